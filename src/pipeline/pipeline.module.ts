import { Module } from "@nestjs/common";
import { AdaptersModule } from "@/adapters/adapters.module";
import { SourceAdapterRegistry } from "@/adapters/base/source-adapter.registry";
import { CollectorModule } from "@/collector/collector.module";
import { CollectorService } from "@/collector/collector.service";
import { ConfigModule } from "@/config/config.module";
import { ConfigService } from "@/config/config.service";
import { QualityValidatorService } from "@/validation/quality-validator.service";
import { SchemaRegistry } from "@/validation/schema.registry";
import { ValidationModule } from "@/validation/validation.module";
import { PipelineCoordinatorService } from "./pipeline-coordinator.service";
import { InMemoryResultSink, JsonFileResultSink, RESULT_SINK, type ResultSink } from "./result-sink";

@Module({
  imports: [ConfigModule, AdaptersModule, CollectorModule, ValidationModule],
  providers: [
    {
      provide: RESULT_SINK,
      useFactory: (configService: ConfigService): ResultSink => {
        const { resultSink, resultSinkDirectory } = configService.getPipelineConfig();
        return resultSink === "file" ? new JsonFileResultSink(resultSinkDirectory) : new InMemoryResultSink();
      },
      inject: [ConfigService],
    },
    {
      provide: PipelineCoordinatorService,
      useFactory: (
        collector: CollectorService,
        validator: QualityValidatorService,
        schemas: SchemaRegistry,
        registry: SourceAdapterRegistry,
        sink: ResultSink,
        configService: ConfigService
      ) => {
        const coordinator = new PipelineCoordinatorService(collector, validator, schemas, registry, sink);
        const config = configService.getPipelineConfig();
        coordinator.updateConfig({
          acceptanceThreshold: config.acceptanceThreshold,
          batchConcurrency: config.batchConcurrency,
        });
        return coordinator;
      },
      inject: [CollectorService, QualityValidatorService, SchemaRegistry, SourceAdapterRegistry, RESULT_SINK, ConfigService],
    },
  ],
  exports: [PipelineCoordinatorService, RESULT_SINK],
})
export class PipelineModule {}
