import { Module } from "@nestjs/common";
import { ConfigModule } from "@/config/config.module";
import { ConfigService } from "@/config/config.service";
import { QualityValidatorService } from "./quality-validator.service";
import { ReferenceWindowStore } from "./reference-window.store";
import { SchemaRegistry } from "./schema.registry";

@Module({
  imports: [ConfigModule],
  providers: [
    ReferenceWindowStore,
    {
      provide: QualityValidatorService,
      useFactory: (windows: ReferenceWindowStore, configService: ConfigService) => {
        const validator = new QualityValidatorService(windows);
        validator.updateConfig(configService.getPipelineConfig().quality);
        return validator;
      },
      inject: [ReferenceWindowStore, ConfigService],
    },
    {
      provide: SchemaRegistry,
      useFactory: (configService: ConfigService) => new SchemaRegistry(configService.getSchemas()),
      inject: [ConfigService],
    },
  ],
  exports: [QualityValidatorService, ReferenceWindowStore, SchemaRegistry],
})
export class ValidationModule {}
