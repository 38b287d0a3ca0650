import { Module } from "@nestjs/common";

// App controllers
import { CollectionController } from "@/controllers/collection.controller";
import { HealthController } from "@/controllers/health.controller";

// Core modules
import { ConfigModule } from "@/config/config.module";
import { AdaptersModule } from "@/adapters/adapters.module";
import { CollectorModule } from "@/collector/collector.module";
import { ValidationModule } from "@/validation/validation.module";
import { PipelineModule } from "@/pipeline/pipeline.module";

@Module({
  imports: [ConfigModule, AdaptersModule, CollectorModule, ValidationModule, PipelineModule],
  controllers: [CollectionController, HealthController],
})
export class AppModule {}
