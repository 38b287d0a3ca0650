import { Module } from "@nestjs/common";
import { AdaptersModule } from "@/adapters/adapters.module";
import { SourceAdapterRegistry } from "@/adapters/base/source-adapter.registry";
import { RateLimiterService } from "@/common/rate-limiting/rate-limiter.service";
import { ConfigModule } from "@/config/config.module";
import { ConfigService } from "@/config/config.service";
import { CollectorService } from "./collector.service";

@Module({
  imports: [ConfigModule, AdaptersModule],
  providers: [
    {
      provide: CollectorService,
      useFactory: (registry: SourceAdapterRegistry, rateLimiter: RateLimiterService, configService: ConfigService) => {
        const collector = new CollectorService(registry, rateLimiter);
        collector.updateConfig({ defaultTimeoutMs: configService.getPipelineConfig().attemptTimeoutMs });
        return collector;
      },
      inject: [SourceAdapterRegistry, RateLimiterService, ConfigService],
    },
  ],
  exports: [CollectorService],
})
export class CollectorModule {}
