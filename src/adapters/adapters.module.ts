import { Module } from "@nestjs/common";
import { RateLimiterService } from "@/common/rate-limiting/rate-limiter.service";
import { ConfigModule } from "@/config/config.module";
import { ConfigService } from "@/config/config.service";
import { SourceAdapterRegistry } from "./base/source-adapter.registry";
import { registerSources } from "./source-adapter.factory";

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: RateLimiterService,
      useFactory: (configService: ConfigService) => {
        return new RateLimiterService({ defaultLimit: configService.getPipelineConfig().defaultRateLimit });
      },
      inject: [ConfigService],
    },

    // Registry is populated from the source definitions before anything can collect
    {
      provide: SourceAdapterRegistry,
      useFactory: (configService: ConfigService, rateLimiter: RateLimiterService) => {
        const registry = new SourceAdapterRegistry();
        registerSources(registry, rateLimiter, configService.getSourceDefinitions());
        return registry;
      },
      inject: [ConfigService, RateLimiterService],
    },
  ],
  exports: [SourceAdapterRegistry, RateLimiterService],
})
export class AdaptersModule {}
