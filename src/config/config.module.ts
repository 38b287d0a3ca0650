import { Module } from "@nestjs/common";
import { ConfigService } from "./config.service";

@Module({
  providers: [
    {
      provide: ConfigService,
      useFactory: () => {
        const configService = new ConfigService();
        const report = configService.validateConfiguration();
        report.warnings.forEach(warning => configService.logWarning(warning, "ConfigValidation"));
        return configService;
      },
    },
  ],
  exports: [ConfigService],
})
export class ConfigModule {}
