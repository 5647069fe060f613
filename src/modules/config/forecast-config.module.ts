import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { FORECAST_CONFIG, buildForecastConfig } from './forecast.config';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: FORECAST_CONFIG,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        buildForecastConfig(configService),
    },
  ],
  exports: [FORECAST_CONFIG],
})
export class ForecastConfigModule {}
