import { DynamicModule, Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { StatusModule } from './modules/status/status.module';
import { ForecastModule } from './modules/forecast/forecast.module';
import { ForecastConfigModule } from './modules/config/forecast-config.module';
import { resolveStorageDriver } from './modules/config/forecast.config';

/**
 * Evaluated after ConfigModule.forRoot() has loaded .env into process.env
 */
function storageImports(): DynamicModule[] {
  const driver = resolveStorageDriver();
  const database =
    driver === 'database'
      ? [
          TypeOrmModule.forRootAsync({
            imports: [ConfigModule],
            inject: [ConfigService],
            useFactory: (configService: ConfigService) => ({
              type: 'postgres',
              host: configService.get('DB_HOST', 'localhost'),
              port: Number(configService.get('DB_PORT', 5432)),
              username: configService.get('DB_USER', 'postgres'),
              password: configService.get('DB_PASS', 'postgres'),
              database: configService.get('DB_NAME', 'forecast'),
              autoLoadEntities: true,
              synchronize: true,
            }),
          }),
        ]
      : [];

  return [...database, ForecastModule.register(driver)];
}

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    ForecastConfigModule,
    ScheduleModule.forRoot(),
    ...storageImports(),
    StatusModule,
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
