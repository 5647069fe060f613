import { DynamicModule, Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { WeatherRequest } from './weather-request.entity';
import { REQUEST_LEDGER } from './request-ledger.interface';
import { DatabaseRequestLedger } from './database-request-ledger.service';
import { MemoryRequestLedger } from './memory-request-ledger.service';
import { StorageDriver } from '../config/forecast.config';

@Module({})
export class LedgerModule {
  static register(driver: StorageDriver): DynamicModule {
    if (driver === 'memory') {
      return {
        module: LedgerModule,
        providers: [
          { provide: REQUEST_LEDGER, useFactory: () => new MemoryRequestLedger() },
        ],
        exports: [REQUEST_LEDGER],
      };
    }

    return {
      module: LedgerModule,
      imports: [TypeOrmModule.forFeature([WeatherRequest])],
      providers: [
        DatabaseRequestLedger,
        { provide: REQUEST_LEDGER, useExisting: DatabaseRequestLedger },
      ],
      exports: [REQUEST_LEDGER],
    };
  }
}
