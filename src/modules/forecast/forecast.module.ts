import { DynamicModule, Module } from '@nestjs/common';
import { ForecastController } from './forecast.controller';
import { ForecastService } from './forecast.service';
import { RequestPlanner } from './request-planner.service';
import { FanoutExecutor } from './fanout-executor.service';
import { ResponseReconciler } from './response-reconciler.service';
import { HttpProviderGateway } from './http-provider-gateway.service';
import { MockProviderGateway } from './mock-provider-gateway.service';
import { PROVIDER_GATEWAY } from './provider-gateway.interface';
import {
  FORECAST_CONFIG,
  ForecastConfig,
  StorageDriver,
} from '../config/forecast.config';
import { PricingModule } from '../pricing/pricing.module';
import { CatalogModule } from '../catalog/catalog.module';
import { LedgerModule } from '../ledger/ledger.module';
import { LedgerController } from '../ledger/ledger.controller';

@Module({})
export class ForecastModule {
  /**
   * The storage driver selects the catalog store and request ledger backends.
   * Usage stats are served here as they read the catalog's exchange rates.
   */
  static register(driver: StorageDriver): DynamicModule {
    return {
      module: ForecastModule,
      imports: [
        PricingModule,
        CatalogModule.register(driver),
        LedgerModule.register(driver),
      ],
      controllers: [ForecastController, LedgerController],
      providers: [
        ForecastService,
        RequestPlanner,
        FanoutExecutor,
        ResponseReconciler,
        {
          provide: PROVIDER_GATEWAY,
          inject: [FORECAST_CONFIG],
          useFactory: (config: ForecastConfig) =>
            config.useMockProviders
              ? new MockProviderGateway()
              : new HttpProviderGateway(config),
        },
      ],
      exports: [ForecastService],
    };
  }
}
