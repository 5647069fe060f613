import { DynamicModule, Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { VariableMapping } from './variable-mapping.entity';
import { PricingConfig } from './pricing-config.entity';
import { CurrencyConfig } from './currency-config.entity';
import { CATALOG_STORE } from './catalog-store.interface';
import { DatabaseCatalogStore } from './database-catalog-store.service';
import { MemoryCatalogStore } from './memory-catalog-store.service';
import { CatalogService } from './catalog.service';
import { CatalogController } from './catalog.controller';
import { PricingModule } from '../pricing/pricing.module';
import { configuredCatalogData } from './default-catalog';
import {
  FORECAST_CONFIG,
  ForecastConfig,
  StorageDriver,
} from '../config/forecast.config';

@Module({})
export class CatalogModule {
  static register(driver: StorageDriver): DynamicModule {
    const shared = {
      module: CatalogModule,
      controllers: [CatalogController],
      exports: [CatalogService, CATALOG_STORE],
    };

    if (driver === 'memory') {
      return {
        ...shared,
        imports: [PricingModule],
        providers: [
          CatalogService,
          {
            provide: CATALOG_STORE,
            inject: [FORECAST_CONFIG],
            useFactory: (config: ForecastConfig) =>
              new MemoryCatalogStore(configuredCatalogData(config)),
          },
        ],
      };
    }

    return {
      ...shared,
      imports: [
        TypeOrmModule.forFeature([VariableMapping, PricingConfig, CurrencyConfig]),
        PricingModule,
      ],
      providers: [
        CatalogService,
        DatabaseCatalogStore,
        { provide: CATALOG_STORE, useExisting: DatabaseCatalogStore },
      ],
    };
  }
}
