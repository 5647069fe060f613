import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
} from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { CATALOG_STORE, CatalogStore } from './catalog-store.interface';
import { CatalogData, PricingTable, VariablePricing } from './catalog.types';
import { VariableCatalog } from './variable-catalog';
import { configuredCatalogData } from './default-catalog';
import { FORECAST_CONFIG, ForecastConfig } from '../config/forecast.config';

export interface CatalogSnapshot {
  readonly version: number;
  readonly loadedAt: Date;
  readonly catalog: VariableCatalog;
  readonly pricing: PricingTable;
}

/**
 * Owns the current catalog snapshot. Queries read one snapshot at planning
 * time; refreshes build a complete new snapshot and swap the reference, so a
 * query never sees a half-updated catalog.
 */
@Injectable()
export class CatalogService implements OnApplicationBootstrap {
  private readonly logger = new Logger(CatalogService.name);
  private current: CatalogSnapshot;
  private version = 0;
  private isRefreshing = false;

  constructor(
    @Inject(CATALOG_STORE)
    private readonly store: CatalogStore,
    @Inject(FORECAST_CONFIG)
    private readonly config: ForecastConfig,
  ) {
    // Usable before the first load completes
    this.current = this.buildSnapshot(configuredCatalogData(config));
  }

  async onApplicationBootstrap(): Promise<void> {
    await this.refresh();
  }

  snapshot(): CatalogSnapshot {
    return this.current;
  }

  /**
   * Reload the catalog from the store every five minutes
   */
  @Cron(CronExpression.EVERY_5_MINUTES)
  async refresh(): Promise<CatalogSnapshot> {
    if (this.isRefreshing) {
      this.logger.warn('Catalog refresh already running, skipping...');
      return this.current;
    }

    this.isRefreshing = true;
    try {
      const data = await this.store.load();
      if (data.variables.length === 0) {
        this.logger.warn(
          'Catalog store returned no variables, keeping previous snapshot',
        );
        return this.current;
      }

      this.current = this.buildSnapshot(data);
      this.logger.log(
        `Catalog snapshot v${this.current.version} loaded with ${this.current.catalog.size} variables`,
      );
    } catch (error) {
      this.logger.error(
        `Catalog refresh failed, keeping snapshot v${this.current.version}:`,
        error instanceof Error ? error.message : String(error),
      );
    } finally {
      this.isRefreshing = false;
    }

    return this.current;
  }

  private buildSnapshot(data: CatalogData): CatalogSnapshot {
    const variables = new Map<string, Readonly<VariablePricing>>();
    for (const entry of data.pricing) {
      variables.set(
        entry.variableName,
        Object.freeze({
          ...entry,
          tierPrices: { ...entry.tierPrices },
          tax: entry.tax ? Object.freeze({ ...entry.tax }) : undefined,
        }),
      );
    }

    const exchangeRates = new Map<string, number>();
    for (const currency of data.currencies) {
      exchangeRates.set(currency.currencyCode, currency.exchangeRate);
    }

    const pricing: PricingTable = Object.freeze({
      baseCurrency: this.config.baseCurrency,
      defaultUnitPrice: this.config.defaultUnitPrice,
      tax: Object.freeze({ ...data.tax }),
      variables,
      exchangeRates,
    });

    return Object.freeze({
      version: this.version++,
      loadedAt: new Date(),
      catalog: new VariableCatalog(data.variables),
      pricing,
    });
  }
}
