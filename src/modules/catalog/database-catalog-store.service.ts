import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { CatalogStore } from './catalog-store.interface';
import {
  CatalogData,
  CurrencyRate,
  SubscriptionTier,
  TierPrices,
  VariableDefinition,
  VariablePricing,
} from './catalog.types';
import { VariableMapping } from './variable-mapping.entity';
import { PricingConfig } from './pricing-config.entity';
import { CurrencyConfig } from './currency-config.entity';
import { configuredCatalogData } from './default-catalog';
import { FORECAST_CONFIG, ForecastConfig } from '../config/forecast.config';

@Injectable()
export class DatabaseCatalogStore implements CatalogStore, OnModuleInit {
  private readonly logger = new Logger(DatabaseCatalogStore.name);

  constructor(
    @InjectRepository(VariableMapping)
    private readonly variableRepository: Repository<VariableMapping>,
    @InjectRepository(PricingConfig)
    private readonly pricingRepository: Repository<PricingConfig>,
    @InjectRepository(CurrencyConfig)
    private readonly currencyRepository: Repository<CurrencyConfig>,
    @Inject(FORECAST_CONFIG)
    private readonly config: ForecastConfig,
  ) {}

  /**
   * Seed the catalog tables when they are empty
   */
  async onModuleInit(): Promise<void> {
    try {
      await this.seedDefaults();
    } catch (error) {
      this.logger.error(
        'Failed to seed catalog tables:',
        error instanceof Error ? error.stack : String(error),
      );
    }
  }

  async load(): Promise<CatalogData> {
    const [variableRows, pricingRows, currencyRows] = await Promise.all([
      this.variableRepository.find({
        where: { isActive: true },
        order: { variableName: 'ASC' },
      }),
      this.pricingRepository.find({
        where: { isActive: true },
        order: { createdAt: 'ASC' },
      }),
      this.currencyRepository.find({ where: { isActive: true } }),
    ]);

    const variables: VariableDefinition[] = variableRows.map((row) => ({
      variableName: row.variableName,
      providerGroup: row.providerGroup,
      unit: row.unit ?? '-',
      dataType: row.dataType,
      description: row.description ?? undefined,
    }));

    const pricing: VariablePricing[] = pricingRows.map((row) => ({
      variableName: row.variableName,
      basePrice: row.basePrice,
      tierPrices: this.toTierPrices(row),
      tax: { rate: row.taxRate, enabled: row.taxEnabled },
    }));

    const currencies: CurrencyRate[] = currencyRows.map((row) => ({
      currencyCode: row.currencyCode,
      exchangeRate: row.exchangeRate,
      currencySymbol: row.currencySymbol,
      currencyName: row.currencyName,
    }));

    // Rows carry their own tax; this applies to variables without a row
    const tax = { rate: this.config.taxRate, enabled: this.config.taxEnabled };

    this.logger.debug(
      `Loaded catalog: ${variables.length} variables, ${pricing.length} prices, ${currencies.length} currencies`,
    );

    return { variables, pricing, currencies, tax };
  }

  private toTierPrices(row: PricingConfig): TierPrices {
    return {
      [SubscriptionTier.FREE]: row.freePlanPrice,
      [SubscriptionTier.DEVELOPER]: row.developerPlanPrice,
      [SubscriptionTier.BUSINESS]: row.businessPlanPrice,
      [SubscriptionTier.ENTERPRISE]: row.enterprisePlanPrice,
    };
  }

  private async seedDefaults(): Promise<void> {
    const defaults = configuredCatalogData(this.config);

    if ((await this.variableRepository.count()) === 0) {
      await this.variableRepository.save(
        defaults.variables.map((variable) =>
          this.variableRepository.create({
            variableName: variable.variableName,
            providerGroup: variable.providerGroup,
            description: variable.description ?? null,
            unit: variable.unit,
            dataType: variable.dataType,
          }),
        ),
      );
      this.logger.log(`Seeded ${defaults.variables.length} variable mappings`);
    }

    if ((await this.pricingRepository.count()) === 0) {
      const groups = new Map(
        defaults.variables.map((v): [string, string] => [
          v.variableName,
          v.providerGroup,
        ]),
      );
      await this.pricingRepository.save(
        defaults.pricing.map((entry) =>
          this.pricingRepository.create({
            variableName: entry.variableName,
            providerGroup: groups.get(entry.variableName) ?? 'unknown',
            basePrice: entry.basePrice,
            currency: this.config.baseCurrency,
            taxRate: defaults.tax.rate,
            taxEnabled: defaults.tax.enabled,
          }),
        ),
      );
      this.logger.log(`Seeded ${defaults.pricing.length} pricing configurations`);
    }

    if ((await this.currencyRepository.count()) === 0) {
      await this.currencyRepository.save(
        defaults.currencies.map((currency) =>
          this.currencyRepository.create({
            currencyCode: currency.currencyCode,
            currencySymbol: currency.currencySymbol ?? currency.currencyCode,
            currencyName: currency.currencyName ?? currency.currencyCode,
            exchangeRate: currency.exchangeRate,
          }),
        ),
      );
      this.logger.log(
        `Seeded ${defaults.currencies.length} currency configurations`,
      );
    }
  }
}
