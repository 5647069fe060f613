import { Logger } from '@nestjs/common';
import { CatalogStore } from './catalog-store.interface';
import {
  CatalogData,
  CurrencyRate,
  SubscriptionTier,
  TaxSettings,
  VariableDefinition,
  VariablePricing,
} from './catalog.types';
import { defaultCatalogData } from './default-catalog';

/**
 * In-process catalog store. Seeded with the default catalog and mutable
 * through the admin write path; every load() returns a detached copy.
 */
export class MemoryCatalogStore implements CatalogStore {
  private readonly logger = new Logger(MemoryCatalogStore.name);
  private readonly variables = new Map<string, VariableDefinition>();
  private readonly pricing = new Map<string, VariablePricing>();
  private readonly currencies = new Map<string, CurrencyRate>();
  private tax: TaxSettings;

  constructor(seed: CatalogData = defaultCatalogData()) {
    seed.variables.forEach((variable) =>
      this.variables.set(variable.variableName, { ...variable }),
    );
    seed.pricing.forEach((entry) =>
      this.pricing.set(entry.variableName, {
        ...entry,
        tierPrices: { ...entry.tierPrices },
        tax: entry.tax ? { ...entry.tax } : undefined,
      }),
    );
    seed.currencies.forEach((currency) =>
      this.currencies.set(currency.currencyCode, { ...currency }),
    );
    this.tax = { ...seed.tax };
  }

  async load(): Promise<CatalogData> {
    return {
      variables: Array.from(this.variables.values(), (variable) => ({
        ...variable,
      })),
      pricing: Array.from(this.pricing.values(), (entry) => ({
        ...entry,
        tierPrices: { ...entry.tierPrices },
        tax: entry.tax ? { ...entry.tax } : undefined,
      })),
      currencies: Array.from(this.currencies.values(), (currency) => ({
        ...currency,
      })),
      tax: { ...this.tax },
    };
  }

  upsertVariable(definition: VariableDefinition): void {
    this.variables.set(definition.variableName, { ...definition });
    this.logger.log(
      `Variable ${definition.variableName} routed to ${definition.providerGroup}`,
    );
  }

  removeVariable(variableName: string): boolean {
    this.pricing.delete(variableName);
    return this.variables.delete(variableName);
  }

  setPricing(
    variableName: string,
    basePrice: number,
    tierPrices: Partial<Record<SubscriptionTier, number | null>> = {},
    tax?: TaxSettings,
  ): void {
    this.pricing.set(variableName, {
      variableName,
      basePrice,
      tierPrices: { ...tierPrices },
      tax: tax ? { ...tax } : undefined,
    });
  }

  removePricing(variableName: string): boolean {
    return this.pricing.delete(variableName);
  }

  setExchangeRate(currencyCode: string, exchangeRate: number): void {
    const existing = this.currencies.get(currencyCode);
    this.currencies.set(currencyCode, {
      ...existing,
      currencyCode,
      exchangeRate,
    });
  }

  setTax(tax: TaxSettings): void {
    this.tax = { ...tax };
  }
}
