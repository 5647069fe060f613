import defaultCatalog from './default-catalog.json';
import {
  CatalogData,
  CurrencyRate,
  TaxSettings,
  VariableDefinition,
  VariablePricing,
} from './catalog.types';

export function defaultVariables(): VariableDefinition[] {
  return defaultCatalog.variables.map((variable) => ({ ...variable }));
}

export function defaultPricing(): VariablePricing[] {
  return defaultCatalog.variables.map((variable) => ({
    variableName: variable.variableName,
    basePrice: defaultCatalog.pricing.basePrice,
    tierPrices: {},
  }));
}

export function defaultCurrencies(): CurrencyRate[] {
  return defaultCatalog.currencies.map((currency) => ({ ...currency }));
}

/**
 * Seed catalog: 14 variables over omega/nova/arc, 1.0 per variable per
 * location, 18% tax
 */
export function defaultCatalogData(): CatalogData {
  return {
    variables: defaultVariables(),
    pricing: defaultPricing(),
    currencies: defaultCurrencies(),
    tax: {
      rate: defaultCatalog.pricing.taxRate,
      enabled: defaultCatalog.pricing.taxEnabled,
    },
  };
}

/**
 * Re-quote the seed rates against another base currency. A base the seed
 * does not know leaves only the base itself, at 1.0.
 */
export function rebaseCurrencies(
  currencies: CurrencyRate[],
  baseCurrency: string,
): CurrencyRate[] {
  const base = currencies.find(
    (currency) => currency.currencyCode === baseCurrency,
  );

  if (!base || !(base.exchangeRate > 0)) {
    return [{ currencyCode: baseCurrency, exchangeRate: 1 }];
  }

  return currencies.map((currency) => ({
    ...currency,
    exchangeRate:
      currency.currencyCode === baseCurrency
        ? 1
        : currency.exchangeRate / base.exchangeRate,
  }));
}

/**
 * Seed catalog with the configured base currency and tax settings applied
 */
export function configuredCatalogData(settings: {
  baseCurrency: string;
  taxRate: number;
  taxEnabled: boolean;
}): CatalogData {
  const defaults = defaultCatalogData();
  const tax: TaxSettings = {
    rate: settings.taxRate,
    enabled: settings.taxEnabled,
  };

  return {
    ...defaults,
    currencies: rebaseCurrencies(defaults.currencies, settings.baseCurrency),
    tax,
  };
}
