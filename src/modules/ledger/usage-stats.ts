import { StoredWeatherRequest } from './request-ledger.interface';
import { PricingTable } from '../catalog/catalog.types';

export interface UsageStats {
  totalRequests: number;
  /** Final amounts converted into `currency` */
  totalCost: number;
  currency: string;
  /** Final amounts as charged, per currency */
  costByCurrency: Record<string, number>;
  variablesUsed: Record<string, number>;
  endpointsUsed: Record<string, number>;
  locationsQueried: number;
  averageResponseTime: number;
  successRate: number;
  recentRequests: StoredWeatherRequest[];
}

export type CurrencyTable = Pick<
  PricingTable,
  'baseCurrency' | 'exchangeRates'
>;

/**
 * Amount in the base currency, or undefined when the currency has no usable
 * rate in the table
 */
export function toBaseAmount(
  amount: number,
  currency: string,
  table: CurrencyTable,
): number | undefined {
  if (currency === table.baseCurrency) return amount;
  const rate = table.exchangeRates.get(currency);
  if (rate === undefined || !Number.isFinite(rate) || rate <= 0) {
    return undefined;
  }
  return amount / rate;
}

/**
 * Aggregate a caller's ledger entries. Final amounts are converted back into
 * the base currency for `totalCost`; amounts in a currency without a usable
 * rate only appear in `costByCurrency`.
 */
export function summarizeUsage(
  records: StoredWeatherRequest[],
  limit = 10,
  currencies: CurrencyTable = {
    baseCurrency: 'INR',
    exchangeRates: new Map<string, number>(),
  },
): UsageStats {
  if (records.length === 0) {
    return {
      totalRequests: 0,
      totalCost: 0,
      currency: currencies.baseCurrency,
      costByCurrency: {},
      variablesUsed: {},
      endpointsUsed: {},
      locationsQueried: 0,
      averageResponseTime: 0,
      successRate: 0,
      recentRequests: [],
    };
  }

  const variablesUsed: Record<string, number> = {};
  const endpointsUsed: Record<string, number> = {};
  const costByCurrency: Record<string, number> = {};
  let totalCost = 0;
  let locationsQueried = 0;
  let responseTime = 0;
  let successes = 0;

  for (const record of records) {
    costByCurrency[record.currency] =
      (costByCurrency[record.currency] ?? 0) + record.finalAmount;
    totalCost +=
      toBaseAmount(record.finalAmount, record.currency, currencies) ?? 0;
    locationsQueried += record.locations.length;
    responseTime += record.responseTime;
    if (record.success) successes++;

    for (const variable of record.variables) {
      variablesUsed[variable] = (variablesUsed[variable] ?? 0) + 1;
    }
    for (const endpoint of record.endpointsCalled) {
      endpointsUsed[endpoint] = (endpointsUsed[endpoint] ?? 0) + 1;
    }
  }

  const recentRequests = [...records]
    .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
    .slice(0, Math.max(0, limit));

  return {
    totalRequests: records.length,
    totalCost,
    currency: currencies.baseCurrency,
    costByCurrency,
    variablesUsed,
    endpointsUsed,
    locationsQueried,
    averageResponseTime: responseTime / records.length,
    successRate: (successes / records.length) * 100,
    recentRequests,
  };
}
