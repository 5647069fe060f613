import { Injectable, Logger } from '@nestjs/common';
import {
  PricingTable,
  SubscriptionTier,
  TaxSettings,
} from '../catalog/catalog.types';
import {
  PricingCaller,
  PricingDisplay,
  PricingResult,
  ResolvedUnitPrice,
} from './pricing.types';

export const PRICING_EXAMPLE_VARIABLES = ['ambient_temp(K)', 'ghi(W/m2)'];
export const PRICING_EXAMPLE_LOCATIONS = 2;

function isValidPrice(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

/**
 * Layered request pricing: unit price resolution, per-location subtotal,
 * currency conversion and tax. Never throws; anomalies are logged and the
 * documented fallback is used instead.
 */
@Injectable()
export class PricingEngine {
  private readonly logger = new Logger(PricingEngine.name);

  /**
   * Precedence: caller's tier override, then base price, then the system
   * default for variables without a pricing entry
   */
  resolveUnitPrice(
    variableName: string,
    table: PricingTable,
    tier?: SubscriptionTier,
  ): ResolvedUnitPrice {
    const entry = table.variables.get(variableName);

    if (!entry) {
      return {
        variableName,
        price: table.defaultUnitPrice,
        source: 'default',
      };
    }

    if (tier !== undefined) {
      const override = entry.tierPrices[tier];
      if (isValidPrice(override)) {
        return { variableName, price: override, source: 'tier' };
      }
      if (override !== null && override !== undefined) {
        this.logger.warn(
          `Ignoring invalid ${tier} price ${override} for ${variableName}`,
        );
      }
    }

    if (isValidPrice(entry.basePrice)) {
      return { variableName, price: entry.basePrice, source: 'base' };
    }

    this.logger.warn(
      `Invalid base price ${entry.basePrice} for ${variableName}, using default ${table.defaultUnitPrice}`,
    );
    return { variableName, price: table.defaultUnitPrice, source: 'default' };
  }

  /**
   * Convert an amount from the base currency. Unknown currencies and
   * unusable rates leave the amount in the base currency.
   */
  convert(
    amount: number,
    targetCurrency: string | undefined,
    table: PricingTable,
  ): { amount: number; currency: string } {
    if (!targetCurrency || targetCurrency === table.baseCurrency) {
      return { amount, currency: table.baseCurrency };
    }

    const rate = table.exchangeRates.get(targetCurrency);
    if (rate === undefined) {
      this.logger.warn(
        `Unknown currency ${targetCurrency}, pricing in ${table.baseCurrency}`,
      );
      return { amount, currency: table.baseCurrency };
    }

    if (!Number.isFinite(rate) || rate <= 0) {
      this.logger.warn(
        `Invalid exchange rate ${rate} for ${targetCurrency}, pricing in ${table.baseCurrency}`,
      );
      return { amount, currency: table.baseCurrency };
    }

    return { amount: amount * rate, currency: targetCurrency };
  }

  /** Tax of the first requested variable whose row carries one, else the table default */
  resolveTax(
    variables: string[],
    table: PricingTable,
  ): Readonly<TaxSettings> {
    for (const variable of variables) {
      const tax = table.variables.get(variable)?.tax;
      if (tax) return tax;
    }
    return table.tax;
  }

  calculate(
    variables: string[],
    coordinateCount: number,
    table: PricingTable,
    caller: PricingCaller = {},
  ): PricingResult {
    const distinct = Array.from(new Set(variables));
    const unitPrices = distinct.map((variable) =>
      this.resolveUnitPrice(variable, table, caller.tier),
    );

    const baseSubtotal = unitPrices.reduce(
      (sum, unit) => sum + unit.price * coordinateCount,
      0,
    );

    const { amount: subtotal, currency } = this.convert(
      baseSubtotal,
      caller.currency,
      table,
    );

    const tax = this.resolveTax(distinct, table);
    let taxRate = tax.rate;
    if (!Number.isFinite(taxRate) || taxRate < 0) {
      this.logger.warn(`Invalid tax rate ${taxRate}, applying no tax`);
      taxRate = 0;
    }
    const taxEnabled = tax.enabled;
    const taxAmount = taxEnabled ? (subtotal * taxRate) / 100 : 0;

    return {
      subtotal,
      currency,
      taxRate,
      taxEnabled,
      taxAmount,
      finalAmount: subtotal + taxAmount,
      unitPrices,
    };
  }

  format(result: PricingResult): PricingDisplay {
    return {
      totalCost: result.subtotal.toFixed(2),
      currency: result.currency,
      taxApplied: result.taxEnabled,
      taxRate: `${result.taxRate}%`,
      taxAmount: result.taxAmount.toFixed(2),
      finalAmount: result.finalAmount.toFixed(2),
    };
  }

  /**
   * Worked example for the pricing information endpoint
   */
  example(table: PricingTable): {
    variables: string[];
    locations: number;
    costPerVariablePerLocation: number;
    totalCost: number;
    taxRate: number;
    taxAmount: number;
    finalAmount: number;
    currency: string;
  } {
    const result = this.calculate(
      PRICING_EXAMPLE_VARIABLES,
      PRICING_EXAMPLE_LOCATIONS,
      table,
    );

    return {
      variables: [...PRICING_EXAMPLE_VARIABLES],
      locations: PRICING_EXAMPLE_LOCATIONS,
      costPerVariablePerLocation:
        result.subtotal /
        (PRICING_EXAMPLE_VARIABLES.length * PRICING_EXAMPLE_LOCATIONS),
      totalCost: result.subtotal,
      taxRate: result.taxRate,
      taxAmount: result.taxAmount,
      finalAmount: result.finalAmount,
      currency: result.currency,
    };
  }
}
