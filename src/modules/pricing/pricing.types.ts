import { SubscriptionTier } from '../catalog/catalog.types';

export interface PricingCaller {
  tier?: SubscriptionTier;
  currency?: string;
}

export type UnitPriceSource = 'tier' | 'base' | 'default';

export interface ResolvedUnitPrice {
  variableName: string;
  price: number;
  source: UnitPriceSource;
}

/**
 * Full-precision pricing outcome. Amounts are in `currency`.
 */
export interface PricingResult {
  subtotal: number;
  currency: string;
  taxRate: number;
  taxEnabled: boolean;
  taxAmount: number;
  finalAmount: number;
  unitPrices: ResolvedUnitPrice[];
}

/**
 * Two-decimal rendering used in response metadata
 */
export interface PricingDisplay {
  totalCost: string;
  currency: string;
  taxApplied: boolean;
  taxRate: string;
  taxAmount: string;
  finalAmount: string;
}
