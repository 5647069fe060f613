/**
 * Provider groups are named by the catalog, so they stay plain strings.
 * The groups shipped with the default catalog are listed in KNOWN_PROVIDER_GROUPS.
 */
export type ProviderGroup = string;

export const KNOWN_PROVIDER_GROUPS = ['omega', 'nova', 'arc'] as const;

export enum SubscriptionTier {
  FREE = 'free',
  DEVELOPER = 'developer',
  BUSINESS = 'business',
  ENTERPRISE = 'enterprise',
}

export interface VariableDefinition {
  variableName: string;
  providerGroup: ProviderGroup;
  unit: string;
  dataType: string;
  description?: string;
}

export type TierPrices = Partial<Record<SubscriptionTier, number | null>>;

export interface VariablePricing {
  variableName: string;
  basePrice: number;
  tierPrices: TierPrices;
  /** Tax stored with this variable's price row, if the store keeps one */
  tax?: TaxSettings;
}

export interface CurrencyRate {
  currencyCode: string;
  exchangeRate: number;
  currencySymbol?: string;
  currencyName?: string;
}

export interface TaxSettings {
  rate: number;
  enabled: boolean;
}

/**
 * Raw catalog contents as returned by a CatalogStore
 */
export interface CatalogData {
  variables: VariableDefinition[];
  pricing: VariablePricing[];
  currencies: CurrencyRate[];
  tax: TaxSettings;
}

/**
 * Pricing lookups frozen at snapshot time
 */
export interface PricingTable {
  readonly baseCurrency: string;
  readonly defaultUnitPrice: number;
  readonly tax: Readonly<TaxSettings>;
  readonly variables: ReadonlyMap<string, Readonly<VariablePricing>>;
  readonly exchangeRates: ReadonlyMap<string, number>;
}

export function isSubscriptionTier(value: unknown): value is SubscriptionTier {
  return (
    typeof value === 'string' &&
    Object.values(SubscriptionTier).some((tier) => tier === value)
  );
}
