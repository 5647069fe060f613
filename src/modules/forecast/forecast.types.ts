import { ProviderGroup, SubscriptionTier } from '../catalog/catalog.types';
import { PricingDisplay } from '../pricing/pricing.types';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/** [latitude, longitude] */
export type Coordinate = readonly [number, number];

export interface ForecastQueryInput {
  coordinates: unknown[];
  variables: string[];
  timestamp: string;
  timezone: string;
}

export interface ForecastQuery {
  coordinates: Coordinate[];
  variables: string[];
  timestamp: string;
  timezone: string;
  /** The requested timestamp as an absolute instant */
  instant: Date;
}

export interface ProviderSubRequest {
  group: ProviderGroup;
  coordinates: Coordinate[];
  variables: string[];
  timestamp: string;
  timezone: string;
}

export interface ForecastPlan {
  query: ForecastQuery;
  subRequests: ProviderSubRequest[];
}

/**
 * Per-location records as sent by a provider, either positional or keyed by
 * a location string
 */
export type ProviderPayload =
  | { shape: 'indexed'; records: Array<JsonObject | undefined> }
  | { shape: 'keyed'; records: ReadonlyMap<string, JsonObject> };

interface ProviderResultBase {
  group: ProviderGroup;
  variables: string[];
  durationMs: number;
}

export interface ProviderSuccess extends ProviderResultBase {
  success: true;
  payload: ProviderPayload;
}

export interface ProviderFailure extends ProviderResultBase {
  success: false;
  error: string;
}

export type ProviderResult = ProviderSuccess | ProviderFailure;

export type LocationData = Record<string, Record<string, JsonValue>>;

export interface ReconciliationGap {
  coordinateKey: string;
  variable: string;
}

export interface ForecastCaller {
  userId?: string;
  apiKeyId?: string;
  tier?: SubscriptionTier;
  currency?: string;
  ipAddress?: string;
  userAgent?: string;
}

export interface ForecastMetadata extends PricingDisplay {
  timestamp: string;
  timezone: string;
  endpointsCalled: ProviderGroup[];
  variablesRequested: string[];
  locationsCount: number;
}

export interface ForecastResponse {
  locationData: LocationData;
  metadata: ForecastMetadata;
}
