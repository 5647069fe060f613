export const REQUEST_LEDGER = Symbol('REQUEST_LEDGER');

/**
 * One completed (or failed) forecast query with its pricing
 */
export interface WeatherRequestRecord {
  userId?: string;
  apiKeyId?: string;
  locations: number[][];
  variables: string[];
  timestamp: string;
  timezone: string;
  endpointsCalled: string[];
  responseStatus: number;
  responseTime: number;
  success: boolean;
  errorMessage?: string;
  totalCost: number;
  currency: string;
  taxAmount: number;
  finalAmount: number;
  ipAddress?: string;
  userAgent?: string;
}

export interface StoredWeatherRequest extends WeatherRequestRecord {
  id: string;
  createdAt: Date;
}

export interface RequestLedger {
  record(entry: WeatherRequestRecord): Promise<void>;
  findForUser(userId: string): Promise<StoredWeatherRequest[]>;
}
