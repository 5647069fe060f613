import { ConfigService } from '@nestjs/config';
import { KNOWN_PROVIDER_GROUPS, ProviderGroup } from '../catalog/catalog.types';

export const FORECAST_CONFIG = Symbol('FORECAST_CONFIG');

export type StorageDriver = 'database' | 'memory';

/**
 * Catalog and ledger persistence backend. Read from the environment at
 * module composition time, after ConfigModule has loaded .env.
 */
export function resolveStorageDriver(
  env: NodeJS.ProcessEnv = process.env,
): StorageDriver {
  return env.STORAGE_DRIVER === 'memory' ? 'memory' : 'database';
}

export interface ForecastConfig {
  /** Endpoint per provider group; a group missing here cannot be called */
  readonly providerEndpoints: Readonly<Record<ProviderGroup, string>>;
  readonly providerTimeoutMs: number;
  readonly maxConcurrentCalls: number;
  readonly useMockProviders: boolean;
  readonly defaultTimezone: string;
  readonly baseCurrency: string;
  readonly defaultUnitPrice: number;
  readonly taxRate: number;
  readonly taxEnabled: boolean;
}

const DEFAULT_PROVIDER_BASE_URL =
  'https://provider.example.com/forecast/multiple';

function readNumber(
  configService: ConfigService,
  key: string,
  fallback: number,
): number {
  const raw = configService.get<string | number>(key);
  if (raw === undefined || raw === '') return fallback;
  const parsed = typeof raw === 'number' ? raw : parseFloat(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function readBoolean(
  configService: ConfigService,
  key: string,
  fallback: boolean,
): boolean {
  const raw = configService.get<string | boolean>(key);
  if (raw === undefined || raw === '') return fallback;
  if (typeof raw === 'boolean') return raw;
  return ['true', '1', 'yes'].includes(raw.toLowerCase());
}

/**
 * Build the immutable engine configuration once at startup.
 */
export function buildForecastConfig(
  configService: ConfigService,
): ForecastConfig {
  const baseUrl = configService
    .get<string>('PROVIDER_BASE_URL', DEFAULT_PROVIDER_BASE_URL)
    .replace(/\/+$/, '');

  const providerEndpoints: Record<ProviderGroup, string> = {};
  for (const group of KNOWN_PROVIDER_GROUPS) {
    providerEndpoints[group] = configService.get<string>(
      `PROVIDER_${group.toUpperCase()}_URL`,
      `${baseUrl}/${group}`,
    );
  }

  return Object.freeze({
    providerEndpoints: Object.freeze(providerEndpoints),
    providerTimeoutMs: readNumber(configService, 'PROVIDER_TIMEOUT_MS', 30000),
    maxConcurrentCalls: Math.max(
      1,
      Math.floor(readNumber(configService, 'PROVIDER_MAX_CONCURRENCY', 3)),
    ),
    useMockProviders: readBoolean(configService, 'USE_MOCK_PROVIDERS', false),
    defaultTimezone: configService.get<string>(
      'DEFAULT_TIMEZONE',
      'Asia/Kolkata',
    ),
    baseCurrency: configService.get<string>('BASE_CURRENCY', 'INR'),
    defaultUnitPrice: readNumber(configService, 'DEFAULT_UNIT_PRICE', 1),
    taxRate: readNumber(configService, 'TAX_RATE', 18),
    taxEnabled: readBoolean(configService, 'TAX_ENABLED', true),
  });
}
