import {
  Coordinate,
  JsonObject,
  JsonValue,
  ProviderPayload,
} from './forecast.types';

/**
 * Requested variable -> field name some providers use instead
 */
export const FIELD_ALIASES: Readonly<Record<string, string>> = Object.freeze({
  wind_10m: 'wind_speed_10',
  wind_100m: 'wind_speed_100',
});

export type PayloadParseResult =
  | { ok: true; payload: ProviderPayload }
  | { ok: false; error: string };

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasOwn(record: JsonObject, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key);
}

/**
 * Location key used in unified responses, e.g. "26.85,80.95"
 */
export function coordinateKey(coordinate: Coordinate): string {
  return `${coordinate[0]},${coordinate[1]}`;
}

/**
 * Extract a provider error reported inside a response body
 */
export function payloadError(body: unknown): string | undefined {
  if (!isJsonObject(body)) return undefined;

  for (const field of ['Error', 'error']) {
    const value = body[field];
    if (value === undefined || value === null || value === false) continue;
    return typeof value === 'string' ? value : JSON.stringify(value);
  }

  return undefined;
}

/**
 * Normalize a provider body into a positional or keyed payload. A `data`
 * envelope is unwrapped; other envelope fields and non-object records are
 * ignored.
 */
export function parseProviderPayload(body: unknown): PayloadParseResult {
  const error = payloadError(body);
  if (error !== undefined) {
    return { ok: false, error: `Provider error: ${error}` };
  }

  const content = isJsonObject(body) && hasOwn(body, 'data') ? body.data : body;

  if (Array.isArray(content)) {
    return {
      ok: true,
      payload: {
        shape: 'indexed',
        records: content.map((record) =>
          isJsonObject(record) ? record : undefined,
        ),
      },
    };
  }

  if (isJsonObject(content)) {
    const records = new Map<string, JsonObject>();
    for (const [key, record] of Object.entries(content)) {
      if (isJsonObject(record)) {
        records.set(key, record);
      }
    }
    return { ok: true, payload: { shape: 'keyed', records } };
  }

  return {
    ok: false,
    error: `Unrecognized payload shape: ${content === null ? 'null' : typeof content}`,
  };
}

/**
 * Find the record for one requested location. Positional payloads are
 * addressed by index; keyed payloads by "lat,lon", then "lat_lon",
 * "lat_{lat}_lon_{lon}" and finally the index as a string.
 */
export function locateRecord(
  payload: ProviderPayload,
  coordinate: Coordinate,
  index: number,
): JsonObject | undefined {
  if (payload.shape === 'indexed') {
    return payload.records[index];
  }

  const [latitude, longitude] = coordinate;
  const candidates = [
    coordinateKey(coordinate),
    `${latitude}_${longitude}`,
    `lat_${latitude}_lon_${longitude}`,
    String(index),
  ];

  for (const key of candidates) {
    const record = payload.records.get(key);
    if (record) return record;
  }

  return undefined;
}

/**
 * Read one requested variable from a location record, preferring the
 * provider's aliased field name when it is present
 */
export function resolveField(
  record: JsonObject,
  variable: string,
): JsonValue | undefined {
  const alias = FIELD_ALIASES[variable];
  if (alias !== undefined && hasOwn(record, alias)) {
    return record[alias];
  }
  if (hasOwn(record, variable)) {
    return record[variable];
  }
  return undefined;
}
