import { ProviderResult, ProviderSubRequest } from './forecast.types';

export const PROVIDER_GATEWAY = Symbol('PROVIDER_GATEWAY');

/**
 * One upstream call per sub-request. Remote failures are reported through
 * the result; only configuration errors may be thrown.
 */
export interface ProviderGateway {
  call(subRequest: ProviderSubRequest): Promise<ProviderResult>;
}

/**
 * Request body sent to every provider group
 */
export interface ProviderWireRequest {
  coordinates: Array<[number, number]>;
  timestamp: string;
  variables: string[];
  timezone: string;
}

export function toWireRequest(subRequest: ProviderSubRequest): ProviderWireRequest {
  return {
    coordinates: subRequest.coordinates.map(
      ([latitude, longitude]): [number, number] => [latitude, longitude],
    ),
    timestamp: subRequest.timestamp,
    variables: [...subRequest.variables],
    timezone: subRequest.timezone,
  };
}
