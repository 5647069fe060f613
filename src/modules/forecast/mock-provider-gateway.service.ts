import { Logger } from '@nestjs/common';
import { ProviderGroup } from '../catalog/catalog.types';
import { JsonObject, ProviderResult, ProviderSubRequest } from './forecast.types';
import { ProviderGateway } from './provider-gateway.interface';
import { coordinateKey, parseProviderPayload } from './provider-payload';

export interface MockProviderOptions {
  /** Artificial latency per group */
  latencyMs?: Record<ProviderGroup, number>;
  /** Groups that answer with the given error instead of data */
  failures?: Record<ProviderGroup, string>;
}

/**
 * Deterministic value for a variable at the given location index
 */
export function mockValue(variable: string, index: number): number {
  const name = variable.toLowerCase();
  if (name.includes('temp')) return 298.15 + index * 2;
  if (name.includes('wind')) return 5.5 + index * 0.5;
  if (name.includes('humidity')) return 65.0 + index * 2;
  if (name.includes('pressure')) return 101325 + index * 100;
  if (name.includes('precipitation')) return 0.5 + index * 0.1;
  if (name.includes('ghi')) return 800 + index * 50;
  if (name.includes('albedo')) return 0.15 + index * 0.01;
  return 0.8 + index * 0.1;
}

/**
 * Offline provider gateway. Synthesizes a keyed payload from mockValue so
 * the pipeline runs without network I/O.
 */
export class MockProviderGateway implements ProviderGateway {
  private readonly logger = new Logger(MockProviderGateway.name);
  readonly calls: ProviderSubRequest[] = [];

  constructor(private readonly options: MockProviderOptions = {}) {}

  async call(subRequest: ProviderSubRequest): Promise<ProviderResult> {
    const { group, variables, coordinates } = subRequest;
    const startedAt = Date.now();
    this.calls.push(subRequest);

    const latency = this.options.latencyMs?.[group] ?? 0;
    if (latency > 0) {
      await new Promise<void>((resolve) => setTimeout(resolve, latency));
    }

    const failure = this.options.failures?.[group];
    if (failure !== undefined) {
      this.logger.warn(`Mock ${group} configured to fail: ${failure}`);
      return {
        group,
        variables,
        success: false,
        error: failure,
        durationMs: Date.now() - startedAt,
      };
    }

    const body: Record<string, JsonObject> = {};
    coordinates.forEach((coordinate, index) => {
      const record: JsonObject = {};
      for (const variable of variables) {
        record[variable] = mockValue(variable, index);
      }
      body[coordinateKey(coordinate)] = record;
    });

    const parsed = parseProviderPayload({ data: body });
    if (!parsed.ok) {
      return {
        group,
        variables,
        success: false,
        error: parsed.error,
        durationMs: Date.now() - startedAt,
      };
    }

    return {
      group,
      variables,
      success: true,
      payload: parsed.payload,
      durationMs: Date.now() - startedAt,
    };
  }
}
