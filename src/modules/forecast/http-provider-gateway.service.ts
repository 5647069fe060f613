import { Inject, Injectable, Logger } from '@nestjs/common';
import axios from 'axios';
import { FORECAST_CONFIG, ForecastConfig } from '../config/forecast.config';
import { UnknownProviderGroupError } from './forecast.errors';
import { ProviderResult, ProviderSubRequest } from './forecast.types';
import { ProviderGateway, toWireRequest } from './provider-gateway.interface';
import { parseProviderPayload, payloadError } from './provider-payload';

function describeBody(body: unknown): string {
  if (body === undefined || body === null || body === '') return 'empty body';
  const text = typeof body === 'string' ? body : JSON.stringify(body);
  return text.length > 200 ? `${text.slice(0, 200)}...` : text;
}

@Injectable()
export class HttpProviderGateway implements ProviderGateway {
  private readonly logger = new Logger(HttpProviderGateway.name);

  constructor(
    @Inject(FORECAST_CONFIG)
    private readonly config: ForecastConfig,
  ) {}

  endpointFor(group: string): string {
    const url = this.config.providerEndpoints[group];
    if (!url) {
      throw new UnknownProviderGroupError(group);
    }
    return url;
  }

  async call(subRequest: ProviderSubRequest): Promise<ProviderResult> {
    const { group, variables } = subRequest;
    const url = this.endpointFor(group);
    const startedAt = Date.now();
    const failure = (error: string): ProviderResult => {
      this.logger.error(`Error from ${group}: ${error}`);
      return {
        group,
        variables,
        success: false,
        error,
        durationMs: Date.now() - startedAt,
      };
    };

    try {
      this.logger.log(`Making request to ${group} endpoint: ${url}`);

      const response = await axios.post<unknown>(
        url,
        toWireRequest(subRequest),
        {
          timeout: this.config.providerTimeoutMs,
          // timeout only bounds socket idle time; the signal bounds the whole call
          signal: AbortSignal.timeout(this.config.providerTimeoutMs),
          // Status handling happens below so every outcome becomes a result
          validateStatus: () => true,
        },
      );

      if (response.status < 200 || response.status >= 300) {
        const reported = payloadError(response.data);
        return failure(
          reported !== undefined
            ? `HTTP ${response.status}: ${reported}`
            : `HTTP ${response.status}: ${describeBody(response.data)}`,
        );
      }

      const parsed = parseProviderPayload(response.data);
      if (!parsed.ok) {
        return failure(parsed.error);
      }

      const durationMs = Date.now() - startedAt;
      this.logger.debug(`${group} answered in ${durationMs}ms`);

      return {
        group,
        variables,
        success: true,
        payload: parsed.payload,
        durationMs,
      };
    } catch (error) {
      if (axios.isAxiosError(error)) {
        if (
          error.code === 'ECONNABORTED' ||
          error.code === 'ETIMEDOUT' ||
          error.code === 'ERR_CANCELED'
        ) {
          return failure(
            `Request timed out after ${this.config.providerTimeoutMs}ms`,
          );
        }
        return failure(`Request failed: ${error.message}`);
      }
      return failure(
        `Request failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}
