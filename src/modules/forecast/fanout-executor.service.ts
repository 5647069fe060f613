import { Inject, Injectable, Logger } from '@nestjs/common';
import { FORECAST_CONFIG, ForecastConfig } from '../config/forecast.config';
import { AllProvidersFailedError } from './forecast.errors';
import { ProviderResult, ProviderSubRequest } from './forecast.types';
import {
  PROVIDER_GATEWAY,
  ProviderGateway,
} from './provider-gateway.interface';

/**
 * Runs every sub-request concurrently (bounded by maxConcurrentCalls) and
 * joins all of them. A failing or slow provider never cancels its siblings.
 */
@Injectable()
export class FanoutExecutor {
  private readonly logger = new Logger(FanoutExecutor.name);

  constructor(
    @Inject(PROVIDER_GATEWAY)
    private readonly gateway: ProviderGateway,
    @Inject(FORECAST_CONFIG)
    private readonly config: ForecastConfig,
  ) {}

  async execute(subRequests: ProviderSubRequest[]): Promise<ProviderResult[]> {
    const startTime = Date.now();
    const settled = await this.runBounded(
      subRequests.map((subRequest) => () => this.gateway.call(subRequest)),
      this.config.maxConcurrentCalls,
    );

    const results: ProviderResult[] = [];
    let programmerError: unknown;

    settled.forEach((outcome, index) => {
      if (outcome.status === 'rejected') {
        this.logger.error(
          `Provider call for ${subRequests[index].group} threw:`,
          outcome.reason instanceof Error
            ? outcome.reason.stack
            : String(outcome.reason),
        );
        programmerError ??= outcome.reason;
        return;
      }

      const result = outcome.value;
      if (!result.success) {
        this.logger.warn(
          `${result.group} endpoint failed after ${result.durationMs}ms: ${result.error}`,
        );
      }
      results.push(result);
    });

    // Rethrown only after every sibling has settled
    if (programmerError !== undefined) {
      throw programmerError;
    }

    this.logger.debug(
      `Fan-out of ${subRequests.length} calls finished in ${Date.now() - startTime}ms`,
    );

    if (results.length > 0 && results.every((result) => !result.success)) {
      throw new AllProvidersFailedError(
        results.map((result) => ({
          group: result.group,
          error: result.success ? '' : result.error,
        })),
      );
    }

    return results;
  }

  /**
   * Run tasks with at most `limit` in flight, keeping results in task order
   */
  private async runBounded<T>(
    tasks: Array<() => Promise<T>>,
    limit: number,
  ): Promise<PromiseSettledResult<T>[]> {
    const outcomes: PromiseSettledResult<T>[] = new Array(tasks.length);
    let nextIndex = 0;

    const worker = async (): Promise<void> => {
      while (nextIndex < tasks.length) {
        const index = nextIndex++;
        try {
          outcomes[index] = { status: 'fulfilled', value: await tasks[index]() };
        } catch (reason) {
          outcomes[index] = { status: 'rejected', reason };
        }
      }
    };

    const workerCount = Math.max(1, Math.min(limit, tasks.length));
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    return outcomes;
  }
}
