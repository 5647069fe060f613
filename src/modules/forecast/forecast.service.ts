import { Inject, Injectable, Logger } from '@nestjs/common';
import { CatalogService } from '../catalog/catalog.service';
import { PricingEngine } from '../pricing/pricing-engine.service';
import { PricingResult } from '../pricing/pricing.types';
import {
  REQUEST_LEDGER,
  RequestLedger,
  WeatherRequestRecord,
} from '../ledger/request-ledger.interface';
import { AllProvidersFailedError } from './forecast.errors';
import { ForecastLifecycle, ForecastStage } from './forecast-lifecycle';
import {
  ForecastCaller,
  ForecastQueryInput,
  ForecastResponse,
  ProviderResult,
} from './forecast.types';
import { RequestPlanner, ValidatedQuery } from './request-planner.service';
import { FanoutExecutor } from './fanout-executor.service';
import { ResponseReconciler } from './response-reconciler.service';

/**
 * Forecast pipeline: validate, plan, fan out, reconcile, price, then hand the
 * record to the ledger without waiting for it.
 */
@Injectable()
export class ForecastService {
  private readonly logger = new Logger(ForecastService.name);

  constructor(
    private readonly catalogService: CatalogService,
    private readonly planner: RequestPlanner,
    private readonly fanout: FanoutExecutor,
    private readonly reconciler: ResponseReconciler,
    private readonly pricingEngine: PricingEngine,
    @Inject(REQUEST_LEDGER)
    private readonly ledger: RequestLedger,
  ) {}

  async getForecast(
    input: ForecastQueryInput,
    caller: ForecastCaller = {},
    now: Date = new Date(),
  ): Promise<ForecastResponse> {
    const startTime = Date.now();
    const lifecycle = new ForecastLifecycle();
    // One snapshot serves both planning and pricing
    const snapshot = this.catalogService.snapshot();

    let validated: ValidatedQuery;
    try {
      validated = this.planner.validate(input, snapshot.catalog, now);
    } catch (error) {
      lifecycle.fail();
      this.recordFailure(input, caller, startTime, 400, error);
      throw error;
    }

    lifecycle.advance(ForecastStage.PLANNING);
    const plan = this.planner.partition(validated);

    lifecycle.advance(ForecastStage.FETCHING);
    let results: ProviderResult[];
    try {
      results = await this.fanout.execute(plan.subRequests);
    } catch (error) {
      lifecycle.fail();
      const status = error instanceof AllProvidersFailedError ? 502 : 500;
      this.recordFailure(input, caller, startTime, status, error);
      throw error;
    }

    lifecycle.advance(ForecastStage.RECONCILING);
    const { locationData, gaps } = this.reconciler.reconcile(
      results,
      plan.query.coordinates,
    );

    lifecycle.advance(ForecastStage.PRICING);
    const pricing = this.pricingEngine.calculate(
      plan.query.variables,
      plan.query.coordinates.length,
      snapshot.pricing,
      { tier: caller.tier, currency: caller.currency },
    );

    lifecycle.advance(ForecastStage.COMPLETED);

    const endpointsCalled = results
      .filter((result) => result.success)
      .map((result) => result.group);

    this.logger.log(
      `Forecast for ${plan.query.coordinates.length} locations served by [${endpointsCalled.join(', ')}] in ${Date.now() - startTime}ms (${gaps.length} gaps)`,
    );

    this.recordInBackground({
      ...this.callerFields(caller),
      locations: plan.query.coordinates.map(([lat, lon]) => [lat, lon]),
      variables: plan.query.variables,
      timestamp: plan.query.timestamp,
      timezone: plan.query.timezone,
      endpointsCalled,
      responseStatus: 200,
      responseTime: (Date.now() - startTime) / 1000,
      success: true,
      ...this.ledgerAmounts(pricing),
    });

    return {
      locationData,
      metadata: {
        timestamp: plan.query.timestamp,
        timezone: plan.query.timezone,
        endpointsCalled,
        variablesRequested: plan.query.variables,
        locationsCount: plan.query.coordinates.length,
        ...this.pricingEngine.format(pricing),
      },
    };
  }

  private ledgerAmounts(
    pricing: PricingResult,
  ): Pick<
    WeatherRequestRecord,
    'totalCost' | 'currency' | 'taxAmount' | 'finalAmount'
  > {
    return {
      totalCost: pricing.subtotal,
      currency: pricing.currency,
      taxAmount: pricing.taxAmount,
      finalAmount: pricing.finalAmount,
    };
  }

  private callerFields(
    caller: ForecastCaller,
  ): Pick<
    WeatherRequestRecord,
    'userId' | 'apiKeyId' | 'ipAddress' | 'userAgent'
  > {
    return {
      userId: caller.userId,
      apiKeyId: caller.apiKeyId,
      ipAddress: caller.ipAddress,
      userAgent: caller.userAgent,
    };
  }

  /**
   * Failed queries are only recorded for identified callers
   */
  private recordFailure(
    input: ForecastQueryInput,
    caller: ForecastCaller,
    startTime: number,
    responseStatus: number,
    error: unknown,
  ): void {
    if (!caller.userId) return;

    const locations = Array.isArray(input.coordinates)
      ? input.coordinates.filter(
          (entry): entry is number[] =>
            Array.isArray(entry) &&
            entry.every((value) => typeof value === 'number'),
        )
      : [];

    this.recordInBackground({
      ...this.callerFields(caller),
      locations,
      variables: Array.isArray(input.variables) ? input.variables : [],
      timestamp: String(input.timestamp),
      timezone: String(input.timezone),
      endpointsCalled: [],
      responseStatus,
      responseTime: (Date.now() - startTime) / 1000,
      success: false,
      errorMessage: error instanceof Error ? error.message : String(error),
      totalCost: 0,
      currency: this.catalogService.snapshot().pricing.baseCurrency,
      taxAmount: 0,
      finalAmount: 0,
    });
  }

  /**
   * Fire-and-forget: ledger failures are logged and never reach the caller
   */
  private recordInBackground(entry: WeatherRequestRecord): void {
    void Promise.resolve()
      .then(() => this.ledger.record(entry))
      .catch((error: unknown) => {
        this.logger.error(
          'Error logging weather request:',
          error instanceof Error ? error.message : String(error),
        );
      });
  }
}
