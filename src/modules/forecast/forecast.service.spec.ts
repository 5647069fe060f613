import { Test, TestingModule } from '@nestjs/testing';
import { ForecastService } from './forecast.service';
import { RequestPlanner } from './request-planner.service';
import { FanoutExecutor } from './fanout-executor.service';
import { ResponseReconciler } from './response-reconciler.service';
import { MockProviderGateway } from './mock-provider-gateway.service';
import { PROVIDER_GATEWAY } from './provider-gateway.interface';
import {
  AllProvidersFailedError,
  ForecastValidationError,
  UnknownVariableError,
} from './forecast.errors';
import { ForecastQueryInput } from './forecast.types';
import { CatalogService } from '../catalog/catalog.service';
import { CATALOG_STORE } from '../catalog/catalog-store.interface';
import { MemoryCatalogStore } from '../catalog/memory-catalog-store.service';
import { SubscriptionTier } from '../catalog/catalog.types';
import { PricingEngine } from '../pricing/pricing-engine.service';
import { FORECAST_CONFIG, ForecastConfig } from '../config/forecast.config';
import {
  REQUEST_LEDGER,
  RequestLedger,
} from '../ledger/request-ledger.interface';
import { MemoryRequestLedger } from '../ledger/memory-request-ledger.service';

const config: ForecastConfig = {
  providerEndpoints: {},
  providerTimeoutMs: 1000,
  maxConcurrentCalls: 3,
  useMockProviders: true,
  defaultTimezone: 'Asia/Kolkata',
  baseCurrency: 'INR',
  defaultUnitPrice: 1,
  taxRate: 18,
  taxEnabled: true,
};

const now = new Date('2026-01-01T00:00:00Z');

const query: ForecastQueryInput = {
  coordinates: [[26.85, 80.95]],
  variables: ['ambient_temp(K)', 'ghi(W/m2)'],
  timestamp: '2030-01-01 00:00:00',
  timezone: 'Asia/Kolkata',
};

const flushBackgroundWork = () =>
  new Promise<void>((resolve) => setImmediate(resolve));

describe('ForecastService', () => {
  let store: MemoryCatalogStore;

  async function createService(
    gateway: MockProviderGateway,
    ledger: RequestLedger,
  ): Promise<TestingModule> {
    return Test.createTestingModule({
      providers: [
        ForecastService,
        RequestPlanner,
        FanoutExecutor,
        ResponseReconciler,
        PricingEngine,
        CatalogService,
        { provide: CATALOG_STORE, useValue: store },
        { provide: FORECAST_CONFIG, useValue: config },
        { provide: PROVIDER_GATEWAY, useValue: gateway },
        { provide: REQUEST_LEDGER, useValue: ledger },
      ],
    }).compile();
  }

  beforeEach(() => {
    store = new MemoryCatalogStore();
  });

  it('returns a unified response with pricing', async () => {
    const gateway = new MockProviderGateway();
    const module = await createService(gateway, new MemoryRequestLedger());
    const service = module.get<ForecastService>(ForecastService);

    const response = await service.getForecast(query, {}, now);

    expect(response.locationData).toEqual({
      '26.85,80.95': { 'ambient_temp(K)': 298.15, 'ghi(W/m2)': 800 },
    });
    expect(response.metadata).toEqual({
      timestamp: '2030-01-01 00:00:00',
      timezone: 'Asia/Kolkata',
      endpointsCalled: ['omega', 'nova'],
      variablesRequested: ['ambient_temp(K)', 'ghi(W/m2)'],
      locationsCount: 1,
      totalCost: '2.00',
      currency: 'INR',
      taxApplied: true,
      taxRate: '18%',
      taxAmount: '0.36',
      finalAmount: '2.36',
    });
    expect(gateway.calls.map((call) => call.group)).toEqual(['omega', 'nova']);
  });

  it('records successful queries in the ledger', async () => {
    const ledger = new MemoryRequestLedger();
    const module = await createService(new MockProviderGateway(), ledger);
    const service = module.get<ForecastService>(ForecastService);

    await service.getForecast(
      query,
      { userId: 'user-1', apiKeyId: 'key-1', currency: 'USD' },
      now,
    );
    await flushBackgroundWork();

    const [entry] = await ledger.findForUser('user-1');
    expect(entry).toMatchObject({
      apiKeyId: 'key-1',
      locations: [[26.85, 80.95]],
      variables: ['ambient_temp(K)', 'ghi(W/m2)'],
      endpointsCalled: ['omega', 'nova'],
      responseStatus: 200,
      success: true,
      currency: 'USD',
    });
    expect(entry.totalCost).toBeCloseTo(0.024);
    expect(entry.finalAmount).toBeCloseTo(0.02832);
  });

  it('answers even when the ledger fails', async () => {
    const ledger: RequestLedger = {
      record: jest.fn().mockRejectedValue(new Error('connection lost')),
      findForUser: jest.fn().mockResolvedValue([]),
    };
    const module = await createService(new MockProviderGateway(), ledger);
    const service = module.get<ForecastService>(ForecastService);

    const response = await service.getForecast(query, { userId: 'user-1' }, now);
    await flushBackgroundWork();

    expect(response.metadata.finalAmount).toBe('2.36');
    expect(ledger.record).toHaveBeenCalledTimes(1);
  });

  it('still prices groups whose provider failed', async () => {
    const gateway = new MockProviderGateway({
      failures: { nova: 'HTTP 500: upstream unavailable' },
    });
    const module = await createService(gateway, new MemoryRequestLedger());
    const service = module.get<ForecastService>(ForecastService);

    const response = await service.getForecast(query, {}, now);

    expect(response.locationData).toEqual({
      '26.85,80.95': { 'ambient_temp(K)': 298.15 },
    });
    expect(response.metadata.endpointsCalled).toEqual(['omega']);
    expect(response.metadata.totalCost).toBe('2.00');
  });

  it('fails when every provider fails and records a 502', async () => {
    const ledger = new MemoryRequestLedger();
    const gateway = new MockProviderGateway({
      failures: { omega: 'HTTP 503: down', nova: 'HTTP 503: down' },
    });
    const module = await createService(gateway, ledger);
    const service = module.get<ForecastService>(ForecastService);

    await expect(
      service.getForecast(query, { userId: 'user-1' }, now),
    ).rejects.toBeInstanceOf(AllProvidersFailedError);
    await flushBackgroundWork();

    const [entry] = await ledger.findForUser('user-1');
    expect(entry).toMatchObject({
      responseStatus: 502,
      success: false,
      endpointsCalled: [],
      finalAmount: 0,
      currency: 'INR',
    });
  });

  it('rejects invalid queries without calling providers', async () => {
    const ledger = new MemoryRequestLedger();
    const gateway = new MockProviderGateway();
    const module = await createService(gateway, ledger);
    const service = module.get<ForecastService>(ForecastService);

    await expect(
      service.getForecast(
        { ...query, variables: ['snow_depth'] },
        { userId: 'user-1' },
        now,
      ),
    ).rejects.toBeInstanceOf(UnknownVariableError);
    await expect(
      service.getForecast(
        { ...query, timestamp: '2025-01-01 00:00:00' },
        { userId: 'user-1' },
        now,
      ),
    ).rejects.toBeInstanceOf(ForecastValidationError);
    await flushBackgroundWork();

    expect(gateway.calls).toEqual([]);
    const entries = await ledger.findForUser('user-1');
    expect(entries.map((entry) => entry.responseStatus)).toEqual([400, 400]);
    expect(entries.map((entry) => entry.errorMessage).sort()).toEqual([
      'Invalid variables: snow_depth',
      'Timestamp must be in the future. Requested: 2025-01-01 00:00:00 Asia/Kolkata',
    ]);
  });

  it('does not record failures of anonymous callers', async () => {
    const ledger = new MemoryRequestLedger();
    const record = jest.spyOn(ledger, 'record');
    const module = await createService(new MockProviderGateway(), ledger);
    const service = module.get<ForecastService>(ForecastService);

    await expect(
      service.getForecast({ ...query, variables: [] }, {}, now),
    ).rejects.toThrow('At least one variable must be specified');
    await flushBackgroundWork();

    expect(record).not.toHaveBeenCalled();
  });

  it('applies the caller tier price from the current catalog', async () => {
    const module = await createService(
      new MockProviderGateway(),
      new MemoryRequestLedger(),
    );
    const service = module.get<ForecastService>(ForecastService);

    store.setPricing('ghi(W/m2)', 1.0, { [SubscriptionTier.BUSINESS]: 0.5 });
    await module.get<CatalogService>(CatalogService).refresh();

    const business = await service.getForecast(
      query,
      { tier: SubscriptionTier.BUSINESS },
      now,
    );
    const free = await service.getForecast(
      query,
      { tier: SubscriptionTier.FREE },
      now,
    );

    expect(business.metadata.totalCost).toBe('1.50');
    expect(free.metadata.totalCost).toBe('2.00');
  });
});
