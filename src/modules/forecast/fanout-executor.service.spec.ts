import { FanoutExecutor } from './fanout-executor.service';
import { MockProviderGateway } from './mock-provider-gateway.service';
import { ForecastConfig } from '../config/forecast.config';
import { ProviderResult, ProviderSubRequest } from './forecast.types';
import { ProviderGateway } from './provider-gateway.interface';
import { AllProvidersFailedError } from './forecast.errors';

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

function subRequest(group: string, variables: string[]): ProviderSubRequest {
  return {
    group,
    coordinates: [[26.85, 80.95]],
    variables,
    timestamp: '2030-01-01 00:00:00',
    timezone: 'Asia/Kolkata',
  };
}

const subRequests = [
  subRequest('omega', ['ambient_temp(K)']),
  subRequest('nova', ['ghi(W/m2)']),
  subRequest('arc', ['ct']),
];

/**
 * Gateway that records how many calls are in flight at once
 */
class ConcurrencyTracker implements ProviderGateway {
  inFlight = 0;
  maxInFlight = 0;

  async call(request: ProviderSubRequest): Promise<ProviderResult> {
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    await new Promise<void>((resolve) => setTimeout(resolve, 20));
    this.inFlight--;
    return {
      group: request.group,
      variables: request.variables,
      success: true,
      payload: { shape: 'indexed', records: [{}] },
      durationMs: 20,
    };
  }
}

describe('FanoutExecutor', () => {
  it('calls providers concurrently', async () => {
    const gateway = new MockProviderGateway({
      latencyMs: { omega: 100, nova: 200, arc: 50 },
    });
    const executor = new FanoutExecutor(gateway, config);

    const startedAt = Date.now();
    const results = await executor.execute(subRequests);
    const elapsed = Date.now() - startedAt;

    expect(elapsed).toBeGreaterThanOrEqual(190);
    expect(elapsed).toBeLessThan(340);
    expect(results.map((result) => result.group)).toEqual([
      'omega',
      'nova',
      'arc',
    ]);
    expect(results.every((result) => result.success)).toBe(true);
  });

  it('keeps successful results when one provider fails', async () => {
    const gateway = new MockProviderGateway({
      failures: { nova: 'HTTP 500: upstream unavailable' },
    });
    const executor = new FanoutExecutor(gateway, config);

    const results = await executor.execute(subRequests);

    expect(results.map((result) => [result.group, result.success])).toEqual([
      ['omega', true],
      ['nova', false],
      ['arc', true],
    ]);
    expect(results[1]).toMatchObject({
      success: false,
      error: 'HTTP 500: upstream unavailable',
    });
  });

  it('raises when every provider fails', async () => {
    const gateway = new MockProviderGateway({
      failures: {
        omega: 'Request timed out after 1000ms',
        nova: 'HTTP 502: bad gateway',
        arc: 'Provider error: quota exceeded',
      },
    });
    const executor = new FanoutExecutor(gateway, config);

    const outcome = executor.execute(subRequests);

    await expect(outcome).rejects.toBeInstanceOf(AllProvidersFailedError);
    await expect(outcome).rejects.toMatchObject({
      failures: [
        { group: 'omega', error: 'Request timed out after 1000ms' },
        { group: 'nova', error: 'HTTP 502: bad gateway' },
        { group: 'arc', error: 'Provider error: quota exceeded' },
      ],
    });
  });

  it('limits the number of calls in flight', async () => {
    const tracker = new ConcurrencyTracker();
    const executor = new FanoutExecutor(tracker, {
      ...config,
      maxConcurrentCalls: 2,
    });

    const results = await executor.execute([
      ...subRequests,
      subRequest('delta', ['x']),
    ]);

    expect(results).toHaveLength(4);
    expect(tracker.maxInFlight).toBe(2);
  });

  it('rethrows a gateway exception after the other calls settle', async () => {
    const gateway = new MockProviderGateway({ latencyMs: { arc: 30 } });
    const broken: ProviderGateway = {
      call: (request) =>
        request.group === 'omega'
          ? Promise.reject(new Error('no endpoint'))
          : gateway.call(request),
    };
    const executor = new FanoutExecutor(broken, config);

    await expect(executor.execute(subRequests)).rejects.toThrow('no endpoint');
    expect(gateway.calls.map((call) => call.group)).toEqual(['nova', 'arc']);
  });

  it('returns nothing for an empty plan', async () => {
    const executor = new FanoutExecutor(new MockProviderGateway(), config);

    await expect(executor.execute([])).resolves.toEqual([]);
  });
});
