import { summarizeUsage, toBaseAmount } from './usage-stats';
import { StoredWeatherRequest } from './request-ledger.interface';

function entry(
  id: string,
  createdAt: string,
  overrides: Partial<StoredWeatherRequest> = {},
): StoredWeatherRequest {
  return {
    id,
    createdAt: new Date(createdAt),
    userId: 'user-1',
    locations: [[26.85, 80.95]],
    variables: ['ambient_temp(K)'],
    timestamp: '2030-01-01 00:00:00',
    timezone: 'Asia/Kolkata',
    endpointsCalled: ['omega'],
    responseStatus: 200,
    responseTime: 0.5,
    success: true,
    totalCost: 1,
    currency: 'INR',
    taxAmount: 0.18,
    finalAmount: 1.18,
    ...overrides,
  };
}

const currencies = {
  baseCurrency: 'INR',
  exchangeRates: new Map<string, number>([
    ['INR', 1],
    ['USD', 0.012],
    ['XXX', 0],
  ]),
};

describe('summarizeUsage', () => {
  const records = [
    entry('a', '2026-03-01T10:00:00Z'),
    entry('b', '2026-03-03T10:00:00Z', {
      locations: [
        [26.85, 80.95],
        [28.61, 77.2],
      ],
      variables: ['ambient_temp(K)', 'ghi(W/m2)'],
      endpointsCalled: ['omega', 'nova'],
      responseTime: 1.5,
      finalAmount: 4.72,
    }),
    entry('c', '2026-03-02T10:00:00Z', {
      success: false,
      responseStatus: 502,
      endpointsCalled: [],
      responseTime: 1,
      finalAmount: 0,
    }),
  ];

  it('aggregates counts and amounts', () => {
    const stats = summarizeUsage(records);

    expect(stats.totalRequests).toBe(3);
    expect(stats.totalCost).toBeCloseTo(5.9);
    expect(stats.currency).toBe('INR');
    expect(Object.keys(stats.costByCurrency)).toEqual(['INR']);
    expect(stats.costByCurrency.INR).toBeCloseTo(5.9);
    expect(stats.locationsQueried).toBe(4);
    expect(stats.averageResponseTime).toBeCloseTo(1);
    expect(stats.successRate).toBeCloseTo(66.667, 2);
    expect(stats.variablesUsed).toEqual({
      'ambient_temp(K)': 3,
      'ghi(W/m2)': 1,
    });
    expect(stats.endpointsUsed).toEqual({ omega: 2, nova: 1 });
  });

  it('lists the most recent requests first', () => {
    const stats = summarizeUsage(records, 2);

    expect(stats.recentRequests.map((request) => request.id)).toEqual([
      'b',
      'c',
    ]);
  });

  it('totals mixed currencies in the base currency', () => {
    const stats = summarizeUsage(
      [
        entry('a', '2026-03-01T10:00:00Z'),
        entry('b', '2026-03-02T10:00:00Z', {
          currency: 'USD',
          finalAmount: 0.024,
        }),
      ],
      10,
      currencies,
    );

    expect(stats.currency).toBe('INR');
    expect(stats.totalCost).toBeCloseTo(3.18);
    expect(stats.costByCurrency).toEqual({ INR: 1.18, USD: 0.024 });
  });

  it('leaves amounts without a usable rate out of the total', () => {
    const stats = summarizeUsage(
      [
        entry('a', '2026-03-01T10:00:00Z'),
        entry('b', '2026-03-02T10:00:00Z', { currency: 'XXX', finalAmount: 9 }),
        entry('c', '2026-03-03T10:00:00Z', { currency: 'JPY', finalAmount: 7 }),
      ],
      10,
      currencies,
    );

    expect(stats.totalCost).toBeCloseTo(1.18);
    expect(stats.costByCurrency).toEqual({ INR: 1.18, XXX: 9, JPY: 7 });
  });

  it('returns zeros without history', () => {
    expect(
      summarizeUsage([], 10, {
        baseCurrency: 'USD',
        exchangeRates: new Map<string, number>(),
      }),
    ).toEqual({
      totalRequests: 0,
      totalCost: 0,
      currency: 'USD',
      costByCurrency: {},
      variablesUsed: {},
      endpointsUsed: {},
      locationsQueried: 0,
      averageResponseTime: 0,
      successRate: 0,
      recentRequests: [],
    });
  });
});

describe('toBaseAmount', () => {
  it('divides by the exchange rate', () => {
    expect(toBaseAmount(0.12, 'USD', currencies)).toBeCloseTo(10);
  });

  it('returns base amounts unchanged', () => {
    expect(toBaseAmount(4.72, 'INR', currencies)).toBe(4.72);
  });

  it('returns undefined without a usable rate', () => {
    expect(toBaseAmount(1, 'XXX', currencies)).toBeUndefined();
    expect(toBaseAmount(1, 'JPY', currencies)).toBeUndefined();
  });
});
