import { ResponseReconciler } from './response-reconciler.service';
import { Coordinate, JsonObject, ProviderResult } from './forecast.types';

const lucknow: Coordinate = [26.85, 80.95];
const delhi: Coordinate = [28.61, 77.2];

function keyedSuccess(
  group: string,
  variables: string[],
  records: Record<string, JsonObject>,
): ProviderResult {
  return {
    group,
    variables,
    success: true,
    payload: { shape: 'keyed', records: new Map(Object.entries(records)) },
    durationMs: 5,
  };
}

describe('ResponseReconciler', () => {
  const reconciler = new ResponseReconciler();

  it('merges groups into one record per location', () => {
    const { locationData, gaps } = reconciler.reconcile(
      [
        keyedSuccess('omega', ['ambient_temp(K)', 'wind_10m'], {
          '26.85,80.95': { 'ambient_temp(K)': 298.15, wind_speed_10: 5.5 },
          '28.61,77.2': { 'ambient_temp(K)': 300.15, wind_speed_10: 6 },
        }),
        {
          group: 'nova',
          variables: ['ghi(W/m2)'],
          success: true,
          payload: {
            shape: 'indexed',
            records: [{ 'ghi(W/m2)': 800 }, { 'ghi(W/m2)': 850 }],
          },
          durationMs: 5,
        },
      ],
      [lucknow, delhi],
    );

    expect(locationData).toEqual({
      '26.85,80.95': {
        'ambient_temp(K)': 298.15,
        wind_10m: 5.5,
        'ghi(W/m2)': 800,
      },
      '28.61,77.2': {
        'ambient_temp(K)': 300.15,
        wind_10m: 6,
        'ghi(W/m2)': 850,
      },
    });
    expect(gaps).toEqual([]);
  });

  it('leaves a gap for every variable of a failed group', () => {
    const { locationData, gaps } = reconciler.reconcile(
      [
        keyedSuccess('omega', ['ambient_temp(K)'], {
          '26.85,80.95': { 'ambient_temp(K)': 298.15 },
        }),
        {
          group: 'arc',
          variables: ['ct', 'pc'],
          success: false,
          error: 'HTTP 500: upstream unavailable',
          durationMs: 5,
        },
      ],
      [lucknow],
    );

    expect(locationData).toEqual({
      '26.85,80.95': { 'ambient_temp(K)': 298.15 },
    });
    expect(gaps).toEqual([
      { coordinateKey: '26.85,80.95', variable: 'ct' },
      { coordinateKey: '26.85,80.95', variable: 'pc' },
    ]);
  });

  it('keeps an empty record for locations no provider answered', () => {
    const { locationData, gaps } = reconciler.reconcile(
      [
        keyedSuccess('omega', ['ambient_temp(K)'], {
          '26.85,80.95': { 'ambient_temp(K)': 298.15 },
        }),
      ],
      [lucknow, delhi],
    );

    expect(locationData['28.61,77.2']).toEqual({});
    expect(gaps).toEqual([
      { coordinateKey: '28.61,77.2', variable: 'ambient_temp(K)' },
    ]);
  });

  it('omits fields the provider left out', () => {
    const { locationData, gaps } = reconciler.reconcile(
      [
        keyedSuccess('nova', ['ghi(W/m2)', 'albedo'], {
          '26.85,80.95': { 'ghi(W/m2)': 800, unrelated: 1 },
        }),
      ],
      [lucknow],
    );

    expect(locationData).toEqual({ '26.85,80.95': { 'ghi(W/m2)': 800 } });
    expect(gaps).toEqual([{ coordinateKey: '26.85,80.95', variable: 'albedo' }]);
  });

  it('reports an aliased variable under its requested name', () => {
    const { locationData, gaps } = reconciler.reconcile(
      [
        keyedSuccess('omega', ['wind_10m'], {
          '26.85,80.95': { wind_speed_10: 4.2 },
        }),
      ],
      [lucknow],
    );

    expect(locationData).toEqual({ '26.85,80.95': { wind_10m: 4.2 } });
    expect(gaps).toEqual([]);
  });

  it('leaves a gap when an aliased variable is missing under both names', () => {
    const { locationData, gaps } = reconciler.reconcile(
      [
        keyedSuccess('omega', ['wind_10m'], {
          '26.85,80.95': { direction_10: 180 },
        }),
      ],
      [lucknow],
    );

    expect(locationData).toEqual({ '26.85,80.95': {} });
    expect(gaps).toEqual([{ coordinateKey: '26.85,80.95', variable: 'wind_10m' }]);
  });

  it('collapses duplicate coordinates into one entry', () => {
    const { locationData, gaps } = reconciler.reconcile(
      [
        {
          group: 'arc',
          variables: ['ct'],
          success: true,
          payload: { shape: 'indexed', records: [{ ct: 0.1 }, { ct: 0.9 }] },
          durationMs: 5,
        },
      ],
      [lucknow, lucknow],
    );

    expect(locationData).toEqual({ '26.85,80.95': { ct: 0.1 } });
    expect(gaps).toEqual([]);
  });
});
