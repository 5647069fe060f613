import { Injectable, Logger } from '@nestjs/common';
import {
  Coordinate,
  JsonValue,
  LocationData,
  ProviderResult,
  ReconciliationGap,
} from './forecast.types';
import { coordinateKey, locateRecord, resolveField } from './provider-payload';

export interface ReconciledForecast {
  locationData: LocationData;
  gaps: ReconciliationGap[];
}

@Injectable()
export class ResponseReconciler {
  private readonly logger = new Logger(ResponseReconciler.name);

  /**
   * Merge provider results into one record per input coordinate. Failed
   * results and missing fields leave gaps; nothing here throws.
   */
  reconcile(
    results: ProviderResult[],
    coordinates: Coordinate[],
  ): ReconciledForecast {
    const locationData: LocationData = {};
    for (const coordinate of coordinates) {
      locationData[coordinateKey(coordinate)] ??= {};
    }

    for (const result of results) {
      if (!result.success) continue;

      coordinates.forEach((coordinate, index) => {
        const key = coordinateKey(coordinate);
        const target = locationData[key];
        const record = locateRecord(result.payload, coordinate, index);
        if (!record) {
          this.logger.debug(`${result.group} has no record for location ${key}`);
          return;
        }

        for (const variable of result.variables) {
          // Duplicate coordinates share a key; the first value found stays
          if (Object.prototype.hasOwnProperty.call(target, variable)) continue;

          const value: JsonValue | undefined = resolveField(record, variable);
          if (value !== undefined) {
            target[variable] = value;
          }
        }
      });
    }

    const requested = results.flatMap((result) => result.variables);
    const gaps: ReconciliationGap[] = [];
    for (const [key, values] of Object.entries(locationData)) {
      for (const variable of requested) {
        if (!Object.prototype.hasOwnProperty.call(values, variable)) {
          gaps.push({ coordinateKey: key, variable });
        }
      }
    }

    if (gaps.length > 0) {
      this.logger.warn(
        `${gaps.length} variable values missing across ${coordinates.length} locations`,
      );
    }

    return { locationData, gaps };
  }
}
