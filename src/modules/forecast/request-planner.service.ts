import { Injectable, Logger } from '@nestjs/common';
import { VariableCatalog } from '../catalog/variable-catalog';
import { ForecastValidationError } from './forecast.errors';
import {
  Coordinate,
  ForecastPlan,
  ForecastQuery,
  ForecastQueryInput,
  ProviderSubRequest,
} from './forecast.types';
import { parseZonedTimestamp } from './zoned-time';
import { ProviderGroup } from '../catalog/catalog.types';

export interface ValidatedQuery {
  query: ForecastQuery;
  groups: Map<ProviderGroup, string[]>;
}

/**
 * Validates a forecast query and partitions it into one sub-request per
 * provider group. Every sub-request carries the full coordinate list.
 */
@Injectable()
export class RequestPlanner {
  private readonly logger = new Logger(RequestPlanner.name);

  plan(
    input: ForecastQueryInput,
    catalog: VariableCatalog,
    now: Date = new Date(),
  ): ForecastPlan {
    return this.partition(this.validate(input, catalog, now));
  }

  /**
   * Check the input and resolve every variable's provider group. Throws
   * before any network call is made.
   */
  validate(
    input: ForecastQueryInput,
    catalog: VariableCatalog,
    now: Date = new Date(),
  ): ValidatedQuery {
    if (!Array.isArray(input.variables) || input.variables.length === 0) {
      throw new ForecastValidationError(
        'At least one variable must be specified',
      );
    }

    const coordinates = this.validateCoordinates(input.coordinates);
    const instant = parseZonedTimestamp(input.timestamp, input.timezone);

    if (instant.getTime() <= now.getTime()) {
      throw new ForecastValidationError(
        `Timestamp must be in the future. Requested: ${input.timestamp} ${input.timezone}`,
      );
    }

    const variables = Array.from(new Set(input.variables));
    const groups = catalog.requireGroupsFor(variables);

    return {
      query: {
        coordinates,
        variables,
        timestamp: input.timestamp,
        timezone: input.timezone,
        instant,
      },
      groups,
    };
  }

  partition({ query, groups }: ValidatedQuery): ForecastPlan {
    const subRequests: ProviderSubRequest[] = Array.from(
      groups,
      ([group, variables]) => ({
        group,
        coordinates: query.coordinates,
        variables,
        timestamp: query.timestamp,
        timezone: query.timezone,
      }),
    );

    this.logger.debug(
      `Planned ${subRequests.length} sub-requests (${subRequests
        .map((request) => `${request.group}: ${request.variables.length}`)
        .join(', ')}) for ${query.coordinates.length} locations`,
    );

    return { query, subRequests };
  }

  private validateCoordinates(raw: unknown[]): Coordinate[] {
    if (!Array.isArray(raw) || raw.length === 0) {
      throw new ForecastValidationError(
        'At least one coordinate must be specified',
      );
    }

    return raw.map((entry, index) => {
      if (
        !Array.isArray(entry) ||
        entry.length !== 2 ||
        !entry.every((value) => typeof value === 'number' && Number.isFinite(value))
      ) {
        throw new ForecastValidationError(
          `Coordinate ${index} must be a [latitude, longitude] pair of numbers`,
        );
      }

      const [latitude, longitude]: number[] = entry;
      if (latitude < -90 || latitude > 90) {
        throw new ForecastValidationError(
          `Latitude ${latitude} must be between -90 and 90`,
        );
      }
      if (longitude < -180 || longitude > 180) {
        throw new ForecastValidationError(
          `Longitude ${longitude} must be between -180 and 180`,
        );
      }

      return [latitude, longitude] as const;
    });
  }
}
