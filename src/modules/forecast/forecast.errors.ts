export class ForecastValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ForecastValidationError';
  }
}

export class UnknownVariableError extends Error {
  constructor(readonly variables: string[]) {
    super(`Invalid variables: ${variables.join(', ')}`);
    this.name = 'UnknownVariableError';
  }
}

/**
 * Raised when the catalog routes a variable to a group with no configured endpoint
 */
export class UnknownProviderGroupError extends Error {
  constructor(readonly group: string) {
    super(`No endpoint configured for provider group '${group}'`);
    this.name = 'UnknownProviderGroupError';
  }
}

export interface ProviderFailureSummary {
  group: string;
  error: string;
}

export class AllProvidersFailedError extends Error {
  constructor(readonly failures: ProviderFailureSummary[]) {
    super(
      `All providers failed: ${failures
        .map((failure) => `${failure.group} (${failure.error})`)
        .join('; ')}`,
    );
    this.name = 'AllProvidersFailedError';
  }
}
