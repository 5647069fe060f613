export enum ForecastStage {
  VALIDATING = 'validating',
  PLANNING = 'planning',
  FETCHING = 'fetching',
  RECONCILING = 'reconciling',
  PRICING = 'pricing',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

// Failed is only reachable from validation or fetching; once reconciling
// starts the query always completes
const TRANSITIONS: Readonly<Record<ForecastStage, readonly ForecastStage[]>> = {
  [ForecastStage.VALIDATING]: [ForecastStage.PLANNING, ForecastStage.FAILED],
  [ForecastStage.PLANNING]: [ForecastStage.FETCHING],
  [ForecastStage.FETCHING]: [ForecastStage.RECONCILING, ForecastStage.FAILED],
  [ForecastStage.RECONCILING]: [ForecastStage.PRICING],
  [ForecastStage.PRICING]: [ForecastStage.COMPLETED],
  [ForecastStage.COMPLETED]: [],
  [ForecastStage.FAILED]: [],
};

export class ForecastLifecycle {
  private current = ForecastStage.VALIDATING;
  private readonly history: ForecastStage[] = [ForecastStage.VALIDATING];

  get stage(): ForecastStage {
    return this.current;
  }

  get stages(): readonly ForecastStage[] {
    return this.history;
  }

  canAdvance(to: ForecastStage): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  advance(to: ForecastStage): void {
    if (!this.canAdvance(to)) {
      throw new Error(`Illegal forecast transition: ${this.current} -> ${to}`);
    }
    this.current = to;
    this.history.push(to);
  }

  fail(): void {
    this.advance(ForecastStage.FAILED);
  }
}
