export class ParsingThresholdExceededError extends Error {
  readonly errorRate: number;

  constructor(
    readonly failedCount: number,
    readonly totalCount: number,
    readonly errorLimit: number,
  ) {
    const errorRate = totalCount > 0 ? failedCount / totalCount : 0;
    super(
      `Unparseable lines ${failedCount}/${totalCount} (${errorRate.toFixed(3)}) exceed the error limit ${errorLimit}`,
    );
    this.name = 'ParsingThresholdExceededError';
    this.errorRate = errorRate;
  }
}
