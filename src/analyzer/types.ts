export type ParsedLine = {
  url: string;
  /** Request processing time in seconds, as logged by nginx. */
  requestTime: number;
};

export type AggregateOptions = {
  /** Max tolerated share of unparseable lines, in [0, 1]. */
  errorLimit: number;
  /** Max number of rows kept after ranking by total time. */
  reportSize: number;
};

export type ReportRow = {
  url: string;
  count: number;
  countPerc: number;
  timeSum: number;
  timePerc: number;
  timeAvg: number;
  timeMax: number;
  timeMed: number;
};

export type AggregationSummary = {
  rows: ReportRow[];
  totalCount: number;
  failedCount: number;
};
