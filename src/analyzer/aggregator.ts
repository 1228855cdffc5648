import { ParsingThresholdExceededError } from './errors';
import { parseLogLine } from './lineParser';
import type { AggregateOptions, AggregationSummary, ReportRow } from './types';

// toFixed rounds an exact binary tie up: 0.0625 -> 0.063 (half-even would give 0.062).
function round3(value: number): number {
  return Number(value.toFixed(3));
}

function median(sorted: number[]): number {
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;
  if (sorted.length % 2 === 1) {
    return upper;
  }
  return ((sorted[mid - 1] ?? 0) + upper) / 2;
}

function sum(values: number[]): number {
  return values.reduce((acc, value) => acc + value, 0);
}

/**
 * Accumulates request times per URL, one raw log line at a time.
 *
 * `finish()` enforces the error limit and derives the ranked report rows.
 */
export class StatsCollector {
  private readonly timesByUrl = new Map<string, number[]>();
  private totalCount = 0;
  private failedCount = 0;
  private totalTime = 0;

  constructor(private readonly options: AggregateOptions) {}

  add(line: string): void {
    this.totalCount += 1;

    const parsed = parseLogLine(line);
    if (!parsed) {
      this.failedCount += 1;
      return;
    }

    let times = this.timesByUrl.get(parsed.url);
    if (!times) {
      times = [];
      this.timesByUrl.set(parsed.url, times);
    }
    times.push(parsed.requestTime);
    this.totalTime += parsed.requestTime;
  }

  finish(): AggregationSummary {
    const { totalCount, failedCount } = this;

    if (totalCount > 0 && failedCount / totalCount > this.options.errorLimit) {
      throw new ParsingThresholdExceededError(failedCount, totalCount, this.options.errorLimit);
    }

    const totalRequests = totalCount - failedCount;
    if (totalRequests === 0) {
      return { rows: [], totalCount, failedCount };
    }

    const rows: ReportRow[] = [];
    for (const [url, times] of this.timesByUrl) {
      const count = times.length;
      const timeSum = sum(times);
      const sorted = [...times].sort((a, b) => a - b);

      rows.push({
        url,
        count,
        countPerc: round3((100 * count) / totalRequests),
        timeSum: round3(timeSum),
        timePerc: this.totalTime > 0 ? round3((100 * timeSum) / this.totalTime) : 0,
        timeAvg: round3(timeSum / count),
        timeMax: round3(sorted[count - 1] ?? 0),
        timeMed: round3(median(sorted)),
      });
    }

    // Array#sort is stable, so equal totals keep first-seen order.
    rows.sort((a, b) => b.timeSum - a.timeSum);

    return {
      rows: rows.slice(0, Math.max(0, this.options.reportSize)),
      totalCount,
      failedCount,
    };
  }
}

export function aggregateLogLines(lines: Iterable<string>, options: AggregateOptions): ReportRow[] {
  const collector = new StatsCollector(options);
  for (const line of lines) {
    collector.add(line);
  }
  return collector.finish().rows;
}

export async function aggregateLogStream(
  lines: AsyncIterable<string>,
  options: AggregateOptions,
): Promise<AggregationSummary> {
  const collector = new StatsCollector(options);
  for await (const line of lines) {
    collector.add(line);
  }
  return collector.finish();
}
