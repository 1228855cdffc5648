export { parseLogLine } from './analyzer/lineParser';
export { aggregateLogLines, aggregateLogStream, StatsCollector } from './analyzer/aggregator';
export { ParsingThresholdExceededError } from './analyzer/errors';
export type { AggregateOptions, AggregationSummary, ParsedLine, ReportRow } from './analyzer/types';
export {
  ConfigError,
  DEFAULT_ANALYZER_CONFIG,
  loadAnalyzerConfig,
  normalizeAnalyzerConfig,
  type AnalyzerConfig,
} from './config/analyzerConfig';
export { findLatestLog, type LatestLog, type LogDate } from './logs/findLatestLog';
export { readLogLines } from './logs/readLogLines';
export { createOutputChannel, Logger, type OutputChannel } from './logging/logger';
export { renderReport, renderTemplate, writeReport } from './report/renderReport';
export { runAnalysis, type AnalysisOutcome } from './analysis';
