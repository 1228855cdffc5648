import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { aggregateLogStream } from './analyzer/aggregator';
import type { ReportRow } from './analyzer/types';
import type { AnalyzerConfig } from './config/analyzerConfig';
import { findLatestLog, formatLogDate, type LogDate } from './logs/findLatestLog';
import { readLogLines } from './logs/readLogLines';
import type { Logger } from './logging/logger';
import { writeReport } from './report/renderReport';

export type AnalysisOutcome =
  | { status: 'no-log' }
  | { status: 'no-template'; templatePath: string }
  | { status: 'up-to-date'; reportPath: string }
  | { status: 'written'; reportPath: string; rows: ReportRow[] };

async function fileExists(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

export function reportFileName(date: LogDate): string {
  return `report-${formatLogDate(date)}.html`;
}

/**
 * Analyzes the newest log in `config.logDir` and writes `report-YYYY.MM.DD.html`
 * into `config.reportDir`. Throws ParsingThresholdExceededError when too many lines fail to parse.
 */
export async function runAnalysis(config: AnalyzerConfig, log: Logger): Promise<AnalysisOutcome> {
  const latest = await findLatestLog(config.logDir);
  if (!latest) {
    log.info(`No log file found in ${config.logDir}`);
    return { status: 'no-log' };
  }
  log.info(`Latest log file: ${latest.filePath}`);

  const reportPath = path.join(config.reportDir, reportFileName(latest.date));

  const created = await fs.mkdir(config.reportDir, { recursive: true });
  if (created !== undefined) {
    log.info(`Created report directory ${config.reportDir}`);
  }

  const templatePath = config.reportTemplate ?? path.join(config.reportDir, 'report.html');
  if (!(await fileExists(templatePath))) {
    log.error(`Template file ${templatePath} does not exist`);
    return { status: 'no-template', templatePath };
  }

  if (await fileExists(reportPath)) {
    log.info(`Report ${reportPath} is up-to-date`);
    return { status: 'up-to-date', reportPath };
  }

  const summary = await aggregateLogStream(readLogLines(latest.filePath), {
    errorLimit: config.errorsLimit,
    reportSize: config.reportSize,
  });
  log.info(
    `Processed ${summary.totalCount} lines, ${summary.failedCount} unparseable, ${summary.rows.length} urls reported`,
  );

  await writeReport(templatePath, reportPath, summary.rows);
  log.info(`Report written to ${reportPath}`);

  return { status: 'written', reportPath, rows: summary.rows };
}
