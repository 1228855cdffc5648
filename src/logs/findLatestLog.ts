import * as fs from 'node:fs/promises';
import fg from 'fast-glob';
import * as path from 'node:path';

export type LogDate = {
  year: number;
  month: number;
  day: number;
};

export type LatestLog = {
  filePath: string;
  date: LogDate;
};

const LOG_FILE_NAME = /^nginx-access-ui\.log-(\d{4})(\d{2})(\d{2})(\.gz)?$/;

/** Parses `nginx-access-ui.log-YYYYMMDD[.gz]`; rejects names whose date does not exist. */
export function parseLogFileDate(fileName: string): LogDate | undefined {
  const m = LOG_FILE_NAME.exec(fileName);
  if (!m) {
    return undefined;
  }

  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);

  const probe = new Date(Date.UTC(year, month - 1, day));
  if (probe.getUTCFullYear() !== year || probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
    return undefined;
  }

  return { year, month, day };
}

function compareDates(a: LogDate, b: LogDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

export function formatLogDate(date: LogDate, separator = '.'): string {
  return [
    String(date.year).padStart(4, '0'),
    String(date.month).padStart(2, '0'),
    String(date.day).padStart(2, '0'),
  ].join(separator);
}

async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await fs.stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Finds the newest `nginx-access-ui.log-YYYYMMDD` (optionally `.gz`) directly inside `logDir`.
 * Returns null when the directory is missing or has no matching files.
 */
export async function findLatestLog(logDir: string): Promise<LatestLog | null> {
  if (!(await isDirectory(logDir))) {
    return null;
  }

  const names = await fg('nginx-access-ui.log-*', {
    cwd: logDir,
    onlyFiles: true,
    deep: 1,
    dot: false,
    suppressErrors: true,
    followSymbolicLinks: false,
  });

  // Sorted so the plain file comes before its .gz sibling and wins the date tie.
  names.sort();

  let latest: LatestLog | null = null;
  for (const name of names) {
    const date = parseLogFileDate(path.basename(name));
    if (!date) {
      continue;
    }
    if (!latest || compareDates(date, latest.date) > 0) {
      latest = { filePath: path.join(logDir, name), date };
    }
  }

  return latest;
}
