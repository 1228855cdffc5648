import * as fs from 'node:fs/promises';

export type AnalyzerConfig = {
  reportSize: number;
  reportDir: string;
  logDir: string;
  /** Where the analyzer's own log goes; null means stdout. */
  logFile: string | null;
  /** Max share of unparseable lines before the run is aborted, in [0, 1]. */
  errorsLimit: number;
  /** Report template; null means `<reportDir>/report.html`. */
  reportTemplate: string | null;
};

export type AnalyzerConfigResult = {
  config: AnalyzerConfig;
  errors: string[];
};

export const DEFAULT_CONFIG_PATH = './config.json';

// errorsLimit 0.64 still reports when up to 64% of lines fail to parse.
export const DEFAULT_ANALYZER_CONFIG: AnalyzerConfig = {
  reportSize: 10,
  reportDir: './reports',
  logDir: './logs',
  logFile: null,
  errorsLimit: 0.64,
  reportTemplate: null,
};

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(v: unknown): string | undefined {
  return typeof v === 'string' && v.trim() ? v : undefined;
}

/**
 * Overlays the upper-case keys of a parsed config file on top of the defaults.
 * Invalid values keep the default and are reported in `errors`; unknown keys are ignored.
 */
export function normalizeAnalyzerConfig(input: unknown): AnalyzerConfigResult {
  const config: AnalyzerConfig = { ...DEFAULT_ANALYZER_CONFIG };
  const errors: string[] = [];

  if (!isRecord(input)) {
    return { config, errors };
  }

  if (input.REPORT_SIZE !== undefined) {
    const n = input.REPORT_SIZE;
    if (typeof n === 'number' && Number.isFinite(n) && n >= 1) {
      config.reportSize = Math.floor(n);
    } else {
      errors.push(`REPORT_SIZE must be a positive integer, got ${JSON.stringify(n)}`);
    }
  }

  if (input.ERRORS_LIMIT !== undefined) {
    const n = input.ERRORS_LIMIT;
    if (typeof n === 'number' && Number.isFinite(n)) {
      config.errorsLimit = Math.max(0, Math.min(1, n));
      if (config.errorsLimit !== n) {
        errors.push(`ERRORS_LIMIT ${n} is outside [0, 1], clamped to ${config.errorsLimit}`);
      }
    } else {
      errors.push(`ERRORS_LIMIT must be a number between 0 and 1, got ${JSON.stringify(n)}`);
    }
  }

  for (const [key, field] of [
    ['REPORT_DIR', 'reportDir'],
    ['LOG_DIR', 'logDir'],
  ] as const) {
    if (input[key] === undefined) {
      continue;
    }
    const value = nonEmptyString(input[key]);
    if (value) {
      config[field] = value;
    } else {
      errors.push(`${key} must be a non-empty string`);
    }
  }

  for (const [key, field] of [
    ['LOG_FILE', 'logFile'],
    ['REPORT_TEMPLATE', 'reportTemplate'],
  ] as const) {
    if (input[key] === undefined) {
      continue;
    }
    const raw = input[key];
    const value = nonEmptyString(raw);
    if (raw === null || value) {
      config[field] = value ?? null;
    } else {
      errors.push(`${key} must be a non-empty string or null`);
    }
  }

  return { config, errors };
}

export async function loadAnalyzerConfig(configPath: string): Promise<AnalyzerConfigResult> {
  let text: string;
  try {
    text = await fs.readFile(configPath, 'utf8');
  } catch (err) {
    if (isRecord(err) && err.code === 'ENOENT') {
      const { config } = normalizeAnalyzerConfig(undefined);
      return { config, errors: [`Config file ${configPath} was not found, using defaults`] };
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Config file ${configPath} is not valid JSON`, { cause: err });
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file ${configPath} must contain a JSON object`);
  }

  return normalizeAnalyzerConfig(parsed);
}
