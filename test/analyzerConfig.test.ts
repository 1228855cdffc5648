import { describe, expect, test } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';

import {
  ConfigError,
  DEFAULT_ANALYZER_CONFIG,
  loadAnalyzerConfig,
  normalizeAnalyzerConfig,
} from '../src/config/analyzerConfig';
import { makeTempDir } from './helpers/accessLog';

describe('analyzer config', () => {
  test('falls back to defaults for non-object input', () => {
    expect(normalizeAnalyzerConfig(undefined)).toEqual({ config: DEFAULT_ANALYZER_CONFIG, errors: [] });
    expect(normalizeAnalyzerConfig([1, 2])).toEqual({ config: DEFAULT_ANALYZER_CONFIG, errors: [] });
  });

  test('keeps the permissive default error limit', () => {
    expect(DEFAULT_ANALYZER_CONFIG.errorsLimit).toBe(0.64);
    expect(DEFAULT_ANALYZER_CONFIG.reportSize).toBe(10);
  });

  test('overlays file values on top of the defaults', () => {
    const { config, errors } = normalizeAnalyzerConfig({
      REPORT_SIZE: 25,
      REPORT_DIR: '/tmp/reports',
      LOG_DIR: '/var/log/nginx',
      LOG_FILE: '/tmp/analyzer.log',
      ERRORS_LIMIT: 0.1,
      UNKNOWN_KEY: true,
    });

    expect(errors).toEqual([]);
    expect(config).toEqual({
      reportSize: 25,
      reportDir: '/tmp/reports',
      logDir: '/var/log/nginx',
      logFile: '/tmp/analyzer.log',
      errorsLimit: 0.1,
      reportTemplate: null,
    });
  });

  test('reports invalid values and keeps their defaults', () => {
    const { config, errors } = normalizeAnalyzerConfig({
      REPORT_SIZE: 0,
      ERRORS_LIMIT: 'high',
      LOG_DIR: '',
      LOG_FILE: 42,
    });

    expect(config).toEqual(DEFAULT_ANALYZER_CONFIG);
    expect(errors).toEqual([
      'REPORT_SIZE must be a positive integer, got 0',
      'ERRORS_LIMIT must be a number between 0 and 1, got "high"',
      'LOG_DIR must be a non-empty string',
      'LOG_FILE must be a non-empty string or null',
    ]);
  });

  test('clamps the error limit and floors the report size', () => {
    const { config, errors } = normalizeAnalyzerConfig({ ERRORS_LIMIT: 1.5, REPORT_SIZE: 3.7 });

    expect(config.errorsLimit).toBe(1);
    expect(config.reportSize).toBe(3);
    expect(errors).toEqual(['ERRORS_LIMIT 1.5 is outside [0, 1], clamped to 1']);
  });

  test('reports a percentage-style error limit instead of silently disabling the check', () => {
    const { config, errors } = normalizeAnalyzerConfig({ ERRORS_LIMIT: 64 });

    expect(config.errorsLimit).toBe(1);
    expect(errors).toEqual(['ERRORS_LIMIT 64 is outside [0, 1], clamped to 1']);
  });

  test('reports a negative error limit clamped to zero', () => {
    const { config, errors } = normalizeAnalyzerConfig({ ERRORS_LIMIT: -0.2 });

    expect(config.errorsLimit).toBe(0);
    expect(errors).toEqual(['ERRORS_LIMIT -0.2 is outside [0, 1], clamped to 0']);
  });

  test('accepts null for the optional paths', () => {
    const { config, errors } = normalizeAnalyzerConfig({ LOG_FILE: null, REPORT_TEMPLATE: null });

    expect(errors).toEqual([]);
    expect(config.logFile).toBeNull();
    expect(config.reportTemplate).toBeNull();
  });

  test('loads a config file from disk', async () => {
    const file = path.join(makeTempDir(), 'config.json');
    fs.writeFileSync(file, JSON.stringify({ REPORT_SIZE: 5, REPORT_TEMPLATE: './tpl.html' }), 'utf8');

    const { config, errors } = await loadAnalyzerConfig(file);

    expect(errors).toEqual([]);
    expect(config.reportSize).toBe(5);
    expect(config.reportTemplate).toBe('./tpl.html');
  });

  test('uses defaults when the config file is missing', async () => {
    const file = path.join(makeTempDir(), 'missing.json');

    expect(await loadAnalyzerConfig(file)).toEqual({
      config: DEFAULT_ANALYZER_CONFIG,
      errors: [`Config file ${file} was not found, using defaults`],
    });
  });

  test('throws ConfigError for malformed JSON or a non-object document', async () => {
    const dir = makeTempDir();
    const broken = path.join(dir, 'broken.json');
    const list = path.join(dir, 'list.json');
    fs.writeFileSync(broken, '{ "REPORT_SIZE": ', 'utf8');
    fs.writeFileSync(list, '[1, 2, 3]', 'utf8');

    await expect(loadAnalyzerConfig(broken)).rejects.toBeInstanceOf(ConfigError);
    await expect(loadAnalyzerConfig(list)).rejects.toThrow(`Config file ${list} must contain a JSON object`);
  });
});
