#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { runAnalysis } from './analysis';
import { DEFAULT_CONFIG_PATH, loadAnalyzerConfig } from './config/analyzerConfig';
import { createOutputChannel, Logger } from './logging/logger';

export async function main(argv: string[]): Promise<number> {
  const args = await yargs(argv)
    .scriptName('access-log-analyzer')
    .usage('$0 [--config <path>]')
    .option('config', {
      type: 'string',
      default: DEFAULT_CONFIG_PATH,
      describe: 'Path to a JSON config file overriding the defaults',
    })
    .strict()
    .help()
    .parseAsync();

  const { config, errors } = await loadAnalyzerConfig(args.config);
  const log = new Logger(createOutputChannel(config.logFile));
  for (const message of errors) {
    log.error(message);
  }

  try {
    await runAnalysis(config, log);
    return 0;
  } catch (err) {
    log.exception('Log analysis failed', err);
    return 1;
  }
}

if (require.main === module) {
  main(hideBin(process.argv)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    },
  );
}
