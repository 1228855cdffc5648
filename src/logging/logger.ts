import * as fs from 'node:fs';

export type OutputChannel = {
  appendLine(value: string): void;
};

export type LogLevel = 'I' | 'E';

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** `[YYYY.MM.DD HH:MM:SS] L message`, local time. */
export function formatLogLine(level: LogLevel, message: string, at: Date): string {
  const date = `${at.getFullYear()}.${pad2(at.getMonth() + 1)}.${pad2(at.getDate())}`;
  const time = `${pad2(at.getHours())}:${pad2(at.getMinutes())}:${pad2(at.getSeconds())}`;
  return `[${date} ${time}] ${level} ${message}`;
}

/** Appends to `logFile` when given, otherwise writes to stdout. */
export function createOutputChannel(logFile: string | null): OutputChannel {
  if (logFile) {
    return {
      appendLine: (value) => fs.appendFileSync(logFile, `${value}\n`, 'utf8'),
    };
  }
  return {
    appendLine: (value) => {
      process.stdout.write(`${value}\n`);
    },
  };
}

export class Logger {
  constructor(
    private readonly output: OutputChannel,
    private readonly now: () => Date = () => new Date(),
  ) {}

  info(message: string): void {
    this.output.appendLine(formatLogLine('I', message, this.now()));
  }

  error(message: string): void {
    this.output.appendLine(formatLogLine('E', message, this.now()));
  }

  exception(message: string, err: unknown): void {
    const detail = err instanceof Error ? (err.stack ?? `${err.name}: ${err.message}`) : String(err);
    this.error(`${message}\n${detail}`);
  }
}
