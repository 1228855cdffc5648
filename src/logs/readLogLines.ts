import * as fs from 'node:fs';
import * as readline from 'node:readline';
import type { Readable } from 'node:stream';
import * as zlib from 'node:zlib';

function isGzipPath(filePath: string): boolean {
  return filePath.toLowerCase().endsWith('.gz');
}

function openLogStream(filePath: string): Readable {
  const fileStream = fs.createReadStream(filePath);
  if (!isGzipPath(filePath)) {
    return fileStream;
  }

  const gunzip = zlib.createGunzip();
  // pipe() does not forward source errors.
  fileStream.on('error', (err) => gunzip.destroy(err));
  return fileStream.pipe(gunzip);
}

/** Yields the lines of a plain or gzip-compressed log file without loading it whole. */
export async function* readLogLines(filePath: string): AsyncGenerator<string> {
  const input = openLogStream(filePath);
  const lines = readline.createInterface({ input, crlfDelay: Infinity });

  try {
    for await (const line of lines) {
      yield line;
    }
  } finally {
    lines.close();
    input.destroy();
  }
}
