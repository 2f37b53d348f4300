import { Writable } from 'node:stream';
import winston from 'winston';
import type { Logger } from '../src/types.js';

/**
 * Adds an in-memory transport to `logger` and returns the raw lines written to it.
 */
export function captureLines(logger: Logger): string[] {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      lines.push(...chunk.toString().split('\n').filter((line) => line.length > 0));
      callback();
    },
  });
  logger.add(new winston.transports.Stream({ stream }));
  return lines;
}

export function parseLines(lines: string[]): Record<string, unknown>[] {
  return lines.map((line): Record<string, unknown> => JSON.parse(line));
}

export function flush(ms = 50): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
