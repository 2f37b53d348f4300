/**
 * @fileoverview Tests for global error handler registration
 */

import { describe, it, expect, afterEach } from 'vitest';
import { createLogger } from '../src/createLogger.js';
import { attachGlobalHandlers } from '../src/errorHandler.js';
import { captureLines, parseLines, flush } from './helpers.js';

describe('attachGlobalHandlers', () => {
  let detach: (() => void) | null = null;

  afterEach(() => {
    detach?.();
    detach = null;
  });

  it('should register and remove process listeners', () => {
    const logger = createLogger({ level: 'info', console: false });
    const before = process.listenerCount('unhandledRejection');

    detach = attachGlobalHandlers(logger, { exit: () => undefined });
    expect(process.listenerCount('unhandledRejection')).toBe(before + 1);

    detach();
    detach = null;
    expect(process.listenerCount('unhandledRejection')).toBe(before);
  });

  it('should warn and reuse handlers when attached twice', async () => {
    const logger = createLogger({ level: 'info', json: true, console: false });
    const lines = captureLines(logger);

    detach = attachGlobalHandlers(logger, { exit: () => undefined });
    const second = attachGlobalHandlers(logger, { exit: () => undefined });
    await flush();

    expect(second).toBe(detach);
    expect(parseLines(lines).map((entry) => entry['message'])).toContain(
      'Global error handlers already attached, skipping'
    );
  });

  it('should log process warnings without exiting', async () => {
    const logger = createLogger({ level: 'info', json: true, console: false });
    const lines = captureLines(logger);
    const exits: number[] = [];

    detach = attachGlobalHandlers(logger, { exit: (code) => exits.push(code) });
    process.emit('warning', new Error('deprecated thing'));
    await flush();

    const warning = parseLines(lines).find((entry) => entry['message'] === 'Process warning emitted');
    expect(warning?.['event']).toBe('warning');
    expect(exits).toEqual([]);
  });
});
