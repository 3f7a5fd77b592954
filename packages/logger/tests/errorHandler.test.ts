/**
 * @fileoverview Tests for global error handler functionality
 */

import { describe, it, expect } from 'vitest';
import { createLogger } from '../src/createLogger.js';
import { attachGlobalHandlers } from '../src/errorHandler.js';
import { captureStream, flush } from './helpers.js';

describe('attachGlobalHandlers', () => {
  it('should register and remove process handlers', () => {
    const logger = createLogger({ level: 'info', json: true, console: false });
    const before = process.listenerCount('unhandledRejection');

    const detach = attachGlobalHandlers(logger);
    expect(process.listenerCount('unhandledRejection')).toBe(before + 1);

    detach();
    expect(process.listenerCount('unhandledRejection')).toBe(before);
  });

  it('should warn when attaching handlers twice', async () => {
    const { stream, lines } = captureStream();
    const logger = createLogger({ level: 'info', json: true, console: false, stream });

    const detach = attachGlobalHandlers(logger);
    attachGlobalHandlers(logger);
    detach();
    await flush();

    const messages = lines().map((line) => JSON.parse(line).message);
    expect(messages).toEqual(['Global error handlers already attached, skipping']);
  });
});
