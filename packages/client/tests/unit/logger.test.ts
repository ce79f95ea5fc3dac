import { afterEach, describe, expect, it, vi } from 'vitest';
import { consoleLogger, guardLogger, noopLogger } from '../../src/logger.js';
import type { Logger } from '../../src/types/index.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should drop everything with the noop logger', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

    noopLogger.info('ignored', { a: 1 });
    noopLogger.error('ignored');

    expect(spy).not.toHaveBeenCalled();
  });

  it('should write JSON lines to stderr with the console logger', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(Date, 'now').mockReturnValue(1_700_000_000_000);

    consoleLogger.warn('Received non-2xx response: 503', { status: 503 });

    expect(spy).toHaveBeenCalledWith(
      '{"level":"warn","ts":1700000000000,"msg":"Received non-2xx response: 503","status":503}',
    );
  });

  it('should forward calls through the guard', () => {
    const inner: Logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };

    guardLogger(inner).info('hello', { attempt: 1 });

    expect(inner.info).toHaveBeenCalledWith('hello', { attempt: 1 });
  });

  it('should swallow errors thrown by the sink', () => {
    const inner: Logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: () => {
        throw new Error('sink down');
      },
      error: vi.fn(),
    };

    expect(() => guardLogger(inner).warn('hello')).not.toThrow();
  });

  it('should accept console as a logger', () => {
    const logger: Logger = console;

    expect(typeof logger.debug).toBe('function');
  });
});
