/**
 * Tests for logging utilities.
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { RecordingError } from '../../errors/index.js';
import { ConsoleLogger, NoopLogger, createDefaultLoggingConfig, logError } from '../logging.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('ConsoleLogger', () => {
  it('should default to pretty info logs with timestamps', () => {
    expect(createDefaultLoggingConfig()).toEqual({
      level: 'info',
      format: 'pretty',
      includeTimestamps: true,
    });
  });

  it('should skip messages below the configured level', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = new ConsoleLogger({ level: 'warn', format: 'compact' });

    logger.info('hidden');
    logger.warn('shown');

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith('[WARN] shown');
  });

  it('should write compact lines with context', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    new ConsoleLogger({ format: 'compact' }).info('rendered', { bytes: 120 });

    expect(spy).toHaveBeenCalledWith('[INFO] rendered {"bytes":120}');
  });

  it('should write JSON lines', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    new ConsoleLogger({ format: 'json', includeTimestamps: false }).error('failed', { key: 'c' });

    expect(spy).toHaveBeenCalledWith('{"level":"error","message":"failed","key":"c"}');
  });

  it('should write pretty lines', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    new ConsoleLogger({ includeTimestamps: false }).info('installed', { recorder: 'X' });

    expect(spy).toHaveBeenCalledWith('[INFO] installed \n  recorder: "X"');
  });
});

describe('NoopLogger', () => {
  it('should write nothing', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    new NoopLogger().error('ignored');
    expect(spy).not.toHaveBeenCalled();
  });
});

describe('logError', () => {
  it('should log the formatted error with its category', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = new ConsoleLogger({ format: 'compact' });

    logError(logger, new RecordingError('too big', { value: 11, highestTrackableValue: 10 }), 'record');

    expect(spy).toHaveBeenCalledWith(
      '[ERROR] [RECORDING] RecordingError : too big {"operation":"record","category":"recording"}'
    );
  });
});
