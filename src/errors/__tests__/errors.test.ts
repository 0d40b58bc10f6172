/**
 * Tests for error types and helpers.
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  MetricsError,
  RecordingError,
  RegistrationError,
  RendererStateError,
  ValidationError,
  formatError,
  getErrorCategory,
  isMetricsError,
  isRetryableError,
} from '../index.js';

describe('MetricsError', () => {
  it('should set name and category per subclass', () => {
    const errors = [
      new ConfigurationError('a'),
      new ValidationError('b'),
      new RecordingError('c', { value: -1, highestTrackableValue: 10 }),
      new RegistrationError('d'),
      new RendererStateError('e'),
    ];

    expect(errors.map((e) => e.name)).toEqual([
      'ConfigurationError',
      'ValidationError',
      'RecordingError',
      'RegistrationError',
      'RendererStateError',
    ]);
    expect(errors.map((e) => e.category)).toEqual([
      'configuration',
      'validation',
      'recording',
      'registration',
      'state',
    ]);
    expect(errors.every((e) => e instanceof MetricsError && e instanceof Error)).toBe(true);
  });

  it('should keep details', () => {
    const cause = new Error('root');
    const error = new ConfigurationError('bad', { field: 'quantiles.0', cause });

    expect(error.field).toBe('quantiles.0');
    expect(error.cause).toBe(cause);
    expect(new ValidationError('bad', { metricName: 'c' }).metricName).toBe('c');

    const recording = new RecordingError('too big', { value: 11, highestTrackableValue: 10 });
    expect(recording.value).toBe(11);
    expect(recording.highestTrackableValue).toBe(10);
  });

  it('should leave optional details unset', () => {
    expect(new ConfigurationError('bad').field).toBeUndefined();
    expect(new ConfigurationError('bad').cause).toBeUndefined();
  });
});

describe('error helpers', () => {
  it('should never mark errors retryable', () => {
    expect(isRetryableError(new ConfigurationError('x'))).toBe(false);
    expect(isRetryableError(new Error('x'))).toBe(false);
  });

  it('should recognise metrics errors', () => {
    expect(isMetricsError(new RegistrationError('x'))).toBe(true);
    expect(isMetricsError(new Error('x'))).toBe(false);
    expect(getErrorCategory(new RendererStateError('x'))).toBe('state');
    expect(getErrorCategory('x')).toBeUndefined();
  });

  it('should format errors for logs', () => {
    expect(formatError(new ConfigurationError('bad quantile'))).toBe(
      '[CONFIGURATION] ConfigurationError : bad quantile'
    );
    expect(formatError(new TypeError('nope'))).toBe('TypeError: nope');
    expect(formatError('plain')).toBe('plain');
  });
});
