/**
 * Error types for metrics recording and exposition rendering.
 * None of them is retryable.
 */

/**
 * Error category for classification
 */
export type ErrorCategory =
  | 'configuration'
  | 'validation'
  | 'recording'
  | 'registration'
  | 'state';

/**
 * Base error class for all metrics errors
 */
export abstract class MetricsError extends Error {
  abstract readonly category: ErrorCategory;
  readonly isRetryable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Configuration error - invalid quantiles, sketch precision or config values.
 * Raised when something is constructed, never later.
 */
export class ConfigurationError extends MetricsError {
  readonly category = 'configuration' as const;
  readonly field?: string;

  constructor(message: string, options?: { field?: string | undefined; cause?: unknown }) {
    super(message, options);
    if (options?.field !== undefined) {
      this.field = options.field;
    }
  }
}

/**
 * Validation error - a counter or gauge value outside its integer domain
 */
export class ValidationError extends MetricsError {
  readonly category = 'validation' as const;
  readonly metricName?: string;

  constructor(message: string, options?: { metricName?: string | undefined; cause?: unknown }) {
    super(message, options);
    if (options?.metricName !== undefined) {
      this.metricName = options.metricName;
    }
  }
}

/**
 * Recording error - a histogram value the sketch cannot represent
 */
export class RecordingError extends MetricsError {
  readonly category = 'recording' as const;
  readonly value: number;
  readonly highestTrackableValue: number;

  constructor(
    message: string,
    options: { value: number; highestTrackableValue: number; cause?: unknown }
  ) {
    super(message, options);
    this.value = options.value;
    this.highestTrackableValue = options.highestTrackableValue;
  }
}

/**
 * Registration error - a global recorder is already installed
 */
export class RegistrationError extends MetricsError {
  readonly category = 'registration' as const;
}

/**
 * State error - a renderer used after it has been finalized
 */
export class RendererStateError extends MetricsError {
  readonly category = 'state' as const;
}

/**
 * Check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof MetricsError) {
    return error.isRetryable;
  }
  return false;
}

/**
 * Check if an error is a metrics error
 */
export function isMetricsError(error: unknown): error is MetricsError {
  return error instanceof MetricsError;
}

/**
 * Get the error category from an error
 */
export function getErrorCategory(error: unknown): ErrorCategory | undefined {
  if (error instanceof MetricsError) {
    return error.category;
  }
  return undefined;
}

/**
 * Format error for logging
 */
export function formatError(error: unknown): string {
  if (error instanceof MetricsError) {
    return [`[${error.category.toUpperCase()}]`, error.name, ':', error.message].join(' ');
  }

  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }

  return String(error);
}
