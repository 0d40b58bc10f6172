/**
 * Metrics Exposition
 *
 * Main entry point. Provides metric keys, the Recorder interface, a
 * mergeable histogram sketch and a renderer producing the Prometheus text
 * exposition format. Serving the payload is left to the caller.
 */

// Re-export types
export type {
  CounterValue,
  GaugeValue,
  MetricKind,
  Recorder,
  Measurement,
  Snapshot,
  SnapshotProvider,
  AsyncSnapshotProvider,
  Clock,
} from './types.js';

// Re-export key model
export { Key, Label, intoKey, intoLabels, type IntoKey, type IntoLabels } from './key/index.js';

// Re-export quantiles
export { Quantile, DEFAULT_QUANTILES, formatQuantileLabel, parseQuantiles } from './quantiles/index.js';

// Re-export sketch
export {
  HistogramSketch,
  DEFAULT_SIGNIFICANT_FIGURES,
  DEFAULT_HIGHEST_TRACKABLE_VALUE,
  MIN_SIGNIFICANT_FIGURES,
  MAX_SIGNIFICANT_FIGURES,
  type SketchOptions,
} from './sketch/index.js';

// Re-export recorders and renderer
export { NoopRecorder, validateCounterValue, validateGaugeValue } from './recorder/index.js';
export { PrometheusRenderer, systemClock, type PrometheusRendererOptions } from './renderer/index.js';

// Re-export serialization helpers
export {
  escapeMetricName,
  escapeLabelValue,
  formatLabelPairs,
  renderLabeledName,
  formatHeader,
  type ExpositionType,
} from './serialization/index.js';

// Re-export snapshots
export {
  MeasurementSnapshot,
  MeasurementBuffer,
  replayMeasurement,
  renderSnapshots,
  renderFromProvider,
} from './snapshot/index.js';

// Re-export call-site helpers
export {
  setRecorder,
  getRecorder,
  clearRecorder,
  isRecorderInstalled,
  counter,
  gauge,
  timing,
  timingBetween,
  value,
  asNanoseconds,
  type HrTime,
  type Nanoseconds,
} from './facade/index.js';

// Re-export configuration
export { RendererConfig, RendererConfigBuilder, type RendererConfigOptions } from './config/index.js';

// Re-export error types
export {
  MetricsError,
  ConfigurationError,
  ValidationError,
  RecordingError,
  RegistrationError,
  RendererStateError,
  isRetryableError,
  isMetricsError,
  getErrorCategory,
  formatError,
  type ErrorCategory,
} from './errors/index.js';

// Re-export logging
export {
  ConsoleLogger,
  NoopLogger,
  createDefaultLoggingConfig,
  logError,
  type Logger,
  type LogLevel,
  type LogFormat,
  type LoggingConfig,
} from './observability/logging.js';

// Re-export testing utilities
export {
  CapturingRecorder,
  parseExposition,
  findSamples,
  assertSampleValue,
  assertTypeDeclared,
  assertSummary,
  type ExpositionSample,
  type ExpositionTypeDeclaration,
  type ParsedExposition,
} from './testing/index.js';
