/**
 * Serialization module exports.
 */

export {
  escapeMetricName,
  escapeLabelValue,
  formatLabelPairs,
  renderLabeledName,
  formatTypeLine,
  formatSampleLine,
  formatHeader,
  type ExpositionType,
} from './exposition-text.js';
