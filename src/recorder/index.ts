export { NoopRecorder } from './noop-recorder.js';
export { validateCounterValue, validateGaugeValue } from './values.js';
