export {
  setRecorder,
  getRecorder,
  clearRecorder,
  isRecorderInstalled,
  getFacadeLogger,
} from './global-recorder.js';
export {
  counter,
  gauge,
  timing,
  timingBetween,
  value,
  asNanoseconds,
  type HrTime,
  type Nanoseconds,
} from './helpers.js';
