export {
  MeasurementSnapshot,
  MeasurementBuffer,
  replayMeasurement,
  renderSnapshots,
  renderFromProvider,
} from './measurement-snapshot.js';
