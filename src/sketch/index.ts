export {
  HistogramSketch,
  DEFAULT_SIGNIFICANT_FIGURES,
  DEFAULT_HIGHEST_TRACKABLE_VALUE,
  MIN_SIGNIFICANT_FIGURES,
  MAX_SIGNIFICANT_FIGURES,
  type SketchOptions,
} from './histogram-sketch.js';
