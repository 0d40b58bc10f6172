export { Quantile, DEFAULT_QUANTILES, formatQuantileLabel, parseQuantiles } from './quantile.js';
