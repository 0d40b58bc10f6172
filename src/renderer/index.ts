export {
  PrometheusRenderer,
  systemClock,
  type PrometheusRendererOptions,
} from './prometheus-renderer.js';
