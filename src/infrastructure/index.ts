export { loadTimingConfig, getTimingConfig, setTimingConfig, resetTimingConfig, onTimingConfigChange, DEFAULT_CONFIG } from './config.js';
export type { TimingConfig } from './config.js';
export { createLogger, getLogger, setLogger, resetLogger } from './logger.js';
export {
  getMetricsSink,
  setMetricsSink,
  resetMetricsSink,
  formatMetricName,
  createLoggerSink,
  createFanOutSink,
} from './telemetry/index.js';
export type { MetricsSink } from './telemetry/index.js';
