export { getMetricsSink, setMetricsSink, resetMetricsSink, formatMetricName } from './sink.js';
export type { MetricsSink } from './sink.js';
export { createLoggerSink } from './logger-sink.js';
export { createFanOutSink } from './fan-out.js';
