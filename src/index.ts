/**
 * timed-calls — wrap functions so each successful call is timed and
 * reported as one telemetry event.
 *
 * @example
 * import { defineTimed, setMetricsSink } from 'timed-calls';
 *
 * setMetricsSink({ emit: (metric, { call }) => console.log(metric.join('.'), call) });
 *
 * const add = defineTimed((a: number, b: number) => a + b);
 * add(1, 2); // logs "timing.add <µs>"
 */
export {
  defineTimed,
  defineTimedPrivate,
  describeTimed,
  TimedModule,
  timedOptionsSchema,
  metricNameSchema,
  monotonicClock,
} from './application/index.js';
export type {
  TimedOptions,
  TimedFunction,
  AnyTimedFunction,
  MetadataSource,
  TimedModuleDefaults,
  TimedDefinitionOptions,
  TimedScope,
  TimedExports,
} from './application/index.js';

export { TimedDefinitionError } from './domain/index.js';
export type {
  MetricName,
  EventMetadata,
  Measurements,
  TelemetryEvent,
  Visibility,
  TimedDescriptor,
  Clock,
} from './domain/index.js';

export {
  getMetricsSink,
  setMetricsSink,
  resetMetricsSink,
  createLoggerSink,
  createFanOutSink,
  formatMetricName,
  loadTimingConfig,
  getTimingConfig,
  setTimingConfig,
  resetTimingConfig,
  onTimingConfigChange,
  createLogger,
  getLogger,
  setLogger,
} from './infrastructure/index.js';
export type { MetricsSink, TimingConfig } from './infrastructure/index.js';
