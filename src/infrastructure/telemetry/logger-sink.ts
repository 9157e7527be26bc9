import type { Logger, Level } from 'pino';
import type { MetricsSink } from './sink.js';

/**
 * Sink that writes every event as a structured pino log line.
 *
 * Line shape: `{ metric: 'timing.add', measurements: { call }, metadata }`
 * with the message `Telemetry event`.
 */
export function createLoggerSink(log: Logger, level: Level = 'debug'): MetricsSink {
  return {
    emit(metric, measurements, metadata) {
      log[level]({ metric: metric.join('.'), measurements, metadata }, 'Telemetry event');
    },
  };
}
