import type { MetricName, Measurements, EventMetadata } from '../../domain/index.js';
import { getLogger } from '../logger.js';
import { createLoggerSink } from './logger-sink.js';

/**
 * Destination for timed-call events.
 *
 * Fire-and-forget: `emit()` returns nothing and callers do not wait on it.
 * Transport, aggregation and export are the sink's business.
 */
export interface MetricsSink {
  emit(metric: MetricName, measurements: Measurements, metadata: EventMetadata): void;
}

let current: MetricsSink | null = null;

/**
 * Returns the process-wide sink.
 * Until one is installed, events go to the library logger at `debug`.
 */
export function getMetricsSink(): MetricsSink {
  current ??= createLoggerSink(getLogger());
  return current;
}

/** Installs a process-wide sink and returns the one it replaced. */
export function setMetricsSink(sink: MetricsSink): MetricsSink {
  const previous = getMetricsSink();
  current = sink;
  return previous;
}

export function resetMetricsSink(): void {
  current = null;
}

/** Dotted form of a metric name, used in log lines. */
export function formatMetricName(metric: MetricName): string {
  return metric.join('.');
}
