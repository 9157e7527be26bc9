import type { Logger } from 'pino';
import type { MetricsSink } from './sink.js';
import { formatMetricName } from './sink.js';

/**
 * Forwards each event to every sink in order.
 *
 * Each sink is invoked independently — a failure in one sink does not
 * prevent the others from receiving the event. Errors are logged.
 */
export function createFanOutSink(sinks: readonly MetricsSink[], log: Logger): MetricsSink {
  return {
    emit(metric, measurements, metadata) {
      for (const [index, sink] of sinks.entries()) {
        try {
          sink.emit(metric, measurements, metadata);
        } catch (err: unknown) {
          log.warn({ err, metric: formatMetricName(metric), sink: index }, 'Metrics sink failed');
        }
      }
    },
  };
}
