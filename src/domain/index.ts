export type {
  MetricName,
  EventMetadata,
  Measurements,
  TelemetryEvent,
  Visibility,
  TimedDescriptor,
  Clock,
} from './metric.js';
export { TimedDefinitionError } from './errors.js';
