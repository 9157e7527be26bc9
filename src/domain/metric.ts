/**
 * Core domain types for timed-call telemetry.
 *
 * A timed call produces exactly one event: the channel it is reported on,
 * the measurements taken, and whatever metadata the caller attached.
 */

/** Ordered channel segments, e.g. `['timing', 'add']`. */
export type MetricName = readonly string[];

/** Per-event context supplied by the caller. */
export type EventMetadata = Record<string, unknown>;

/** Measurements carried by a timed-call event. `call` is in microseconds. */
export interface Measurements {
  readonly call: number;
}

export interface TelemetryEvent {
  readonly metric: MetricName;
  readonly measurements: Measurements;
  readonly metadata: EventMetadata;
}

export type Visibility = 'public' | 'private';

/**
 * Read-only description of a wrapped function, attached to it as `timed`.
 */
export interface TimedDescriptor {
  readonly name: string;
  readonly metric: MetricName;
  readonly visibility: Visibility;
}

/** Monotonic time source in nanoseconds. */
export type Clock = () => bigint;
