import type { Logger } from 'pino';
import type {
  Clock,
  EventMetadata,
  MetricName,
  TimedDescriptor,
  Visibility,
} from '../domain/index.js';
import { TimedDefinitionError } from '../domain/index.js';
import type { MetricsSink } from '../infrastructure/index.js';
import {
  formatMetricName,
  getLogger,
  getMetricsSink,
  getTimingConfig,
} from '../infrastructure/index.js';
import { timedOptionsSchema, describeIssues } from './options-schema.js';
import { monotonicClock, elapsedMicros } from './stopwatch.js';

/** Static metadata, or a function of the call's own `this` and arguments. */
export type MetadataSource<A extends unknown[], T> =
  | EventMetadata
  | ((this: T, ...args: A) => EventMetadata);

export interface TimedOptions<A extends unknown[] = unknown[], T = unknown> {
  /** Overrides `fn.name` for the default metric and the wrapper's `name`. */
  name?: string;
  /** Event channel. Omitted or empty means `[marker, name]`. */
  metric?: MetricName;
  metadata?: MetadataSource<A, T>;
  /** Defaults to the process-wide sink, looked up on every call. */
  sink?: MetricsSink;
  clock?: Clock;
  /** First segment of the default metric. Defaults to the configured marker. */
  marker?: string;
  log?: Logger;
}

export type TimedFunction<A extends unknown[], R, T = unknown> =
  ((this: T, ...args: A) => R) & { readonly timed: TimedDescriptor };

/** Any timed function, whatever its parameters. */
export type AnyTimedFunction =
  ((this: never, ...args: never) => unknown) & { readonly timed: TimedDescriptor };

/**
 * Wraps `fn` so that every successful call is timed and reported.
 *
 * Each call that returns normally emits one event on the resolved metric
 * with `{ call: <microseconds> }` and the call's metadata. A call that
 * throws emits nothing and the error reaches the caller untouched.
 *
 * When `fn` returns a native promise, timing runs until it settles:
 * fulfilment emits, rejection does not. The caller gets a promise chained
 * on the body's, settling with the same value or reason. Other thenables
 * are returned untouched and timed as plain values.
 *
 * @example
 * const add = defineTimed((a: number, b: number) => a + b, { metric: ['math', 'add'] });
 * add(1, 2); // 3, plus one event on ['math', 'add']
 *
 * @throws {TimedDefinitionError} when the options are malformed or no
 *   metric can be derived.
 */
export function defineTimed<A extends unknown[], R, T = unknown>(
  fn: (this: T, ...args: A) => R,
  options: TimedOptions<A, T> = {},
): TimedFunction<A, R, T> {
  return wrap(fn, options, 'public');
}

/**
 * Same as {@link defineTimed}, but the result is described as private:
 * `TimedModule` keeps it off its export surface.
 */
export function defineTimedPrivate<A extends unknown[], R, T = unknown>(
  fn: (this: T, ...args: A) => R,
  options: TimedOptions<A, T> = {},
): TimedFunction<A, R, T> {
  return wrap(fn, options, 'private');
}

/**
 * Validates a definition and builds its descriptor without wrapping anything.
 */
export function describeTimed(
  fn: unknown,
  options: Pick<TimedOptions, 'name' | 'metric' | 'marker'>,
  visibility: Visibility,
): TimedDescriptor {
  if (typeof fn !== 'function') {
    throw new TimedDefinitionError('Cannot time a value that is not a function');
  }

  const parsed = timedOptionsSchema.safeParse({
    name: options.name,
    metric: options.metric,
    marker: options.marker,
  });

  if (!parsed.success) {
    throw new TimedDefinitionError('Invalid timed function options', describeIssues(parsed.error));
  }

  const name = parsed.data.name ?? fn.name;
  const supplied = parsed.data.metric ?? [];

  if (supplied.length > 0) {
    return { name, metric: Object.freeze(supplied), visibility };
  }

  if (name === '') {
    throw new TimedDefinitionError(
      'Cannot derive a metric for an anonymous function; pass a name or a metric',
    );
  }

  const marker = parsed.data.marker ?? getTimingConfig().marker;
  return { name, metric: Object.freeze([marker, name]), visibility };
}

function wrap<A extends unknown[], R, T>(
  fn: (this: T, ...args: A) => R,
  options: TimedOptions<A, T>,
  visibility: Visibility,
): TimedFunction<A, R, T> {
  const descriptor = describeTimed(fn, options, visibility);
  const { metric } = descriptor;
  const clock = options.clock ?? monotonicClock;
  const log = options.log ?? getLogger();
  const source = options.metadata;

  const report = (micros: number, self: T, args: A): void => {
    try {
      let metadata: EventMetadata = {};
      if (typeof source === 'function') {
        metadata = source.apply(self, args);
      } else if (source !== undefined) {
        metadata = source;
      }

      (options.sink ?? getMetricsSink()).emit(metric, { call: micros }, metadata);
    } catch (err: unknown) {
      // Reporting never changes the outcome of the call
      log.warn({ err, metric: formatMetricName(metric) }, 'Telemetry emission failed');
    }
  };

  const timed = function (this: T, ...args: A): R {
    if (!getTimingConfig().enabled) {
      return fn.apply(this, args);
    }

    const start = clock();
    const result = fn.apply(this, args);

    if (result instanceof Promise) {
      return afterFulfilment<R>(result, () => report(elapsedMicros(start, clock()), this, args));
    }

    report(elapsedMicros(start, clock()), this, args);
    return result;
  };

  Object.defineProperty(timed, 'name', { value: descriptor.name, configurable: true });
  Object.defineProperty(timed, 'length', { value: fn.length, configurable: true });

  return Object.assign(timed, { timed: descriptor });
}

/**
 * Chains `onFulfilled` onto a native promise and hands back the derived
 * promise, which settles with the same value or reason. Rejections are left
 * to whoever holds the derived promise.
 */
function afterFulfilment<R>(result: R & Promise<unknown>, onFulfilled: () => void): R;
function afterFulfilment(result: Promise<unknown>, onFulfilled: () => void): Promise<unknown> {
  return result.then((value) => {
    onFulfilled();
    return value;
  });
}
