import { vi } from 'vitest';
import type { Clock, TelemetryEvent } from '../src/domain/index.js';
import type { MetricsSink } from '../src/infrastructure/index.js';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
  } as unknown as import('pino').Logger;
}

/**
 * Clock that advances by `stepNs` on every reading, starting at 0.
 * With the default step each start/end pair measures 5 µs.
 */
export function fakeClock(stepNs: bigint = 5_000n): Clock {
  let now = 0n;
  return () => {
    const reading = now;
    now += stepNs;
    return reading;
  };
}

/** Sink that keeps every event it receives. */
export function recordingSink(): MetricsSink & { events: TelemetryEvent[] } {
  const events: TelemetryEvent[] = [];
  return {
    events,
    emit(metric, measurements, metadata) {
      events.push({ metric, measurements, metadata });
    },
  };
}
