import type { Clock } from '../domain/index.js';

/** Default clock: Node's monotonic high-resolution timer. */
export const monotonicClock: Clock = () => process.hrtime.bigint();

/** Whole microseconds between two clock readings. */
export function elapsedMicros(start: bigint, end: bigint): number {
  return Number((end - start) / 1000n);
}
