import { z } from 'zod';
import type { LevelWithSilent } from 'pino';

/**
 * Process-level settings for timed functions.
 */
export interface TimingConfig {
  enabled: boolean;
  marker: string;
  logLevel: LevelWithSilent;
}

/**
 * Default configuration — timing on, `timing` marker, `info` logging.
 */
export const DEFAULT_CONFIG: TimingConfig = {
  enabled: true,
  marker: 'timing',
  logLevel: 'info',
};

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const satisfies readonly LevelWithSilent[];

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0']))
  .transform((v) => v === 'true' || v === '1');

/**
 * Environment schema. Every field falls back to its default on its own,
 * so one bad variable does not discard the others.
 */
const timingEnvSchema = z.object({
  TIMING_ENABLED: booleanFlag.catch(DEFAULT_CONFIG.enabled),
  TIMING_MARKER: z.string().trim().min(1).catch(DEFAULT_CONFIG.marker),
  LOG_LEVEL: z.enum(LOG_LEVELS).catch(DEFAULT_CONFIG.logLevel),
});

/**
 * Reads timing configuration from environment variables.
 *
 * TIMING_ENABLED — `true`/`false`/`1`/`0`
 * TIMING_MARKER  — first segment of default metric names
 * LOG_LEVEL      — pino level
 */
export function loadTimingConfig(
  env: Record<string, string | undefined> = process.env,
): TimingConfig {
  const parsed = timingEnvSchema.parse(env);

  return {
    enabled: parsed.TIMING_ENABLED,
    marker: parsed.TIMING_MARKER,
    logLevel: parsed.LOG_LEVEL,
  };
}

let current: TimingConfig | null = null;

type TimingConfigListener = (config: TimingConfig) => void;

const listeners = new Set<TimingConfigListener>();

/** Returns the process configuration, loading it from the environment once. */
export function getTimingConfig(): TimingConfig {
  current ??= loadTimingConfig();
  return current;
}

/** Overrides parts of the process configuration. Returns the result. */
export function setTimingConfig(overrides: Partial<TimingConfig>): TimingConfig {
  const next = { ...getTimingConfig(), ...overrides };
  current = next;
  for (const listener of listeners) {
    listener(next);
  }
  return next;
}

/**
 * Calls `listener` after every {@link setTimingConfig}. Returns a function
 * that unsubscribes it.
 */
export function onTimingConfigChange(listener: TimingConfigListener): () => void {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
}

/** Drops the cached configuration; the next read reloads from the environment. */
export function resetTimingConfig(): void {
  current = null;
}
