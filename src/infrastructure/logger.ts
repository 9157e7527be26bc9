import { pino } from 'pino';
import type { Logger, LevelWithSilent } from 'pino';
import { getTimingConfig, onTimingConfigChange } from './config.js';

const LOGGER_NAME = 'timed-calls';

export function createLogger(level: LevelWithSilent = getTimingConfig().logLevel): Logger {
  return pino({ name: LOGGER_NAME, level });
}

let shared: Logger | null = null;
let unfollow: (() => void) | null = null;

/**
 * Library-wide logger, created on first use at the configured level. The
 * logger created here follows later `setTimingConfig({ logLevel })` calls.
 */
export function getLogger(): Logger {
  if (shared === null) {
    const owned = createLogger();
    unfollow = onTimingConfigChange((config) => {
      owned.level = config.logLevel;
    });
    shared = owned;
  }
  return shared;
}

/** Replaces the library-wide logger, e.g. with an application's child logger. */
export function setLogger(log: Logger): void {
  stopFollowingConfig();
  shared = log;
}

export function resetLogger(): void {
  stopFollowingConfig();
  shared = null;
}

function stopFollowingConfig(): void {
  unfollow?.();
  unfollow = null;
}
