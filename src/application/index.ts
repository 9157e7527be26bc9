export { defineTimed, defineTimedPrivate, describeTimed } from './timed.js';
export type { TimedOptions, TimedFunction, AnyTimedFunction, MetadataSource } from './timed.js';
export { TimedModule } from './timed-module.js';
export type { TimedModuleDefaults, TimedDefinitionOptions, TimedScope, TimedExports } from './timed-module.js';
export { timedOptionsSchema, metricNameSchema } from './options-schema.js';
export { monotonicClock, elapsedMicros } from './stopwatch.js';
