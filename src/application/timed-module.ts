import type { Logger } from 'pino';
import type { TimedDescriptor } from '../domain/index.js';
import { TimedDefinitionError } from '../domain/index.js';
import { formatMetricName, getLogger } from '../infrastructure/index.js';
import { defineTimed, defineTimedPrivate } from './timed.js';
import type { AnyTimedFunction, TimedFunction, TimedOptions } from './timed.js';

/** Options applied to every definition in a module. */
export type TimedModuleDefaults = Pick<TimedOptions, 'sink' | 'clock' | 'marker' | 'log'>;

/** Per-definition options; the name is given separately. */
export type TimedDefinitionOptions<A extends unknown[], T> = Omit<TimedOptions<A, T>, 'name'>;

/** Public functions of a module, by name. */
export type TimedExports = Record<string, AnyTimedFunction>;

/** Definition functions handed to a module body. */
export interface TimedScope {
  def<A extends unknown[], R, T = unknown>(
    name: string,
    fn: (this: T, ...args: A) => R,
    options?: TimedDefinitionOptions<A, T>,
  ): TimedFunction<A, R, T>;
  defp<A extends unknown[], R, T = unknown>(
    name: string,
    fn: (this: T, ...args: A) => R,
    options?: TimedDefinitionOptions<A, T>,
  ): TimedFunction<A, R, T>;
}

/**
 * A named group of timed functions with a typed export surface.
 *
 * The body receives `def` and `defp`. `def` defines a public function,
 * `defp` a private one that only the body holds. The body returns the
 * public functions under their own names; that object becomes `exports`.
 * Names are unique across both kinds, and the scope closes once the body
 * returns.
 *
 * @example
 * const billing = new TimedModule('billing', ({ def, defp }) => {
 *   const round = defp('round', (n: number) => Math.round(n));
 *   const total = def('total', (items: number[]) => round(items.reduce((a, b) => a + b, 0)));
 *   return { total };
 * });
 * billing.exports.total([1.2, 2.5]); // 4
 */
export class TimedModule<E extends TimedExports> {
  readonly moduleName: string;
  readonly exports: Readonly<E>;
  private readonly defaults: TimedModuleDefaults;
  private readonly log: Logger;
  private readonly descriptors: Map<string, TimedDescriptor> = new Map();
  private readonly surface: Map<string, AnyTimedFunction> = new Map();
  private open = true;

  constructor(
    moduleName: string,
    body: (scope: TimedScope) => E,
    defaults: TimedModuleDefaults = {},
  ) {
    this.moduleName = moduleName;
    this.defaults = defaults;
    this.log = defaults.log ?? getLogger();

    const built = body({
      def: <A extends unknown[], R, T = unknown>(
        name: string,
        fn: (this: T, ...args: A) => R,
        options: TimedDefinitionOptions<A, T> = {},
      ) => this.definePublic(name, fn, options),
      defp: <A extends unknown[], R, T = unknown>(
        name: string,
        fn: (this: T, ...args: A) => R,
        options: TimedDefinitionOptions<A, T> = {},
      ) => this.definePrivate(name, fn, options),
    });

    this.open = false;
    this.exports = this.seal(built);
  }

  /** Every definition, public and private, in definition order. */
  definitions(): TimedDescriptor[] {
    return [...this.descriptors.values()];
  }

  private definePublic<A extends unknown[], R, T>(
    name: string,
    fn: (this: T, ...args: A) => R,
    options: TimedDefinitionOptions<A, T>,
  ): TimedFunction<A, R, T> {
    this.assertAvailable(name);
    const timed = defineTimed(fn, { ...this.defaults, ...options, name });
    this.record(timed.timed);
    this.surface.set(name, timed);
    return timed;
  }

  private definePrivate<A extends unknown[], R, T>(
    name: string,
    fn: (this: T, ...args: A) => R,
    options: TimedDefinitionOptions<A, T>,
  ): TimedFunction<A, R, T> {
    this.assertAvailable(name);
    const timed = defineTimedPrivate(fn, { ...this.defaults, ...options, name });
    this.record(timed.timed);
    return timed;
  }

  /** The returned object must list exactly the public definitions, by name. */
  private seal(built: E): Readonly<E> {
    for (const [key, value] of Object.entries(built)) {
      if (this.surface.get(key) !== value) {
        throw new TimedDefinitionError(`${this.moduleName}.${key} is not a public definition of this module`);
      }
    }

    for (const name of this.surface.keys()) {
      if (!Object.hasOwn(built, name)) {
        throw new TimedDefinitionError(`${this.moduleName}.${name} is defined public but not exported`);
      }
    }

    return Object.freeze({ ...built });
  }

  private assertAvailable(name: string): void {
    if (!this.open) {
      throw new TimedDefinitionError(`${this.moduleName} is closed; define functions inside its body`);
    }
    if (this.descriptors.has(name)) {
      throw new TimedDefinitionError(`${this.moduleName}.${name} is already defined`);
    }
  }

  private record(descriptor: TimedDescriptor): void {
    this.descriptors.set(descriptor.name, descriptor);
    this.log.debug(
      {
        module: this.moduleName,
        name: descriptor.name,
        metric: formatMetricName(descriptor.metric),
        visibility: descriptor.visibility,
      },
      'Timed function defined',
    );
  }
}
