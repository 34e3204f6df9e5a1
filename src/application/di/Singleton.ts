import type { Constructor } from './IDependencyInjection';

/**
 * A type that manages its own single shared instance.
 */
export interface SingletonType<T = unknown> {
  getInstance(...dependencies: unknown[]): T;
}

const instances = new Map<Constructor<Singleton>, Singleton>();

/**
 * Base class for types that own a single shared instance.
 *
 * The instance is built by the first `getInstance()` call, with that call's
 * dependencies; later calls return it and ignore their arguments. When the
 * container auto-wires a subclass it goes through `getInstance()`, so every
 * lookup yields the same object.
 *
 * @example
 * ```typescript
 * @Injectable()
 * class Configuration extends Singleton {
 *   constructor(readonly env: Environment) {
 *     super();
 *   }
 * }
 *
 * container.get('Configuration') === Configuration.getInstance(); // true
 * ```
 */
export abstract class Singleton {
  static getInstance<T extends Singleton>(
    this: Constructor<T>,
    ...dependencies: unknown[]
  ): T {
    const existing = instances.get(this);
    if (existing instanceof this) {
      return existing;
    }
    const instance = new this(...dependencies);
    instances.set(this, instance);
    return instance;
  }

  static hasInstance(this: Constructor<Singleton>): boolean {
    return instances.has(this);
  }

  /**
   * Drops every shared instance. Intended for test isolation.
   */
  static resetInstances(): void {
    instances.clear();
  }
}

export function isSingletonType(
  target: Constructor,
): target is Constructor & SingletonType {
  return Singleton.isPrototypeOf(target);
}
