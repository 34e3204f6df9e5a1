/**
 * @fileoverview Dependency Injection Container Contracts
 *
 * @packageDocumentation
 * @module wirekit/application/di
 *
 * ## Resolution Model
 *
 * The container maps string identifiers to **bindings**. A binding is either
 * a zero-argument factory or an alias naming another identifier:
 *
 * ```typescript
 * container
 *   .set('Config', () => loadConfig())   // factory
 *   .set('Settings', 'Config');          // alias
 * ```
 *
 * An identifier with no binding is **auto-wired**: the type registry looks up
 * the class registered under the identifier, reads its constructor
 * parameters from decorator metadata and the container resolves each one
 * recursively.
 *
 * ```
 * Step 1: container.get('UserController')          (no binding)
 *     ↓
 * Step 2: registry.inspect('UserController')
 *   UserController(UserService, Logger)
 *     ↓
 * Step 3: get('UserService'), get('Logger')        (recursively)
 *     ↓
 * Step 4: set('UserController', () => new UserController(userService, logger))
 *     ↓
 * Step 5: invoke the new binding and return the instance
 * ```
 *
 * The factory bound in step 4 captures the dependencies resolved in step 3,
 * so later lookups reuse them without inspecting the class again.
 *
 * ## Parameter Descriptors
 *
 * TypeScript erases most type information at run time. With
 * `emitDecoratorMetadata` the compiler emits the constructor of each
 * parameter's declared type, which collapses interfaces, unions and `any`
 * to `Object`. The registry therefore describes each parameter with a closed
 * variant:
 *
 * | Declared as | `design:paramtypes` | Descriptor |
 * |-------------|---------------------|------------|
 * | `logger: Logger` (class) | `Logger` | `named`, not builtin |
 * | `port: number` | `Number` | `named`, builtin |
 * | `logger: ILogger` (interface) | `Object` | `untyped` |
 * | `@Inject('ILogger') logger: ILogger` | - | `named`, not builtin |
 * | `@Inject(['A', 'B']) dep: A \| B` | - | `union` |
 *
 * Only `named`, non-builtin parameters can be auto-wired. Anything else must
 * be supplied through a factory binding.
 *
 * @version 1.0.0
 */

import type { ILogger } from '../logging';
import type { TypeRegistry } from './TypeRegistry';

/**
 * Constructor of a class whose instances are `T`.
 */
export type Constructor<T = unknown> = new (...args: any[]) => T;

/**
 * Zero-argument operation producing a service instance.
 */
export type Factory<T = unknown> = () => T;

/**
 * A factory, or an alias naming another identifier.
 */
export type Binding = Factory | string;

/**
 * Read side of a container, interchangeable between implementations.
 *
 * @example
 * ```typescript
 * function bootstrap(container: IContainer) {
 *   if (!container.has('Config')) {
 *     throw new Error('Config must be bound before bootstrap');
 *   }
 *   return container.get('App');
 * }
 * ```
 */
export interface IContainer {
  /**
   * Finds an entry by identifier and returns it.
   *
   * @throws NotFoundException when nothing can be found for the identifier
   * @throws ContainerException when the entry cannot be built
   */
  get(id: string): unknown;

  /**
   * Whether the container has a binding for the identifier.
   * Does not report whether an unbound identifier could be auto-wired.
   */
  has(id: string): boolean;
}

/**
 * Declared type of a constructor parameter.
 */
export type ParameterType =
  | { kind: 'untyped' }
  | { kind: 'union'; ids: readonly string[] }
  | { kind: 'named'; id: string; builtin: boolean };

/**
 * A constructor parameter, by position.
 */
export interface ParameterDescriptor {
  /** Zero-based position in the constructor signature */
  index: number;

  /** Declared type */
  type: ParameterType;
}

/**
 * What the type registry knows about an identifier.
 */
export type TypeDescriptor =
  | {
      id: string;
      instantiable: true;
      target: Constructor;
      parameters: readonly ParameterDescriptor[];
    }
  | {
      id: string;
      instantiable: false;
      target?: Constructor;
      reason: string;
    };

/**
 * Container configuration options
 */
export interface ContainerOptions {
  /** Container name, used in log lines. Defaults to `'container'`. */
  name?: string;

  /** Logger. Defaults to {@link consoleLogger}, which drops debug output. */
  logger?: ILogger;

  /** Type registry used for auto-wiring. Defaults to a new registry. */
  registry?: TypeRegistry;

  /** Classes to register with the type registry on construction */
  types?: readonly Constructor[];
}
