import {
  CircularDependencyException,
  ContainerException,
  NotFoundException,
  UnknownTypeException,
} from '../../domain/exceptions';
import { consoleLogger } from '../logging';
import type { ILogger } from '../logging';
import type {
  Binding,
  Constructor,
  ContainerOptions,
  Factory,
  IContainer,
  ParameterDescriptor,
  TypeDescriptor,
} from './IDependencyInjection';
import { isSingletonType } from './Singleton';
import { TypeRegistry } from './TypeRegistry';

/**
 * Dependency injection container.
 *
 * Holds string-keyed bindings and auto-wires unbound identifiers through its
 * {@link TypeRegistry}. Auto-wired classes are memoized as factory bindings,
 * so a class is inspected once; the factory still builds a new instance on
 * every lookup unless the class is a {@link Singleton}.
 *
 * @example
 * ```typescript
 * @Injectable()
 * class Mailer {
 *   constructor(@Inject('Transport') private readonly transport: Transport) {}
 * }
 *
 * const container = new Container({
 *   types: [Mailer],
 *   logger: createConsoleLogger('debug'), // or silentLogger
 * })
 *   .set('SmtpTransport', () => new SmtpTransport(env.SMTP_URL))
 *   .set('Transport', 'SmtpTransport');
 *
 * container.get('Mailer'); // Mailer wired with the SMTP transport
 * ```
 */
export class Container implements IContainer {
  readonly name: string;
  readonly registry: TypeRegistry;
  private readonly logger: ILogger;
  private readonly bindings = new Map<string, Binding>();
  private readonly resolving: string[] = [];

  constructor(options: ContainerOptions = {}) {
    this.name = options.name ?? 'container';
    this.logger = options.logger ?? consoleLogger;
    this.registry = options.registry ?? new TypeRegistry();
    for (const type of options.types ?? []) {
      this.registry.register(type);
    }
  }

  /**
   * Binds a factory or an alias to `id`, replacing any previous binding.
   * Nothing about `implementation` is checked until the next `get()`.
   */
  set(id: string, implementation: Binding): this {
    this.bindings.set(id, implementation);
    this.logger.debug(
      typeof implementation === 'string'
        ? `[${this.name}] Bound '${id}' to alias '${implementation}'`
        : `[${this.name}] Bound '${id}' to factory`,
    );
    return this;
  }

  has(id: string): boolean {
    return this.bindings.has(id);
  }

  /**
   * Returns the entry for `id`.
   *
   * A factory binding is invoked on every call. An alias binding is
   * followed. An unbound identifier is auto-wired and memoized.
   *
   * @throws NotFoundException when `id` is unbound and names no known type
   * @throws CircularDependencyException when `id` is already being resolved
   * @throws ContainerException when auto-wiring `id` is not possible
   */
  get(id: string): unknown {
    return this.track(id, () => this.lookup(id));
  }

  /**
   * Auto-wires `id` from its constructor signature, replacing any binding.
   */
  resolve(id: string): unknown {
    return this.track(id, () => this.autowire(id));
  }

  /**
   * Resolves constructor parameters in declaration order.
   *
   * Only parameters typed with a single, non built-in type are resolved,
   * through {@link get}; any other parameter fails the whole list.
   *
   * @param id - Identifier of the type owning the parameters, for errors
   */
  resolveDependencies(
    id: string,
    parameters: readonly ParameterDescriptor[],
  ): unknown[] {
    return parameters.map(({ index, type }) => {
      switch (type.kind) {
        case 'untyped':
          throw this.unresolvable(
            id,
            `parameter #${index} has no type to inject`,
          );
        case 'union':
          throw this.unresolvable(
            id,
            `parameter #${index} has a union type (${type.ids.join(' | ')})`,
          );
        case 'named':
          if (type.builtin) {
            throw this.unresolvable(
              id,
              `parameter #${index} has built-in type '${type.id}', which cannot be injected`,
            );
          }
          return this.get(type.id);
      }
    });
  }

  /**
   * Typed lookup by class: resolves the class's identifier and checks the
   * result is an instance of it.
   */
  make<T>(type: Constructor<T>): T {
    const id = this.registry.register(type);
    const instance = this.get(id);
    if (instance instanceof type) {
      return instance;
    }
    throw new ContainerException(
      id,
      `Service '${id}' did not resolve to an instance of ${type.name}`,
      { resolutionPath: [...this.resolving] },
    );
  }

  private track<T>(id: string, work: () => T): T {
    if (this.resolving.includes(id)) {
      throw new CircularDependencyException(id, [...this.resolving]);
    }

    this.resolving.push(id);
    try {
      return work();
    } catch (error) {
      if (this.resolving.length === 1) {
        this.logger.warn(
          `[${this.name}] Failed to resolve '${id}': ${error instanceof Error ? error.message : String(error)}`,
        );
      }
      throw error;
    } finally {
      this.resolving.pop();
    }
  }

  private lookup(id: string): unknown {
    const binding = this.bindings.get(id);
    if (binding === undefined) {
      return this.autowire(id);
    }
    if (typeof binding === 'function') {
      return binding();
    }
    return this.get(binding);
  }

  private autowire(id: string): unknown {
    const descriptor = this.inspect(id);
    if (!descriptor.instantiable) {
      throw new ContainerException(
        id,
        `Cannot auto-wire '${id}': type is not instantiable (${descriptor.reason})`,
        { resolutionPath: this.trail(id), marker: 'NOT INSTANTIABLE' },
      );
    }

    const { target, parameters } = descriptor;
    const dependencies =
      parameters.length === 0 ? [] : this.resolveDependencies(id, parameters);

    const factory: Factory = isSingletonType(target)
      ? () => target.getInstance(...dependencies)
      : () => new target(...dependencies);

    this.set(id, factory);
    this.logger.debug(
      `[${this.name}] Auto-wired '${id}' with ${dependencies.length} dependencies`,
    );
    return this.lookup(id);
  }

  private inspect(id: string): TypeDescriptor {
    try {
      return this.registry.inspect(id);
    } catch (error) {
      if (error instanceof UnknownTypeException) {
        throw new NotFoundException(id, {
          resolutionPath: this.trail(id),
          cause: error,
        });
      }
      throw error;
    }
  }

  private unresolvable(id: string, reason: string): ContainerException {
    return new ContainerException(id, `Cannot auto-wire '${id}': ${reason}`, {
      resolutionPath: this.trail(id),
      marker: 'UNRESOLVABLE PARAMETER',
    });
  }

  /** Identifiers in progress above `id` */
  private trail(id: string): string[] {
    const last = this.resolving[this.resolving.length - 1];
    return last === id ? this.resolving.slice(0, -1) : [...this.resolving];
  }
}
