/**
 * @module wirekit/application/di
 * @description Class and parameter decorators read by the type registry.
 *
 * @example With tsconfig.json setup
 * ```json
 * {
 *   "compilerOptions": {
 *     "experimentalDecorators": true,
 *     "emitDecoratorMetadata": true
 *   }
 * }
 * ```
 */

import 'reflect-metadata';

import type { Constructor } from './IDependencyInjection';

export const INJECTABLE_METADATA = 'wirekit:injectable';
export const INJECT_METADATA = 'wirekit:inject';
export const PARAMTYPES_METADATA = 'design:paramtypes';

/**
 * Options for {@link Injectable}
 */
export interface InjectableOptions {
  /** Identifier the class is registered under. Defaults to the class name. */
  id?: string;

  /** Marks the class as not instantiable by the container */
  abstract?: boolean;
}

/**
 * Explicit type for a constructor parameter: an identifier, a class, or
 * several of them for a union.
 */
export type InjectToken =
  | string
  | Constructor
  | ReadonlyArray<string | Constructor>;

export function isConstructor(value: unknown): value is Constructor {
  return typeof value === 'function' && value.prototype !== undefined;
}

function isInjectToken(value: unknown): value is InjectToken {
  if (Array.isArray(value)) {
    return value.every(
      (item) => typeof item === 'string' || isConstructor(item),
    );
  }
  return typeof value === 'string' || isConstructor(value);
}

/**
 * Marks a class for auto-wiring.
 *
 * Any class decorator makes TypeScript emit `design:paramtypes` for the
 * constructor; this one also records the registration id and whether the
 * class is abstract.
 *
 * @example
 * ```typescript
 * @Injectable()
 * class UserService {
 *   constructor(private readonly repository: UserRepository) {}
 * }
 *
 * @Injectable({ id: 'app.cache', abstract: true })
 * abstract class Cache {
 *   abstract get(key: string): string | undefined;
 * }
 * ```
 */
export function Injectable(options: InjectableOptions = {}): ClassDecorator {
  return (target) => {
    Reflect.defineMetadata(
      INJECTABLE_METADATA,
      { id: options.id, abstract: options.abstract ?? false },
      target,
    );
  };
}

/**
 * Overrides the declared type of a constructor parameter.
 *
 * Needed for parameters typed with an interface, which the compiler emits as
 * `Object`.
 *
 * @example
 * ```typescript
 * @Injectable()
 * class OrderService {
 *   constructor(@Inject('ILogger') private readonly logger: ILogger) {}
 * }
 * ```
 */
export function Inject(token: InjectToken): ParameterDecorator {
  return (target, propertyKey, parameterIndex) => {
    if (propertyKey !== undefined) {
      throw new TypeError(
        `@Inject() is only supported on constructor parameters, found on '${String(propertyKey)}'`,
      );
    }
    const tokens = new Map(readInjectTokens(target));
    tokens.set(parameterIndex, token);
    Reflect.defineMetadata(INJECT_METADATA, tokens, target);
  };
}

/**
 * Reads the options recorded by {@link Injectable}, or defaults.
 */
export function readInjectableOptions(target: Object): {
  id?: string;
  abstract: boolean;
} {
  const metadata: unknown = Reflect.getOwnMetadata(INJECTABLE_METADATA, target);
  if (typeof metadata !== 'object' || metadata === null) {
    return { abstract: false };
  }
  const id = 'id' in metadata && typeof metadata.id === 'string' ? metadata.id : undefined;
  const abstract = 'abstract' in metadata && metadata.abstract === true;
  return { id, abstract };
}

/**
 * Reads the tokens recorded by {@link Inject}, keyed by parameter index.
 */
export function readInjectTokens(target: Object): ReadonlyMap<number, InjectToken> {
  const metadata: unknown = Reflect.getOwnMetadata(INJECT_METADATA, target);
  const tokens = new Map<number, InjectToken>();
  if (!(metadata instanceof Map)) {
    return tokens;
  }
  for (const [index, token] of metadata) {
    if (typeof index === 'number' && isInjectToken(token)) {
      tokens.set(index, token);
    }
  }
  return tokens;
}

/**
 * Reads the compiler-emitted constructor parameter types recorded on
 * `target` itself, if any. Metadata of a parent class is not considered.
 */
export function readParamTypes(target: Object): readonly unknown[] | undefined {
  const metadata: unknown = Reflect.getOwnMetadata(PARAMTYPES_METADATA, target);
  return Array.isArray(metadata) ? metadata : undefined;
}
