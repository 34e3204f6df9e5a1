import { ContainerException, UnknownTypeException } from '../../domain/exceptions';
import {
  isConstructor,
  readInjectableOptions,
  readInjectTokens,
  readParamTypes,
} from './decorators';
import type { InjectToken } from './decorators';
import type {
  Constructor,
  ParameterDescriptor,
  ParameterType,
  TypeDescriptor,
} from './IDependencyInjection';

const BUILTIN_TYPES: ReadonlySet<unknown> = new Set<unknown>([
  String,
  Number,
  Boolean,
  Symbol,
  BigInt,
  Array,
  Function,
  Date,
  RegExp,
  Map,
  Set,
  WeakMap,
  WeakSet,
  Promise,
  Error,
]);

const BUILTIN_NAMES: ReadonlySet<string> = new Set([
  'string',
  'number',
  'boolean',
  'symbol',
  'bigint',
  'object',
  'array',
  'function',
  'date',
  'regexp',
  'map',
  'set',
  'weakmap',
  'weakset',
  'promise',
  'error',
  'any',
  'unknown',
  'never',
  'void',
  'null',
  'undefined',
]);

export function isBuiltinTypeName(id: string): boolean {
  return BUILTIN_NAMES.has(id.toLowerCase());
}

/**
 * Type-introspection facility backing auto-wiring.
 *
 * Maps identifiers to classes and describes their constructors from
 * decorator metadata. Classes met as parameter types are registered on the
 * fly, so only the entry points of a graph need registering by hand.
 */
export class TypeRegistry {
  private readonly types = new Map<string, Constructor>();
  private readonly ids = new Map<Constructor, string>();
  private readonly contracts = new Set<string>();

  /**
   * Registers a class and returns its identifier.
   *
   * The identifier is `id`, else the one given to `@Injectable({ id })`,
   * else the class name. A class may be registered under several
   * identifiers; {@link idOf} returns the first.
   *
   * @throws ContainerException when the identifier belongs to another class
   */
  register(target: Constructor, id?: string): string {
    const known = this.ids.get(target);
    if (known !== undefined && (id === undefined || id === known)) {
      return known;
    }

    const typeId = id ?? readInjectableOptions(target).id ?? target.name;
    if (typeId === '') {
      throw new ContainerException(
        '<anonymous>',
        'Cannot register an anonymous class without an explicit id',
      );
    }

    const existing = this.types.get(typeId);
    if (existing !== undefined && existing !== target) {
      throw new ContainerException(
        typeId,
        `Cannot register class ${target.name} as '${typeId}': the identifier is already taken by class ${existing.name}; give one of them its own id with @Injectable({ id })`,
      );
    }

    this.types.set(typeId, target);
    if (known === undefined) {
      this.ids.set(target, typeId);
    }
    return typeId;
  }

  /**
   * Declares an identifier naming a contract with no runtime class, such as
   * an interface. It is known to the registry but never instantiable.
   */
  declare(id: string): this {
    this.contracts.add(id);
    return this;
  }

  idOf(target: Constructor): string {
    return this.register(target);
  }

  isKnown(id: string): boolean {
    return this.types.has(id) || this.contracts.has(id);
  }

  /**
   * Describes the type registered under `id`.
   *
   * @throws UnknownTypeException when `id` is neither registered nor declared
   */
  inspect(id: string): TypeDescriptor {
    const target = this.types.get(id);
    if (target === undefined) {
      if (this.contracts.has(id)) {
        return { id, instantiable: false, reason: 'declared as a contract with no implementation' };
      }
      throw new UnknownTypeException(id);
    }

    if (readInjectableOptions(target).abstract) {
      return { id, instantiable: false, target, reason: 'declared abstract' };
    }

    return {
      id,
      instantiable: true,
      target,
      parameters: this.describeParameters(target),
    };
  }

  private describeParameters(target: Constructor): ParameterDescriptor[] {
    const source = this.signatureSource(target) ?? target;
    const designTypes = readParamTypes(source);
    const tokens = readInjectTokens(source);
    const count = Math.max(
      designTypes?.length ?? target.length,
      ...[...tokens.keys()].map((index) => index + 1),
    );

    const parameters: ParameterDescriptor[] = [];
    for (let index = 0; index < count; index++) {
      const token = tokens.get(index);
      parameters.push({
        index,
        type:
          token === undefined
            ? this.describeDesignType(designTypes?.[index])
            : this.describeToken(token),
      });
    }
    return parameters;
  }

  /**
   * Class whose constructor metadata describes `target`.
   *
   * A subclass without metadata of its own takes its parent's only when it
   * can be running the inherited constructor: its own arity is zero (the
   * implicit `constructor(...args)`) or matches the parent's parameter
   * count. Otherwise there is no source and every parameter is untyped.
   */
  private signatureSource(target: Constructor): Constructor | undefined {
    if (readParamTypes(target) !== undefined || readInjectTokens(target).size > 0) {
      return target;
    }
    const parent: unknown = Object.getPrototypeOf(target);
    if (!isConstructor(parent)) {
      return undefined;
    }
    const source = this.signatureSource(parent);
    const inherited = source === undefined ? undefined : readParamTypes(source);
    if (inherited === undefined) {
      return undefined;
    }
    return target.length === 0 || target.length === inherited.length
      ? source
      : undefined;
  }

  private describeToken(token: InjectToken): ParameterType {
    if (typeof token === 'string') {
      return { kind: 'named', id: token, builtin: isBuiltinTypeName(token) };
    }
    if (isConstructor(token)) {
      return this.describeDesignType(token);
    }
    if (token.length === 1) {
      return this.describeToken(token[0]);
    }
    if (token.length === 0) {
      return { kind: 'untyped' };
    }
    return {
      kind: 'union',
      ids: token.map((member) =>
        typeof member === 'string' ? member : this.register(member),
      ),
    };
  }

  private describeDesignType(type: unknown): ParameterType {
    // interfaces, unions and `any` are all emitted as Object
    if (type === undefined || type === Object || !isConstructor(type)) {
      return { kind: 'untyped' };
    }
    if (BUILTIN_TYPES.has(type)) {
      return { kind: 'named', id: type.name, builtin: true };
    }
    return { kind: 'named', id: this.register(type), builtin: false };
  }
}
