/**
 * @module wirekit/application/di
 * @description Dependency injection container, type registry and decorators
 */

// ============================================================================
// Contracts
// ============================================================================

export type {
  Binding,
  Constructor,
  ContainerOptions,
  Factory,
  IContainer,
  ParameterDescriptor,
  ParameterType,
  TypeDescriptor,
} from './IDependencyInjection';

// ============================================================================
// Container
// ============================================================================

export { Container } from './Container';

export {
  initContainer,
  getContainer,
  hasContainer,
  resetContainer,
} from './globalContainer';

// ============================================================================
// Introspection
// ============================================================================

export { TypeRegistry, isBuiltinTypeName } from './TypeRegistry';

export {
  Injectable,
  Inject,
  INJECTABLE_METADATA,
  INJECT_METADATA,
  PARAMTYPES_METADATA,
} from './decorators';

export type { InjectableOptions, InjectToken } from './decorators';

// ============================================================================
// Singletons
// ============================================================================

export { Singleton, isSingletonType } from './Singleton';

export type { SingletonType } from './Singleton';
