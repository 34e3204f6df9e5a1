/**
 * wirekit - Container Exceptions
 *
 * Error hierarchy raised by the container and its type registry.
 * Every container failure carries the identifier that failed, the
 * resolution path that led to it and a rendered dependency graph.
 */

/**
 * Renders a resolution path as an indented tree.
 *
 * @example
 * ```
 * renderDependencyGraph(['UserController', 'UserService'], 'Database (NOT FOUND)');
 * // UserController
 * // └─ UserService
 * //    └─ Database (NOT FOUND)
 * ```
 */
export function renderDependencyGraph(
  path: readonly string[],
  current: string,
): string {
  const nodes = [...path, current];
  return nodes
    .map((node, depth) =>
      depth === 0 ? node : `${'   '.repeat(depth - 1)}└─ ${node}`,
    )
    .join('\n');
}

/**
 * Options shared by container exceptions
 */
export interface ContainerExceptionOptions {
  /** Identifiers being resolved when the failure happened, outermost first */
  resolutionPath?: readonly string[];

  /** Marker appended to the failing node of the dependency graph */
  marker?: string;

  /** Underlying error */
  cause?: unknown;
}

/**
 * Base container exception.
 *
 * Raised directly when an identifier is resolvable as a type but breaks an
 * auto-wiring precondition: the type is not instantiable, or one of its
 * constructor parameters is untyped, a union, or a built-in type.
 *
 * @example
 * ```typescript
 * try {
 *   container.get('ReportService');
 * } catch (error) {
 *   if (error instanceof ContainerException) {
 *     logger.error(error.message);
 *     logger.error(error.dependencyGraph);
 *   }
 *   throw error;
 * }
 * ```
 */
export class ContainerException extends Error {
  /** Identifier that failed */
  public readonly id: string;

  /** Identifiers in progress above the failing one, outermost first */
  public readonly resolutionPath: readonly string[];

  /** Tree rendering of {@link resolutionPath} ending at the failing identifier */
  public readonly dependencyGraph: string;

  constructor(
    id: string,
    message: string,
    options: ContainerExceptionOptions = {},
  ) {
    super(
      message,
      options.cause === undefined ? undefined : { cause: options.cause },
    );
    this.name = 'ContainerException';
    this.id = id;
    this.resolutionPath = [...(options.resolutionPath ?? [])];
    this.dependencyGraph = renderDependencyGraph(
      this.resolutionPath,
      options.marker ? `${id} (${options.marker})` : id,
    );

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The identifier has no binding and no type is registered under it.
 */
export class NotFoundException extends ContainerException {
  constructor(id: string, options: ContainerExceptionOptions = {}) {
    super(
      id,
      `Service '${id}' was not found: it has no binding and no type is registered under that identifier`,
      { marker: 'NOT FOUND', ...options },
    );
    this.name = 'NotFoundException';
  }
}

/**
 * An identifier was requested again while it was still being resolved.
 */
export class CircularDependencyException extends ContainerException {
  /** The cycle, starting and ending with the repeated identifier */
  public readonly cycle: readonly string[];

  constructor(id: string, resolutionPath: readonly string[]) {
    const start = resolutionPath.indexOf(id);
    const cycle = [...resolutionPath.slice(Math.max(start, 0)), id];
    super(id, `Circular dependency detected: ${cycle.join(' -> ')}`, {
      resolutionPath,
      marker: 'CIRCULAR!',
    });
    this.name = 'CircularDependencyException';
    this.cycle = cycle;
  }
}

/**
 * Raised by the type registry when an identifier names no known type.
 * The container wraps it in a {@link NotFoundException}.
 */
export class UnknownTypeException extends Error {
  constructor(public readonly id: string) {
    super(`No type is registered under '${id}'`);
    this.name = 'UnknownTypeException';
    Object.setPrototypeOf(this, UnknownTypeException.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}
