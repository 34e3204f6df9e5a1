import { ContainerException } from '../../domain/exceptions';
import { Container } from './Container';
import type { ContainerOptions } from './IDependencyInjection';

let current: Container | undefined;

/**
 * Creates the process-wide container. Call once during bootstrap.
 *
 * @throws ContainerException when a global container already exists
 */
export function initContainer(options: ContainerOptions = {}): Container {
  if (current) {
    throw new ContainerException(
      current.name,
      `Global container '${current.name}' is already initialized; call resetContainer() first`,
    );
  }
  current = new Container(options);
  return current;
}

/**
 * Returns the process-wide container.
 *
 * @throws ContainerException when {@link initContainer} has not been called
 */
export function getContainer(): Container {
  if (!current) {
    throw new ContainerException(
      'container',
      'Global container is not initialized; call initContainer() during bootstrap',
    );
  }
  return current;
}

export function hasContainer(): boolean {
  return current !== undefined;
}

/**
 * Drops the process-wide container so the next {@link initContainer} starts
 * fresh. Intended for tests.
 */
export function resetContainer(): void {
  current = undefined;
}
