/**
 * wirekit - Exception Module
 */

export {
  ContainerException,
  NotFoundException,
  CircularDependencyException,
  UnknownTypeException,
  renderDependencyGraph,
} from './exceptions';

export type { ContainerExceptionOptions } from './exceptions';
