/**
 * @fileoverview Unit tests for container exceptions
 */

import {
  CircularDependencyException,
  ContainerException,
  NotFoundException,
  UnknownTypeException,
  renderDependencyGraph,
} from '../../../src';

describe('Container Exceptions', () => {
  describe('renderDependencyGraph()', () => {
    it('should render a lone node', () => {
      expect(renderDependencyGraph([], 'Logger')).toBe('Logger');
    });

    it('should indent each level under its parent', () => {
      expect(
        renderDependencyGraph(['UserController', 'UserService'], 'Database (NOT FOUND)'),
      ).toBe('UserController\n└─ UserService\n   └─ Database (NOT FOUND)');
    });
  });

  describe('ContainerException', () => {
    it('should carry id, path and graph', () => {
      const error = new ContainerException('Mailer', 'broken', {
        resolutionPath: ['App'],
        marker: 'FAILED',
      });

      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('ContainerException');
      expect(error.message).toBe('broken');
      expect(error.id).toBe('Mailer');
      expect(error.resolutionPath).toEqual(['App']);
      expect(error.dependencyGraph).toBe('App\n└─ Mailer (FAILED)');
    });

    it('should keep the underlying cause', () => {
      const cause = new Error('boom');

      expect(new ContainerException('X', 'wrapped', { cause }).cause).toBe(cause);
    });

    it('should copy the resolution path', () => {
      const path = ['A'];
      const error = new ContainerException('B', 'failed', { resolutionPath: path });
      path.push('C');

      expect(error.resolutionPath).toEqual(['A']);
    });
  });

  describe('NotFoundException', () => {
    it('should be a ContainerException', () => {
      const error = new NotFoundException('Cache');

      expect(error).toBeInstanceOf(ContainerException);
      expect(error.name).toBe('NotFoundException');
      expect(error.message).toBe(
        "Service 'Cache' was not found: it has no binding and no type is registered under that identifier",
      );
      expect(error.dependencyGraph).toBe('Cache (NOT FOUND)');
    });
  });

  describe('CircularDependencyException', () => {
    it('should report the cycle from its first occurrence', () => {
      const error = new CircularDependencyException('B', ['App', 'B', 'C']);

      expect(error).toBeInstanceOf(ContainerException);
      expect(error.name).toBe('CircularDependencyException');
      expect(error.cycle).toEqual(['B', 'C', 'B']);
      expect(error.message).toBe('Circular dependency detected: B -> C -> B');
      expect(error.dependencyGraph).toBe('App\n└─ B\n   └─ C\n      └─ B (CIRCULAR!)');
    });
  });

  describe('UnknownTypeException', () => {
    it('should name the missing id', () => {
      const error = new UnknownTypeException('Ghost');

      expect(error).toBeInstanceOf(Error);
      expect(error.id).toBe('Ghost');
      expect(error.message).toBe("No type is registered under 'Ghost'");
    });
  });
});
