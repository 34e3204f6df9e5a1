/**
 * @fileoverview Shared test utilities
 */

import type { ILogger } from '../src';

/**
 * Runs `action` and returns what it threw, checked against `type`.
 */
export function captureError<E extends Error>(
  action: () => unknown,
  type: new (...args: any[]) => E,
): E {
  try {
    action();
  } catch (error) {
    if (error instanceof type) {
      return error;
    }
    throw new Error(`Expected ${type.name}, got ${String(error)}`);
  }
  throw new Error(`Expected ${type.name} to be thrown`);
}

/**
 * Logger whose methods are Jest mocks
 */
export function createMockLogger(): jest.Mocked<ILogger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}
