/**
 * @fileoverview wirekit - dependency injection container with constructor
 * auto-wiring
 *
 * @example
 * ```typescript
 * import { Container, Injectable } from 'wirekit';
 *
 * @Injectable()
 * class Clock {
 *   now(): Date {
 *     return new Date();
 *   }
 * }
 *
 * @Injectable()
 * class Greeter {
 *   constructor(private readonly clock: Clock) {}
 * }
 *
 * const container = new Container({ types: [Greeter] });
 * const greeter = container.make(Greeter); // Clock is wired automatically
 * ```
 *
 * @packageDocumentation
 * @module wirekit
 * @version 1.0.0
 */

import 'reflect-metadata';

// ============================================================================
// DOMAIN LAYER EXPORTS (Exceptions)
// ============================================================================

export * from './domain';

// ============================================================================
// APPLICATION LAYER EXPORTS (Container, Registry, Decorators, Logging)
// ============================================================================

export * from './application';
