/**
 * @fileoverview Extent Core - building blocks shared by the manifest resolvers.
 *
 * Provides:
 * - An ordered, de-duplicated error ledger with change subscriptions
 * - Compute-once lazy fields with explicit resolution state
 * - Ordered decision tables for precedence rules
 * - A small logger contract with a console implementation
 * - Dependency injection helpers on top of InversifyJS
 *
 * @module @extent/core
 *
 * @example
 * ```typescript
 * import { ErrorLedger, lazyField, StructuredError } from '@extent/core';
 *
 * const ledger = new ErrorLedger();
 * const name = lazyField({
 *   name: 'name',
 *   fallback: undefined,
 *   resolve: () => {
 *     ledger.record(new StructuredError('InvalidName', 'Missing `name`.'));
 *     return undefined;
 *   },
 * });
 * ```
 */

import 'reflect-metadata';

export { Service, Use } from './decorators/Service';
export { createContainer } from './di/Container';
export { bindConstant, bindSelf, bindTo, bindTransient, type Newable } from './di/Binding';

export { StructuredError } from './exceptions/StructuredError';
export { CircularResolutionException } from './exceptions/CircularResolutionException';

export { ErrorLedger, type LedgerListener } from './ledger/ErrorLedger';
export { LazyField, lazyField, type FieldState, type LazyFieldOptions } from './cache/LazyField';
export {
  DecisionTable,
  decisionTable,
  otherwise,
  type Decision,
  type DecisionRow,
} from './support/DecisionTable';

export type { LogContext, Logger } from './interfaces/Logger';
export {
  ConsoleLogger,
  formatLogLine,
  silentLogger,
  type ConsoleLoggerOptions,
  type LogLevel,
} from './logging/ConsoleLogger';
