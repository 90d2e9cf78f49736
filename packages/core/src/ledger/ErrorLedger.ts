/**
 * @fileoverview ErrorLedger - ordered, de-duplicated record of structured errors.
 *
 * Resolvers never throw to their callers; they append to a ledger instead and
 * fall back to a safe value. The ledger keeps first-seen order, ignores
 * structurally-equal repeats and is never cleared.
 *
 * State lives in a zustand vanilla store so callers can subscribe to changes
 * the same way UI code observes any other store.
 *
 * @module @extent/core/ledger/ErrorLedger
 *
 * @example
 * ```typescript
 * const ledger = new ErrorLedger<StructuredError<'InvalidName'>>();
 * const stop = ledger.subscribe((errors) => render(errors));
 * ledger.record(new StructuredError('InvalidName', 'Missing `name`.'));
 * stop();
 * ```
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import type { StructuredError } from '../exceptions/StructuredError';
import type { Logger } from '../interfaces/Logger';
import { silentLogger } from '../logging/ConsoleLogger';

interface LedgerState<E> {
  errors: readonly E[];
}

export type LedgerListener<E> = (errors: readonly E[], previous: readonly E[]) => void;

export class ErrorLedger<E extends StructuredError = StructuredError> {
  private readonly store: StoreApi<LedgerState<E>>;

  constructor(private readonly logger: Logger = silentLogger) {
    this.store = createStore<LedgerState<E>>(() => ({ errors: [] }));
  }

  /**
   * Append an error unless an equal one is already present.
   *
   * @returns true when the error was appended
   */
  record(error: E): boolean {
    const { errors } = this.store.getState();
    if (errors.some((existing) => existing.equals(error))) return false;

    this.logger.warn('Error recorded', { error });
    this.store.setState({ errors: [...errors, error] });
    return true;
  }

  /** Errors in first-seen order. */
  all(): readonly E[] {
    return this.store.getState().errors;
  }

  get size(): number {
    return this.store.getState().errors.length;
  }

  has(predicate: (error: E) => boolean): boolean {
    return this.store.getState().errors.some(predicate);
  }

  /**
   * Observe appends.
   *
   * @returns an unsubscribe function
   */
  subscribe(listener: LedgerListener<E>): () => void {
    return this.store.subscribe((state, previous) => listener(state.errors, previous.errors));
  }
}
