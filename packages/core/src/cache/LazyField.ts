/**
 * @fileoverview LazyField - compute-once memoization with an explicit state.
 *
 * A field starts `pending`, moves to `resolving` while its resolver runs and
 * ends either `resolved` (holding the value) or `failed` (its gate refused,
 * e.g. the manifest never parsed). Terminal states are final for the life of
 * the owner; reading a `failed` field returns its fallback.
 *
 * @module @extent/core/cache/LazyField
 */

import { CircularResolutionException } from '../exceptions/CircularResolutionException';

export type FieldState<T> =
  | { readonly status: 'pending' }
  | { readonly status: 'resolving' }
  | { readonly status: 'resolved'; readonly value: T }
  | { readonly status: 'failed' };

export interface LazyFieldOptions<T> {
  /** Name used in diagnostics */
  name: string;
  /** Produces the value; runs at most once */
  resolve: () => T;
  /** Returned while the gate is closed */
  fallback: T;
  /** Must return true for the resolver to run */
  gate?: () => boolean;
}

export class LazyField<T> {
  private state: FieldState<T> = { status: 'pending' };

  constructor(private readonly options: LazyFieldOptions<T>) {}

  get name(): string {
    return this.options.name;
  }

  get status(): FieldState<T>['status'] {
    return this.state.status;
  }

  /** True once the field reached a terminal state. */
  get settled(): boolean {
    return this.state.status === 'resolved' || this.state.status === 'failed';
  }

  get(): T {
    switch (this.state.status) {
      case 'resolved':
        return this.state.value;
      case 'failed':
        return this.options.fallback;
      case 'resolving':
        throw new CircularResolutionException(this.options.name);
      case 'pending':
        break;
    }

    if (this.options.gate && !this.options.gate()) {
      this.state = { status: 'failed' };
      return this.options.fallback;
    }

    this.state = { status: 'resolving' };
    try {
      const value = this.options.resolve();
      this.state = { status: 'resolved', value };
      return value;
    } catch (error) {
      this.state = { status: 'pending' };
      throw error;
    }
  }
}

/** Convenience factory mirroring {@link LazyField}'s constructor. */
export function lazyField<T>(options: LazyFieldOptions<T>): LazyField<T> {
  return new LazyField(options);
}
