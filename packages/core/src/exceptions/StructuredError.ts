/**
 * An error tagged with a machine-readable kind. Two structured errors are equal
 * when their kind, message and cause chain are equal, which is what the
 * {@link ErrorLedger} uses to drop repeats.
 */
export class StructuredError<K extends string = string> extends Error {
  readonly kind: K;

  constructor(kind: K, message: string, cause?: Error) {
    super(message, cause ? { cause } : undefined);
    this.name = 'StructuredError';
    this.kind = kind;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** The underlying error, when one was attached. */
  get underlyingError(): Error | undefined {
    return this.cause instanceof Error ? this.cause : undefined;
  }

  equals(other: Error): boolean {
    if (this === other) return true;
    if (!(other instanceof StructuredError)) return false;
    if (this.kind !== other.kind || this.message !== other.message) return false;
    return causesEqual(this.underlyingError, other.underlyingError);
  }

  toJSON(): { kind: K; message: string; cause?: unknown } {
    const cause = this.underlyingError;
    if (!cause) return { kind: this.kind, message: this.message };
    return {
      kind: this.kind,
      message: this.message,
      cause: cause instanceof StructuredError ? cause.toJSON() : { name: cause.name, message: cause.message },
    };
  }
}

function causesEqual(a: Error | undefined, b: Error | undefined): boolean {
  if (!a || !b) return a === b;
  if (a instanceof StructuredError) return a.equals(b);
  if (b instanceof StructuredError) return false;
  return a.name === b.name && a.message === b.message;
}
