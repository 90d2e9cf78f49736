import type { ErrorKind } from '../errors';
import type { DisplayEnvironment } from '../interfaces/DisplayEnvironment';
import type { MatchPatternEngine } from '../interfaces/MatchPattern';
import type { JsonObject } from '../json';

/** What every resolver reads from and reports to. */
export interface ResolverContext {
  /** The parsed, localized and frozen manifest */
  readonly manifest: JsonObject;
  readonly manifestVersion: number;
  supportsManifestVersion(version: number): boolean;
  readonly patterns: MatchPatternEngine;
  readonly environment: DisplayEnvironment;
  /** Append an error to the ledger; the default message is used when none is given. */
  record(kind: ErrorKind, message?: string, cause?: Error): void;
}
