export type ResourceReadResult<T> =
  | { readonly found: true; readonly data: T }
  | { readonly found: false; readonly reason: 'missing' | 'invalid-path'; readonly cause?: Error };

/**
 * Read access to the files bundled with an extension. Paths are relative to
 * the extension root; implementations must refuse paths that leave it.
 */
export interface ResourceProvider {
  bytes(path: string): ResourceReadResult<Uint8Array>;
  text(path: string): ResourceReadResult<string>;
}
