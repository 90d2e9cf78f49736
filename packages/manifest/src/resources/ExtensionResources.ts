import { ErrorKind, ExtensionError } from '../errors';
import type { ResourceProvider } from '../interfaces/ResourceProvider';
import { decodeDataUri, isDataUri } from './dataUri';

export interface ResourceOptions {
  /** Keep the bytes for later lookups of the same path */
  cache?: boolean;
  /** Return a miss without an error, for lookups where absence is expected */
  suppressNotFound?: boolean;
}

export type ResourceLookup<T> =
  | { readonly found: true; readonly data: T }
  | { readonly found: false; readonly error?: ExtensionError };

export interface GeneratedResource {
  readonly path: string;
  readonly content: string;
}

/** Returns the generated background resource for a path, if that path has one. */
export type GeneratedResourceSource = (path: string) => GeneratedResource | undefined;

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * The resource layer a descriptor reads through: `data:` URIs, the generated
 * background resource and a path cache sit on top of the provider.
 */
export class ExtensionResources {
  private readonly cache = new Map<string, Uint8Array>();

  constructor(
    private readonly provider: ResourceProvider,
    private readonly generated: GeneratedResourceSource = () => undefined,
  ) {}

  data(path: string, options: ResourceOptions = {}): ResourceLookup<Uint8Array> {
    if (isDataUri(path)) {
      const decoded = decodeDataUri(path);
      return decoded ? { found: true, data: decoded.data } : { found: false };
    }

    const key = stripLeadingSlash(path);
    const cached = this.cache.get(key);
    if (cached) return { found: true, data: cached };

    const generated = this.generated(key);
    if (generated) return { found: true, data: encoder.encode(generated.content) };

    const result = this.provider.bytes(key);
    if (!result.found) {
      if (options.suppressNotFound) return { found: false };
      const message =
        result.reason === 'invalid-path'
          ? `Unable to find "${key}" in the extension’s resources. It is an invalid path.`
          : `Unable to find "${key}" in the extension’s resources.`;
      return { found: false, error: new ExtensionError(ErrorKind.ResourceNotFound, message, result.cause) };
    }

    if (options.cache) this.cache.set(key, result.data);
    return { found: true, data: result.data };
  }

  string(path: string, options: ResourceOptions = {}): ResourceLookup<string> {
    const generated = isDataUri(path) ? undefined : this.generated(stripLeadingSlash(path));
    if (generated) return { found: true, data: generated.content };

    const result = this.data(path, options);
    if (!result.found) return result;
    return { found: true, data: decoder.decode(result.data) };
  }
}

function stripLeadingSlash(path: string): string {
  return path.startsWith('/') ? path.substring(1) : path;
}
