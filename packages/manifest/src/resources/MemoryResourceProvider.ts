import type { JsonValue } from '../json';
import type { ResourceProvider, ResourceReadResult } from '../interfaces/ResourceProvider';
import { normalizeResourcePath } from './paths';

export type MemoryResource = string | Uint8Array | JsonValue;

/**
 * Resources held in memory, keyed by path. Strings are stored as UTF-8 text,
 * byte arrays as-is, and any other JSON value is serialized.
 */
export class MemoryResourceProvider implements ResourceProvider {
  private readonly files = new Map<string, Uint8Array>();

  constructor(files: Record<string, MemoryResource> = {}) {
    for (const [path, contents] of Object.entries(files)) this.set(path, contents);
  }

  set(path: string, contents: MemoryResource): this {
    const normalized = normalizeResourcePath(path);
    if (!normalized) throw new Error(`Invalid resource path "${path}"`);
    this.files.set(normalized, toBytes(contents));
    return this;
  }

  bytes(path: string): ResourceReadResult<Uint8Array> {
    const normalized = normalizeResourcePath(path);
    if (!normalized) return { found: false, reason: 'invalid-path' };

    const data = this.files.get(normalized);
    return data ? { found: true, data } : { found: false, reason: 'missing' };
  }

  text(path: string): ResourceReadResult<string> {
    const result = this.bytes(path);
    if (!result.found) return result;
    return { found: true, data: new TextDecoder().decode(result.data) };
  }
}

function toBytes(contents: MemoryResource): Uint8Array {
  if (contents instanceof Uint8Array) return contents;
  if (typeof contents === 'string') return new TextEncoder().encode(contents);
  return new TextEncoder().encode(JSON.stringify(contents));
}
