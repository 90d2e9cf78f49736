import fs from 'fs-extra';
import path from 'node:path';
import type { ResourceProvider, ResourceReadResult } from '../interfaces/ResourceProvider';
import { normalizeResourcePath } from './paths';

/**
 * Reads resources from an unpacked extension directory. Reads are synchronous
 * so resolution never waits on I/O.
 */
export class DirectoryResourceProvider implements ResourceProvider {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  bytes(resourcePath: string): ResourceReadResult<Uint8Array> {
    const absolute = this.resolve(resourcePath);
    if (!absolute) return { found: false, reason: 'invalid-path' };

    try {
      const stat = fs.statSync(absolute);
      if (!stat.isFile()) return { found: false, reason: 'missing' };
      return { found: true, data: new Uint8Array(fs.readFileSync(absolute)) };
    } catch (error) {
      return {
        found: false,
        reason: 'missing',
        cause: error instanceof Error ? error : new Error(String(error)),
      };
    }
  }

  text(resourcePath: string): ResourceReadResult<string> {
    const result = this.bytes(resourcePath);
    if (!result.found) return result;
    return { found: true, data: new TextDecoder().decode(result.data) };
  }

  private resolve(resourcePath: string): string | undefined {
    const normalized = normalizeResourcePath(resourcePath);
    if (!normalized) return undefined;

    const absolute = path.resolve(this.root, normalized);
    const relative = path.relative(this.root, absolute);
    if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) return undefined;
    return absolute;
  }
}
