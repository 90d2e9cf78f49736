import { posix } from 'node:path';

/**
 * Normalize a resource path relative to the extension root. Returns undefined
 * for paths that are empty or climb out of the root.
 */
export function normalizeResourcePath(path: string): string | undefined {
  let decoded: string;
  try {
    decoded = decodeURIComponent(path);
  } catch {
    decoded = path;
  }

  const relative = decoded.replace(/\\/g, '/').replace(/^\/+/, '');
  if (!relative) return undefined;

  const normalized = posix.normalize(relative);
  if (normalized === '..' || normalized.startsWith('../')) return undefined;
  if (normalized === '.') return undefined;
  return normalized;
}

export function fileExtension(path: string): string {
  return posix.extname(path).replace(/^\./, '').toLowerCase();
}
