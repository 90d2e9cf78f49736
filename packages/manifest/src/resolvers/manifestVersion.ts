import { ErrorKind } from '../errors';
import type { ResolverContext } from './ResolverContext';

const SUPPORTED_MANIFEST_VERSIONS: ReadonlySet<number> = new Set([2, 3]);

/** Returns `manifest_version` and records an error unless it is 2 or 3. */
export function resolveManifestVersion({ manifestVersion, record }: ResolverContext): number {
  if (!SUPPORTED_MANIFEST_VERSIONS.has(manifestVersion)) record(ErrorKind.UnsupportedManifestVersion);
  return manifestVersion;
}
