import { ErrorKind } from '../errors';
import { nonEmptyStrings, objectForKey, stringArrayForKey } from '../json';
import { MatchPatternSet, type ReadonlyMatchPatternSet } from '../patterns/MatchPatternSet';
import type { ResolverContext } from './ResolverContext';

export interface ExternallyConnectable {
  readonly matchPatterns: ReadonlyMatchPatternSet;
  readonly extensionIds: readonly string[];
}

/**
 * Web pages and extensions allowed to message this one. Patterns covering all
 * URLs, unsupported patterns and bare public suffixes are rejected.
 */
export function resolveExternallyConnectable(context: ResolverContext): ExternallyConnectable | undefined {
  const { manifest, patterns, record } = context;

  const entry = objectForKey(manifest, 'externally_connectable', { nilIfEmpty: false });
  if (!entry) return undefined;

  if (!Object.keys(entry).length) {
    record(ErrorKind.InvalidExternallyConnectable);
    return undefined;
  }

  let rejected = false;
  const matchPatterns = new MatchPatternSet();

  for (const value of nonEmptyStrings(stringArrayForKey(entry, 'matches'))) {
    const pattern = patterns.parse(value);
    if (!pattern) continue;

    // Patterns need at least a registrable domain.
    if (pattern.matchesAllURLs || !pattern.isSupported || pattern.hostIsPublicSuffix) {
      rejected = true;
      continue;
    }

    matchPatterns.add(pattern);
  }

  const extensionIds = nonEmptyStrings(stringArrayForKey(entry, 'ids'));

  if (rejected || (!matchPatterns.size && !extensionIds.length)) record(ErrorKind.InvalidExternallyConnectable);

  return { matchPatterns: matchPatterns.freeze(), extensionIds };
}
