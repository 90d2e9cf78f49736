import { ErrorKind } from '../errors';
import type { WildcardMatcher } from '../interfaces/WildcardMatcher';
import { hasKey, nonEmptyStrings, objectArrayForKey, stringArrayForKey } from '../json';
import { MatchPatternSet, type ReadonlyMatchPatternSet } from '../patterns/MatchPatternSet';
import type { ResolverContext } from './ResolverContext';

export interface WebAccessibleResource {
  /** Pages allowed to load the resources; empty means any page */
  readonly matchPatterns: ReadonlyMatchPatternSet;
  /** Wildcard paths relative to the extension root */
  readonly resourcePathPatterns: readonly string[];
}

export function resolveWebAccessibleResources(context: ResolverContext): WebAccessibleResource[] {
  const { manifest, patterns, record } = context;
  const result: WebAccessibleResource[] = [];

  if (!context.supportsManifestVersion(3)) {
    const paths = stringArrayForKey(manifest, 'web_accessible_resources', { nilIfEmpty: false });
    if (!paths) {
      if (hasKey(manifest, 'web_accessible_resources')) record(ErrorKind.InvalidWebAccessibleResources);
      return result;
    }

    const resourcePathPatterns = nonEmptyStrings(paths);
    if (resourcePathPatterns.length) result.push({ matchPatterns: new MatchPatternSet().freeze(), resourcePathPatterns });
    return result;
  }

  const entries = objectArrayForKey(manifest, 'web_accessible_resources', { nilIfEmpty: false });
  if (!entries) {
    if (hasKey(manifest, 'web_accessible_resources')) record(ErrorKind.InvalidWebAccessibleResources);
    return result;
  }

  let invalid = false;
  for (const entry of entries) {
    const paths = stringArrayForKey(entry, 'resources', { nilIfEmpty: false });
    const matches = stringArrayForKey(entry, 'matches', { nilIfEmpty: false });
    if (!paths || !matches) {
      invalid = true;
      continue;
    }

    const resourcePathPatterns = nonEmptyStrings(paths);
    const matchStrings = nonEmptyStrings(matches);
    if (!resourcePathPatterns.length || !matchStrings.length) continue;

    const matchPatterns = new MatchPatternSet();
    for (const value of matchStrings) {
      const pattern = patterns.parse(value);
      if (!pattern) continue;
      if (pattern.isSupported) matchPatterns.add(pattern);
      else invalid = true;
    }

    if (!matchPatterns.size) {
      invalid = true;
      continue;
    }

    result.push({ matchPatterns: matchPatterns.freeze(), resourcePathPatterns });
  }

  if (invalid) record(ErrorKind.InvalidWebAccessibleResources);
  return result;
}

/**
 * Whether `resourcePath` (with or without its leading slash) may be loaded by
 * a page at `pageURL`.
 */
export function isWebAccessible(
  resources: readonly WebAccessibleResource[],
  resourcePath: string,
  pageURL: string | URL,
  matches: WildcardMatcher,
): boolean {
  const path = resourcePath.startsWith('/') ? resourcePath.substring(1) : resourcePath;

  return resources.some(
    ({ matchPatterns, resourcePathPatterns }) =>
      (!matchPatterns.size || matchPatterns.matchesURL(pageURL)) &&
      resourcePathPatterns.some((pattern) => matches(pattern, path)),
  );
}
