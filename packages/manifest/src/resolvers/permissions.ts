import { SUPPORTED_PERMISSIONS } from '../constants';
import { stringArrayForKey } from '../json';
import { MatchPatternSet, type ReadonlyMatchPatternSet } from '../patterns/MatchPatternSet';
import type { ResolverContext } from './ResolverContext';

export interface PermissionModel {
  readonly requestedPermissions: ReadonlySet<string>;
  /** Never overlaps {@link requestedPermissions} */
  readonly optionalPermissions: ReadonlySet<string>;
  readonly requestedPatterns: ReadonlyMatchPatternSet;
  /** Never overlaps {@link requestedPatterns} */
  readonly optionalPatterns: ReadonlyMatchPatternSet;
}

export const emptyPermissionModel = (): PermissionModel => ({
  requestedPermissions: new Set(),
  optionalPermissions: new Set(),
  requestedPatterns: new MatchPatternSet().freeze(),
  optionalPatterns: new MatchPatternSet().freeze(),
});

/**
 * Split `permissions` and friends into capabilities and host patterns.
 *
 * Before manifest version 3 a `permissions` entry that parses as a match
 * pattern is a host permission; from version 3 on hosts come only from
 * `host_permissions`. Unsupported capabilities and patterns are dropped.
 */
export function resolvePermissions(context: ResolverContext): PermissionModel {
  const { manifest, patterns } = context;
  const patternsInPermissions = !context.supportsManifestVersion(3);

  const requestedPermissions = new Set<string>();
  const optionalPermissions = new Set<string>();
  const requestedPatterns = new MatchPatternSet();
  const optionalPatterns = new MatchPatternSet();

  for (const permission of stringArrayForKey(manifest, 'permissions') ?? []) {
    if (patternsInPermissions) {
      const pattern = patterns.parse(permission);
      if (pattern) {
        if (pattern.isSupported) requestedPatterns.add(pattern);
        continue;
      }
    }

    if (SUPPORTED_PERMISSIONS.has(permission)) requestedPermissions.add(permission);
  }

  if (!patternsInPermissions) {
    for (const host of stringArrayForKey(manifest, 'host_permissions') ?? []) {
      const pattern = patterns.parse(host);
      if (pattern?.isSupported) requestedPatterns.add(pattern);
    }
  }

  for (const permission of stringArrayForKey(manifest, 'optional_permissions') ?? []) {
    if (patternsInPermissions) {
      const pattern = patterns.parse(permission);
      if (pattern) {
        if (pattern.isSupported && !requestedPatterns.has(pattern)) optionalPatterns.add(pattern);
        continue;
      }
    }

    if (!requestedPermissions.has(permission) && SUPPORTED_PERMISSIONS.has(permission)) {
      optionalPermissions.add(permission);
    }
  }

  if (!patternsInPermissions) {
    for (const host of stringArrayForKey(manifest, 'optional_host_permissions') ?? []) {
      const pattern = patterns.parse(host);
      if (pattern?.isSupported && !requestedPatterns.has(pattern)) optionalPatterns.add(pattern);
    }
  }

  return {
    requestedPermissions,
    optionalPermissions,
    requestedPatterns: requestedPatterns.freeze(),
    optionalPatterns: optionalPatterns.freeze(),
  };
}
