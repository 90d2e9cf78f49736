import { DEFAULT_CONTENT_SECURITY_POLICY } from '../constants';
import { ErrorKind } from '../errors';
import { hasKey, objectForKey, stringForKey } from '../json';
import type { ResolverContext } from './ResolverContext';

/**
 * Policy for extension pages: `content_security_policy.extension_pages` from
 * manifest version 3, the plain string before it.
 */
export function resolveContentSecurityPolicy(context: ResolverContext): string {
  const { manifest, record } = context;
  let policy: string | undefined;

  if (context.supportsManifestVersion(3)) {
    const policies = objectForKey(manifest, 'content_security_policy', { nilIfEmpty: false });
    if (policies) {
      policy = stringForKey(policies, 'extension_pages');
      if (!policy && (!Object.keys(policies).length || hasKey(policies, 'extension_pages'))) {
        record(ErrorKind.InvalidContentSecurityPolicy);
      }
    }
  } else {
    policy = stringForKey(manifest, 'content_security_policy');
    if (!policy && hasKey(manifest, 'content_security_policy')) record(ErrorKind.InvalidContentSecurityPolicy);
  }

  return policy ?? DEFAULT_CONTENT_SECURITY_POLICY;
}
