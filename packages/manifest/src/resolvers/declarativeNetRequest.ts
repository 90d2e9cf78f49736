import {
  DECLARATIVE_NET_REQUEST_PERMISSIONS,
  MAXIMUM_ENABLED_STATIC_RULESETS,
  MAXIMUM_STATIC_RULESETS,
} from '../constants';
import { ErrorKind, ExtensionError } from '../errors';
import { arrayForKey, hasKey, isJsonObject, objectForKey, stringForKey, valueForKey, type JsonObject } from '../json';
import type { ResolverContext } from './ResolverContext';

export interface DeclarativeNetRequestRuleset {
  readonly id: string;
  readonly enabled: boolean;
  /** Rules file, relative to the extension root */
  readonly path: string;
}

export const MISSING_PERMISSION = 'Manifest has no `declarativeNetRequest` permission.';
export const TOO_MANY_RULESETS = 'Exceeded maximum number of `declarative_net_request` rulesets. Ignoring extra rulesets.';
export const TOO_MANY_ENABLED_RULESETS = `Exceeded maximum number of enabled \`declarative_net_request\` static rulesets. The first ${MAXIMUM_ENABLED_STATIC_RULESETS} will be applied, the remaining will be ignored.`;
export const EMPTY_RULESET_ID = 'Empty `declarative_net_request` ruleset id.';
export const EMPTY_RULESET_PATH = 'Empty `declarative_net_request` JSON path.';

export const duplicateRulesetId = (id: string) =>
  `\`declarative_net_request\` ruleset with id "${id}" is invalid. Ruleset id must be unique.`;

const REQUIRED_KEYS = [
  ['id', 'string'],
  ['enabled', 'boolean'],
  ['path', 'string'],
] as const;

/**
 * Validate one `rule_resources` entry. Returns the ruleset or the error that
 * describes why it was rejected.
 */
export function parseRuleset(entry: JsonObject): DeclarativeNetRequestRuleset | ExtensionError {
  for (const [key, type] of REQUIRED_KEYS) {
    if (!hasKey(entry, key)) {
      return new ExtensionError(
        ErrorKind.InvalidDeclarativeNetRequest,
        `Missing required key \`${key}\` in \`declarative_net_request\` ruleset.`,
      );
    }
    if (typeof valueForKey(entry, key) !== type) {
      return new ExtensionError(
        ErrorKind.InvalidDeclarativeNetRequest,
        `Expected a ${type} for \`${key}\` in \`declarative_net_request\` ruleset.`,
      );
    }
  }

  const id = stringForKey(entry, 'id');
  if (!id) return new ExtensionError(ErrorKind.InvalidDeclarativeNetRequest, EMPTY_RULESET_ID);

  const path = stringForKey(entry, 'path');
  if (!path) return new ExtensionError(ErrorKind.InvalidDeclarativeNetRequest, EMPTY_RULESET_PATH);

  return { id, enabled: valueForKey(entry, 'enabled') === true, path };
}

export function resolveDeclarativeNetRequest(
  context: ResolverContext,
  hasRequestedPermission: (permission: string) => boolean,
): DeclarativeNetRequestRuleset[] {
  const { manifest, record } = context;
  if (!hasKey(manifest, 'declarative_net_request')) return [];

  if (!DECLARATIVE_NET_REQUEST_PERMISSIONS.some(hasRequestedPermission)) {
    record(ErrorKind.InvalidDeclarativeNetRequest, MISSING_PERMISSION);
    return [];
  }

  const entry = objectForKey(manifest, 'declarative_net_request');
  const resources = arrayForKey(entry, 'rule_resources', { nilIfEmpty: false });
  if (!resources) {
    record(ErrorKind.InvalidDeclarativeNetRequest);
    return [];
  }

  const objects = resources.filter(isJsonObject);
  if (objects.length > MAXIMUM_STATIC_RULESETS) record(ErrorKind.InvalidDeclarativeNetRequest, TOO_MANY_RULESETS);

  const rulesets: DeclarativeNetRequestRuleset[] = [];
  const seenIds = new Set<string>();
  let enabledCount = 0;

  for (const object of objects) {
    if (rulesets.length >= MAXIMUM_STATIC_RULESETS) break;

    const ruleset = parseRuleset(object);
    if (ruleset instanceof ExtensionError) {
      record(ErrorKind.InvalidDeclarativeNetRequest, undefined, ruleset);
      continue;
    }

    if (seenIds.has(ruleset.id)) {
      record(ErrorKind.InvalidDeclarativeNetRequest, duplicateRulesetId(ruleset.id));
      continue;
    }

    if (ruleset.enabled && ++enabledCount > MAXIMUM_ENABLED_STATIC_RULESETS) {
      record(ErrorKind.InvalidDeclarativeNetRequest, TOO_MANY_ENABLED_RULESETS);
      continue;
    }

    seenIds.add(ruleset.id);
    rulesets.push(ruleset);
  }

  return rulesets;
}
