import { describe, it, expect } from 'vitest';
import { fromManifest } from '../src/createManifestDescriptor';
import { MAXIMUM_ENABLED_STATIC_RULESETS, MAXIMUM_STATIC_RULESETS } from '../src/constants';
import { ErrorKind } from '../src/errors';
import type { JsonObject } from '../src/json';
import {
  EMPTY_RULESET_ID,
  MISSING_PERMISSION,
  TOO_MANY_ENABLED_RULESETS,
  TOO_MANY_RULESETS,
  parseRuleset,
} from '../src/resolvers/declarativeNetRequest';
import { manifestV2, manifestV3 } from './fixtures';

describe('permission resolution', () => {
  it('keeps version 3 permissions capability-only', () => {
    const descriptor = fromManifest(
      manifestV3({ permissions: ['storage', 'https://example.com/*'], host_permissions: ['https://example.org/*'] }),
    );

    expect([...descriptor.requestedPermissions()]).toEqual(['storage']);
    expect(descriptor.requestedPermissionMatchPatterns().keys()).toEqual(['https://example.org/*']);
  });

  it('ignores host_permissions before version 3', () => {
    const descriptor = fromManifest(manifestV2({ host_permissions: ['https://example.org/*'] }));

    expect(descriptor.requestedPermissionMatchPatterns().size).toBe(0);
  });

  it('drops unsupported capabilities and patterns', () => {
    const descriptor = fromManifest(
      manifestV2({ permissions: ['storage', 'geolocation', 'ftp://example.com/*', 'https://example.com/*'] }),
    );

    expect([...descriptor.requestedPermissions()]).toEqual(['storage']);
    expect(descriptor.requestedPermissionMatchPatterns().keys()).toEqual(['https://example.com/*']);
  });

  it('keeps optional permissions disjoint from requested ones', () => {
    const descriptor = fromManifest(
      manifestV3({
        permissions: ['storage'],
        optional_permissions: ['storage', 'tabs'],
        host_permissions: ['https://example.com/*'],
        optional_host_permissions: ['https://EXAMPLE.com/*', 'https://example.org/*'],
      }),
    );

    expect([...descriptor.optionalPermissions()]).toEqual(['tabs']);
    expect(descriptor.optionalPermissionMatchPatterns().keys()).toEqual(['https://example.org/*']);
  });

  it('splits version 2 optional permissions the same way', () => {
    const descriptor = fromManifest(
      manifestV2({ permissions: ['https://example.com/*'], optional_permissions: ['https://example.com/*', 'cookies', '<all_urls>'] }),
    );

    expect([...descriptor.optionalPermissions()]).toEqual(['cookies']);
    expect(descriptor.optionalPermissionMatchPatterns().keys()).toEqual(['<all_urls>']);
  });

  it('answers hasRequestedPermission from the resolved set', () => {
    const descriptor = fromManifest(manifestV3({ permissions: ['tabs'] }));

    expect(descriptor.hasRequestedPermission('tabs')).toBe(true);
    expect(descriptor.hasRequestedPermission('storage')).toBe(false);
  });
});

describe('externally connectable', () => {
  it('reads match patterns and extension ids', () => {
    const descriptor = fromManifest(
      manifestV3({ externally_connectable: { matches: ['https://*.example.com/*'], ids: ['abcdefghijklmnop', ''] } }),
    );

    expect(descriptor.externallyConnectableMatchPatterns().keys()).toEqual(['https://*.example.com/*']);
    expect(descriptor.externallyConnectableExtensionIds()).toEqual(['abcdefghijklmnop']);
    expect(descriptor.errors()).toEqual([]);
  });

  it('rejects patterns covering every site or a public suffix', () => {
    const descriptor = fromManifest(
      manifestV3({
        externally_connectable: {
          matches: ['<all_urls>', '*://*/*', 'https://*.co.uk/*', 'https://*.com/*', 'https://shop.example.co.uk/*'],
        },
      }),
    );

    expect(descriptor.externallyConnectableMatchPatterns().keys()).toEqual(['https://shop.example.co.uk/*']);
    expect(descriptor.errors().map((error) => [error.kind, error.message])).toEqual([
      [ErrorKind.InvalidExternallyConnectable, 'Empty or invalid `externally_connectable` manifest entry.'],
    ]);
  });

  it('records an error for an empty entry', () => {
    const descriptor = fromManifest(manifestV3({ externally_connectable: {} }));

    expect(descriptor.externallyConnectableMatchPatterns().size).toBe(0);
    expect(descriptor.errors().map((error) => error.kind)).toEqual([ErrorKind.InvalidExternallyConnectable]);
  });
});

describe('declarative net request', () => {
  const ruleset = (index: number, enabled = false): JsonObject => ({ id: `set-${index}`, enabled, path: `rules/${index}.json` });
  const withRulesets = (ruleResources: JsonObject[], permissions = ['declarativeNetRequest']) =>
    fromManifest(manifestV3({ permissions, declarative_net_request: { rule_resources: ruleResources } }));

  it('requires a declarative net request permission', () => {
    const descriptor = withRulesets([ruleset(1)], []);

    expect(descriptor.declarativeNetRequestRulesets()).toEqual([]);
    expect(descriptor.errors().map((error) => error.message)).toEqual([MISSING_PERMISSION]);
  });

  it('accepts the host access variant of the permission', () => {
    const descriptor = withRulesets([ruleset(1, true)], ['declarativeNetRequestWithHostAccess']);

    expect(descriptor.declarativeNetRequestRuleset('set-1')).toEqual({ id: 'set-1', enabled: true, path: 'rules/1.json' });
  });

  it('does nothing without a declarative_net_request key', () => {
    const descriptor = fromManifest(manifestV3({ permissions: ['declarativeNetRequest'] }));

    expect(descriptor.declarativeNetRequestRulesets()).toEqual([]);
    expect(descriptor.errors()).toEqual([]);
  });

  it('records each invalid entry with its reason as the cause', () => {
    const descriptor = withRulesets([{ id: 'set-1', path: 'rules/1.json' }, { id: 'set-2', enabled: 'yes', path: 'a.json' }]);

    const errors = descriptor.errors();
    expect(errors.map((error) => error.message)).toEqual([
      'Unable to parse `declarativeNetRequest` rules: Missing required key `enabled` in `declarative_net_request` ruleset.',
      'Unable to parse `declarativeNetRequest` rules: Expected a boolean for `enabled` in `declarative_net_request` ruleset.',
    ]);
    expect(errors[0].underlyingError?.message).toBe('Missing required key `enabled` in `declarative_net_request` ruleset.');
  });

  it('rejects empty ids', () => {
    const result = parseRuleset({ id: '', enabled: true, path: 'a.json' });

    expect(result).toBeInstanceOf(Error);
    expect(result instanceof Error && result.message).toBe(EMPTY_RULESET_ID);
  });

  it('skips every enabled ruleset past the cap', () => {
    const entries = Array.from({ length: MAXIMUM_ENABLED_STATIC_RULESETS + 2 }, (_, index) => ruleset(index, true));
    entries.push(ruleset(99));

    const descriptor = withRulesets(entries);
    const rulesets = descriptor.declarativeNetRequestRulesets();

    expect(rulesets).toHaveLength(MAXIMUM_ENABLED_STATIC_RULESETS + 1);
    expect(rulesets.filter((entry) => entry.enabled)).toHaveLength(MAXIMUM_ENABLED_STATIC_RULESETS);
    expect(rulesets[rulesets.length - 1].id).toBe('set-99');
    expect(descriptor.errors().map((error) => error.message)).toEqual([TOO_MANY_ENABLED_RULESETS]);
  });

  it('ignores rulesets past the total cap', () => {
    const entries = Array.from({ length: MAXIMUM_STATIC_RULESETS + 5 }, (_, index) => ruleset(index));

    const descriptor = withRulesets(entries);

    expect(descriptor.declarativeNetRequestRulesets()).toHaveLength(MAXIMUM_STATIC_RULESETS);
    expect(descriptor.errors().map((error) => error.message)).toEqual([TOO_MANY_RULESETS]);
  });
});
