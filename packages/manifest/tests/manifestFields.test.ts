import { describe, it, expect } from 'vitest';
import { DEFAULT_CONTENT_SECURITY_POLICY } from '../src/constants';
import { fromManifest } from '../src/createManifestDescriptor';
import { defineManifest } from '../src/defineManifest';
import { ErrorKind } from '../src/errors';
import { INVALID_NEW_TAB_OVERRIDE } from '../src/resolvers/pages';
import { manifestV2, manifestV3 } from './fixtures';

const messagesOf = (descriptor: ReturnType<typeof fromManifest>) => descriptor.errors().map((error) => error.message);

describe('display strings', () => {
  it('defaults the short name and display version', () => {
    const descriptor = fromManifest(manifestV3());

    expect(descriptor.displayShortName()).toBe('Reader');
    expect(descriptor.displayVersion()).toBe('1.0');
  });

  it('reads short_name and version_name when present', () => {
    const descriptor = fromManifest(manifestV3({ short_name: 'RD', version_name: '1.0 beta' }));

    expect(descriptor.displayShortName()).toBe('RD');
    expect(descriptor.version()).toBe('1.0');
    expect(descriptor.displayVersion()).toBe('1.0 beta');
  });

  it('records each missing required string', () => {
    const descriptor = fromManifest({ manifest_version: 3, name: '' });

    expect(descriptor.displayName()).toBeUndefined();
    expect(descriptor.errors().map((error) => error.kind)).toEqual([
      ErrorKind.InvalidName,
      ErrorKind.InvalidVersion,
      ErrorKind.InvalidDescription,
    ]);
    expect(messagesOf(descriptor)).toEqual([
      'Missing or empty `name` manifest entry.',
      'Missing or empty `version` manifest entry.',
      'Missing or empty `description` manifest entry.',
    ]);
  });
});

describe('manifest version', () => {
  it('reads as zero when absent and records the error', () => {
    const descriptor = fromManifest({ name: 'Reader', version: '1.0', description: 'Reads pages.' });

    expect(descriptor.manifestVersion()).toBe(0);
    expect(descriptor.supportsManifestVersion(2)).toBe(false);
    expect(messagesOf(descriptor)).toEqual(['An unsupported `manifest_version` was specified.']);
  });

  it('accepts versions 2 and 3', () => {
    expect(fromManifest(manifestV2()).errors()).toEqual([]);
    expect(fromManifest(manifestV3()).supportsManifestVersion(3)).toBe(true);
  });
});

describe('pages', () => {
  it('prefers options_ui over options_page', () => {
    const descriptor = fromManifest(manifestV3({ options_ui: { page: 'options.html' }, options_page: 'legacy.html' }));

    expect(descriptor.hasOptionsPage()).toBe(true);
    expect(descriptor.optionsPagePath()).toBe('options.html');
  });

  it('records an options_ui entry without a page', () => {
    const descriptor = fromManifest(manifestV3({ options_ui: {} }));

    expect(descriptor.hasOptionsPage()).toBe(false);
    expect(messagesOf(descriptor)).toEqual(['Empty or invalid `options_ui` manifest entry']);
  });

  it('reads options_page', () => {
    expect(fromManifest(manifestV2({ options_page: 'settings.html' })).optionsPagePath()).toBe('settings.html');
    expect(messagesOf(fromManifest(manifestV2({ options_page: '' })))).toEqual([
      'Empty or invalid `options_page` manifest entry',
    ]);
  });

  it('reads the new tab override from either key', () => {
    expect(fromManifest(manifestV3({ browser_url_overrides: { newtab: 'tab.html' } })).overrideNewTabPagePath()).toBe(
      'tab.html',
    );
    expect(fromManifest(manifestV3({ chrome_url_overrides: { newtab: 'tab.html' } })).hasOverrideNewTabPage()).toBe(true);
  });

  it('records empty overrides and an empty newtab', () => {
    expect(messagesOf(fromManifest(manifestV3({ chrome_url_overrides: {} })))).toEqual([
      'Empty or invalid `chrome_url_overrides` manifest entry',
    ]);
    expect(messagesOf(fromManifest(manifestV3({ chrome_url_overrides: { newtab: '' } })))).toEqual([
      INVALID_NEW_TAB_OVERRIDE,
    ]);
  });

  it('reads devtools_page', () => {
    const descriptor = fromManifest(manifestV3({ devtools_page: 'devtools.html' }));

    expect(descriptor.hasInspectorBackgroundPage()).toBe(true);
    expect(descriptor.inspectorBackgroundPagePath()).toBe('devtools.html');
  });
});

describe('sidebar', () => {
  it('reads sidebar_action', () => {
    const descriptor = fromManifest(
      manifestV3({ sidebar_action: { default_title: 'Notes', default_panel: 'panel.html' }, side_panel: { default_path: 'side.html' } }),
    );

    expect(descriptor.hasSidebar()).toBe(true);
    expect(descriptor.sidebarTitle()).toBe('Notes');
    expect(descriptor.sidebarDocumentPath()).toBe('panel.html');
  });

  it('reads side_panel without a title', () => {
    const descriptor = fromManifest(manifestV3({ side_panel: { default_path: 'side.html' } }));

    expect(descriptor.sidebarTitle()).toBeUndefined();
    expect(descriptor.sidebarDocumentPath()).toBe('side.html');
  });

  it('counts the sidePanel permission as a sidebar', () => {
    expect(fromManifest(manifestV3({ permissions: ['sidePanel'] })).hasSidebar()).toBe(true);
    expect(fromManifest(manifestV3()).hasSidebar()).toBe(false);
  });
});

describe('content security policy', () => {
  it('reads extension_pages from version 3', () => {
    const policy = "script-src 'self'; object-src 'none'";

    expect(fromManifest(manifestV3({ content_security_policy: { extension_pages: policy } })).contentSecurityPolicy()).toBe(
      policy,
    );
  });

  it('reads the plain string before version 3', () => {
    expect(fromManifest(manifestV2({ content_security_policy: "default-src 'self'" })).contentSecurityPolicy()).toBe(
      "default-src 'self'",
    );
  });

  it('falls back to the default policy', () => {
    expect(fromManifest(manifestV3()).contentSecurityPolicy()).toBe(DEFAULT_CONTENT_SECURITY_POLICY);
    expect(fromManifest(manifestV3({ content_security_policy: { sandbox: 'sandbox allow-scripts' } })).errors()).toEqual([]);
  });

  it('records an empty policy', () => {
    const descriptor = fromManifest(manifestV3({ content_security_policy: {} }));

    expect(descriptor.contentSecurityPolicy()).toBe("script-src 'self'");
    expect(messagesOf(descriptor)).toEqual(['Empty or invalid `content_security_policy` manifest entry.']);
    expect(messagesOf(fromManifest(manifestV2({ content_security_policy: '' })))).toEqual([
      'Empty or invalid `content_security_policy` manifest entry.',
    ]);
  });
});

describe('web accessible resources', () => {
  it('opens version 2 paths to every page', () => {
    const descriptor = fromManifest(manifestV2({ web_accessible_resources: ['images/*', ''] }));

    expect(descriptor.webAccessibleResources()[0].resourcePathPatterns).toEqual(['images/*']);
    expect(descriptor.isWebAccessibleResource('/images/logo.png', 'https://any.example.net/')).toBe(true);
    expect(descriptor.isWebAccessibleResource('scripts/a.js', 'https://any.example.net/')).toBe(false);
  });

  it('scopes version 3 entries to their matches and records invalid ones', () => {
    const descriptor = fromManifest(
      manifestV3({
        web_accessible_resources: [
          { resources: ['fonts/*'], matches: ['https://example.com/*'] },
          { resources: ['x.png'], matches: ['ftp://example.com/*'] },
          { resources: ['y.png'] },
        ],
      }),
    );

    expect(descriptor.webAccessibleResources()).toHaveLength(1);
    expect(descriptor.isWebAccessibleResource('fonts/a.woff', 'https://example.com/page')).toBe(true);
    expect(descriptor.isWebAccessibleResource('fonts/a.woff', 'https://example.org/page')).toBe(false);
    expect(messagesOf(descriptor)).toEqual(['Invalid `web_accessible_resources` manifest entry.']);
  });

  it('records a version 3 entry that is not a list', () => {
    const descriptor = fromManifest(manifestV3({ web_accessible_resources: 'fonts/*' }));

    expect(descriptor.webAccessibleResources()).toEqual([]);
    expect(descriptor.errors().map((error) => error.kind)).toEqual([ErrorKind.InvalidWebAccessibleResources]);
  });
});

describe('action', () => {
  it('reads the version 3 action', () => {
    const descriptor = fromManifest(manifestV3({ action: { default_title: 'Open', default_popup: 'popup.html' } }));

    expect(descriptor.hasAction()).toBe(true);
    expect(descriptor.hasBrowserAction()).toBe(false);
    expect(descriptor.displayActionLabel()).toBe('Open');
    expect(descriptor.actionPopupPath()).toBe('popup.html');
  });

  it('ignores action keys from the other manifest version', () => {
    const v3 = fromManifest(manifestV3({ browser_action: { default_title: 'Old' } }));
    const v2 = fromManifest(manifestV2({ action: { default_title: 'New' } }));

    expect([v3.hasAction(), v3.hasBrowserAction(), v3.displayActionLabel()]).toEqual([false, false, undefined]);
    expect([v2.hasAction(), v2.hasBrowserAction(), v2.displayActionLabel()]).toEqual([false, false, undefined]);
  });

  it('prefers browser_action over page_action for the label', () => {
    const descriptor = fromManifest(
      manifestV2({ browser_action: { default_title: 'Browser' }, page_action: { default_title: 'Page' } }),
    );

    expect(descriptor.hasBrowserAction()).toBe(true);
    expect(descriptor.hasPageAction()).toBe(true);
    expect(descriptor.displayActionLabel()).toBe('Browser');
  });
});

describe('defineManifest', () => {
  it('returns the manifest it was given', () => {
    const manifest = defineManifest({
      manifest_version: 3,
      name: 'Reader',
      version: '1.0',
      description: 'Reads pages.',
      permissions: ['storage'],
      action: { default_popup: 'popup.html' },
    });

    expect(defineManifest(manifest)).toBe(manifest);
    expect(fromManifest(manifest).actionPopupPath()).toBe('popup.html');
  });
});
