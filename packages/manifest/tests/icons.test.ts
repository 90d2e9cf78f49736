import { describe, it, expect } from 'vitest';
import { fromManifest } from '../src/createManifestDescriptor';
import { ErrorKind } from '../src/errors';
import {
  ANY_ICON_SIZE,
  bestIconSize,
  colorSchemesOf,
  iconVariantForScheme,
  pathForBestIcon,
} from '../src/icons/iconSelection';
import { iconForAppearance, representationForScale, type ExtensionIcon } from '../src/icons/types';
import { manifestV2, manifestV3, png } from './fixtures';

const pathsOf = (icon: ExtensionIcon | undefined) => (icon?.kind === 'scaled' ? icon.paths : undefined);

describe('bestIconSize', () => {
  it('prefers an any entry over every numeric size', () => {
    expect(bestIconSize({ '16': 'a.png', any: 'a.svg' }, 16)).toBe(ANY_ICON_SIZE);
    expect(pathForBestIcon({ '16': 'a.png', any: 'a.svg' }, 512)).toBe('a.svg');
  });

  it('sorts sizes numerically', () => {
    expect(bestIconSize({ '128': 'c.png', '16': 'a.png', '32': 'b.png' }, 48)).toBe(128);
  });

  it('never picks an undersized icon', () => {
    expect(bestIconSize({ '16': 'a.png' }, 32)).toBe(0);
    expect(pathForBestIcon({ '16': 'a.png' }, 32)).toBeUndefined();
  });

  it('ignores keys that are not sizes', () => {
    expect(bestIconSize({ large: 'a.png', '-4': 'b.png', '64': 'c.png' }, 8)).toBe(64);
  });
});

describe('icon variants', () => {
  it('reads color schemes, defaulting to both', () => {
    expect(colorSchemesOf({ '16': 'a.png' })).toEqual(new Set(['light', 'dark']));
    expect(colorSchemesOf({ color_schemes: ['dark'] })).toEqual(new Set(['dark']));
    expect(colorSchemesOf({ color_schemes: 'dark' })).toEqual(new Set());
  });

  it('falls back to a large enough variant of another scheme', () => {
    const light = { '16': 'light.png', color_schemes: ['light'] };
    const dark = { '128': 'dark.png', color_schemes: ['dark'] };

    expect(iconVariantForScheme([light, dark], 64, 'light')).toBe(dark);
    expect(iconVariantForScheme([light, dark], 16, 'light')).toBe(light);
  });
});

describe('descriptor icons', () => {
  it('records the missing file and a load failure for the icons table', () => {
    const descriptor = fromManifest(manifestV3({ icons: { '16': 'missing.png' } }), {}, { displayScales: [1] });

    expect(descriptor.icon(16)).toBeUndefined();
    expect(descriptor.errors().map((error) => [error.kind, error.message])).toEqual([
      [ErrorKind.ResourceNotFound, 'Unable to find "missing.png" in the extension’s resources.'],
      [ErrorKind.InvalidIcon, 'Failed to load images in `icons` manifest entry.'],
    ]);
  });

  it('records a wrongly typed icons entry', () => {
    const descriptor = fromManifest(manifestV3({ icons: 'icon.png' }));

    expect(descriptor.icon(16)).toBeUndefined();
    expect(descriptor.errors().map((error) => error.message)).toEqual(['Missing or empty `icons` manifest entry.']);
  });

  it('stays silent without an icons entry', () => {
    const descriptor = fromManifest(manifestV3());

    expect(descriptor.icon(16)).toBeUndefined();
    expect(descriptor.errors()).toEqual([]);
  });

  it('decodes data URI icons', () => {
    const uri = `data:image/png;base64,${Buffer.from(png(48)).toString('base64')}`;
    const descriptor = fromManifest(manifestV3({ icons: { '48': uri } }), {}, { displayScales: [1] });

    const icon = descriptor.icon(48);

    expect(icon?.kind === 'scaled' && icon.representations[0].image).toEqual({
      mimeType: 'image/png',
      byteLength: 24,
      width: 48,
      height: 48,
    });
  });

  it('splits light and dark variants into an appearance icon', () => {
    const descriptor = fromManifest(
      manifestV3({
        icon_variants: [
          { '16': 'light.png', color_schemes: ['light'] },
          { '16': 'dark.png', color_schemes: ['dark'] },
        ],
      }),
      { 'light.png': png(16), 'dark.png': png(16) },
      { displayScales: [1] },
    );

    const icon = descriptor.icon(16);

    expect(icon?.kind).toBe('appearance');
    expect(icon && iconForAppearance(icon, () => 'dark').paths).toEqual(['dark.png']);
    expect(icon && iconForAppearance(icon, () => 'light').paths).toEqual(['light.png']);
  });

  it('returns one image when a variant covers both schemes', () => {
    const descriptor = fromManifest(
      manifestV3({ icon_variants: [{ '32': 'any.png' }] }),
      { 'any.png': png(32) },
      { displayScales: [1, 2] },
    );

    const icon = descriptor.icon(16);

    expect(icon?.kind).toBe('scaled');
    expect(icon?.kind === 'scaled' && representationForScale(icon, 2)?.path).toBe('any.png');
  });

  it('records an empty icon_variants entry', () => {
    const descriptor = fromManifest(manifestV3({ icon_variants: [] }));

    expect(descriptor.icon(16)).toBeUndefined();
    expect(descriptor.errors().map((error) => error.message)).toEqual(['Empty or invalid `icon_variants` manifest entry.']);
  });
});

describe('action icons', () => {
  const resources = { 'icon.png': png(16), 'toolbar.png': png(16), 'toolbar-32.png': png(32) };

  it('loads a single default_icon path', () => {
    const descriptor = fromManifest(manifestV3({ action: { default_icon: 'toolbar.png' } }), resources);

    expect(descriptor.actionIcon(16)).toEqual({
      kind: 'scaled',
      paths: ['toolbar.png'],
      representations: [
        { scale: 0, path: 'toolbar.png', image: { mimeType: 'image/png', byteLength: 24, width: 16, height: 16 } },
      ],
    });
  });

  it('picks from a default_icon table per scale', () => {
    const descriptor = fromManifest(
      manifestV2({ browser_action: { default_icon: { '16': 'toolbar.png', '32': 'toolbar-32.png' } } }),
      resources,
      { displayScales: [1, 2] },
    );

    expect(pathsOf(descriptor.actionIcon(16))).toEqual(['toolbar.png', 'toolbar-32.png']);
  });

  it('falls back to the extension icon', () => {
    const descriptor = fromManifest(manifestV3({ action: {}, icons: { '16': 'icon.png' } }), resources, {
      displayScales: [1],
    });

    expect(pathsOf(descriptor.actionIcon(16))).toEqual(['icon.png']);
    expect(descriptor.errors()).toEqual([]);
  });

  it('records a default_icon path that does not load', () => {
    const descriptor = fromManifest(manifestV3({ action: { default_icon: 'gone.png' }, icons: { '16': 'icon.png' } }), resources, {
      displayScales: [1],
    });

    expect(pathsOf(descriptor.actionIcon(16))).toEqual(['icon.png']);
    expect(descriptor.errors().map((error) => [error.kind, error.message])).toEqual([
      [ErrorKind.ResourceNotFound, 'Unable to find "gone.png" in the extension’s resources.'],
      [ErrorKind.InvalidActionIcon, 'Failed to load image for `default_icon` in the `action` manifest entry.'],
    ]);
  });

  it('words version 2 failures after browser and page actions', () => {
    const descriptor = fromManifest(manifestV2({ page_action: { default_icon: { '16': 'gone.png' } } }), resources, {
      displayScales: [1],
    });

    expect(descriptor.actionIcon(16)).toBeUndefined();
    expect(descriptor.errors().map((error) => error.message)).toContain(
      'Failed to load images in `default_icon` for the `browser_action` or `page_action` manifest entry.',
    );
  });
});
