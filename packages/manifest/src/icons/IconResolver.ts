/**
 * @fileoverview IconResolver - best-fit icon selection with a per-size cache.
 *
 * For each active display scale the requested point size becomes a pixel size
 * and the best entry of the icon table is picked. Paths shared by several
 * scales are decoded once. Results (including misses) are cached per size and
 * per cache location; a location's cache is dropped whenever the active scale
 * set differs from the one it was filled under.
 *
 * @module @extent/manifest/icons/IconResolver
 */

import type { ErrorKind, ExtensionError } from '../errors';
import type { DecodedImage } from '../interfaces/ImageProvider';
import { hasKey, objectArrayForKey, objectForKey, type JsonObject } from '../json';
import { iconVariantForScheme, pathForBestIcon } from './iconSelection';
import { pointSizeOf, sizeKeyOf, type ExtensionIcon, type IconRepresentation, type IconSize, type ScaledIcon } from './types';

export type ImageLoadResult =
  | { readonly image: DecodedImage; readonly error?: undefined }
  | { readonly image?: undefined; readonly error?: ExtensionError };

export interface IconResolverOptions {
  loadImage(path: string): ImageLoadResult;
  displayScales(): readonly number[];
  /** Records an error with the kind's default message when none is given */
  record(kind: ErrorKind, message?: string): void;
  /** Records an error produced elsewhere, such as a missing resource */
  reportError(error: ExtensionError): void;
}

/** Where a lookup reads from and how it reports a miss. */
export interface IconLookup {
  /** Cache location; lookups sharing a name share results */
  readonly cache: string;
  /** The object holding the icon key, e.g. the manifest or the action entry */
  readonly owner: JsonObject | undefined;
  readonly key: string;
  readonly errorKind: ErrorKind;
  /** Message recorded when a non-empty table produced no image */
  readonly failureMessage: string;
}

interface CacheLocation {
  scalesKey: string;
  entries: Map<string, ExtensionIcon | undefined>;
}

export class IconResolver {
  private readonly caches = new Map<string, CacheLocation>();

  constructor(private readonly options: IconResolverOptions) {}

  /** Best image from an icon table such as `icons` or `default_icon`. */
  iconForTable(lookup: IconLookup, size: IconSize): ExtensionIcon | undefined {
    return this.cached(lookup.cache, size, () => {
      const table = objectForKey(lookup.owner, lookup.key);
      const result = this.bestImageInTable(table, size);
      if (!result) this.recordMiss(lookup, !!table);
      return result;
    });
  }

  /** Best image from an `icon_variants` list, split by appearance when needed. */
  iconForVariants(lookup: IconLookup, size: IconSize): ExtensionIcon | undefined {
    return this.cached(lookup.cache, size, () => {
      const variants = objectArrayForKey(lookup.owner, lookup.key, { nilIfEmpty: false });
      const result = this.bestImageForVariants(variants ?? [], size);
      if (!result) this.recordMiss(lookup, !!variants?.length);
      return result;
    });
  }

  /** Load one image for every scale. */
  singleImage(path: string): ScaledIcon | undefined {
    const loaded = this.options.loadImage(path);
    if (!loaded.image) {
      if (loaded.error) this.options.reportError(loaded.error);
      return undefined;
    }
    return { kind: 'scaled', paths: [path], representations: [{ scale: 0, path, image: loaded.image }] };
  }

  private recordMiss(lookup: IconLookup, hadEntries: boolean): void {
    if (hadEntries) this.options.record(lookup.errorKind, lookup.failureMessage);
    else if (hasKey(lookup.owner, lookup.key)) this.options.record(lookup.errorKind);
  }

  private cached(
    cacheName: string,
    size: IconSize,
    compute: () => ExtensionIcon | undefined,
  ): ExtensionIcon | undefined {
    const scalesKey = [...this.options.displayScales()].sort((a, b) => a - b).join(',');
    let location = this.caches.get(cacheName);
    if (!location || location.scalesKey !== scalesKey) {
      location = { scalesKey, entries: new Map() };
      this.caches.set(cacheName, location);
    }

    const key = sizeKeyOf(size);
    if (location.entries.has(key)) return location.entries.get(key);

    const result = compute();
    location.entries.set(key, result);
    return result;
  }

  private bestImageInTable(table: JsonObject | undefined, size: IconSize): ScaledIcon | undefined {
    if (!table) return undefined;

    const pointSize = pointSizeOf(size);
    const scalePaths: { scale: number; path: string }[] = [];
    for (const scale of this.options.displayScales()) {
      const path = pathForBestIcon(table, Math.trunc(pointSize * scale));
      if (path) scalePaths.push({ scale, path });
    }

    const uniquePaths = [...new Set(scalePaths.map(({ path }) => path))];
    if (!uniquePaths.length) return undefined;

    const images = new Map<string, DecodedImage>();
    for (const path of uniquePaths) {
      const loaded = this.options.loadImage(path);
      if (loaded.image) images.set(path, loaded.image);
      else if (loaded.error) this.options.reportError(loaded.error);
    }

    const wanted = uniquePaths.length === 1 ? [{ scale: 0, path: uniquePaths[0] }] : scalePaths;
    const representations: IconRepresentation[] = [];
    for (const { scale, path } of wanted) {
      const image = images.get(path);
      if (image) representations.push({ scale, path, image });
    }

    if (!representations.length) return undefined;
    return { kind: 'scaled', paths: uniquePaths, representations };
  }

  private bestImageForVariants(variants: readonly JsonObject[], size: IconSize): ExtensionIcon | undefined {
    const pointSize = pointSizeOf(size);
    const lightTable = iconVariantForScheme(variants, pointSize, 'light');
    const darkTable = iconVariantForScheme(variants, pointSize, 'dark');

    if (!lightTable || !darkTable || lightTable === darkTable) {
      return this.bestImageInTable(lightTable ?? darkTable, size);
    }

    const light = this.bestImageInTable(lightTable, size);
    const dark = this.bestImageInTable(darkTable, size);
    if (!light || !dark) return light ?? dark;

    return { kind: 'appearance', light, dark };
  }
}
