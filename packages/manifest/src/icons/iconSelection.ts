import { isJsonArray, stringForKey, valueForKey, type JsonObject } from '../json';
import type { ColorScheme } from './types';

/** Returned by {@link bestIconSize} when the table has an `any` entry. */
export const ANY_ICON_SIZE = Number.POSITIVE_INFINITY;

/**
 * Best size key for a requested pixel size: `any` first, then the exact size,
 * then the smallest larger size. Returns 0 when nothing is large enough.
 */
export function bestIconSize(table: JsonObject | undefined, pixelSize: number): number {
  if (!table || !Object.keys(table).length) return 0;
  if (valueForKey(table, 'any') !== undefined) return ANY_ICON_SIZE;
  if (valueForKey(table, String(pixelSize)) !== undefined) return pixelSize;

  const sizes = Object.keys(table)
    .filter((key) => /^\d+$/.test(key))
    .map(Number)
    .filter((size) => size > 0)
    .sort((a, b) => a - b);

  return sizes.find((size) => size >= pixelSize) ?? 0;
}

export function pathForBestIcon(table: JsonObject | undefined, pixelSize: number): string | undefined {
  const size = bestIconSize(table, pixelSize);
  if (!size) return undefined;
  return stringForKey(table, size === ANY_ICON_SIZE ? 'any' : String(size));
}

/** `color_schemes` of a variant; an absent list covers both schemes. */
export function colorSchemesOf(variant: JsonObject): ReadonlySet<ColorScheme> {
  const value = valueForKey(variant, 'color_schemes');
  if (value === undefined) return new Set<ColorScheme>(['light', 'dark']);

  const schemes = new Set<ColorScheme>();
  if (isJsonArray(value)) {
    if (value.includes('light')) schemes.add('light');
    if (value.includes('dark')) schemes.add('dark');
  }
  return schemes;
}

/**
 * The variant to use for a color scheme: the first variant for the scheme with
 * an icon large enough, else the first such variant of any scheme.
 */
export function iconVariantForScheme(
  variants: readonly JsonObject[],
  idealPixelSize: number,
  scheme: ColorScheme,
): JsonObject | undefined {
  if (variants.length <= 1) return variants[0];

  let fallback: JsonObject | undefined;
  for (const variant of variants) {
    if (!bestIconSize(variant, idealPixelSize)) continue;
    if (colorSchemesOf(variant).has(scheme)) return variant;
    fallback ??= variant;
  }

  return fallback;
}
