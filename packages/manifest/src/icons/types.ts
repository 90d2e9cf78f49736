import type { DecodedImage } from '../interfaces/ImageProvider';

export type ColorScheme = 'light' | 'dark';

export interface IconDimensions {
  readonly width: number;
  readonly height: number;
}

/** A point size, or width and height in points. */
export type IconSize = number | IconDimensions;

export interface IconRepresentation {
  /** Display scale this image serves; 0 means every scale */
  readonly scale: number;
  readonly path: string;
  readonly image: DecodedImage;
}

export interface ScaledIcon {
  readonly kind: 'scaled';
  /** Distinct paths that were decoded, in scale order */
  readonly paths: readonly string[];
  readonly representations: readonly IconRepresentation[];
}

/** Separate images for light and dark appearance. */
export interface AppearanceIcon {
  readonly kind: 'appearance';
  readonly light: ScaledIcon;
  readonly dark: ScaledIcon;
}

export type ExtensionIcon = ScaledIcon | AppearanceIcon;

/**
 * Pick the image to draw. `currentScheme` is asked on every call, so the
 * result follows appearance changes without the icon storing any state.
 */
export function iconForAppearance(icon: ExtensionIcon, currentScheme: () => ColorScheme): ScaledIcon {
  if (icon.kind === 'scaled') return icon;
  return currentScheme() === 'dark' ? icon.dark : icon.light;
}

/** Representation for a display scale, falling back to the universal one. */
export function representationForScale(icon: ScaledIcon, scale: number): IconRepresentation | undefined {
  return (
    icon.representations.find((representation) => representation.scale === scale) ??
    icon.representations.find((representation) => representation.scale === 0)
  );
}

export function pointSizeOf(size: IconSize): number {
  return typeof size === 'number' ? size : Math.max(size.width, size.height);
}

export function sizeKeyOf(size: IconSize): string {
  return typeof size === 'number' ? `${size}x${size}` : `${size.width}x${size.height}`;
}
