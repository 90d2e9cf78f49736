/**
 * @fileoverview Extent Manifest - resolve an extension manifest into a descriptor.
 *
 * Provides:
 * - `ManifestDescriptor`, the lazily-resolved view of one extension
 * - `createManifestDescriptor`, `fromManifest` and `fromDirectory` factories
 * - Default collaborators for resources, match patterns, localization and images
 *
 * @module @extent/manifest
 *
 * @example
 * ```typescript
 * import { defineManifest, fromManifest } from '@extent/manifest';
 *
 * const descriptor = fromManifest(
 *   defineManifest({ manifest_version: 3, name: 'Reader', version: '1.0', description: 'Reads pages.' }),
 * );
 * descriptor.errors(); // []
 * ```
 */

import 'reflect-metadata';

export { ManifestDescriptor } from './ManifestDescriptor';
export {
  createManifestDescriptor,
  fromDirectory,
  fromManifest,
  type DescriptorOptions,
  type ManifestOptions,
} from './createManifestDescriptor';
export { defineManifest, type ManifestInput } from './defineManifest';

export { ErrorKind, ExtensionError, createExtensionError, defaultErrorMessage } from './errors';
export type { ErrorMessageContext } from './errors';
export * from './constants';
export * from './tokens';

export type { DisplayEnvironment, Platform } from './interfaces/DisplayEnvironment';
export { PLATFORMS, isPlatform } from './interfaces/DisplayEnvironment';
export type { ResourceProvider, ResourceReadResult } from './interfaces/ResourceProvider';
export type { MatchPattern, MatchPatternEngine } from './interfaces/MatchPattern';
export type { LocalizationContext, Localizer } from './interfaces/Localizer';
export type { DecodedImage, ImageProvider } from './interfaces/ImageProvider';
export type { WildcardMatcher } from './interfaces/WildcardMatcher';

export { StaticDisplayEnvironment } from './environment/StaticDisplayEnvironment';
export { SignatureImageProvider } from './images/SignatureImageProvider';
export { MessageLocalizer } from './localization/MessageLocalizer';
export { globMatches } from './patterns/globMatches';
export { MatchPatternSet, type ReadonlyMatchPatternSet } from './patterns/MatchPatternSet';
export { ALL_URLS_PATTERN, WebMatchPattern, WebMatchPatternEngine, isKnownPublicSuffix } from './patterns/WebMatchPattern';
export { DirectoryResourceProvider } from './resources/DirectoryResourceProvider';
export { MemoryResourceProvider, type MemoryResource } from './resources/MemoryResourceProvider';
export type { ResourceLookup, ResourceOptions } from './resources/ExtensionResources';

export { iconForAppearance, representationForScale } from './icons/types';
export type { ColorScheme, ExtensionIcon, IconRepresentation, IconSize, ScaledIcon, AppearanceIcon } from './icons/types';

export { BackgroundEnvironment, type BackgroundContent } from './resolvers/background';
export { NAMED_KEYS, parseShortcut, type Command, type CommandModifier, type Shortcut } from './resolvers/commands';
export type { ContentWorld, InjectedContentRule, InjectionTime, StyleLevel } from './resolvers/contentScripts';
export type { DeclarativeNetRequestRuleset } from './resolvers/declarativeNetRequest';
export type { WebAccessibleResource } from './resolvers/webAccessibleResources';
export type { JsonArray, JsonObject, JsonValue } from './json';
