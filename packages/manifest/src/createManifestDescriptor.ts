import { bindConstant, bindTransient, ConsoleLogger, createContainer } from '@extent/core';
import type { Logger } from '@extent/core';
import { StaticDisplayEnvironment } from './environment/StaticDisplayEnvironment';
import { SignatureImageProvider } from './images/SignatureImageProvider';
import type { DisplayEnvironment, Platform } from './interfaces/DisplayEnvironment';
import type { ImageProvider } from './interfaces/ImageProvider';
import type { Localizer } from './interfaces/Localizer';
import type { MatchPatternEngine } from './interfaces/MatchPattern';
import type { ResourceProvider } from './interfaces/ResourceProvider';
import type { WildcardMatcher } from './interfaces/WildcardMatcher';
import type { JsonObject } from './json';
import { MessageLocalizer } from './localization/MessageLocalizer';
import { ManifestDescriptor } from './ManifestDescriptor';
import { globMatches } from './patterns/globMatches';
import { WebMatchPatternEngine } from './patterns/WebMatchPattern';
import { DirectoryResourceProvider } from './resources/DirectoryResourceProvider';
import { MemoryResourceProvider, type MemoryResource } from './resources/MemoryResourceProvider';
import {
  DisplayEnvironmentToken,
  ImageProviderToken,
  LocalizerToken,
  LoggerToken,
  MatchPatternEngineToken,
  ResourceProviderToken,
  WildcardMatcherToken,
} from './tokens';

export interface DescriptorOptions {
  /** Where `manifest.json` and every other resource is read from */
  resources: ResourceProvider;
  /** Platform used for suggested keys and background restrictions (default: 'mac') */
  platform?: Platform;
  /** Active display scales (default: [1, 2]); ignored when `environment` is given */
  displayScales?: readonly number[];
  /** Log resolution to the console (default: false) */
  enableLogs?: boolean;
  environment?: DisplayEnvironment;
  logger?: Logger;
  patternEngine?: MatchPatternEngine;
  localizer?: Localizer;
  imageProvider?: ImageProvider;
  wildcardMatcher?: WildcardMatcher;
}

/**
 * Build a descriptor in its own container. Collaborators not given in
 * `options` get their default implementation.
 */
export function createManifestDescriptor(options: DescriptorOptions): ManifestDescriptor {
  const container = createContainer();
  const logger = options.logger ?? new ConsoleLogger({ enableLogs: options.enableLogs ?? false });

  bindConstant<Logger>(container, LoggerToken, logger);
  bindConstant<ResourceProvider>(container, ResourceProviderToken, options.resources);
  bindConstant<DisplayEnvironment>(
    container,
    DisplayEnvironmentToken,
    options.environment ?? new StaticDisplayEnvironment(options.platform, options.displayScales),
  );
  bindConstant<MatchPatternEngine>(container, MatchPatternEngineToken, options.patternEngine ?? new WebMatchPatternEngine());
  bindConstant<Localizer>(container, LocalizerToken, options.localizer ?? new MessageLocalizer(logger));
  bindConstant<ImageProvider>(container, ImageProviderToken, options.imageProvider ?? new SignatureImageProvider());
  bindConstant<WildcardMatcher>(container, WildcardMatcherToken, options.wildcardMatcher ?? globMatches);
  bindTransient(container, ManifestDescriptor);

  logger.debug('Collaborators bound', { platform: options.platform ?? 'mac' });
  return container.get(ManifestDescriptor);
}

export type ManifestOptions = Omit<DescriptorOptions, 'resources'>;

/** Descriptor for an in-memory manifest plus any extra resources. */
export function fromManifest(
  manifest: JsonObject,
  resources: Record<string, MemoryResource> = {},
  options: ManifestOptions = {},
): ManifestDescriptor {
  return createManifestDescriptor({
    ...options,
    resources: new MemoryResourceProvider({ ...resources, 'manifest.json': manifest }),
  });
}

/** Descriptor for an unpacked extension directory. */
export function fromDirectory(directory: string, options: ManifestOptions = {}): ManifestDescriptor {
  return createManifestDescriptor({ ...options, resources: new DirectoryResourceProvider(directory) });
}
