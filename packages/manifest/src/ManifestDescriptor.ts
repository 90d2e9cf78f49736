/**
 * @fileoverview ManifestDescriptor - the resolved, queryable view of an extension.
 *
 * Every derived value is a {@link LazyField}: it resolves on first read, at
 * most once, and only when `manifest.json` parsed. Reads never throw; problems
 * land in the error ledger and the accessor returns its fallback. Calling
 * {@link ManifestDescriptor.errors} forces every resolver so the ledger holds
 * everything that can be reported without asking for a specific icon size.
 *
 * @module @extent/manifest/ManifestDescriptor
 */

import 'reflect-metadata';
import { ErrorLedger, lazyField, Service, Use } from '@extent/core';
import type { LazyField, LedgerListener, Logger } from '@extent/core';
import {
  GENERATED_BACKGROUND_PAGE_PATH,
  GENERATED_SERVICE_WORKER_PATH,
  MANIFEST_PATH,
  SUPPORTED_PERMISSIONS,
} from './constants';
import { createExtensionError, ErrorKind, type ErrorMessageContext, type ExtensionError } from './errors';
import { IconResolver, type IconLookup, type ImageLoadResult } from './icons/IconResolver';
import type { ExtensionIcon, IconSize } from './icons/types';
import type { DisplayEnvironment } from './interfaces/DisplayEnvironment';
import type { ImageProvider } from './interfaces/ImageProvider';
import type { Localizer } from './interfaces/Localizer';
import type { MatchPatternEngine } from './interfaces/MatchPattern';
import type { ResourceProvider } from './interfaces/ResourceProvider';
import type { WildcardMatcher } from './interfaces/WildcardMatcher';
import { deepFreeze, hasKey, isJsonObject, numberForKey, stringForKey, type JsonObject } from './json';
import { MatchPatternSet, type ReadonlyMatchPatternSet } from './patterns/MatchPatternSet';
import { decodeDataUri, isDataUri } from './resources/dataUri';
import {
  ExtensionResources,
  type GeneratedResource,
  type ResourceLookup,
  type ResourceOptions,
} from './resources/ExtensionResources';
import { fileExtension } from './resources/paths';
import { actionSurface, hasActionSurface, resolveAction, type ActionConfig } from './resolvers/action';
import {
  BackgroundEnvironment,
  backgroundContentPath,
  generateBackgroundContent,
  resolveBackground,
  type BackgroundContent,
} from './resolvers/background';
import { resolveCommands, type Command } from './resolvers/commands';
import { resolveContentScripts, ruleAppliesToURL, type InjectedContentRule } from './resolvers/contentScripts';
import { resolveContentSecurityPolicy } from './resolvers/contentSecurityPolicy';
import { resolveDeclarativeNetRequest, type DeclarativeNetRequestRuleset } from './resolvers/declarativeNetRequest';
import { resolveDisplayStrings, type DisplayStrings } from './resolvers/displayStrings';
import { resolveExternallyConnectable, type ExternallyConnectable } from './resolvers/externallyConnectable';
import { resolveManifestVersion } from './resolvers/manifestVersion';
import { resolvePages, type ExtensionPages } from './resolvers/pages';
import { emptyPermissionModel, resolvePermissions, type PermissionModel } from './resolvers/permissions';
import type { ResolverContext } from './resolvers/ResolverContext';
import { resolveSidebar, type SidebarConfig } from './resolvers/sidebar';
import { isWebAccessible, resolveWebAccessibleResources, type WebAccessibleResource } from './resolvers/webAccessibleResources';
import {
  DisplayEnvironmentToken,
  ImageProviderToken,
  LocalizerToken,
  LoggerToken,
  MatchPatternEngineToken,
  ResourceProviderToken,
  WildcardMatcherToken,
} from './tokens';

const EMPTY_PATTERNS = new MatchPatternSet().freeze();

@Service()
export class ManifestDescriptor {
  private readonly ledger: ErrorLedger<ExtensionError>;
  private readonly resources: ExtensionResources;
  private readonly icons: IconResolver;

  // ─── Lazy fields ─────────────────────────────────────────────────────────

  private readonly parsedManifest: LazyField<JsonObject | undefined>;
  private readonly context: LazyField<ResolverContext | undefined>;
  private readonly manifestVersionCheck: LazyField<number>;
  private readonly displayStrings: LazyField<DisplayStrings>;
  private readonly permissions: LazyField<PermissionModel>;
  private readonly background: LazyField<BackgroundContent | undefined>;
  private readonly generatedBackground: LazyField<string | undefined>;
  private readonly action: LazyField<ActionConfig | undefined>;
  private readonly defaultActionIcon: LazyField<ExtensionIcon | undefined>;
  private readonly commandList: LazyField<readonly Command[]>;
  private readonly contentScripts: LazyField<readonly InjectedContentRule[]>;
  private readonly rulesets: LazyField<readonly DeclarativeNetRequestRuleset[]>;
  private readonly externallyConnectable: LazyField<ExternallyConnectable | undefined>;
  private readonly csp: LazyField<string | undefined>;
  private readonly webAccessible: LazyField<readonly WebAccessibleResource[]>;
  private readonly pages: LazyField<ExtensionPages>;
  private readonly sidebar: LazyField<SidebarConfig | undefined>;

  constructor(
    @Use(ResourceProviderToken) provider: ResourceProvider,
    @Use(MatchPatternEngineToken) private readonly patternEngine: MatchPatternEngine,
    @Use(LocalizerToken) private readonly localizer: Localizer,
    @Use(ImageProviderToken) private readonly imageProvider: ImageProvider,
    @Use(WildcardMatcherToken) private readonly wildcardMatcher: WildcardMatcher,
    @Use(DisplayEnvironmentToken) private readonly environment: DisplayEnvironment,
    @Use(LoggerToken) private readonly logger: Logger,
  ) {
    this.ledger = new ErrorLedger<ExtensionError>(logger);
    this.resources = new ExtensionResources(provider, (path) => this.generatedResourceFor(path));
    this.icons = new IconResolver({
      loadImage: (path) => this.loadImage(path),
      displayScales: () => this.environment.displayScales(),
      record: (kind, message) => this.record(kind, message),
      reportError: (error) => this.ledger.record(error),
    });

    this.parsedManifest = lazyField({ name: 'manifest', fallback: undefined, resolve: () => this.parseManifest() });

    const parsed = () => this.parsedManifest.get() !== undefined;
    const field = <T>(name: string, fallback: T, resolve: (context: ResolverContext) => T): LazyField<T> =>
      lazyField({
        name,
        fallback,
        gate: parsed,
        resolve: () => {
          const context = this.context.get();
          return context ? resolve(context) : fallback;
        },
      });

    this.context = lazyField({
      name: 'context',
      fallback: undefined,
      gate: parsed,
      resolve: () => this.createContext(),
    });

    this.manifestVersionCheck = field<number>('manifest_version', 0, resolveManifestVersion);
    this.displayStrings = field<DisplayStrings>('display strings', {}, resolveDisplayStrings);
    this.permissions = field<PermissionModel>('permissions', emptyPermissionModel(), resolvePermissions);
    this.background = field<BackgroundContent | undefined>('background', undefined, (context) =>
      resolveBackground(context, { hasRequestedPermission: (permission) => this.hasRequestedPermission(permission) }),
    );
    this.generatedBackground = field<string | undefined>('generated background', undefined, () =>
      generateBackgroundContent(this.background.get()),
    );
    this.action = field<ActionConfig | undefined>('action', undefined, resolveAction);
    this.defaultActionIcon = field<ExtensionIcon | undefined>('action default_icon', undefined, (context) => this.loadDefaultActionIcon(context));
    this.commandList = field<readonly Command[]>('commands', [], (context) =>
      resolveCommands(context, { actionLabel: this.displayActionLabel(), shortName: this.displayShortName() }),
    );
    this.contentScripts = field<readonly InjectedContentRule[]>('content_scripts', [], resolveContentScripts);
    this.rulesets = field<readonly DeclarativeNetRequestRuleset[]>('declarative_net_request', [], (context) =>
      resolveDeclarativeNetRequest(context, (permission) => this.hasRequestedPermission(permission)),
    );
    this.externallyConnectable = field<ExternallyConnectable | undefined>('externally_connectable', undefined, resolveExternallyConnectable);
    this.csp = field<string | undefined>('content_security_policy', undefined, resolveContentSecurityPolicy);
    this.webAccessible = field<readonly WebAccessibleResource[]>('web_accessible_resources', [], resolveWebAccessibleResources);
    this.pages = field<ExtensionPages>('pages', {}, resolvePages);
    this.sidebar = field<SidebarConfig | undefined>('sidebar', undefined, resolveSidebar);
  }

  // ─── Manifest ────────────────────────────────────────────────────────────

  /** The parsed and localized manifest, or undefined when it did not parse. */
  manifest(): JsonObject | undefined {
    return this.parsedManifest.get();
  }

  manifestParsedSuccessfully(): boolean {
    return this.parsedManifest.get() !== undefined;
  }

  /** `manifest_version`, or 0 when absent. */
  manifestVersion(): number {
    return numberForKey(this.manifest(), 'manifest_version') ?? 0;
  }

  supportsManifestVersion(version: number): boolean {
    return this.manifestVersion() >= version;
  }

  defaultLocale(): string | undefined {
    return stringForKey(this.manifest(), 'default_locale');
  }

  // ─── Errors ──────────────────────────────────────────────────────────────

  /** Resolve every field, then return the ledger in first-seen order. */
  errors(): readonly ExtensionError[] {
    if (this.manifestParsedSuccessfully()) {
      this.manifestVersionCheck.get();
      this.displayStrings.get();
      this.action.get();
      this.defaultActionIcon.get();
      this.background.get();
      this.contentScripts.get();
      this.permissions.get();
      this.pages.get();
      this.csp.get();
      this.webAccessible.get();
      this.commandList.get();
      this.rulesets.get();
      this.externallyConnectable.get();
      this.sidebar.get();
    }
    return this.ledger.all();
  }

  /** Errors recorded so far, without forcing resolution. */
  recordedErrors(): readonly ExtensionError[] {
    return this.ledger.all();
  }

  subscribeToErrors(listener: LedgerListener<ExtensionError>): () => void {
    return this.ledger.subscribe(listener);
  }

  // ─── Display strings ─────────────────────────────────────────────────────

  displayName(): string | undefined {
    return this.displayStrings.get().name;
  }

  displayShortName(): string | undefined {
    return this.displayStrings.get().shortName;
  }

  version(): string | undefined {
    return this.displayStrings.get().version;
  }

  displayVersion(): string | undefined {
    return this.displayStrings.get().displayVersion;
  }

  displayDescription(): string | undefined {
    return this.displayStrings.get().description;
  }

  // ─── Background ──────────────────────────────────────────────────────────

  backgroundContent(): BackgroundContent | undefined {
    return this.background.get();
  }

  hasBackgroundContent(): boolean {
    return this.background.get() !== undefined;
  }

  backgroundContentIsPersistent(): boolean {
    return this.background.get()?.isPersistent ?? false;
  }

  backgroundContentUsesModules(): boolean {
    return this.background.get()?.usesModules ?? false;
  }

  backgroundContentIsServiceWorker(): boolean {
    return this.background.get()?.environment === BackgroundEnvironment.ServiceWorker;
  }

  backgroundContentPath(): string | undefined {
    return backgroundContentPath(this.background.get());
  }

  /** The generated page or worker for a script-only background. */
  generatedBackgroundContent(): string | undefined {
    return this.generatedBackground.get();
  }

  // ─── Icons & action ──────────────────────────────────────────────────────

  icon(size: IconSize): ExtensionIcon | undefined {
    const manifest = this.manifest();
    if (!manifest) return undefined;

    if (hasKey(manifest, 'icon_variants')) {
      return this.icons.iconForVariants(
        this.iconLookup('icons', manifest, 'icon_variants', ErrorKind.InvalidIcon, 'Failed to load images in `icon_variants` manifest entry.'),
        size,
      );
    }

    return this.icons.iconForTable(
      this.iconLookup('icons', manifest, 'icons', ErrorKind.InvalidIcon, 'Failed to load images in `icons` manifest entry.'),
      size,
    );
  }

  /** The action's icon, falling back to {@link icon}. */
  actionIcon(size: IconSize): ExtensionIcon | undefined {
    if (!this.manifestParsedSuccessfully()) return undefined;

    const action = this.action.get();
    if (!action) return this.icon(size);
    if (action.defaultIconPath) return this.defaultActionIcon.get() ?? this.icon(size);

    const entry = action.entry;
    const surfaces = this.supportsManifestVersion(3) ? '`action`' : '`browser_action` or `page_action`';

    if (hasKey(entry, 'icon_variants')) {
      const message = `Failed to load images in \`icon_variants\` for the ${surfaces} manifest entry.`;
      const result = this.icons.iconForVariants(
        this.iconLookup('action', entry, 'icon_variants', ErrorKind.InvalidActionIcon, message),
        size,
      );
      return result ?? this.icon(size);
    }

    const message = `Failed to load images in \`default_icon\` for the ${surfaces} manifest entry.`;
    const result = this.icons.iconForTable(
      this.iconLookup('action', entry, 'default_icon', ErrorKind.InvalidActionIcon, message),
      size,
    );
    return result ?? this.icon(size);
  }

  displayActionLabel(): string | undefined {
    return this.action.get()?.label;
  }

  actionPopupPath(): string | undefined {
    return this.action.get()?.popupPath;
  }

  hasAction(): boolean {
    return this.hasSurface('action');
  }

  hasBrowserAction(): boolean {
    return this.hasSurface('browser_action');
  }

  hasPageAction(): boolean {
    return this.hasSurface('page_action');
  }

  // ─── Commands ────────────────────────────────────────────────────────────

  commands(): readonly Command[] {
    return this.commandList.get();
  }

  hasCommands(): boolean {
    return this.commandList.get().length > 0;
  }

  // ─── Content scripts ─────────────────────────────────────────────────────

  staticInjectedContents(): readonly InjectedContentRule[] {
    return this.contentScripts.get();
  }

  hasStaticInjectedContent(): boolean {
    return this.contentScripts.get().length > 0;
  }

  hasStaticInjectedContentForURL(url: string | URL): boolean {
    return this.contentScripts.get().some((rule) => ruleAppliesToURL(rule, url, this.wildcardMatcher));
  }

  // ─── Permissions & patterns ──────────────────────────────────────────────

  /** Capability permissions the engine knows how to grant. */
  supportedPermissions(): ReadonlySet<string> {
    return SUPPORTED_PERMISSIONS;
  }

  requestedPermissions(): ReadonlySet<string> {
    return this.permissions.get().requestedPermissions;
  }

  optionalPermissions(): ReadonlySet<string> {
    return this.permissions.get().optionalPermissions;
  }

  hasRequestedPermission(permission: string): boolean {
    return this.permissions.get().requestedPermissions.has(permission);
  }

  requestedPermissionMatchPatterns(): ReadonlyMatchPatternSet {
    return this.permissions.get().requestedPatterns;
  }

  optionalPermissionMatchPatterns(): ReadonlyMatchPatternSet {
    return this.permissions.get().optionalPatterns;
  }

  externallyConnectableMatchPatterns(): ReadonlyMatchPatternSet {
    return this.externallyConnectable.get()?.matchPatterns ?? EMPTY_PATTERNS;
  }

  externallyConnectableExtensionIds(): readonly string[] {
    return this.externallyConnectable.get()?.extensionIds ?? [];
  }

  /** Permission, externally-connectable and content-script patterns, without repeats. */
  allRequestedMatchPatterns(): ReadonlyMatchPatternSet {
    return MatchPatternSet.union(
      this.requestedPermissionMatchPatterns(),
      this.externallyConnectableMatchPatterns(),
      ...this.staticInjectedContents().map((rule) => rule.includePatterns),
    );
  }

  // ─── Declarative net request ─────────────────────────────────────────────

  declarativeNetRequestRulesets(): readonly DeclarativeNetRequestRuleset[] {
    return this.rulesets.get();
  }

  declarativeNetRequestRuleset(id: string): DeclarativeNetRequestRuleset | undefined {
    return this.rulesets.get().find((ruleset) => ruleset.id === id);
  }

  // ─── Policies & pages ────────────────────────────────────────────────────

  contentSecurityPolicy(): string | undefined {
    return this.csp.get();
  }

  webAccessibleResources(): readonly WebAccessibleResource[] {
    return this.webAccessible.get();
  }

  isWebAccessibleResource(resourcePath: string, pageURL: string | URL): boolean {
    return isWebAccessible(this.webAccessible.get(), resourcePath, pageURL, this.wildcardMatcher);
  }

  hasOptionsPage(): boolean {
    return !!this.pages.get().optionsPagePath;
  }

  optionsPagePath(): string | undefined {
    return this.pages.get().optionsPagePath;
  }

  hasOverrideNewTabPage(): boolean {
    return !!this.pages.get().overrideNewTabPagePath;
  }

  overrideNewTabPagePath(): string | undefined {
    return this.pages.get().overrideNewTabPagePath;
  }

  hasInspectorBackgroundPage(): boolean {
    return !!this.pages.get().devtoolsPagePath;
  }

  inspectorBackgroundPagePath(): string | undefined {
    return this.pages.get().devtoolsPagePath;
  }

  hasSidebar(): boolean {
    return this.sidebar.get() !== undefined || this.hasRequestedPermission('sidePanel');
  }

  sidebarTitle(): string | undefined {
    return this.sidebar.get()?.title;
  }

  sidebarDocumentPath(): string | undefined {
    return this.sidebar.get()?.documentPath;
  }

  // ─── Resources ───────────────────────────────────────────────────────────

  resourceData(path: string, options?: ResourceOptions): ResourceLookup<Uint8Array> {
    return this.resources.data(path, options);
  }

  resourceString(path: string, options?: ResourceOptions): ResourceLookup<string> {
    return this.resources.string(path, options);
  }

  // ─── Internals ───────────────────────────────────────────────────────────

  private parseManifest(): JsonObject | undefined {
    const lookup = this.resources.string(MANIFEST_PATH);
    if (!lookup.found) {
      this.ledger.record(
        lookup.error ?? createExtensionError(ErrorKind.ResourceNotFound, this.messageContext(undefined), `Unable to find "${MANIFEST_PATH}" in the extension’s resources.`),
      );
      return undefined;
    }

    let manifest: unknown;
    try {
      manifest = JSON.parse(lookup.data);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.ledger.record(createExtensionError(ErrorKind.InvalidManifest, this.messageContext(undefined), undefined, cause));
      return undefined;
    }

    if (!isJsonObject(manifest)) {
      this.ledger.record(createExtensionError(ErrorKind.InvalidManifest, this.messageContext(undefined)));
      return undefined;
    }

    const localized = this.localizer.localize(manifest, {
      defaultLocale: stringForKey(manifest, 'default_locale'),
      readText: (path) => {
        const result = this.resources.string(path, { suppressNotFound: true });
        return result.found ? { found: true, data: result.data } : { found: false, reason: 'missing' };
      },
    });

    return deepFreeze(localized);
  }

  private createContext(): ResolverContext | undefined {
    const manifest = this.parsedManifest.get();
    if (!manifest) return undefined;

    const manifestVersion = numberForKey(manifest, 'manifest_version') ?? 0;
    this.logger.debug('Resolving manifest', { name: stringForKey(manifest, 'name'), manifestVersion });

    return {
      manifest,
      manifestVersion,
      supportsManifestVersion: (version) => manifestVersion >= version,
      patterns: this.patternEngine,
      environment: this.environment,
      record: (kind, message, cause) => this.record(kind, message, cause),
    };
  }

  private record(kind: ErrorKind, message?: string, cause?: Error): void {
    this.ledger.record(createExtensionError(kind, this.messageContext(this.parsedManifest.get()), message, cause));
  }

  private messageContext(manifest: JsonObject | undefined): ErrorMessageContext {
    const manifestVersion = numberForKey(manifest, 'manifest_version') ?? 0;
    const supportsManifestVersion = (version: number) => manifestVersion >= version;
    return {
      supportsManifestVersion,
      hasManifestKey: (key) => hasKey(manifest, key),
      hasActionKey: (key) => {
        const context = this.context.settled ? this.context.get() : undefined;
        return !!context && hasKey(actionSurface(context)?.entry, key);
      },
    };
  }

  private hasSurface(surface: 'action' | 'browser_action' | 'page_action'): boolean {
    const context = this.context.get();
    return !!context && hasActionSurface(context, surface);
  }

  private iconLookup(
    cache: string,
    owner: JsonObject | undefined,
    key: string,
    errorKind: ErrorKind,
    failureMessage: string,
  ): IconLookup {
    return { cache, owner, key, errorKind, failureMessage };
  }

  private loadDefaultActionIcon(context: ResolverContext): ExtensionIcon | undefined {
    const path = this.action.get()?.defaultIconPath;
    if (!path) return undefined;

    const icon = this.icons.singleImage(path);
    if (!icon) {
      const surfaces = context.supportsManifestVersion(3) ? '`action`' : '`browser_action` or `page_action`';
      this.record(ErrorKind.InvalidActionIcon, `Failed to load image for \`default_icon\` in the ${surfaces} manifest entry.`);
    }
    return icon;
  }

  private loadImage(path: string): ImageLoadResult {
    const lookup = this.resources.data(path);
    if (!lookup.found) return { error: lookup.error };

    const hint = isDataUri(path) ? (decodeDataUri(path)?.mimeType ?? '') : fileExtension(path);
    const image = this.imageProvider.decode(lookup.data, hint);
    return image ? { image } : {};
  }

  /** The generated background resource, for the one path that names it. */
  private generatedResourceFor(path: string): GeneratedResource | undefined {
    // Only the two generated names consult the manifest, so locale and manifest reads never recurse.
    if (path !== GENERATED_BACKGROUND_PAGE_PATH && path !== GENERATED_SERVICE_WORKER_PATH) return undefined;
    if (!this.manifestParsedSuccessfully() || path !== this.backgroundContentPath()) return undefined;

    const content = this.generatedBackgroundContent();
    return content === undefined ? undefined : { path, content };
  }
}
