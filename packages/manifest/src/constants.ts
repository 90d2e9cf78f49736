import type { Platform } from './interfaces/DisplayEnvironment';

/** Most commands that may carry an assigned keyboard shortcut. */
export const MAXIMUM_SHORTCUT_COMMANDS = 4;

/** Most `declarative_net_request` rulesets accepted from the manifest. */
export const MAXIMUM_STATIC_RULESETS = 100;

/** Most of those rulesets that may be enabled at once. */
export const MAXIMUM_ENABLED_STATIC_RULESETS = 50;

export const GENERATED_BACKGROUND_PAGE_PATH = '_generated_background_page.html';
export const GENERATED_SERVICE_WORKER_PATH = '_generated_service_worker.js';

export const DEFAULT_CONTENT_SECURITY_POLICY = "script-src 'self'";

export const MANIFEST_PATH = 'manifest.json';

export const ACTION_COMMAND_IDENTIFIER = '_execute_action';
export const BROWSER_ACTION_COMMAND_IDENTIFIER = '_execute_browser_action';
export const PAGE_ACTION_COMMAND_IDENTIFIER = '_execute_page_action';

/** Capability permissions the engine grants; anything else is dropped. */
export const SUPPORTED_PERMISSIONS: ReadonlySet<string> = new Set([
  'activeTab',
  'alarms',
  'clipboardWrite',
  'contextMenus',
  'cookies',
  'declarativeNetRequest',
  'declarativeNetRequestFeedback',
  'declarativeNetRequestWithHostAccess',
  'menus',
  'nativeMessaging',
  'notifications',
  'scripting',
  'sidePanel',
  'storage',
  'tabs',
  'unlimitedStorage',
  'webNavigation',
  'webRequest',
]);

export const DECLARATIVE_NET_REQUEST_PERMISSIONS = [
  'declarativeNetRequest',
  'declarativeNetRequestWithHostAccess',
] as const;

/** Platforms that only run non-persistent background content. */
export const RESTRICTED_BACKGROUND_PLATFORMS: ReadonlySet<Platform> = new Set<Platform>(['ios', 'visionos']);
