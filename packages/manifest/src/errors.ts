import { StructuredError } from '@extent/core';

export const ErrorKind = {
  Unknown: 'Unknown',
  ResourceNotFound: 'ResourceNotFound',
  InvalidManifest: 'InvalidManifest',
  UnsupportedManifestVersion: 'UnsupportedManifestVersion',
  InvalidAction: 'InvalidAction',
  InvalidActionIcon: 'InvalidActionIcon',
  InvalidBackgroundContent: 'InvalidBackgroundContent',
  InvalidBackgroundPersistence: 'InvalidBackgroundPersistence',
  InvalidCommands: 'InvalidCommands',
  InvalidContentScripts: 'InvalidContentScripts',
  InvalidContentSecurityPolicy: 'InvalidContentSecurityPolicy',
  InvalidDeclarativeNetRequest: 'InvalidDeclarativeNetRequest',
  InvalidDescription: 'InvalidDescription',
  InvalidExternallyConnectable: 'InvalidExternallyConnectable',
  InvalidIcon: 'InvalidIcon',
  InvalidName: 'InvalidName',
  InvalidOptionsPage: 'InvalidOptionsPage',
  InvalidURLOverrides: 'InvalidURLOverrides',
  InvalidVersion: 'InvalidVersion',
  InvalidWebAccessibleResources: 'InvalidWebAccessibleResources',
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

/** One ledger entry produced while resolving a manifest. */
export class ExtensionError extends StructuredError<ErrorKind> {
  constructor(kind: ErrorKind, message: string, cause?: Error) {
    super(kind, message, cause);
    this.name = 'ExtensionError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * What the default messages depend on. Several kinds word their message after
 * the keys the manifest actually uses.
 */
export interface ErrorMessageContext {
  supportsManifestVersion(version: number): boolean;
  /** True when the manifest root carries the key */
  hasManifestKey(key: string): boolean;
  /** True when the action entry in use carries the key */
  hasActionKey(key: string): boolean;
}

/**
 * Default message for a kind. A custom message always wins; kinds without a
 * sensible default (`ResourceNotFound`) fall back to the unknown message.
 */
export function defaultErrorMessage(kind: ErrorKind, context: ErrorMessageContext, cause?: Error): string {
  const v3 = context.supportsManifestVersion(3);

  switch (kind) {
    case ErrorKind.Unknown:
    case ErrorKind.ResourceNotFound:
      return 'An unknown error has occurred.';
    case ErrorKind.InvalidManifest:
      return cause?.message
        ? `Unable to parse manifest: ${cause.message}`
        : 'Unable to parse manifest because of an unexpected format.';
    case ErrorKind.UnsupportedManifestVersion:
      return 'An unsupported `manifest_version` was specified.';
    case ErrorKind.InvalidAction:
      return v3
        ? 'Missing or empty `action` manifest entry.'
        : 'Missing or empty `browser_action` or `page_action` manifest entry.';
    case ErrorKind.InvalidActionIcon: {
      const entry = context.hasActionKey('icon_variants') ? 'icon_variants' : 'default_icon';
      return v3
        ? `Empty or invalid \`${entry}\` for the \`action\` manifest entry.`
        : `Empty or invalid \`${entry}\` for the \`browser_action\` or \`page_action\` manifest entry.`;
    }
    case ErrorKind.InvalidBackgroundContent:
      return 'Empty or invalid `background` manifest entry.';
    case ErrorKind.InvalidBackgroundPersistence:
      return 'Invalid `persistent` manifest entry.';
    case ErrorKind.InvalidCommands:
      return 'Invalid `commands` manifest entry.';
    case ErrorKind.InvalidContentScripts:
      return 'Empty or invalid `content_scripts` manifest entry.';
    case ErrorKind.InvalidContentSecurityPolicy:
      return 'Empty or invalid `content_security_policy` manifest entry.';
    case ErrorKind.InvalidDeclarativeNetRequest:
      return cause?.message
        ? `Unable to parse \`declarativeNetRequest\` rules: ${cause.message}`
        : 'Unable to parse `declarativeNetRequest` rules because of an unexpected error.';
    case ErrorKind.InvalidDescription:
      return 'Missing or empty `description` manifest entry.';
    case ErrorKind.InvalidExternallyConnectable:
      return 'Empty or invalid `externally_connectable` manifest entry.';
    case ErrorKind.InvalidIcon:
      return context.hasManifestKey('icon_variants')
        ? 'Empty or invalid `icon_variants` manifest entry.'
        : 'Missing or empty `icons` manifest entry.';
    case ErrorKind.InvalidName:
      return 'Missing or empty `name` manifest entry.';
    case ErrorKind.InvalidOptionsPage:
      return context.hasManifestKey('options_ui')
        ? 'Empty or invalid `options_ui` manifest entry'
        : 'Empty or invalid `options_page` manifest entry';
    case ErrorKind.InvalidURLOverrides:
      return context.hasManifestKey('browser_url_overrides')
        ? 'Empty or invalid `browser_url_overrides` manifest entry'
        : 'Empty or invalid `chrome_url_overrides` manifest entry';
    case ErrorKind.InvalidVersion:
      return 'Missing or empty `version` manifest entry.';
    case ErrorKind.InvalidWebAccessibleResources:
      return 'Invalid `web_accessible_resources` manifest entry.';
  }
}

export function createExtensionError(
  kind: ErrorKind,
  context: ErrorMessageContext,
  message?: string,
  cause?: Error,
): ExtensionError {
  return new ExtensionError(kind, message || defaultErrorMessage(kind, context, cause), cause);
}
