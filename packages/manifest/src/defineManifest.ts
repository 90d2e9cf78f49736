import type { JsonObject, JsonValue } from './json';

/** Keys the resolvers read, typed for authoring; anything else passes through. */
export type ManifestInput = JsonObject & {
  readonly manifest_version?: 2 | 3;
  /** Visible name, or a `__MSG_name__` placeholder */
  readonly name?: string;
  readonly short_name?: string;
  readonly version?: string;
  readonly version_name?: string;
  readonly description?: string;
  readonly default_locale?: string;
  readonly icons?: Readonly<Record<string, string>>;
  readonly permissions?: readonly string[];
  readonly optional_permissions?: readonly string[];
  readonly host_permissions?: readonly string[];
  readonly optional_host_permissions?: readonly string[];
  readonly background?: Readonly<Record<string, JsonValue>>;
  readonly content_scripts?: readonly Readonly<Record<string, JsonValue>>[];
  readonly commands?: Readonly<Record<string, JsonValue>>;
};

export function defineManifest<const T extends ManifestInput>(manifest: T): T {
  return manifest;
}
