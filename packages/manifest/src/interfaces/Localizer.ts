import type { JsonObject } from '../json';
import type { ResourceReadResult } from './ResourceProvider';

export interface LocalizationContext {
  /** `default_locale` of the manifest, when declared */
  readonly defaultLocale?: string;
  readText(path: string): ResourceReadResult<string>;
}

export interface Localizer {
  /** Returns the manifest with its message placeholders replaced. */
  localize(manifest: JsonObject, context: LocalizationContext): JsonObject;
}
