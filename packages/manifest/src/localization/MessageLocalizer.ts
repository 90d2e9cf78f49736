import { silentLogger, type Logger } from '@extent/core';
import type { LocalizationContext, Localizer } from '../interfaces/Localizer';
import { isJsonArray, isJsonObject, objectForKey, parseJsonObject, stringForKey, type JsonObject, type JsonValue } from '../json';

const MESSAGE_PATTERN = /__MSG_([A-Za-z0-9_@]+)__/g;
const PLACEHOLDER_PATTERN = /\$([A-Za-z0-9_@]+)\$/g;
const RTL_LANGUAGES: ReadonlySet<string> = new Set(['ar', 'fa', 'he', 'ur', 'yi']);

type MessageTable = ReadonlyMap<string, string>;

/**
 * Replaces `__MSG_name__` placeholders in every manifest string with messages
 * from `_locales/<locale>/messages.json`. Names are case-insensitive; unknown
 * names become empty strings.
 */
export class MessageLocalizer implements Localizer {
  constructor(private readonly logger: Logger = silentLogger) {}

  localize(manifest: JsonObject, context: LocalizationContext): JsonObject {
    const locale = context.defaultLocale;
    if (!locale) return manifest;

    const localized = substitute(manifest, this.loadMessages(locale, context));
    return isJsonObject(localized) ? localized : manifest;
  }

  private loadMessages(locale: string, context: LocalizationContext): MessageTable {
    const table = new Map<string, string>(predefinedMessages(locale));

    // Regional messages override the base language.
    const language = locale.split(/[-_]/)[0];
    const candidates = language && language !== locale ? [language, locale] : [locale];

    for (const candidate of candidates) {
      const path = `_locales/${candidate}/messages.json`;
      const result = context.readText(path);
      if (!result.found) continue;

      let parsed: JsonObject;
      try {
        parsed = parseJsonObject(result.data);
      } catch (error) {
        this.logger.warn(`Ignoring unreadable ${path}`, { error: error instanceof Error ? error.message : String(error) });
        continue;
      }

      for (const [name, entry] of Object.entries(parsed)) {
        if (!isJsonObject(entry)) continue;
        const message = stringForKey(entry, 'message', { nilIfEmpty: false });
        if (message === undefined) continue;
        table.set(name.toLowerCase(), expandPlaceholders(message, objectForKey(entry, 'placeholders')));
      }
    }

    return table;
  }
}

function predefinedMessages(locale: string): [string, string][] {
  const rtl = RTL_LANGUAGES.has(locale.split(/[-_]/)[0].toLowerCase());
  return [
    ['@@ui_locale', locale.replace(/-/g, '_')],
    ['@@bidi_dir', rtl ? 'rtl' : 'ltr'],
    ['@@bidi_reversed_dir', rtl ? 'ltr' : 'rtl'],
    ['@@bidi_start_edge', rtl ? 'right' : 'left'],
    ['@@bidi_end_edge', rtl ? 'left' : 'right'],
  ];
}

function expandPlaceholders(message: string, placeholders: JsonObject | undefined): string {
  const contents = new Map<string, string>();
  for (const [name, placeholder] of Object.entries(placeholders ?? {})) {
    if (!isJsonObject(placeholder)) continue;
    const content = stringForKey(placeholder, 'content', { nilIfEmpty: false });
    if (content !== undefined) contents.set(name.toLowerCase(), content);
  }

  return message
    .replace(PLACEHOLDER_PATTERN, (match, name: string) => contents.get(name.toLowerCase()) ?? match)
    .replace(/\$\$/g, '$');
}

function substitute(value: JsonValue, messages: MessageTable): JsonValue {
  if (typeof value === 'string') {
    return value.replace(MESSAGE_PATTERN, (_, name: string) => messages.get(name.toLowerCase()) ?? '');
  }
  if (isJsonArray(value)) return value.map((item) => substitute(item, messages));
  if (isJsonObject(value)) {
    const result: Record<string, JsonValue> = {};
    for (const [key, item] of Object.entries(value)) result[key] = substitute(item, messages);
    return result;
  }
  return value;
}
