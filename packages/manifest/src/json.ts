/**
 * Typed reads over parsed manifest JSON.
 *
 * Reads follow the manifest conventions: a value of the wrong type reads as
 * absent, and by default so does an empty string, array or object. Arrays can
 * be narrowed to one element type, dropping the elements that do not fit.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;
export type JsonArray = readonly JsonValue[];
export interface JsonObject {
  readonly [key: string]: JsonValue;
}

export interface ReadOptions {
  /** Treat empty strings, arrays and objects as absent (default true) */
  nilIfEmpty?: boolean;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isJsonArray(value: unknown): value is JsonArray {
  return Array.isArray(value);
}

export function hasKey(object: JsonObject | undefined, key: string): boolean {
  return !!object && Object.prototype.hasOwnProperty.call(object, key);
}

export function valueForKey(object: JsonObject | undefined, key: string): JsonValue | undefined {
  return hasKey(object, key) ? object?.[key] : undefined;
}

export function stringForKey(
  object: JsonObject | undefined,
  key: string,
  { nilIfEmpty = true }: ReadOptions = {},
): string | undefined {
  const value = valueForKey(object, key);
  if (typeof value !== 'string') return undefined;
  if (nilIfEmpty && !value.length) return undefined;
  return value;
}

export function numberForKey(object: JsonObject | undefined, key: string): number | undefined {
  const value = valueForKey(object, key);
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/** Booleans, and numbers read as their truthiness. */
export function booleanForKey(object: JsonObject | undefined, key: string): boolean | undefined {
  const value = valueForKey(object, key);
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  return undefined;
}

export function objectForKey(
  object: JsonObject | undefined,
  key: string,
  { nilIfEmpty = true }: ReadOptions = {},
): JsonObject | undefined {
  const value = valueForKey(object, key);
  if (!isJsonObject(value)) return undefined;
  if (nilIfEmpty && !Object.keys(value).length) return undefined;
  return value;
}

export function arrayForKey(
  object: JsonObject | undefined,
  key: string,
  { nilIfEmpty = true }: ReadOptions = {},
): JsonArray | undefined {
  const value = valueForKey(object, key);
  if (!isJsonArray(value)) return undefined;
  if (nilIfEmpty && !value.length) return undefined;
  return value;
}

/** The string elements of an array value; absent when the key holds no array. */
export function stringArrayForKey(
  object: JsonObject | undefined,
  key: string,
  options: ReadOptions = {},
): string[] | undefined {
  return narrowArray(arrayForKey(object, key, { nilIfEmpty: false }), isString, options);
}

/** The object elements of an array value; absent when the key holds no array. */
export function objectArrayForKey(
  object: JsonObject | undefined,
  key: string,
  options: ReadOptions = {},
): JsonObject[] | undefined {
  return narrowArray(arrayForKey(object, key, { nilIfEmpty: false }), isJsonObject, options);
}

/** Drop empty strings, the usual cleanup for path and pattern lists. */
export function nonEmptyStrings(values: readonly string[] | undefined): string[] {
  return (values ?? []).filter((value) => value.length > 0);
}

function narrowArray<T extends JsonValue>(
  array: JsonArray | undefined,
  guard: (value: JsonValue) => value is T,
  { nilIfEmpty = true }: ReadOptions,
): T[] | undefined {
  if (!array) return undefined;
  const result = array.filter(guard);
  if (nilIfEmpty && !result.length) return undefined;
  return result;
}

function isString(value: JsonValue): value is string {
  return typeof value === 'string';
}

/** Parse JSON text, accepting only an object at the root. */
export function parseJsonObject(text: string): JsonObject {
  const value: unknown = JSON.parse(text);
  if (!isJsonObject(value)) throw new TypeError('Expected a JSON object at the top level');
  return value;
}

/** Recursively freeze a JSON value in place and return it. */
export function deepFreeze<T extends JsonValue>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
