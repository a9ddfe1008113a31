/**
 * Readers for untyped JSON from upstream APIs
 *
 * Upstream payloads are parsed as `unknown` and read field by field; a
 * missing or mistyped field yields the supplied default.
 */

export type JsonObject = Record<string, unknown>;

export function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** The value if it is an object, otherwise an empty one */
export function asObject(value: unknown): JsonObject {
  return isObject(value) ? value : {};
}

/** Nested object lookup, e.g. `getObject(data, 'queries')` */
export function getObject(obj: JsonObject, key: string): JsonObject {
  return asObject(obj[key]);
}

export function getArray(obj: JsonObject, key: string): unknown[] {
  const value = obj[key];
  return Array.isArray(value) ? value : [];
}

/** Numbers, and numeric strings such as "12,345" or "42.5" */
export function getNumber(obj: JsonObject, key: string, fallback = 0): number {
  return toNumber(obj[key], fallback);
}

export function toNumber(value: unknown, fallback = 0): number {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.replace(/,/g, ''));
    if (Number.isFinite(parsed)) return parsed;
  }
  return fallback;
}

export function getString(obj: JsonObject, key: string, fallback = ''): string {
  const value = obj[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return fallback;
}

export function getBoolean(obj: JsonObject, key: string, fallback = false): boolean {
  const value = obj[key];
  return typeof value === 'boolean' ? value : fallback;
}

/** Every element of an array that is an object */
export function objects(values: unknown[]): JsonObject[] {
  return values.filter(isObject);
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
