/**
 * Field Access
 *
 * Backend payloads arrive as SDK class instances on one version and plain
 * JSON objects on another. Everything that reads them goes through these
 * accessors so business logic never branches on the shape.
 */

export type FieldBag = Record<string, unknown>;

export function isFieldBag(value: unknown): value is FieldBag {
  return typeof value === "object" && value !== null;
}

/**
 * Read `key` from an object-shaped value, own or inherited (getters on SDK
 * classes included). Returns `fallback` when the value is not an object or
 * the field is absent/null.
 */
export function getField(obj: unknown, key: string, fallback?: unknown): unknown {
  if (!isFieldBag(obj)) return fallback;
  const value = Reflect.get(obj, key);
  return value === undefined || value === null ? fallback : value;
}

export function getString(obj: unknown, key: string): string | undefined {
  const value = getField(obj, key);
  return typeof value === "string" ? value : undefined;
}

export function getNumber(obj: unknown, key: string): number | undefined {
  const value = getField(obj, key);
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

export function getArray(obj: unknown, key: string): unknown[] {
  const value = getField(obj, key);
  return Array.isArray(value) ? value : [];
}
