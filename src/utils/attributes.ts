// src/utils/attributes.ts
// Read-only accessors over the loosely typed JSON the API server returns.

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getPath(obj: JsonObject, path: readonly string[]): JsonValue | undefined {
  let current: JsonValue | undefined = obj;
  for (const segment of path) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

export function getString(obj: JsonObject, ...path: string[]): string | undefined {
  const value = getPath(obj, path);
  return typeof value === 'string' ? value : undefined;
}

export function getNumber(obj: JsonObject, ...path: string[]): number | undefined {
  const value = getPath(obj, path);
  return typeof value === 'number' ? value : undefined;
}

export function getBoolean(obj: JsonObject, ...path: string[]): boolean | undefined {
  const value = getPath(obj, path);
  return typeof value === 'boolean' ? value : undefined;
}

export function getRecord(obj: JsonObject, ...path: string[]): JsonObject | undefined {
  const value = getPath(obj, path);
  return isRecord(value) ? value : undefined;
}

export function getArray(obj: JsonObject, ...path: string[]): JsonValue[] {
  const value = getPath(obj, path);
  return Array.isArray(value) ? value : [];
}

/** Elements of an array attribute that are objects */
export function getRecords(obj: JsonObject, ...path: string[]): JsonObject[] {
  return getArray(obj, ...path).filter(isRecord);
}
