import { SerializationError } from './errors';

/**
 * Any value that survives a JSON round trip unchanged
 */
export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Checks for an object created by a literal or `Object.create(null)`
 */
export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Narrows a value to `JsonValue`, rebuilding arrays and objects along the way
 * @param value Value to check
 * @param path Location of the value, reported in the error
 * @throws SerializationError for functions, symbols, bigint, undefined,
 * non-finite numbers, class instances and cycles
 */
export function toJsonValue(value: unknown, path: string, seen: Set<object> = new Set()): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new SerializationError(`Number ${value} is not JSON-compatible`, path);
    }
    return value;
  }

  if (Array.isArray(value)) {
    if (seen.has(value)) {
      throw new SerializationError('Circular reference', path);
    }
    seen.add(value);
    const items = value.map((item: unknown, index) => toJsonValue(item, `${path}[${index}]`, seen));
    seen.delete(value);
    return items;
  }

  if (isPlainRecord(value)) {
    if (seen.has(value)) {
      throw new SerializationError('Circular reference', path);
    }
    seen.add(value);
    const result: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = toJsonValue(item, `${path}.${key}`, seen);
    }
    seen.delete(value);
    return result;
  }

  const kind = value !== null && typeof value === 'object' ? value.constructor.name : typeof value;
  throw new SerializationError(`Value of type ${kind} is not JSON-compatible`, path);
}

/**
 * Narrows every entry of a mapping to `JsonValue`
 */
export function toJsonObject(value: Readonly<Record<string, unknown>>, path: string): JsonObject {
  const result: JsonObject = {};
  for (const [key, item] of Object.entries(value)) {
    result[key] = toJsonValue(item, `${path}.${key}`);
  }
  return result;
}
