import type { JsonObject, JsonValue } from '../types/common.js';

export function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Flattens tables of records found anywhere in a JSON value.
 *
 * An array whose elements are all objects is read as a list of records, and
 * each record's nested objects are collapsed into dotted keys:
 *
 * ```ts
 * flattenJson({ data: [{ id: 'ft-1', hyperparams: { n_epochs: 4 } }] });
 * // => { data: [{ id: 'ft-1', 'hyperparams.n_epochs': 4 }] }
 * ```
 *
 * Objects outside such arrays keep their shape, so an error body still
 * reads as `error.message`.
 */
export function flattenJson(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    const records = value.filter(isJsonObject);
    if (records.length > 0 && records.length === value.length) {
      return records.map((record) => flattenRecord(record));
    }
    return value.map(flattenJson);
  }

  if (isJsonObject(value)) {
    const result: JsonObject = {};
    for (const [key, child] of Object.entries(value)) {
      setEntry(result, key, flattenJson(child));
    }
    return result;
  }

  return value;
}

export function flattenRecord(record: JsonObject, prefix = '', into: JsonObject = {}): JsonObject {
  for (const [key, child] of Object.entries(record)) {
    const path = prefix ? `${prefix}.${key}` : key;
    if (isJsonObject(child) && Object.keys(child).length > 0) {
      flattenRecord(child, path, into);
    } else {
      setEntry(into, path, flattenJson(child));
    }
  }
  return into;
}

// Defines an own property, so a `__proto__` key is stored like any other.
function setEntry(target: JsonObject, key: string, value: JsonValue): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}
