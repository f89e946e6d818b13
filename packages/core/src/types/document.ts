/**
 * JSON value that can be stored in a benchmark document
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

/**
 * JSON object
 */
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Base document interface that all workload documents extend
 */
export interface JsonDocument extends JsonObject {
  /** Unique document identifier */
  _id: string;
}

/**
 * Narrow an unknown value to a JSON object (not an array, not null)
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrow an unknown value to a document with a string `_id`
 */
export function isJsonDocument(value: unknown): value is JsonDocument {
  return isJsonObject(value) && typeof value._id === 'string';
}

/**
 * Split a dotted projection path into segments.
 *
 * Array indices may be written either as `items[2]` or `items.2`; both
 * produce `['items', 2]`.
 */
export function parsePath(path: string): (string | number)[] {
  const segments: (string | number)[] = [];
  for (const part of path.split('.')) {
    const match = /^([^[\]]*)((?:\[\d+\])*)$/.exec(part);
    if (!match) {
      segments.push(part);
      continue;
    }
    const [, name = '', indices = ''] = match;
    if (name !== '') {
      segments.push(/^\d+$/.test(name) ? Number(name) : name);
    }
    for (const index of indices.matchAll(/\[(\d+)\]/g)) {
      segments.push(Number(index[1]));
    }
  }
  return segments;
}

/**
 * Resolve a dotted path inside a JSON value. Returns `undefined` when any
 * segment is absent.
 */
export function getAtPath(value: JsonValue, path: string): JsonValue | undefined {
  let current: JsonValue | undefined = value;
  for (const segment of parsePath(path)) {
    if (current === undefined) return undefined;
    if (typeof segment === 'number') {
      current = Array.isArray(current) ? current[segment] : undefined;
    } else {
      current = isJsonObject(current) ? current[segment] : undefined;
    }
  }
  return current;
}

/**
 * Write `newValue` at a dotted path, creating intermediate objects as needed.
 * Returns false when the path crosses a scalar or indexes past an array's end.
 */
export function setAtPath(target: JsonObject, path: string, newValue: JsonValue): boolean {
  const segments = parsePath(path);
  if (segments.length === 0) return false;

  let current: JsonValue = target;
  for (let i = 0; i < segments.length - 1; i++) {
    const segment = segments[i];
    const nextIsIndex = typeof segments[i + 1] === 'number';
    if (typeof segment === 'number') {
      if (!Array.isArray(current) || segment >= current.length) return false;
      current = current[segment] ?? null;
    } else if (isJsonObject(current)) {
      const child: JsonValue | undefined = current[segment];
      if (child === undefined || child === null) {
        const created: JsonValue = nextIsIndex ? [] : {};
        current[segment] = created;
        current = created;
      } else {
        current = child;
      }
    } else {
      return false;
    }
  }

  const last = segments[segments.length - 1];
  if (typeof last === 'number') {
    if (!Array.isArray(current) || last > current.length) return false;
    current[last] = newValue;
    return true;
  }
  if (last === undefined || !isJsonObject(current)) return false;
  current[last] = newValue;
  return true;
}

/**
 * Number of object fields in a value, counted at every depth
 */
export function countFields(value: JsonValue): number {
  if (Array.isArray(value)) {
    return value.reduce<number>((sum, item) => sum + countFields(item), 0);
  }
  if (isJsonObject(value)) {
    let count = 0;
    for (const child of Object.values(value)) {
      count += 1 + countFields(child);
    }
    return count;
  }
  return 0;
}
