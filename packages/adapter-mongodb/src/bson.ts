import { isJsonObject, type JsonObject, type JsonValue } from '@latency-lab/core';
import { Binary, BSON, ObjectId } from 'mongodb';

/**
 * Convert a decoded BSON value to plain JSON. Object ids become hex strings,
 * dates ISO strings and binaries base64; other BSON types use their string form.
 */
export function toJsonValue(value: unknown): JsonValue {
  if (value === null || value === undefined) return null;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : null;
    case 'bigint':
      return value.toString();
    case 'object':
      break;
    default:
      return String(value);
  }

  if (Array.isArray(value)) return value.map(toJsonValue);
  if (value instanceof Date) return value.toISOString();
  if (value instanceof ObjectId) return value.toHexString();
  if (value instanceof Binary) return value.toString('base64');
  if ('_bsontype' in value) return String(value);

  const out: JsonObject = {};
  for (const [key, field] of Object.entries(value)) {
    out[key] = toJsonValue(field);
  }
  return out;
}

export function toJsonObject(value: unknown): JsonObject {
  const converted = toJsonValue(value);
  if (!isJsonObject(converted)) throw new Error('Expected a BSON document');
  return converted;
}

export function decodeDocument(bytes: Uint8Array): JsonObject {
  return toJsonObject(BSON.deserialize(bytes));
}

export function encodeDocument(doc: JsonObject): Uint8Array {
  return BSON.serialize(doc);
}

export function encodedSize(doc: JsonObject): number {
  return BSON.calculateObjectSize(doc);
}
