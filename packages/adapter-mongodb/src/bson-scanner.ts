/**
 * Sequential field lookup over encoded BSON.
 *
 * A BSON document stores its elements back to back with no index, so finding
 * a field means reading every element name before it and skipping over each
 * value. The scanner does exactly that and reports the ordinal position at
 * which each requested field was found, which is what makes late fields
 * expensive to reach.
 *
 * @module bson-scanner
 */

import { parsePath, type TraversalTimer } from '@latency-lab/core';

export const BSON_DOUBLE = 0x01;
export const BSON_STRING = 0x02;
export const BSON_DOCUMENT = 0x03;
export const BSON_ARRAY = 0x04;

export interface ScannedElement {
  readonly type: number;
  /** Offset of the element's value */
  readonly valueOffset: number;
  /** Zero-based index of the element within its document */
  readonly ordinal: number;
}

function malformed(reason: string): Error {
  return new Error(`Malformed BSON: ${reason}`);
}

function readInt32(bytes: Uint8Array, offset: number): number {
  if (offset + 4 > bytes.length) throw malformed(`truncated length at offset ${offset}`);
  return bytes[offset] | (bytes[offset + 1] << 8) | (bytes[offset + 2] << 16) | (bytes[offset + 3] << 24);
}

function cstringEnd(bytes: Uint8Array, offset: number): number {
  const end = bytes.indexOf(0, offset);
  if (end < 0) throw malformed(`unterminated string at offset ${offset}`);
  return end;
}

/**
 * Encoded size of a value of the given element type
 */
function valueSize(bytes: Uint8Array, type: number, offset: number): number {
  switch (type) {
    case BSON_DOUBLE:
    case 0x09: // UTC datetime
    case 0x11: // timestamp
    case 0x12: // int64
      return 8;
    case BSON_STRING:
    case 0x0d: // JavaScript code
    case 0x0e: // symbol
      return 4 + readInt32(bytes, offset);
    case BSON_DOCUMENT:
    case BSON_ARRAY:
    case 0x0f: // code with scope
      return readInt32(bytes, offset);
    case 0x05: // binary: length, subtype, bytes
      return 5 + readInt32(bytes, offset);
    case 0x06: // undefined
    case 0x0a: // null
    case 0x7f: // max key
    case 0xff: // min key
      return 0;
    case 0x07: // object id
      return 12;
    case 0x08: // boolean
      return 1;
    case 0x0b: // regex: pattern and flags
      return cstringEnd(bytes, cstringEnd(bytes, offset) + 1) + 1 - offset;
    case 0x0c: // DB pointer
      return 4 + readInt32(bytes, offset) + 12;
    case 0x10: // int32
      return 4;
    case 0x13: // decimal128
      return 16;
    default:
      throw malformed(`unknown element type 0x${type.toString(16)} at offset ${offset}`);
  }
}

function nameEquals(bytes: Uint8Array, start: number, end: number, name: Uint8Array): boolean {
  if (end - start !== name.length) return false;
  for (let i = 0; i < name.length; i++) {
    if (bytes[start + i] !== name[i]) return false;
  }
  return true;
}

/**
 * Scan the document starting at `documentOffset` for an element name
 */
export function findElement(bytes: Uint8Array, documentOffset: number, name: string): ScannedElement | undefined {
  const target = Buffer.from(name, 'utf8');
  const end = documentOffset + readInt32(bytes, documentOffset) - 1;
  if (end >= bytes.length) throw malformed(`document at offset ${documentOffset} overruns the buffer`);

  let offset = documentOffset + 4;
  let ordinal = 0;
  while (offset < end) {
    const type = bytes[offset];
    const nameEnd = cstringEnd(bytes, offset + 1);
    const valueOffset = nameEnd + 1;
    if (nameEquals(bytes, offset + 1, nameEnd, target)) {
      return { type, valueOffset, ordinal };
    }
    offset = valueOffset + valueSize(bytes, type, valueOffset);
    ordinal++;
  }
  return undefined;
}

/**
 * Locate one path, reporting nesting and array access to the timer.
 * Returns the ordinal of the last segment within its parent, or -1.
 */
export function scanPath(timer: TraversalTimer, operationId: string, bytes: Uint8Array, path: string): number {
  const segments = parsePath(path);
  const exits: (() => void)[] = [];
  let offset = 0;
  let arrayName: string | undefined;

  try {
    for (let i = 0; i < segments.length; i++) {
      const name = String(segments[i]);
      const element = findElement(bytes, offset, name);
      if (!element) return -1;
      if (arrayName !== undefined) {
        timer.recordArrayElementAccess(operationId, arrayName, Number(name));
      }
      if (i === segments.length - 1) return element.ordinal;

      if (element.type === BSON_DOCUMENT) {
        timer.enterNestedDocument(operationId, name);
        exits.push(() => timer.exitNestedDocument(operationId));
        arrayName = undefined;
      } else if (element.type === BSON_ARRAY) {
        timer.enterArray(operationId, name);
        exits.push(() => timer.exitArray(operationId));
        arrayName = name;
      } else {
        return -1;
      }
      offset = element.valueOffset;
    }
    return -1;
  } finally {
    for (const exit of exits.reverse()) exit();
  }
}

/**
 * Sequential-scan projection: every path is located by walking the encoded
 * document from its first element. Returns each path's ordinal position.
 */
export function scanProjection(
  timer: TraversalTimer,
  operationId: string,
  bytes: Uint8Array,
  paths: readonly string[]
): Map<string, number> {
  const positions = new Map<string, number>();
  timer.startDeserialization(operationId);

  try {
    for (const path of paths) {
      const position = scanPath(timer, operationId, bytes, path);
      timer.recordFieldAccess(operationId, path, position);
      positions.set(path, position);
    }
    timer.endDeserialization(operationId);
  } finally {
    timer.clear(operationId);
  }
  return positions;
}
