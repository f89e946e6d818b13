import {
  isJsonObject,
  parsePath,
  type JsonDocument,
  type JsonObject,
  type JsonValue,
  type TraversalTimer,
} from '@latency-lab/core';

/**
 * Resolve one path by direct key lookup at each level, reporting nesting and
 * array access to the timer
 */
function resolveTracked(
  timer: TraversalTimer,
  operationId: string,
  doc: JsonObject,
  path: string
): JsonValue | undefined {
  let current: JsonValue | undefined = doc;
  let parent = '';
  let depth = 0;

  for (const segment of parsePath(path)) {
    if (current === undefined) break;

    if (typeof segment === 'number') {
      if (!Array.isArray(current)) {
        current = undefined;
        break;
      }
      timer.enterArray(operationId, parent);
      timer.recordArrayElementAccess(operationId, parent, segment);
      timer.exitArray(operationId);
      current = current[segment];
    } else {
      if (!isJsonObject(current)) {
        current = undefined;
        break;
      }
      if (current !== doc) {
        timer.enterNestedDocument(operationId, parent);
        depth++;
      }
      current = current[segment];
      parent = segment;
    }
  }

  for (; depth > 0; depth--) {
    timer.exitNestedDocument(operationId);
  }
  return current;
}

/**
 * Hash-indexed projection: each requested path is found by key lookup, so its
 * cost does not depend on where the field sits in the document.
 *
 * The result keeps `_id` and keys every found value by its full path. Paths
 * that resolve to nothing are left out. A field's reported position is its
 * index in `paths`.
 */
export function projectDocument(
  timer: TraversalTimer,
  operationId: string,
  doc: JsonDocument,
  paths: readonly string[]
): JsonObject {
  timer.startDeserialization(operationId);

  const projected: JsonObject = { _id: doc._id };
  paths.forEach((path, position) => {
    const value = resolveTracked(timer, operationId, doc, path);
    timer.recordFieldAccess(operationId, path, position);
    if (value !== undefined) {
      projected[path] = value;
    }
  });

  timer.endDeserialization(operationId);
  timer.clear(operationId);
  return projected;
}
