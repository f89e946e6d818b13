/**
 * Aggregation pipeline for the in-memory adapter.
 *
 * Supports `$match`, `$project`, `$sort`, `$skip`, `$limit` and `$count`.
 * Filters use the comparison operators `$eq`, `$ne`, `$gt`, `$gte`, `$lt`,
 * `$lte`, `$in`, `$nin` and `$exists`, plus `$and` / `$or`.
 *
 * @module pipeline
 */

import {
  getAtPath,
  isJsonObject,
  OperationError,
  toError,
  type JsonObject,
  type JsonValue,
} from '@latency-lab/core';
import type { MemoryCollection } from './store.js';

export type PipelineStage =
  | { kind: '$match'; filter: JsonObject }
  | { kind: '$project'; paths: string[]; includeId: boolean }
  | { kind: '$sort'; keys: { path: string; direction: 1 | -1 }[] }
  | { kind: '$skip'; count: number }
  | { kind: '$limit'; count: number }
  | { kind: '$count'; field: string };

const COMPARISON_OPERATORS = new Set(['$eq', '$ne', '$gt', '$gte', '$lt', '$lte', '$in', '$nin', '$exists']);

function invalidPipeline(operationId: string, message: string, cause?: Error): OperationError {
  return new OperationError(operationId, 'aggregate', message, { code: 'BENCH_O303', cause });
}

function isOperatorObject(value: JsonValue): value is JsonObject {
  return isJsonObject(value) && Object.keys(value).some((key) => key.startsWith('$'));
}

function validateFilter(operationId: string, filter: JsonObject): void {
  for (const [key, condition] of Object.entries(filter)) {
    if (key === '$and' || key === '$or') {
      if (!Array.isArray(condition) || condition.length === 0) {
        throw invalidPipeline(operationId, `${key} takes a non-empty array of filters`);
      }
      for (const clause of condition) {
        if (!isJsonObject(clause)) throw invalidPipeline(operationId, `${key} clauses must be objects`);
        validateFilter(operationId, clause);
      }
      continue;
    }
    if (key.startsWith('$')) {
      throw invalidPipeline(operationId, `Unsupported filter operator ${key}`);
    }
    if (!isOperatorObject(condition)) continue;

    for (const [operator, operand] of Object.entries(condition)) {
      if (!COMPARISON_OPERATORS.has(operator)) {
        throw invalidPipeline(operationId, `Unsupported comparison operator ${operator} on ${key}`);
      }
      if ((operator === '$in' || operator === '$nin') && !Array.isArray(operand)) {
        throw invalidPipeline(operationId, `${operator} on ${key} takes an array`);
      }
      if (operator === '$exists' && typeof operand !== 'boolean') {
        throw invalidPipeline(operationId, `$exists on ${key} takes a boolean`);
      }
    }
  }
}

function parseCount(operationId: string, operator: string, value: JsonValue, min: number): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    throw invalidPipeline(operationId, `${operator} takes an integer of at least ${min}`);
  }
  return value;
}

function parseStage(operationId: string, text: string, index: number): PipelineStage {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw invalidPipeline(operationId, `Stage ${index} is not valid JSON`, toError(error));
  }
  if (!isJsonObject(value)) {
    throw invalidPipeline(operationId, `Stage ${index} must be an object`);
  }
  const keys = Object.keys(value);
  if (keys.length !== 1) {
    throw invalidPipeline(operationId, `Stage ${index} must have exactly one operator, got ${keys.length}`);
  }

  const [operator] = keys;
  const argument = value[operator];
  switch (operator) {
    case '$match':
      if (!isJsonObject(argument)) throw invalidPipeline(operationId, '$match takes a filter object');
      validateFilter(operationId, argument);
      return { kind: '$match', filter: argument };

    case '$project': {
      if (!isJsonObject(argument)) throw invalidPipeline(operationId, '$project takes an object');
      const paths: string[] = [];
      let includeId = true;
      for (const [path, flag] of Object.entries(argument)) {
        const included = flag === 1 || flag === true;
        if (path === '_id') {
          includeId = included;
        } else if (included) {
          paths.push(path);
        } else {
          throw invalidPipeline(operationId, `$project only supports inclusion, got ${path}: ${JSON.stringify(flag)}`);
        }
      }
      return { kind: '$project', paths, includeId };
    }

    case '$sort': {
      if (!isJsonObject(argument)) throw invalidPipeline(operationId, '$sort takes an object');
      const sortKeys: { path: string; direction: 1 | -1 }[] = [];
      for (const [path, direction] of Object.entries(argument)) {
        if (direction !== 1 && direction !== -1) {
          throw invalidPipeline(operationId, `$sort direction for ${path} must be 1 or -1`);
        }
        sortKeys.push({ path, direction });
      }
      if (sortKeys.length === 0) throw invalidPipeline(operationId, '$sort needs at least one key');
      return { kind: '$sort', keys: sortKeys };
    }

    case '$skip':
      return { kind: '$skip', count: parseCount(operationId, operator, argument, 0) };

    case '$limit':
      return { kind: '$limit', count: parseCount(operationId, operator, argument, 1) };

    case '$count':
      if (typeof argument !== 'string' || argument === '' || argument.startsWith('$') || argument.includes('.')) {
        throw invalidPipeline(operationId, '$count takes a plain field name');
      }
      return { kind: '$count', field: argument };

    default:
      throw invalidPipeline(operationId, `Unsupported pipeline stage ${operator}`);
  }
}

/**
 * Parse every stage before any runs
 *
 * @throws OperationError with code BENCH_O303 for the first bad stage
 */
export function parsePipeline(operationId: string, stages: readonly string[]): PipelineStage[] {
  return stages.map((text, index) => parseStage(operationId, text, index));
}

// ── Matching ───────────────────────────────────────────────────────────

export function isEqual(a: JsonValue | undefined, b: JsonValue | undefined): boolean {
  if (a === b) return true;
  if (a === undefined || b === undefined || a === null || b === null) return false;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, index) => isEqual(item, b[index]));
  }

  if (isJsonObject(a) && isJsonObject(b)) {
    const aKeys = Object.keys(a);
    if (aKeys.length !== Object.keys(b).length) return false;
    return aKeys.every((key) => isEqual(a[key], b[key]));
  }

  return false;
}

/**
 * Order two values. Missing values and null sort first; values of different
 * types compare equal.
 */
export function compareValues(a: JsonValue | undefined, b: JsonValue | undefined): number {
  if (a === b) return 0;
  if (a === null || a === undefined) return -1;
  if (b === null || b === undefined) return 1;

  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'boolean' && typeof b === 'boolean') return a === b ? 0 : a ? 1 : -1;
  return 0;
}

function comparable(a: JsonValue | undefined, b: JsonValue): boolean {
  return (typeof a === 'number' && typeof b === 'number') || (typeof a === 'string' && typeof b === 'string');
}

export function matchesCondition(value: JsonValue | undefined, condition: JsonValue): boolean {
  if (!isOperatorObject(condition)) {
    return isEqual(value, condition);
  }

  for (const [operator, operand] of Object.entries(condition)) {
    switch (operator) {
      case '$eq':
        if (!isEqual(value, operand)) return false;
        break;
      case '$ne':
        if (isEqual(value, operand)) return false;
        break;
      case '$gt':
        if (!comparable(value, operand) || compareValues(value, operand) <= 0) return false;
        break;
      case '$gte':
        if (!comparable(value, operand) || compareValues(value, operand) < 0) return false;
        break;
      case '$lt':
        if (!comparable(value, operand) || compareValues(value, operand) >= 0) return false;
        break;
      case '$lte':
        if (!comparable(value, operand) || compareValues(value, operand) > 0) return false;
        break;
      case '$in':
        if (!Array.isArray(operand) || !operand.some((candidate) => isEqual(value, candidate))) return false;
        break;
      case '$nin':
        if (Array.isArray(operand) && operand.some((candidate) => isEqual(value, candidate))) return false;
        break;
      case '$exists':
        if ((value !== undefined) !== (operand === true)) return false;
        break;
      default:
        return false;
    }
  }
  return true;
}

export function matchesFilter(doc: JsonObject, filter: JsonObject): boolean {
  for (const [key, condition] of Object.entries(filter)) {
    if (key === '$and') {
      if (!Array.isArray(condition) || !condition.every((c) => isJsonObject(c) && matchesFilter(doc, c))) return false;
    } else if (key === '$or') {
      if (!Array.isArray(condition) || !condition.some((c) => isJsonObject(c) && matchesFilter(doc, c))) return false;
    } else if (!matchesCondition(getAtPath(doc, key), condition)) {
      return false;
    }
  }
  return true;
}

// ── Execution ──────────────────────────────────────────────────────────

export function applyStage(docs: JsonObject[], stage: PipelineStage): JsonObject[] {
  switch (stage.kind) {
    case '$match':
      return docs.filter((doc) => matchesFilter(doc, stage.filter));

    case '$project':
      // Projected fields are keyed by their full path.
      return docs.map((doc) => {
        const projected: JsonObject = {};
        if (stage.includeId && doc._id !== undefined) projected._id = doc._id;
        for (const path of stage.paths) {
          const value = getAtPath(doc, path);
          if (value !== undefined) projected[path] = value;
        }
        return projected;
      });

    case '$sort':
      return [...docs].sort((a, b) => {
        for (const { path, direction } of stage.keys) {
          const comparison = compareValues(getAtPath(a, path), getAtPath(b, path));
          if (comparison !== 0) return comparison * direction;
        }
        return 0;
      });

    case '$skip':
      return docs.slice(stage.count);

    case '$limit':
      return docs.slice(0, stage.count);

    case '$count':
      return [{ [stage.field]: docs.length }];
  }
}

// ── Access planning ────────────────────────────────────────────────────

/**
 * How candidate documents are found before the pipeline runs
 */
export interface AccessPlan {
  stage: 'IDHACK' | 'IXSCAN' | 'COLLSCAN';
  indexName?: string;
  ids: string[];
}

/**
 * Top-level paths a filter pins to a single value
 */
export function equalityFields(filter: JsonObject): Map<string, JsonValue> {
  const fields = new Map<string, JsonValue>();
  for (const [path, condition] of Object.entries(filter)) {
    if (path.startsWith('$')) continue;
    if (!isOperatorObject(condition)) {
      fields.set(path, condition);
    } else if (Object.keys(condition).length === 1 && condition.$eq !== undefined) {
      fields.set(path, condition.$eq);
    }
  }
  return fields;
}

/**
 * Choose an access path from a leading `$match`: `_id` lookup, then the
 * widest covering index, then a full scan
 */
export function planAccess(collection: MemoryCollection, stages: readonly PipelineStage[]): AccessPlan {
  const first = stages.at(0);
  if (first?.kind === '$match') {
    const equalities = equalityFields(first.filter);
    const id = equalities.get('_id');
    if (typeof id === 'string') {
      return { stage: 'IDHACK', ids: collection.has(id) ? [id] : [] };
    }
    const hit = collection.findIndex(equalities);
    if (hit) {
      return { stage: 'IXSCAN', indexName: hit.name, ids: hit.ids };
    }
  }
  return { stage: 'COLLSCAN', ids: collection.ids() };
}
