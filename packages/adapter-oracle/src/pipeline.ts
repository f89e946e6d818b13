import { type AggregateOperation, isJsonObject, type JsonObject, OperationError, toError } from '@latency-lab/core';
import type { DocumentQuery } from './sql.js';

type StageName = '$match' | '$sort' | '$skip' | '$limit';

/** Stages in the only order one SELECT can express */
const STAGE_ORDER: readonly StageName[] = ['$match', '$sort', '$skip', '$limit'];

function isStageName(name: string): name is StageName {
  return STAGE_ORDER.some((stage) => stage === name);
}

function parseStage(op: AggregateOperation, text: string, index: number): { name: string; body: unknown } {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw invalid(op, index, `Stage ${index} is not valid JSON`, toError(error));
  }
  if (!isJsonObject(value)) throw invalid(op, index, `Stage ${index} must be an object`);
  const entries = Object.entries(value);
  const [entry] = entries;
  if (entries.length !== 1 || !entry) {
    throw invalid(op, index, `Stage ${index} must have exactly one operator, got ${entries.length}`);
  }
  return { name: entry[0], body: entry[1] };
}

function invalid(op: AggregateOperation, stage: number, message: string, cause?: Error): OperationError {
  return new OperationError(op.id, op.type, message, {
    code: 'BENCH_O303',
    ...(cause ? { cause } : {}),
    context: { stage },
  });
}

function count(op: AggregateOperation, index: number, name: string, body: unknown): number {
  if (typeof body !== 'number' || !Number.isInteger(body) || body < 0) {
    throw invalid(op, index, `Stage ${index}: ${name} must be a non-negative integer`);
  }
  return body;
}

function fields(op: AggregateOperation, index: number, name: string, body: unknown): JsonObject {
  if (!isJsonObject(body)) throw invalid(op, index, `Stage ${index}: ${name} must be an object`);
  return body;
}

/**
 * Translate an aggregation pipeline into one document query.
 *
 * Supports `$match` on scalar equality, `$sort`, `$skip` and `$limit`, in
 * that order; consecutive `$match` stages are combined.
 *
 * @throws OperationError with code BENCH_O303 for the first stage that cannot be translated
 */
export function translatePipeline(op: AggregateOperation): DocumentQuery {
  const where: { path: string; value: string | number | boolean | null }[] = [];
  const orderBy: { path: string; descending: boolean }[] = [];
  let offset: number | undefined;
  let limit: number | undefined;
  let previous: StageName | undefined;

  op.pipelineStages.forEach((text, index) => {
    const { name, body } = parseStage(op, text, index);
    if (!isStageName(name)) {
      throw invalid(op, index, `Stage ${index}: ${name} is not supported`);
    }
    if (previous && (STAGE_ORDER.indexOf(name) < STAGE_ORDER.indexOf(previous) || (name === previous && name !== '$match'))) {
      throw invalid(op, index, `Stage ${index}: ${name} cannot follow ${previous}`);
    }
    previous = name;

    switch (name) {
      case '$match':
        for (const [path, value] of Object.entries(fields(op, index, name, body))) {
          if (Array.isArray(value) || isJsonObject(value)) {
            throw invalid(op, index, `Stage ${index}: $match on ${path} supports only scalar equality`);
          }
          where.push({ path, value });
        }
        break;
      case '$sort':
        for (const [path, direction] of Object.entries(fields(op, index, name, body))) {
          if (direction !== 1 && direction !== -1) {
            throw invalid(op, index, `Stage ${index}: $sort direction for ${path} must be 1 or -1`);
          }
          orderBy.push({ path, descending: direction === -1 });
        }
        break;
      case '$skip':
        offset = count(op, index, name, body);
        break;
      case '$limit':
        limit = count(op, index, name, body);
        break;
    }
  });

  return {
    where,
    orderBy,
    ...(offset !== undefined ? { offset } : {}),
    ...(limit !== undefined ? { limit } : {}),
  };
}
