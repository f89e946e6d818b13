import { InvalidOperationError } from '../errors/bench-error.js';
import type { JsonDocument, JsonValue } from './document.js';

/**
 * Operation kinds
 */
export type OperationType = 'insert' | 'read' | 'update' | 'delete' | 'aggregate';

/**
 * Read preference for replica set deployments
 */
export type ReadPreference =
  | 'primary'
  | 'primaryPreferred'
  | 'secondary'
  | 'secondaryPreferred'
  | 'nearest';

interface OperationBase<K extends OperationType> {
  readonly type: K;
  /** Caller-assigned id used to correlate timing events and results */
  readonly id: string;
}

export interface InsertOperation extends OperationBase<'insert'> {
  readonly document: Readonly<JsonDocument>;
}

export interface ReadOperation extends OperationBase<'read'> {
  readonly documentId: string;
  /** Dotted paths to retrieve; empty means the full document */
  readonly projectionPaths: readonly string[];
  readonly readPreference: ReadPreference;
}

export interface UpdateOperation extends OperationBase<'update'> {
  readonly documentId: string;
  readonly path: string;
  readonly newValue: JsonValue;
  readonly upsert: boolean;
}

export interface DeleteOperation extends OperationBase<'delete'> {
  readonly documentId: string;
}

export interface AggregateOperation extends OperationBase<'aggregate'> {
  /** Pipeline stages as JSON text, one stage per entry */
  readonly pipelineStages: readonly string[];
  /** Request the backend's query plan instead of results */
  readonly explain: boolean;
}

/**
 * Closed set of operations an adapter executes
 */
export type Operation =
  | InsertOperation
  | ReadOperation
  | UpdateOperation
  | DeleteOperation
  | AggregateOperation;

function requireText(value: string, field: string, operationId?: string): void {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new InvalidOperationError(`${field} must be a non-empty string`, {
      field,
      ...(operationId !== undefined ? { operationId } : {}),
    });
  }
}

export function insertOperation(id: string, document: JsonDocument): InsertOperation {
  requireText(id, 'id');
  requireText(document._id, 'document._id', id);
  return Object.freeze({ type: 'insert', id, document: structuredClone(document) });
}

export function readOperation(
  id: string,
  documentId: string,
  options: { projectionPaths?: readonly string[]; readPreference?: ReadPreference } = {}
): ReadOperation {
  requireText(id, 'id');
  requireText(documentId, 'documentId', id);
  const projectionPaths = [...(options.projectionPaths ?? [])];
  projectionPaths.forEach((path, i) => requireText(path, `projectionPaths[${i}]`, id));
  return Object.freeze({
    type: 'read',
    id,
    documentId,
    projectionPaths: Object.freeze(projectionPaths),
    readPreference: options.readPreference ?? 'primary',
  });
}

/**
 * Read the whole document from the primary
 */
export function fullDocumentRead(id: string, documentId: string): ReadOperation {
  return readOperation(id, documentId);
}

/**
 * Read only the given paths from the primary
 */
export function projectedRead(id: string, documentId: string, paths: readonly string[]): ReadOperation {
  return readOperation(id, documentId, { projectionPaths: paths });
}

export function updateOperation(
  id: string,
  documentId: string,
  path: string,
  newValue: JsonValue,
  options: { upsert?: boolean } = {}
): UpdateOperation {
  requireText(id, 'id');
  requireText(documentId, 'documentId', id);
  requireText(path, 'path', id);
  return Object.freeze({
    type: 'update',
    id,
    documentId,
    path,
    newValue: structuredClone(newValue),
    upsert: options.upsert ?? false,
  });
}

export function deleteOperation(id: string, documentId: string): DeleteOperation {
  requireText(id, 'id');
  requireText(documentId, 'documentId', id);
  return Object.freeze({ type: 'delete', id, documentId });
}

export function aggregateOperation(
  id: string,
  pipelineStages: readonly string[],
  options: { explain?: boolean } = {}
): AggregateOperation {
  requireText(id, 'id');
  return Object.freeze({
    type: 'aggregate',
    id,
    pipelineStages: Object.freeze([...pipelineStages]),
    explain: options.explain ?? false,
  });
}

/**
 * True when a read retrieves only part of the document
 */
export function hasProjection(operation: ReadOperation): boolean {
  return operation.projectionPaths.length > 0;
}

/**
 * Exhaustiveness guard for switches over {@link Operation}
 */
export function assertNever(value: never): never {
  throw new InvalidOperationError(`Unsupported operation: ${JSON.stringify(value)}`);
}
