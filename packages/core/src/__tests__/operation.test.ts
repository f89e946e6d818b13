import { describe, expect, it } from 'vitest';
import { InvalidOperationError } from '../errors/bench-error.js';
import { countFields, getAtPath, parsePath, setAtPath, type JsonObject } from '../types/document.js';
import {
  aggregateOperation,
  deleteOperation,
  fullDocumentRead,
  hasProjection,
  insertOperation,
  projectedRead,
  readOperation,
  updateOperation,
} from '../types/operation.js';

describe('operations', () => {
  it('should build a full-document read from the primary', () => {
    const op = fullDocumentRead('op-1', 'doc-1');
    expect(op).toEqual({
      type: 'read',
      id: 'op-1',
      documentId: 'doc-1',
      projectionPaths: [],
      readPreference: 'primary',
    });
    expect(hasProjection(op)).toBe(false);
  });

  it('should copy projection paths', () => {
    const paths = ['customer.name', 'items[0].sku'];
    const op = projectedRead('op-1', 'doc-1', paths);
    paths.push('extra');

    expect(op.projectionPaths).toEqual(['customer.name', 'items[0].sku']);
    expect(hasProjection(op)).toBe(true);
    expect(Object.isFrozen(op.projectionPaths)).toBe(true);
  });

  it('should honour an explicit read preference', () => {
    expect(readOperation('op-1', 'doc-1', { readPreference: 'nearest' }).readPreference).toBe('nearest');
  });

  it('should snapshot inserted documents', () => {
    const doc = { _id: 'doc-1', nested: { value: 1 } };
    const op = insertOperation('op-1', doc);
    doc.nested.value = 2;

    expect(op.document).toEqual({ _id: 'doc-1', nested: { value: 1 } });
  });

  it('should default update to no upsert', () => {
    const op = updateOperation('op-1', 'doc-1', 'status', 'shipped');
    expect(op.upsert).toBe(false);
    expect(updateOperation('op-2', 'doc-1', 'status', 'shipped', { upsert: true }).upsert).toBe(true);
  });

  it('should build delete and aggregate operations', () => {
    expect(deleteOperation('op-1', 'doc-1')).toEqual({ type: 'delete', id: 'op-1', documentId: 'doc-1' });
    const agg = aggregateOperation('op-2', ['{"$match":{"status":"open"}}']);
    expect(agg.explain).toBe(false);
    expect(agg.pipelineStages).toHaveLength(1);
  });

  it.each([
    ['empty id', () => fullDocumentRead('', 'doc-1')],
    ['blank document id', () => deleteOperation('op-1', '   ')],
    ['empty update path', () => updateOperation('op-1', 'doc-1', '', 1)],
    ['empty projection path', () => projectedRead('op-1', 'doc-1', ['ok', ''])],
    ['empty document _id', () => insertOperation('op-1', { _id: '' })],
  ])('should reject an %s', (_label, build) => {
    expect(build).toThrow(InvalidOperationError);
  });
});

describe('document paths', () => {
  const doc: JsonObject = {
    _id: 'doc-1',
    customer: { name: 'Ada', address: { city: 'Leeds' } },
    items: [{ sku: 'a-1' }, { sku: 'b-2' }],
  };

  it('should parse bracket and dotted indices alike', () => {
    expect(parsePath('items[1].sku')).toEqual(['items', 1, 'sku']);
    expect(parsePath('items.1.sku')).toEqual(['items', 1, 'sku']);
  });

  it('should resolve nested values', () => {
    expect(getAtPath(doc, 'customer.address.city')).toBe('Leeds');
    expect(getAtPath(doc, 'items[1].sku')).toBe('b-2');
    expect(getAtPath(doc, 'customer.phone')).toBeUndefined();
    expect(getAtPath(doc, 'items[5].sku')).toBeUndefined();
  });

  it('should set values and create intermediate objects', () => {
    const target: JsonObject = { _id: 'doc-1', items: [{ sku: 'a-1' }] };

    expect(setAtPath(target, 'shipping.method', 'air')).toBe(true);
    expect(setAtPath(target, 'items[0].sku', 'z-9')).toBe(true);
    expect(target).toEqual({ _id: 'doc-1', items: [{ sku: 'z-9' }], shipping: { method: 'air' } });
  });

  it('should refuse to descend through a scalar', () => {
    const target: JsonObject = { _id: 'doc-1', status: 'open' };
    expect(setAtPath(target, 'status.code', 1)).toBe(false);
  });

  it('should count fields at every depth', () => {
    // _id, customer, name, address, city, items, sku, sku
    expect(countFields(doc)).toBe(8);
  });
});
