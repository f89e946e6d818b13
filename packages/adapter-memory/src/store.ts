import { getAtPath, type IndexDefinition, type JsonObject, type JsonValue } from '@latency-lab/core';

/**
 * Index definition after defaults are applied
 */
export interface NormalizedIndex {
  name: string;
  fields: string[];
}

/**
 * Hash index over one or more document paths
 */
class MemoryIndex {
  readonly definition: NormalizedIndex;

  private entries = new Map<string, Set<string>>();
  private keysById = new Map<string, string>();

  constructor(definition: NormalizedIndex) {
    this.definition = definition;
  }

  add(id: string, doc: JsonObject): void {
    this.remove(id);
    const key = this.keyOf(this.definition.fields.map((field) => getAtPath(doc, field)));

    let ids = this.entries.get(key);
    if (!ids) {
      ids = new Set();
      this.entries.set(key, ids);
    }
    ids.add(id);
    this.keysById.set(id, key);
  }

  remove(id: string): void {
    const key = this.keysById.get(id);
    if (key === undefined) return;

    this.keysById.delete(id);
    const ids = this.entries.get(key);
    if (ids) {
      ids.delete(id);
      if (ids.size === 0) {
        this.entries.delete(key);
      }
    }
  }

  /**
   * Ids whose indexed values equal `values`, in field order
   */
  lookup(values: (JsonValue | undefined)[]): string[] {
    const ids = this.entries.get(this.keyOf(values));
    return ids ? Array.from(ids) : [];
  }

  clear(): void {
    this.entries.clear();
    this.keysById.clear();
  }

  private keyOf(values: (JsonValue | undefined)[]): string {
    return values.map((v) => serializeValue(v)).join('|');
  }
}

function serializeValue(value: JsonValue | undefined): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (typeof value === 'string') return `s:${value}`;
  if (typeof value === 'number') return `n:${value}`;
  if (typeof value === 'boolean') return `b:${value}`;
  return `j:${JSON.stringify(value)}`;
}

function normalizeIndex(index: IndexDefinition): NormalizedIndex {
  return {
    name: index.name ?? `idx_${index.fields.join('_').replace(/\W/g, '_')}`,
    fields: [...index.fields],
  };
}

/**
 * One collection: encoded documents keyed by `_id` plus secondary indexes.
 *
 * Documents are held as JSON text so every read pays a decode, the way a
 * client pays to deserialize a reply.
 */
export class MemoryCollection {
  readonly name: string;

  private documents = new Map<string, string>();
  private indexes = new Map<string, MemoryIndex>();

  constructor(name: string) {
    this.name = name;
  }

  get size(): number {
    return this.documents.size;
  }

  has(id: string): boolean {
    return this.documents.has(id);
  }

  get(id: string): string | undefined {
    return this.documents.get(id);
  }

  ids(): string[] {
    return Array.from(this.documents.keys());
  }

  /**
   * Store an encoded document and refresh every index from its decoded form
   */
  put(id: string, encoded: string, decoded: JsonObject): void {
    this.documents.set(id, encoded);
    for (const index of this.indexes.values()) {
      index.add(id, decoded);
    }
  }

  delete(id: string): boolean {
    if (!this.documents.delete(id)) return false;
    for (const index of this.indexes.values()) {
      index.remove(id);
    }
    return true;
  }

  createIndex(definition: IndexDefinition, decode: (encoded: string) => JsonObject): NormalizedIndex {
    const normalized = normalizeIndex(definition);
    const index = new MemoryIndex(normalized);
    for (const [id, encoded] of this.documents) {
      index.add(id, decode(encoded));
    }
    this.indexes.set(normalized.name, index);
    return normalized;
  }

  getIndexes(): NormalizedIndex[] {
    return Array.from(this.indexes.values()).map((idx) => idx.definition);
  }

  /**
   * An index whose every field is constrained by `equalities`, preferring
   * the one covering the most fields
   */
  findIndex(equalities: ReadonlyMap<string, JsonValue>): { name: string; ids: string[] } | undefined {
    let best: MemoryIndex | undefined;
    for (const index of this.indexes.values()) {
      const covered = index.definition.fields.every((field) => equalities.has(field));
      if (covered && (!best || index.definition.fields.length > best.definition.fields.length)) {
        best = index;
      }
    }
    if (!best) return undefined;
    return {
      name: best.definition.name,
      ids: best.lookup(best.definition.fields.map((field) => equalities.get(field))),
    };
  }

  clear(): void {
    this.documents.clear();
    for (const index of this.indexes.values()) {
      index.clear();
    }
  }
}

/**
 * Named collections shared by every connection to the same database
 */
export class MemoryDatabase {
  readonly name: string;

  private collections = new Map<string, MemoryCollection>();

  constructor(name: string) {
    this.name = name;
  }

  collection(name: string): MemoryCollection {
    let collection = this.collections.get(name);
    if (!collection) {
      collection = new MemoryCollection(name);
      this.collections.set(name, collection);
    }
    return collection;
  }

  hasCollection(name: string): boolean {
    return this.collections.has(name);
  }

  listCollections(): string[] {
    return Array.from(this.collections.keys());
  }

  dropCollection(name: string): boolean {
    const collection = this.collections.get(name);
    if (!collection) return false;
    collection.clear();
    this.collections.delete(name);
    return true;
  }
}
