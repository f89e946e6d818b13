import type { CommandFailure, CommandStart, JsonDocument, JsonObject, ReadPreference } from '@latency-lab/core';

/**
 * Settings a driver is created with, after validation and defaults
 */
export interface MongoDriverSettings {
  uri: string;
  database: string;
  username?: string;
  password?: string;
  maxPoolSize: number;
  minPoolSize: number;
  connectTimeoutMs: number;
  readPreference: ReadPreference;
  writeConcern: number | 'majority';
}

/**
 * Command-monitoring callbacks. `started` carries the issuing operation id
 * when the command was sent with one as its comment.
 */
export interface MongoCommandObserver {
  started(event: CommandStart): void;
  succeeded(event: { readonly requestId: number; readonly durationMs: number }): void;
  failed(event: CommandFailure): void;
}

export interface MongoCommandOptions {
  /** Sent as the command comment so monitoring events carry it back */
  comment: string;
}

export interface MongoFindOptions extends MongoCommandOptions {
  projection?: Record<string, 1>;
  readPreference: ReadPreference;
}

export interface MongoUpdateOptions extends MongoCommandOptions {
  upsert: boolean;
}

export interface MongoUpdateResult {
  matchedCount: number;
  modifiedCount: number;
  upsertedCount: number;
}

/**
 * MongoDB driver interface (abstraction over the `mongodb` client).
 *
 * Reads and aggregates return raw BSON so the adapter can time decoding and
 * walk the encoded bytes itself.
 */
export interface MongoDriver {
  /** Connect and round-trip a ping */
  ping(): Promise<void>;

  findRawById(collection: string, id: string, options: MongoFindOptions): Promise<Uint8Array | null>;

  insertOne(collection: string, document: JsonDocument, options: MongoCommandOptions): Promise<void>;

  /** `$set` the given dotted paths on one document */
  updateOne(collection: string, id: string, set: JsonObject, options: MongoUpdateOptions): Promise<MongoUpdateResult>;

  /** Returns the number of documents deleted */
  deleteOne(collection: string, id: string, options: MongoCommandOptions): Promise<number>;

  aggregateRaw(collection: string, pipeline: readonly JsonObject[], options: MongoCommandOptions): Promise<Uint8Array[]>;

  explainFind(collection: string, id: string): Promise<unknown>;

  /** Pass `options` when the explain is timed as a benchmark operation */
  explainAggregate(collection: string, pipeline: readonly JsonObject[], options?: MongoCommandOptions): Promise<unknown>;

  createIndex(collection: string, keys: Record<string, 1>, name?: string): Promise<string>;

  /** Resolves false when the collection did not exist */
  dropCollection(collection: string): Promise<boolean>;

  /** Subscribe to command monitoring; returns the unsubscribe function */
  observe(observer: MongoCommandObserver): () => void;

  isOpen(): boolean;

  close(): Promise<void>;
}

export type MongoDriverFactory = (settings: MongoDriverSettings) => MongoDriver;
