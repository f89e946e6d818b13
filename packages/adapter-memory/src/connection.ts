import { BaseInstrumentedConnection, type BaseConnectionOptions } from '@latency-lab/core';
import type { MemoryDatabase } from './store.js';

export interface MemoryConnectionOptions extends BaseConnectionOptions {
  database: MemoryDatabase;
  /** Documents allowed per collection; 0 means no limit */
  maxDocuments?: number;
}

/**
 * Session on an in-process database. Closing it leaves the data in place for
 * other connections to the same database.
 */
export class MemoryConnection extends BaseInstrumentedConnection {
  readonly database: MemoryDatabase;
  readonly maxDocuments: number;

  constructor(options: MemoryConnectionOptions) {
    super(options);
    this.database = options.database;
    this.maxDocuments = options.maxDocuments ?? 0;
  }

  protected closeBackend(): Promise<void> {
    return Promise.resolve();
  }
}
