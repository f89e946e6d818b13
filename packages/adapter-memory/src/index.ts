/**
 * @packageDocumentation
 *
 * In-memory reference adapter for latency-lab.
 *
 * Keeps documents as JSON text in process memory. Every operation pays a real
 * encode and decode, while server-side work is limited to hash lookups, so a
 * run against this adapter shows the harness's own floor.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { fullDocumentRead, runBenchmark } from '@latency-lab/core';
 * import { createMemoryAdapter } from '@latency-lab/adapter-memory';
 *
 * const report = await runBenchmark({
 *   adapter: createMemoryAdapter(),
 *   connection: { database: 'bench' },
 *   iterations: 1000,
 *   nextOperation: (i) => fullDocumentRead(`op-${i}`, `doc-${i % 100}`),
 * });
 * ```
 *
 * ## Configuration
 *
 * | Option | Default | |
 * |---|---|---|
 * | `maxDocuments` | `0` | documents per collection, `0` for no limit |
 *
 * `uri` is optional; when given it must use the `memory://` scheme.
 *
 * @module @latency-lab/adapter-memory
 */

import { MemoryAdapter, type MemoryAdapterOptions } from './adapter.js';

export { MEMORY_ADAPTER_ID, MemoryAdapter, memoryConfigSchema, type MemoryAdapterOptions } from './adapter.js';
export { MemoryConnection, type MemoryConnectionOptions } from './connection.js';
export {
  applyStage,
  compareValues,
  equalityFields,
  isEqual,
  matchesCondition,
  matchesFilter,
  parsePipeline,
  planAccess,
  type AccessPlan,
  type PipelineStage,
} from './pipeline.js';
export { projectDocument } from './projection.js';
export { MemoryCollection, MemoryDatabase, type NormalizedIndex } from './store.js';

/**
 * Create an in-memory adapter
 */
export function createMemoryAdapter(options: MemoryAdapterOptions = {}): MemoryAdapter {
  return new MemoryAdapter(options);
}
