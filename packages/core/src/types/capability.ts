/**
 * Named optional behaviors an adapter may support.
 *
 * Callers query an adapter's capability set before relying on any of these;
 * support is declared per adapter instance and never inferred.
 */
export const CAPABILITIES = [
  // Document access patterns
  'nested-document-access',
  'array-index-access',
  'partial-document-retrieval',
  'wildcard-path-access',

  // Operations
  'bulk-insert',
  'bulk-update',
  'bulk-read',

  // Topology
  'sharding',
  'replication',

  // Indexing
  'secondary-indexes',
  'compound-indexes',
  'json-path-indexes',

  // Transactions
  'single-document-atomicity',
  'multi-document-transactions',

  // Instrumentation
  'server-execution-time',
  'server-traversal-time',
  'explain-plan',
  'profiling',
  'client-timing-hooks',
  'deserialization-metrics',
] as const;

/**
 * Capability tag
 */
export type Capability = (typeof CAPABILITIES)[number];

/**
 * Immutable set of capabilities
 */
export type CapabilitySet = ReadonlySet<Capability>;

/**
 * Build a read-only capability set
 */
export function capabilitySet(...capabilities: Capability[]): CapabilitySet {
  return new Set<Capability>(capabilities);
}

/**
 * Check whether a string names a known capability
 */
export function isCapability(value: string): value is Capability {
  return CAPABILITIES.some((capability) => capability === value);
}
