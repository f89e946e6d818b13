/**
 * @packageDocumentation
 *
 * Oracle OSON adapter for latency-lab.
 *
 * Talks to Oracle Database 23ai through `oracledb` in thin mode. Documents
 * go into a native `JSON` column; projected reads use `JSON_QUERY` per path
 * and updates use `JSON_TRANSFORM`, so field lookup runs on the server.
 * Checking a session out of the pool and returning it are measured per
 * operation as connection acquisition and release.
 *
 * ## Configuration
 *
 * | Option | Default | |
 * |---|---|---|
 * | `poolSize` | `5` | maximum pooled sessions |
 * | `queueTimeoutMs` | `30000` | wait for a free session |
 * | `tableName` | `benchmark_docs` | table used before setup names one |
 *
 * `uri` is a `jdbc:oracle:thin:@...` URL or a plain connect string. Username
 * and password are required unless the JDBC URL carries them.
 *
 * @module @latency-lab/adapter-oracle
 */

import { OracleAdapter, type OracleAdapterOptions } from './adapter.js';

export {
  COMMIT_METRIC,
  ORACLE_ADAPTER_ID,
  OracleAdapter,
  oracleConfigSchema,
  parseOracleUri,
  SQL_BUILD_METRIC,
  type OracleAdapterOptions,
  type OracleUri,
} from './adapter.js';
export { OracleConnection, type OracleConnectionOptions } from './connection.js';
export {
  createOracleDriver,
  isInvalidCredentials,
  isTableMissing,
  isUniqueViolation,
  oracleErrorNumber,
} from './driver.js';
export { translatePipeline } from './pipeline.js';
export * from './sql.js';
export type * from './types.js';

/**
 * Create an Oracle OSON adapter
 */
export function createOracleAdapter(options: OracleAdapterOptions = {}): OracleAdapter {
  return new OracleAdapter(options);
}
