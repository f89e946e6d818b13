/**
 * @packageDocumentation
 *
 * MongoDB adapter for latency-lab.
 *
 * Connects through the official `mongodb` driver with command monitoring
 * turned on. Each command carries its benchmark operation id as the command
 * comment, so the correlated server time lands in that operation's overhead
 * breakdown. Projected reads fetch raw BSON and locate each requested path
 * with a sequential field scan, reported under the `bson` traversal metrics.
 *
 * ## Configuration
 *
 * | Option | Default | |
 * |---|---|---|
 * | `maxPoolSize` | `100` | |
 * | `minPoolSize` | `0` | |
 * | `connectTimeoutMs` | `10000` | |
 * | `readPreference` | `primary` | client default; reads also pass their own |
 * | `writeConcern` | `majority` | `majority`, or a count such as `w1` |
 *
 * `uri` is required and must use `mongodb://` or `mongodb+srv://`.
 *
 * @module @latency-lab/adapter-mongodb
 */

import { MongoAdapter, type MongoAdapterOptions } from './adapter.js';

export {
  MONGODB_ADAPTER_ID,
  MongoAdapter,
  mongoConfigSchema,
  parseWriteConcern,
  projectionFor,
  QUERY_BUILD_METRIC,
  type MongoAdapterOptions,
} from './adapter.js';
export { decodeDocument, encodeDocument, encodedSize, toJsonObject, toJsonValue } from './bson.js';
export { findElement, scanPath, scanProjection, type ScannedElement } from './bson-scanner.js';
export { MongoConnection, type MongoConnectionOptions, type OperationServerTiming } from './connection.js';
export { createMongoDriver, isAuthenticationError, isDuplicateKeyError } from './driver.js';
export type * from './types.js';

/**
 * Create a MongoDB adapter
 */
export function createMongoAdapter(options: MongoAdapterOptions = {}): MongoAdapter {
  return new MongoAdapter(options);
}
