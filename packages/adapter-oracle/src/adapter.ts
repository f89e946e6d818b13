/**
 * Oracle OSON adapter.
 *
 * Documents are stored in a native `JSON` column, which the server keeps in
 * its binary OSON format with a hash-indexed field dictionary. Reads pull
 * single paths out with SQL/JSON operators and updates rewrite one path in
 * place with `JSON_TRANSFORM`, so field lookup happens on the server and is
 * part of the measured execution time.
 *
 * @module adapter
 */

import {
  type AggregateOperation,
  BaseAdapter,
  type BaseAdapterOptions,
  BreakdownRecorder,
  capabilitySet,
  connectionConfigSchema,
  type ConnectionConfig,
  type ConnectionConfigSchema,
  ConnectionError,
  countFields,
  type DeleteOperation,
  getIntOption,
  getStringOption,
  hasProjection,
  type InsertOperation,
  type InstrumentedConnection,
  intOptionIssue,
  isJsonObject,
  type JsonDocument,
  type JsonObject,
  type JsonValue,
  MetricsCollector,
  OperationError,
  type OperationResult,
  parsePath,
  type ReadOperation,
  setAtPath,
  successResult,
  type TestEnvironmentConfig,
  toError,
  type UpdateOperation,
} from '@latency-lab/core';
import { z } from 'zod';
import { OracleConnection } from './connection.js';
import { createOracleDriver, isInvalidCredentials, isTableMissing, isUniqueViolation } from './driver.js';
import { translatePipeline } from './pipeline.js';
import {
  createIndexSql,
  createTableSql,
  DISPLAY_PLAN_SQL,
  DOCUMENT_COLUMN,
  deleteSql,
  dropTableSql,
  explainPlanSql,
  fieldAlias,
  indexName,
  insertSql,
  isIdentifier,
  selectDocumentSql,
  selectDocumentsSql,
  selectPathsSql,
  updatePathSql,
} from './sql.js';
import type {
  OracleDriverFactory,
  OracleDriverSettings,
  OracleSession,
  OracleStatement,
  OracleStatementResult,
} from './types.js';

export const ORACLE_ADAPTER_ID = 'oracle-oson';

/** Platform-specific breakdown entry for building the statement text */
export const SQL_BUILD_METRIC = 'oracle.sql_build_time';

/** Platform-specific breakdown entry for the commit round trip */
export const COMMIT_METRIC = 'oracle.commit_time';

const DEFAULT_TABLE = 'benchmark_docs';

/**
 * Connect string and any credentials carried by a connection URI
 */
export interface OracleUri {
  connectString: string;
  username?: string;
  password?: string;
}

/**
 * Accepts a JDBC thin URL (`jdbc:oracle:thin:@host:1521/service`, optionally
 * with `user/password` before the `@`) or a plain connect string: Easy
 * Connect, a TNS alias or a descriptor.
 */
export function parseOracleUri(uri: string): OracleUri | undefined {
  if (/^jdbc:/i.test(uri)) {
    const match = /^jdbc:oracle:[a-z]+:(?:([^/@]+)\/([^@]*))?@(.+)$/i.exec(uri);
    if (!match) return undefined;
    const [, username, password, connectString = ''] = match;
    return {
      connectString,
      ...(username !== undefined ? { username } : {}),
      ...(password !== undefined ? { password } : {}),
    };
  }
  const scheme = /^([a-z][a-z0-9+.-]*):\/\//i.exec(uri);
  if (scheme && !['tcp', 'tcps'].includes((scheme[1] ?? '').toLowerCase())) return undefined;
  return { connectString: uri };
}

export const oracleConfigSchema: ConnectionConfigSchema = connectionConfigSchema.superRefine((config, ctx) => {
  const issue = (path: (string | number)[], message: string) =>
    ctx.addIssue({ code: z.ZodIssueCode.custom, path, message });

  const parsed = config.uri === undefined ? undefined : parseOracleUri(config.uri);
  if (config.uri === undefined) {
    issue(['uri'], 'is required');
  } else if (!parsed) {
    issue(['uri'], 'must be a jdbc:oracle: URL or an Oracle connect string');
  }

  if (!config.username && !parsed?.username) issue(['username'], 'is required');
  if (!config.password && !parsed?.password) issue(['password'], 'is required');

  for (const name of ['poolSize', 'queueTimeoutMs']) {
    const optionIssue = intOptionIssue(config.options, name);
    if (optionIssue) issue(['options', name], optionIssue.message);
  }
  if (config.options.poolSize !== undefined && Number(config.options.poolSize) === 0) {
    issue(['options', 'poolSize'], 'must be at least 1');
  }

  const tableName = config.options.tableName;
  if (tableName !== undefined && !isIdentifier(String(tableName))) {
    issue(['options', 'tableName'], 'must be a SQL identifier');
  }
});

function driverSettings(config: ConnectionConfig): OracleDriverSettings {
  const uri = parseOracleUri(config.uri ?? '') ?? { connectString: '' };
  return {
    connectString: uri.connectString,
    user: config.username ?? uri.username ?? '',
    password: config.password ?? uri.password ?? '',
    poolMin: 1,
    poolMax: getIntOption(config, 'poolSize', 5),
    queueTimeoutMs: getIntOption(config, 'queueTimeoutMs', 30_000),
  };
}

function byteLength(text: string): number {
  return Buffer.byteLength(text, 'utf8');
}

function statementBytes({ sql, binds }: OracleStatement): number {
  return binds.reduce<number>(
    (sum, value) => sum + (typeof value === 'string' ? byteLength(value) : typeof value === 'number' ? 8 : 0),
    byteLength(sql)
  );
}

function resultBytes({ rows }: OracleStatementResult): number {
  let bytes = 0;
  for (const row of rows) {
    for (const cell of row) {
      if (typeof cell === 'string') bytes += byteLength(cell);
    }
  }
  return bytes;
}

function toJsonValue(value: unknown): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) return value.map(toJsonValue);
  if (isJsonObject(value)) return value;
  throw new Error(`Unexpected JSON value of type ${typeof value}`);
}

function parseJson(text: string): JsonValue {
  const value: unknown = JSON.parse(text);
  return toJsonValue(value);
}

function parseDocument(text: string): JsonObject {
  const value = parseJson(text);
  if (!isJsonObject(value)) throw new Error('Expected a JSON document');
  return value;
}

function textCell(row: readonly unknown[], index: number): string {
  const cell = row[index];
  if (typeof cell !== 'string') throw new Error(`Expected JSON text in column ${index + 1}`);
  return cell;
}

export interface OracleAdapterOptions extends BaseAdapterOptions {
  /** Defaults to a driver over an `oracledb` session pool */
  driverFactory?: OracleDriverFactory;
}

/**
 * @example
 * ```typescript
 * const adapter = new OracleAdapter();
 * const conn = await adapter.connect({
 *   uri: 'jdbc:oracle:thin:@localhost:1521/FREEPDB1',
 *   database: 'bench',
 *   username: 'bench',
 *   password: process.env.ORACLE_PASSWORD,
 *   options: { poolSize: 10 },
 * });
 * ```
 */
export class OracleAdapter extends BaseAdapter<OracleConnection> {
  readonly id = ORACLE_ADAPTER_ID;
  readonly displayName = 'Oracle OSON (Binary JSON)';
  readonly version = '23ai';
  readonly capabilities = capabilitySet(
    'nested-document-access',
    'array-index-access',
    'partial-document-retrieval',
    'bulk-insert',
    'bulk-update',
    'bulk-read',
    'replication',
    'secondary-indexes',
    'compound-indexes',
    'json-path-indexes',
    'single-document-atomicity',
    'multi-document-transactions',
    'server-execution-time',
    'explain-plan',
    'profiling',
    'client-timing-hooks',
    'deserialization-metrics'
  );

  private readonly driverFactory: OracleDriverFactory;
  private readonly opened = new WeakSet<OracleConnection>();

  constructor(options: OracleAdapterOptions = {}) {
    super(options);
    this.driverFactory = options.driverFactory ?? createOracleDriver;
  }

  getConfigurationOptions(): Readonly<Record<string, string>> {
    return {
      poolSize: 'Maximum sessions in the pool (default 5)',
      queueTimeoutMs: 'Milliseconds to wait for a free session (default 30000)',
      tableName: `JSON table used before a test environment is set up (default ${DEFAULT_TABLE})`,
    };
  }

  protected configSchema(): ConnectionConfigSchema {
    return oracleConfigSchema;
  }

  protected async openConnection(config: ConnectionConfig, connectionId: string): Promise<OracleConnection> {
    const driver = this.driverFactory(driverSettings(config));
    try {
      await driver.ping();
    } catch (error) {
      await driver.close().catch((closeError: unknown) => {
        this.logger.debug('Pool close after failed connect threw', { error: toError(closeError).message });
      });
      if (isInvalidCredentials(error)) {
        throw new ConnectionError(this.id, `Authentication failed for schema ${config.database}`, {
          code: 'BENCH_C201',
          cause: toError(error),
          context: { database: config.database },
        });
      }
      throw error;
    }

    const connection = new OracleConnection({
      id: connectionId,
      collector: new MetricsCollector({ logger: this.logger }),
      timeSource: this.timeSource,
      logger: this.logger,
      driver,
      database: config.database,
      tableName: getStringOption(config, 'tableName', DEFAULT_TABLE),
    });
    this.opened.add(connection);
    return connection;
  }

  protected isOwnConnection(connection: InstrumentedConnection): connection is OracleConnection {
    return connection instanceof OracleConnection && this.opened.has(connection);
  }

  // ── Operations ───────────────────────────────────────────────────────

  protected async doInsert(conn: OracleConnection, op: InsertOperation): Promise<OperationResult> {
    const recorder = new BreakdownRecorder(this.timeSource);
    const sql = this.buildSql(recorder, () => insertSql(this.tableName(conn)));

    const { value: json, nanos } = conn.timeSerialization(op.id, () => JSON.stringify(op.document), byteLength);
    recorder.add('serializationTime', nanos);

    try {
      await conn.withSession(async (session) => {
        await this.run(conn, op.id, recorder, session, { sql, binds: [op.document._id, json] });
        await this.commit(recorder, session);
      }, recorder);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new OperationError(op.id, op.type, `Duplicate document id: ${op.document._id}`, {
          code: 'BENCH_O302',
          cause: toError(error),
          context: { documentId: op.document._id },
        });
      }
      throw error;
    }

    const { totalLatency, breakdown } = recorder.finish();
    return successResult(op.id, op.type, totalLatency, {
      breakdown,
      metadata: { insertedId: op.document._id, bytes: byteLength(json) },
    });
  }

  protected async doRead(conn: OracleConnection, op: ReadOperation): Promise<OperationResult> {
    const recorder = new BreakdownRecorder(this.timeSource);
    const statement = this.buildSql(recorder, () => this.readStatement(conn, op));

    const result = await conn.withSession(
      (session) => this.run(conn, op.id, recorder, session, statement),
      recorder
    );
    const [row] = result.rows;
    if (!row) {
      throw new OperationError(op.id, op.type, `Document not found: ${op.documentId}`, {
        code: 'BENCH_O301',
        context: { documentId: op.documentId },
      });
    }
    const bytes = resultBytes(result);

    if (!hasProjection(op)) {
      const { value: doc, nanos } = conn.timeDeserialization(op.id, () => parseDocument(textCell(row, 0)), countFields);
      recorder.add('deserializationTime', nanos);

      const { totalLatency, breakdown } = recorder.finish();
      return successResult(op.id, op.type, totalLatency, { data: doc, breakdown, metadata: { bytes } });
    }

    const { value: data, nanos } = conn.timeDeserialization(
      op.id,
      () => {
        const [id] = row;
        const projected: JsonObject = { _id: typeof id === 'string' ? id : op.documentId };
        op.projectionPaths.forEach((path, index) => {
          const cell = row[index + 1];
          if (typeof cell === 'string') projected[path] = parseJson(cell);
        });
        return projected;
      },
      (projected) => Object.keys(projected).length - 1
    );
    recorder.add('deserializationTime', nanos);

    const { totalLatency, breakdown } = recorder.finish();
    return successResult(op.id, op.type, totalLatency, {
      data,
      breakdown,
      metadata: { bytes, fieldsFound: Object.keys(data).length - 1 },
    });
  }

  protected async doUpdate(conn: OracleConnection, op: UpdateOperation): Promise<OperationResult> {
    if (parsePath(op.path)[0] === '_id') {
      throw new OperationError(op.id, op.type, 'The _id field cannot be updated', { context: { path: op.path } });
    }

    const recorder = new BreakdownRecorder(this.timeSource);
    const table = this.tableName(conn);
    const sql = this.buildSql(recorder, () => updatePathSql(table, op.path));

    const { value: json, nanos } = conn.timeSerialization(op.id, () => JSON.stringify(op.newValue), byteLength);
    recorder.add('serializationTime', nanos);

    const outcome = await conn.withSession(async (session) => {
      const updated = await this.run(conn, op.id, recorder, session, { sql, binds: [json, op.documentId] });
      if (updated.rowsAffected > 0) {
        await this.commit(recorder, session);
        return { matchedCount: updated.rowsAffected, upserted: false };
      }
      if (!op.upsert) return { matchedCount: 0, upserted: false };

      const document: JsonDocument = { _id: op.documentId };
      if (!setAtPath(document, op.path, op.newValue)) {
        throw new OperationError(op.id, op.type, `Cannot create ${op.path} in a new document`, {
          context: { path: op.path },
        });
      }
      const created = conn.timeSerialization(op.id, () => JSON.stringify(document), byteLength);
      recorder.add('serializationTime', created.nanos);
      await this.run(conn, op.id, recorder, session, { sql: insertSql(table), binds: [op.documentId, created.value] });
      await this.commit(recorder, session);
      return { matchedCount: 0, upserted: true };
    }, recorder);

    const { totalLatency, breakdown } = recorder.finish();
    return successResult(op.id, op.type, totalLatency, {
      breakdown,
      metadata: { matchedCount: outcome.matchedCount, modifiedCount: outcome.matchedCount, upserted: outcome.upserted },
    });
  }

  protected async doDelete(conn: OracleConnection, op: DeleteOperation): Promise<OperationResult> {
    const recorder = new BreakdownRecorder(this.timeSource);
    const sql = this.buildSql(recorder, () => deleteSql(this.tableName(conn)));

    const deletedCount = await conn.withSession(async (session) => {
      const { rowsAffected } = await this.run(conn, op.id, recorder, session, { sql, binds: [op.documentId] });
      if (rowsAffected > 0) await this.commit(recorder, session);
      return rowsAffected;
    }, recorder);

    const { totalLatency, breakdown } = recorder.finish();
    return successResult(op.id, op.type, totalLatency, { breakdown, metadata: { deletedCount } });
  }

  protected async doAggregate(conn: OracleConnection, op: AggregateOperation): Promise<OperationResult> {
    const recorder = new BreakdownRecorder(this.timeSource);
    const { sql, binds } = this.buildSql(recorder, () => selectDocumentsSql(this.tableName(conn), translatePipeline(op)));

    if (op.explain) {
      const plan = await conn.withSession((session) => this.explainSql(op.id, session, sql, recorder), recorder);
      const { totalLatency, breakdown } = recorder.finish();
      return successResult(op.id, op.type, totalLatency, {
        data: { sql, plan },
        breakdown,
        metadata: { explain: true },
      });
    }

    const result = await conn.withSession(
      (session) => this.run(conn, op.id, recorder, session, { sql, binds, textColumns: [DOCUMENT_COLUMN] }),
      recorder
    );
    const { value: data, nanos } = conn.timeDeserialization(
      op.id,
      (): JsonValue => result.rows.map((row) => parseDocument(textCell(row, 0))),
      countFields
    );
    recorder.add('deserializationTime', nanos);

    const { totalLatency, breakdown } = recorder.finish();
    return successResult(op.id, op.type, totalLatency, {
      data,
      breakdown,
      metadata: { returned: result.rows.length, bytes: resultBytes(result) },
    });
  }

  protected override async doExplain(
    conn: OracleConnection,
    operation: ReadOperation | AggregateOperation
  ): Promise<JsonObject> {
    const sql =
      operation.type === 'read'
        ? this.readStatement(conn, operation).sql
        : selectDocumentsSql(this.tableName(conn), translatePipeline(operation)).sql;
    const plan = await conn.withSession((session) => this.explainSql(operation.id, session, sql));
    return { sql, plan };
  }

  // ── Test environment ─────────────────────────────────────────────────

  protected async provision(conn: OracleConnection, config: TestEnvironmentConfig): Promise<void> {
    const table = config.collectionName;
    await conn.withSession(async (session) => {
      if (config.dropExisting) await this.dropTable(session, table);
      await session.execute({ sql: createTableSql(table), binds: [] });
      for (const index of config.indexes) {
        const name = index.name ?? indexName(table, index.fields);
        await session.execute({ sql: createIndexSql(table, name, index.fields), binds: [] });
        this.logger.debug('Index created', { table, index: name });
      }
    });
  }

  protected async deprovision(conn: OracleConnection, config: TestEnvironmentConfig): Promise<void> {
    await conn.withSession((session) => this.dropTable(session, config.collectionName));
  }

  // ── Helpers ──────────────────────────────────────────────────────────

  private tableName(conn: OracleConnection): string {
    return this.testEnvironment?.collectionName ?? conn.tableName;
  }

  private readStatement(conn: OracleConnection, op: ReadOperation): OracleStatement {
    const table = this.tableName(conn);
    if (!hasProjection(op)) {
      return { sql: selectDocumentSql(table), binds: [op.documentId], textColumns: [DOCUMENT_COLUMN] };
    }
    return {
      sql: selectPathsSql(table, op.projectionPaths),
      binds: [op.documentId],
      textColumns: op.projectionPaths.map((_, index) => fieldAlias(index)),
    };
  }

  private buildSql<T>(recorder: BreakdownRecorder, build: () => T): T {
    const start = this.timeSource.nanoTime();
    try {
      return build();
    } finally {
      recorder.addPlatformSpecific(SQL_BUILD_METRIC, this.timeSource.nanoTime() - start);
    }
  }

  /**
   * Execute one statement. The driver reports no server-side timing, so the
   * whole execute round trip is booked as server execution; bytes on the
   * wire are still counted on the connection.
   */
  private async run(
    conn: OracleConnection,
    operationId: string,
    recorder: BreakdownRecorder,
    session: OracleSession,
    statement: OracleStatement
  ): Promise<OracleStatementResult> {
    const result = await recorder.measureAsync('serverExecutionTime', () => session.execute(statement));
    conn.recordWireTransmit(operationId, 0, statementBytes(statement));
    conn.recordWireReceive(operationId, 0, resultBytes(result));
    return result;
  }

  private async commit(recorder: BreakdownRecorder, session: OracleSession): Promise<void> {
    const start = this.timeSource.nanoTime();
    try {
      await session.commit();
    } finally {
      recorder.addPlatformSpecific(COMMIT_METRIC, this.timeSource.nanoTime() - start);
    }
  }

  private async explainSql(
    statementId: string,
    session: OracleSession,
    sql: string,
    recorder?: BreakdownRecorder
  ): Promise<string[]> {
    const explain = async () => {
      await session.execute({ sql: explainPlanSql(statementId, sql), binds: [] });
      return session.execute({ sql: DISPLAY_PLAN_SQL, binds: [statementId] });
    };
    const { rows } = recorder ? await recorder.measureAsync('serverExecutionTime', explain) : await explain();
    return rows.flatMap(([line]) => (typeof line === 'string' ? [line] : []));
  }

  private async dropTable(session: OracleSession, table: string): Promise<void> {
    try {
      await session.execute({ sql: dropTableSql(table), binds: [] });
    } catch (error) {
      if (!isTableMissing(error)) throw error;
    }
  }
}
