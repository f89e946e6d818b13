import oracledb, { type Connection, type Pool } from 'oracledb';
import type { OracleDriver, OracleDriverSettings, OracleSession } from './types.js';

const UNIQUE_CONSTRAINT = 1;
const TABLE_MISSING = 942;
const INVALID_CREDENTIALS = 1017;

/**
 * `ORA-` number of a database error, if the value is one
 */
export function oracleErrorNumber(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'errorNum' in error && typeof error.errorNum === 'number') {
    return error.errorNum;
  }
  return undefined;
}

export function isUniqueViolation(error: unknown): boolean {
  return oracleErrorNumber(error) === UNIQUE_CONSTRAINT;
}

export function isTableMissing(error: unknown): boolean {
  return oracleErrorNumber(error) === TABLE_MISSING;
}

export function isInvalidCredentials(error: unknown): boolean {
  return oracleErrorNumber(error) === INVALID_CREDENTIALS;
}

function createSession(connection: Connection): OracleSession {
  return {
    execute: async ({ sql, binds, textColumns = [] }) => {
      const result = await connection.execute<unknown[]>(sql, [...binds], {
        outFormat: oracledb.OUT_FORMAT_ARRAY,
        autoCommit: false,
        fetchInfo: Object.fromEntries(textColumns.map((column) => [column, { type: oracledb.STRING }])),
      });
      return { rows: result.rows ?? [], rowsAffected: result.rowsAffected ?? 0 };
    },
    commit: () => connection.commit(),
    rollback: () => connection.rollback(),
    release: () => connection.close(),
  };
}

/**
 * Create a driver over one `oracledb` session pool in thin mode. The pool
 * is created on the first ping.
 */
export function createOracleDriver(settings: OracleDriverSettings): OracleDriver {
  let pool: Pool | null = null;
  let closed = false;

  const requirePool = async (): Promise<Pool> => {
    if (closed) throw new Error('Pool is closed');
    if (!pool) {
      pool = await oracledb.createPool({
        connectString: settings.connectString,
        user: settings.user,
        password: settings.password,
        poolMin: settings.poolMin,
        poolMax: settings.poolMax,
        poolIncrement: 1,
        queueTimeout: settings.queueTimeoutMs,
      });
    }
    return pool;
  };

  return {
    ping: async () => {
      const connection = await (await requirePool()).getConnection();
      try {
        await connection.ping();
      } finally {
        await connection.close();
      }
    },

    acquire: async () => createSession(await (await requirePool()).getConnection()),

    isOpen: () => !closed,

    close: async () => {
      closed = true;
      const current = pool;
      pool = null;
      if (current) await current.close(0);
    },
  };
}
