/**
 * Settings a driver is created with, after validation and defaults
 */
export interface OracleDriverSettings {
  /** Easy Connect string, TNS alias or descriptor */
  connectString: string;
  user: string;
  password: string;
  poolMin: number;
  poolMax: number;
  /** Milliseconds a caller waits for a pooled session */
  queueTimeoutMs: number;
}

export type OracleBindValue = string | number | null;

/**
 * One SQL statement with positional binds (`:1`, `:2`, ...)
 */
export interface OracleStatement {
  sql: string;
  binds: readonly OracleBindValue[];
  /** Result columns to fetch as strings instead of LOB handles */
  textColumns?: readonly string[];
}

export interface OracleStatementResult {
  rows: readonly (readonly unknown[])[];
  rowsAffected: number;
}

/**
 * Session checked out of the pool. Statements run without autocommit.
 */
export interface OracleSession {
  execute(statement: OracleStatement): Promise<OracleStatementResult>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  /** Return the session to the pool */
  release(): Promise<void>;
}

/**
 * Oracle driver interface (abstraction over an `oracledb` session pool)
 */
export interface OracleDriver {
  /** Create the pool and round-trip a ping on one session */
  ping(): Promise<void>;

  acquire(): Promise<OracleSession>;

  isOpen(): boolean;

  close(): Promise<void>;
}

/**
 * Factory function for creating Oracle drivers
 */
export type OracleDriverFactory = (settings: OracleDriverSettings) => OracleDriver;
