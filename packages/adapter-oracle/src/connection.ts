import {
  BaseInstrumentedConnection,
  type BaseConnectionOptions,
  type BreakdownRecorder,
  toError,
} from '@latency-lab/core';
import type { OracleDriver, OracleSession } from './types.js';

export interface OracleConnectionOptions extends BaseConnectionOptions {
  driver: OracleDriver;
  /** Schema the benchmark table lives in */
  database: string;
  tableName: string;
}

/**
 * Handle on one Oracle session pool.
 *
 * Every operation checks a session out and returns it afterwards; with a
 * recorder attached both steps land in the operation's connection overhead.
 */
export class OracleConnection extends BaseInstrumentedConnection {
  readonly driver: OracleDriver;
  readonly database: string;
  /** Table used until a test environment names another */
  readonly tableName: string;

  constructor(options: OracleConnectionOptions) {
    super(options);
    this.driver = options.driver;
    this.database = options.database;
    this.tableName = options.tableName;
  }

  /**
   * Run `work` on a pooled session. The session is rolled back when `work`
   * throws and is always released.
   */
  async withSession<T>(work: (session: OracleSession) => Promise<T>, recorder?: BreakdownRecorder): Promise<T> {
    const acquire = () => this.driver.acquire();
    const session = recorder ? await recorder.measureAsync('connectionAcquisition', acquire) : await acquire();

    try {
      return await work(session);
    } catch (error) {
      await session.rollback().catch((rollbackError: unknown) => {
        this.logger.warn('Rollback failed', { connectionId: this.id, error: toError(rollbackError).message });
      });
      throw error;
    } finally {
      const release = () => session.release();
      if (recorder) {
        await recorder.measureAsync('connectionRelease', release);
      } else {
        await release();
      }
    }
  }

  protected override isBackendOpen(): boolean {
    return this.driver.isOpen();
  }

  protected closeBackend(): Promise<void> {
    return this.driver.close();
  }
}
