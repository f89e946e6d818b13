/**
 * Structured logging for latency-lab.
 *
 * Levelled logger with module prefixes, optional JSON output to the console
 * and a pluggable handler. Silent unless a handler, JSON output or debug mode
 * is configured, so adapters can log freely inside measured code paths.
 *
 * @module observability/logger
 */

import { BenchError } from '../errors/bench-error.js';

/** Log level */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Structured log entry */
export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: number;
  readonly module: string;
  readonly context?: Record<string, unknown>;
  readonly durationMs?: number;
  readonly error?: { message: string; code?: string; stack?: string };
}

/** Logger configuration */
export interface BenchLoggerConfig {
  /** Minimum log level (default: 'info') */
  readonly level?: LogLevel;
  /** Enable debug mode (overrides level to 'debug') */
  readonly debug?: boolean;
  /** Module name prefix */
  readonly module?: string;
  /** Custom log handler */
  readonly handler?: (entry: LogEntry) => void;
  /** Write entries to the console as JSON lines */
  readonly json?: boolean;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let globalDebug = false;

/** Enable/disable global debug mode for every logger */
export function setDebugMode(enabled: boolean): void {
  globalDebug = enabled;
}

export function isDebugMode(): boolean {
  return globalDebug;
}

/** Narrow a log level name read from configuration */
export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

function describeError(error: unknown): NonNullable<LogEntry['error']> {
  if (BenchError.isBenchError(error)) {
    return { message: error.message, code: error.code, stack: error.stack };
  }
  if (error instanceof Error) {
    return { message: error.message, stack: error.stack };
  }
  return { message: String(error) };
}

/**
 * Structured logger.
 *
 * @example
 * ```typescript
 * const log = createLogger({ module: 'runner', json: true });
 *
 * log.info('Run started', { adapter: 'mongodb', iterations: 1000 });
 *
 * const end = log.time('setup');
 * await adapter.setupTestEnvironment(env);
 * end({ documents: env.documentCount });
 * ```
 */
export class BenchLogger {
  private readonly config: Required<Omit<BenchLoggerConfig, 'handler' | 'json'>> &
    Pick<BenchLoggerConfig, 'handler' | 'json'>;

  constructor(config: BenchLoggerConfig = {}) {
    this.config = {
      level: config.debug ? 'debug' : (config.level ?? 'info'),
      debug: config.debug ?? false,
      module: config.module ?? 'latency-lab',
      handler: config.handler,
      json: config.json,
    };
  }

  get module(): string {
    return this.config.module;
  }

  /** Create a child logger with a sub-module prefix */
  child(subModule: string): BenchLogger {
    return new BenchLogger({
      ...this.config,
      module: `${this.config.module}:${subModule}`,
    });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.log('error', message, context, error === undefined ? undefined : describeError(error));
  }

  /**
   * Start a timer. Returns a function that logs completion at debug level
   * with `durationMs`.
   */
  time(operation: string): (context?: Record<string, unknown>) => void {
    const start = performance.now();
    return (context?: Record<string, unknown>) => {
      const durationMs = Math.round((performance.now() - start) * 100) / 100;
      this.log('debug', `${operation} completed`, context, undefined, durationMs);
    };
  }

  // ── Private ──────────────────────────────────────────────────────────

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: LogEntry['error'],
    durationMs?: number
  ): void {
    const effectiveLevel = globalDebug ? 'debug' : this.config.level;
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[effectiveLevel]) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      module: this.config.module,
      ...(context ? { context } : {}),
      ...(durationMs !== undefined ? { durationMs } : {}),
      ...(error ? { error } : {}),
    };

    if (this.config.handler) {
      this.config.handler(entry);
      return;
    }

    if (this.config.json || globalDebug) {
      const consoleFn = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
      consoleFn(JSON.stringify(entry));
    }
  }
}

export function createLogger(config?: BenchLoggerConfig): BenchLogger {
  return new BenchLogger(config);
}

/** Logger that drops every entry below `error` and has no output */
export const silentLogger: BenchLogger = new BenchLogger({ level: 'error', module: 'latency-lab' });
