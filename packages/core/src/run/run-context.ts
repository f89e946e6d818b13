import { Subject, type Observable } from 'rxjs';
import { MetricsCollector } from '../metrics/metrics-collector.js';
import { type BenchLogger, createLogger } from '../observability/logger.js';
import { systemTime, type TimeSource } from '../time/time-source.js';

/**
 * Phase of a benchmark run
 */
export type RunPhase = 'connect' | 'setup' | 'warmup' | 'measure' | 'teardown' | 'close';

/**
 * Progress notification emitted while a run executes
 */
export type RunEvent =
  | { readonly type: 'phase'; readonly phase: RunPhase; readonly runId: string }
  | {
      readonly type: 'progress';
      readonly phase: 'warmup' | 'measure';
      readonly runId: string;
      readonly completed: number;
      readonly total: number;
    };

export interface RunContextOptions {
  runId?: string;
  collector?: MetricsCollector;
  logger?: BenchLogger;
  timeSource?: TimeSource;
}

let runSeq = 0;

/**
 * Everything one benchmark run shares: its collector, clock, logger and
 * progress stream. Create one per run.
 */
export class RunContext {
  readonly runId: string;
  readonly collector: MetricsCollector;
  readonly logger: BenchLogger;
  readonly timeSource: TimeSource;

  private readonly events$ = new Subject<RunEvent>();

  constructor(options: RunContextOptions = {}) {
    this.runId = options.runId ?? `run-${++runSeq}`;
    this.logger = options.logger ?? createLogger({ module: 'latency-lab' }).child(this.runId);
    this.collector = options.collector ?? new MetricsCollector({ logger: this.logger });
    this.timeSource = options.timeSource ?? systemTime();
  }

  events(): Observable<RunEvent> {
    return this.events$.asObservable();
  }

  enterPhase(phase: RunPhase): void {
    this.logger.info(`Phase ${phase}`, { runId: this.runId });
    this.events$.next({ type: 'phase', phase, runId: this.runId });
  }

  reportProgress(phase: 'warmup' | 'measure', completed: number, total: number): void {
    this.events$.next({ type: 'progress', phase, runId: this.runId, completed, total });
  }

  /** Complete the event stream */
  dispose(): void {
    this.events$.complete();
  }
}

export function createRunContext(options?: RunContextOptions): RunContext {
  return new RunContext(options);
}
