import crypto from 'node:crypto';
import { performance } from 'node:perf_hooks';
import type { Job, RunRecord, RunRequest, RunStatus } from './types.js';
import { withLease, type RunLock } from './run-lock.js';
import type { StatusStore } from './status-store.js';
import type { RunSink } from './run-log.js';
import type { CommandProcessor } from '../processor/types.js';
import type { LoggerLike } from '../logging.js';
import {
  ProcessorError,
  RunCancelledError,
  RunLockViolationError,
  RunTimeoutError,
} from './errors.js';
import { sanitizeErrorMessage } from '../utils/redact.js';

export type WorkerOpts = {
  lock: RunLock;
  store: StatusStore;
  processor: CommandProcessor;
  defaultTimeoutSeconds: number;
  sink?: RunSink;
  log?: LoggerLike;
  now?: () => Date;
  /** Monotonic milliseconds, used for durations. */
  clock?: () => number;
  newRunId?: () => string;
};

type Outcome = {
  status: RunStatus;
  error?: string;
  costUsd?: number;
};

type InflightRun = {
  runId: string;
  controller: AbortController;
};

const NO_ERROR_MESSAGE = 'Processor reported failure without an error message';

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function abortOutcome(reason: unknown): Outcome {
  if (reason instanceof RunTimeoutError) return { status: 'timeout', error: reason.message };
  if (reason instanceof RunCancelledError) return { status: 'cancelled', error: reason.message };
  return { status: 'cancelled', error: 'Cancelled' };
}

/**
 * Executes one run at a time under the shared RunLock.
 *
 * Idle -> Acquiring -> Running -> (success | failure | timeout | cancelled) -> Idle.
 * The lock is released on every exit path before the outcome is recorded.
 */
export class Worker {
  private readonly opts: WorkerOpts;
  private readonly inflight = new Map<string, InflightRun>();
  private readonly now: () => Date;
  private readonly clock: () => number;
  private readonly newRunId: () => string;

  constructor(opts: WorkerOpts) {
    this.opts = opts;
    this.now = opts.now ?? (() => new Date());
    this.clock = opts.clock ?? (() => performance.now());
    this.newRunId = opts.newRunId ?? (() => crypto.randomUUID());
  }

  isRunning(jobId: string): boolean {
    return this.inflight.has(jobId);
  }

  get runningJobIds(): string[] {
    return Array.from(this.inflight.keys());
  }

  /**
   * Abort the in-flight run of a job. Returns false when the job has no run
   * (or its run is already being torn down).
   */
  cancel(jobId: string, reason = 'cancelled'): boolean {
    const run = this.inflight.get(jobId);
    if (!run || run.controller.signal.aborted) return false;
    run.controller.abort(new RunCancelledError(jobId, reason));
    return true;
  }

  /**
   * Run `job` once. Callers check the lock before calling; losing the lock
   * here is an invariant violation and rejects with RunLockViolationError.
   */
  async execute(job: Job, request: RunRequest): Promise<RunRecord> {
    const { lock, store, log } = this.opts;
    const lease = lock.tryAcquire(job.id);
    if (!lease) throw new RunLockViolationError(job.id, lock.holder);

    const runId = this.newRunId();
    const controller = new AbortController();
    const timeoutMs = (job.timeoutSeconds ?? this.opts.defaultTimeoutSeconds) * 1000;
    const startedAt = this.now();
    const t0 = this.clock();
    const processorSettled = { value: false };

    let processing: Promise<unknown> = Promise.resolve();
    // withLease calls the body synchronously, so the run is marked started before the first await.
    const outcome = await withLease(lease, async (): Promise<Outcome> => {
      try {
        this.inflight.set(job.id, { runId, controller });
        store.markStarted(job.id, runId, request.trigger, startedAt);
        log?.info({ jobId: job.id, runId, trigger: request.trigger, command: job.command, timeoutMs }, 'worker:start');

        const call = this.invoke(job, controller, timeoutMs, startedAt, processorSettled);
        processing = call.processing;
        return await call.outcome;
      } catch (err) {
        processorSettled.value = true;
        return { status: 'failure', error: sanitizeErrorMessage(errorMessage(err), 'Run failed') };
      } finally {
        this.inflight.delete(job.id);
      }
    });

    const record: RunRecord = {
      runId,
      jobId: job.id,
      trigger: request.trigger,
      startedAt,
      finishedAt: this.now(),
      status: outcome.status,
      ...(outcome.error ? { error: outcome.error } : {}),
      durationMs: Math.max(0, this.clock() - t0),
      ...(outcome.costUsd != null ? { costUsd: outcome.costUsd } : {}),
      processorState: processorSettled.value ? 'stopped' : 'abandoned',
    };
    store.markFinished(record);

    if (record.processorState === 'abandoned') {
      log?.warn({ jobId: job.id, runId, status: record.status }, 'worker:processor abandoned (still settling)');
      void processing.then(() => {
        store.markProcessorStopped(job.id, runId);
        log?.info({ jobId: job.id, runId }, 'worker:abandoned processor settled');
      });
    }

    this.logOutcome(job, record);

    if (this.opts.sink) {
      try {
        await this.opts.sink.append(record);
      } catch (err) {
        log?.warn({ err, jobId: job.id, runId }, 'worker:run log append failed');
      }
    }

    return record;
  }

  /**
   * Race the processor against the run's abort signal. The outcome resolves as
   * soon as either side settles; `processing` settles only when the processor does.
   */
  private invoke(
    job: Job,
    controller: AbortController,
    timeoutMs: number,
    startedAt: Date,
    settled: { value: boolean },
  ): { outcome: Promise<Outcome>; processing: Promise<Outcome> } {
    const { signal } = controller;

    let processing: Promise<Outcome>;
    try {
      processing = this.opts.processor
        .run({
          command: job.command,
          ...(job.arguments ? { arguments: job.arguments } : {}),
          overrides: {
            ...(job.model ? { model: job.model } : {}),
            ...(job.maxBudgetUsd != null ? { maxBudgetUsd: job.maxBudgetUsd } : {}),
          },
          signal,
          timeoutMs,
          deadline: new Date(startedAt.getTime() + timeoutMs),
        })
        .then(
          (result): Outcome => {
            settled.value = true;
            if (result.success) {
              return { status: 'success', ...(result.costUsd != null ? { costUsd: result.costUsd } : {}) };
            }
            return {
              status: 'failure',
              error: sanitizeErrorMessage(result.error ?? '', NO_ERROR_MESSAGE),
              ...(result.costUsd != null ? { costUsd: result.costUsd } : {}),
            };
          },
          (err: unknown): Outcome => {
            settled.value = true;
            return { status: 'failure', error: sanitizeErrorMessage(errorMessage(err), 'Processor failed') };
          },
        );
    } catch (err) {
      // Synchronous throw from run(): nothing is left running.
      settled.value = true;
      processing = Promise.resolve({ status: 'failure', error: sanitizeErrorMessage(errorMessage(err), 'Processor failed') });
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    let onAbort: (() => void) | undefined;
    const aborted = new Promise<Outcome>((resolve) => {
      onAbort = () => resolve(abortOutcome(signal.reason));
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
      timer = setTimeout(() => {
        controller.abort(new RunTimeoutError(job.id, timeoutMs));
      }, timeoutMs);
    });

    const outcome = Promise.race([processing, aborted]).finally(() => {
      if (timer) clearTimeout(timer);
      if (onAbort) signal.removeEventListener('abort', onAbort);
    });

    return { outcome, processing };
  }

  private logOutcome(job: Job, record: RunRecord): void {
    const { log } = this.opts;
    const base = {
      jobId: job.id,
      runId: record.runId,
      status: record.status,
      ms: Math.round(record.durationMs),
      costUsd: record.costUsd,
    };
    switch (record.status) {
      case 'success':
        log?.info(base, 'worker:done');
        break;
      case 'cancelled':
        log?.info({ ...base, reason: record.error }, 'worker:cancelled');
        break;
      case 'timeout':
        log?.warn({ ...base, error: record.error }, 'worker:timeout');
        break;
      case 'failure':
        log?.error({ ...base, err: new ProcessorError(job.id, record.error ?? NO_ERROR_MESSAGE) }, 'worker:failed');
        break;
    }
  }
}
