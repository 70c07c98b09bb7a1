import type { Job, RunRecord, RunRequest } from './types.js';
import type { LoggerLike } from '../logging.js';
import type { RunLock } from './run-lock.js';
import type { StatusStore, StatusReport } from './status-store.js';
import type { Worker } from './worker.js';
import type { ScheduleSource } from './schedule-config.js';
import { JobRegistry, type JobLoadIssue } from './job-registry.js';
import { isDue, minuteStart, nextRun } from './cron-engine.js';
import { JobNotFoundError } from './errors.js';

export const DEFAULT_TICK_MS = 30_000;

export type DispatchOutcome =
  | 'started'
  | 'queued'
  | 'deferred'
  | 'skipped'
  | 'dropped'
  | 'busy'
  | 'queue_full';

export type TriggerResult = {
  status: 'started' | 'queued' | 'queue_full' | 'busy' | 'disabled';
  runId?: string;
};

export type CancelResult = {
  cancelled: boolean;
  wasRunning: boolean;
  clearedQueueCount: number;
};

export type SchedulerStatus = StatusReport & {
  timezone: string;
  configPath: string | null;
  configError: string | null;
  issues: readonly JobLoadIssue[];
};

export type SchedulerOpts = {
  store: StatusStore;
  lock: RunLock;
  worker: Worker;
  registry?: JobRegistry;
  source?: ScheduleSource;
  tickMs?: number;
  log?: LoggerLike;
  now?: () => Date;
};

/**
 * Tick loop and overlap policy. Every run, scheduled or manual, goes through
 * dispatch(), so the RunLock check and the Worker's acquire happen in one
 * synchronous step.
 */
export class Scheduler {
  private registry: JobRegistry;
  private readonly store: StatusStore;
  private readonly lock: RunLock;
  private readonly worker: Worker;
  private readonly source?: ScheduleSource;
  private readonly tickMs: number;
  private readonly log?: LoggerLike;
  private readonly now: () => Date;

  private timer: ReturnType<typeof setInterval> | null = null;
  private ticking: Promise<void> | null = null;
  private readonly runs = new Set<Promise<RunRecord | null>>();
  /** Minute (epoch ms) each job last fired for, so two ticks in one minute fire once. */
  private readonly lastFired = new Map<string, number>();
  private reloadError: string | null = null;
  private stopped = false;

  constructor(opts: SchedulerOpts) {
    this.store = opts.store;
    this.lock = opts.lock;
    this.worker = opts.worker;
    this.source = opts.source;
    this.tickMs = opts.tickMs ?? DEFAULT_TICK_MS;
    this.log = opts.log;
    this.now = opts.now ?? (() => new Date());
    this.registry = JobRegistry.empty();
    this.applyRegistry(opts.registry ?? this.registry);
  }

  start(): void {
    if (this.timer) return;
    this.stopped = false;
    this.timer = setInterval(() => {
      // Fire-and-forget: tick() never rejects.
      void this.runTick();
    }, this.tickMs);
    void this.runTick();
    this.log?.info({ tickMs: this.tickMs, jobs: this.registry.size }, 'schedule:started');
  }

  /** Stop ticking, drop pending requests, cancel the active run and wait for it. */
  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    for (const state of this.store.list()) this.store.clearPending(state.job.id);
    for (const jobId of this.worker.runningJobIds) this.worker.cancel(jobId, 'shutdown');
    if (this.ticking) await this.ticking;
    await this.idle();
    this.log?.info('schedule:stopped');
  }

  /** Resolves once no run is in flight, including runs started by draining. */
  async idle(): Promise<void> {
    while (this.runs.size > 0) {
      await Promise.all(this.runs);
    }
  }

  private runTick(): Promise<void> {
    if (this.ticking) return this.ticking;
    this.ticking = this.tick().finally(() => {
      this.ticking = null;
    });
    return this.ticking;
  }

  /**
   * One pass over the job set: reload the document if it changed, then
   * dispatch every enabled job whose cron matches the minute of `now`. A job
   * whose stored nextRunAt has already passed also fires, once: nextRunAt is
   * recomputed from `now`, so missed minutes are not replayed.
   */
  async tick(now: Date = this.now()): Promise<void> {
    if (this.stopped) return;
    await this.reloadIfChanged();
    if (this.stopped) return;
    const minute = minuteStart(now).getTime();
    try {
      for (const state of this.store.list()) {
        const { job, nextRunAt } = state;
        if (!job.enabled || this.lastFired.get(job.id) === minute) continue;
        const overdue = nextRunAt != null && nextRunAt.getTime() <= now.getTime();
        if (!overdue && !isDue(job.cron, now, job.timezone)) continue;
        this.lastFired.set(job.id, minute);
        this.store.setNextRun(job.id, nextRun(job.cron, now, job.timezone));
        this.dispatch(job, { jobId: job.id, trigger: 'cron', enqueuedAt: now });
      }
    } catch (err) {
      this.log?.error({ err }, 'schedule:tick failed');
    }
  }

  /** A failed reload keeps the current job set; the tick still dispatches it. */
  private async reloadIfChanged(): Promise<void> {
    if (!this.source) return;
    try {
      const next = await this.source.loadIfChanged();
      this.reloadError = null;
      if (next && !this.stopped) this.applyRegistry(next);
    } catch (err) {
      this.reloadError = err instanceof Error ? err.message : String(err);
      this.log?.error({ err, path: this.source.path }, 'schedule:reload failed, keeping current jobs');
    }
  }

  /**
   * Apply the overlap policy to one request. The lock is global: a busy lock
   * means some job is running, this one or another.
   */
  private dispatch(job: Job, request: RunRequest): DispatchOutcome {
    const manual = request.trigger === 'manual';

    // Older pending requests go first; a free lock with work waiting means a
    // run has just released it and its drain has not happened yet.
    if (!this.lock.isHeld && this.store.peekPending()) this.drain();

    if (!this.lock.isHeld) {
      this.startRun(job, request);
      return 'started';
    }

    const holder = this.lock.holder;
    if (job.overlap === 'queue') {
      if (this.store.enqueue(job.id, request)) {
        this.log?.info({ jobId: job.id, trigger: request.trigger, holder }, 'schedule:queued');
        return 'queued';
      }
      if (manual) return 'queue_full';
      this.store.recordSkipped(job.id);
      this.log?.warn({ jobId: job.id, holder }, 'schedule:queue full, dropped');
      return 'dropped';
    }

    // Skip-mode jobs never wait for their own run, and a manual trigger never waits at all.
    if (manual) return 'busy';
    if (holder !== job.id && !job.useVaultLock && this.store.setDeferred(job.id, request)) {
      this.log?.info({ jobId: job.id, holder }, 'schedule:deferred');
      return 'deferred';
    }
    this.store.recordSkipped(job.id);
    this.log?.info({ jobId: job.id, holder }, 'schedule:skip');
    return 'skipped';
  }

  private startRun(job: Job, request: RunRequest): string | null {
    // execute() takes the lock and marks the run started before its first await.
    const execution = this.worker.execute(job, request);
    const runId = this.store.get(job.id)?.active?.runId ?? null;

    const tracked: Promise<RunRecord | null> = execution
      .catch((err: unknown) => {
        this.log?.error({ err, jobId: job.id }, 'schedule:run failed to start');
        return null;
      })
      .finally(() => {
        this.runs.delete(tracked);
        this.drain();
      });
    this.runs.add(tracked);
    return runId;
  }

  /** Start the oldest pending request across all jobs while the lock is free. */
  private drain(): void {
    if (this.stopped) return;
    try {
      while (!this.lock.isHeld) {
        const pending = this.store.peekPending();
        if (!pending) return;
        this.store.takePending(pending);
        const job = this.registry.get(pending.jobId);
        if (!job || !job.enabled) continue;
        this.log?.info({ jobId: job.id, waitedFrom: pending.request.enqueuedAt.toISOString() }, 'schedule:drain');
        this.startRun(job, { ...pending.request, trigger: 'queued-retry' });
      }
    } catch (err) {
      this.log?.error({ err }, 'schedule:drain failed');
    }
  }

  /** Manual run request. Skip-mode jobs report `busy` instead of waiting. */
  trigger(jobId: string): TriggerResult {
    const job = this.registry.get(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    if (!job.enabled) return { status: 'disabled' };
    if (this.stopped) return { status: 'busy' };

    const request: RunRequest = { jobId, trigger: 'manual', enqueuedAt: this.now() };
    const outcome = this.dispatch(job, request);
    this.log?.info({ jobId, outcome }, 'schedule:trigger');
    switch (outcome) {
      case 'started': {
        const runId = this.store.get(jobId)?.active?.runId;
        return runId ? { status: 'started', runId } : { status: 'started' };
      }
      case 'queued':
        return { status: 'queued' };
      case 'queue_full':
      case 'dropped':
        return { status: 'queue_full' };
      default:
        return { status: 'busy' };
    }
  }

  /**
   * Drop the job's pending requests and abort its active run. Cancelling an
   * idle job succeeds with nothing to do.
   */
  cancel(jobId: string): CancelResult {
    if (!this.registry.has(jobId) && !this.store.has(jobId)) throw new JobNotFoundError(jobId);
    const clearedQueueCount = this.store.clearPending(jobId);
    const wasRunning = this.worker.cancel(jobId);
    this.log?.info({ jobId, wasRunning, clearedQueueCount }, 'schedule:cancel');
    return { cancelled: true, wasRunning, clearedQueueCount };
  }

  /** Swap in a new job set. Removed jobs lose their run and pending requests. */
  applyRegistry(next: JobRegistry): void {
    this.registry = next;
    const removed = this.store.sync(next.list(), (job) => nextRun(job.cron, this.now(), job.timezone));
    for (const jobId of removed) {
      this.lastFired.delete(jobId);
      const wasRunning = this.worker.cancel(jobId, 'removed');
      this.log?.info({ jobId, wasRunning }, 'schedule:job removed');
    }
    for (const issue of next.issues) {
      this.log?.warn({ index: issue.index, jobId: issue.jobId, code: issue.error.code, error: issue.error.message }, 'schedule:job rejected');
    }
  }

  get jobs(): JobRegistry {
    return this.registry;
  }

  status(): SchedulerStatus {
    return {
      ...this.store.report(),
      timezone: this.registry.timezone,
      configPath: this.source?.path ?? null,
      configError: this.reloadError ?? this.source?.configError ?? null,
      issues: this.registry.issues,
    };
  }
}
