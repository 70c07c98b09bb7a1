import { performance } from 'node:perf_hooks';
import { JobQueue } from './job-queue.js';
import type { Job, OverlapMode, RunRecord, RunRequest, RunTrigger } from './types.js';

type ActiveRun = {
  runId: string;
  trigger: RunTrigger;
  startedAt: Date;
  startedMono: number;
};

export type JobState = {
  job: Job;
  nextRunAt: Date | null;
  active: ActiveRun | null;
  queue: JobQueue;
  // Single coalesced request for skip-mode jobs blocked by another job's run.
  deferred: RunRequest | null;
  lastRun: RunRecord | null;
  skippedRuns: number;
  totalRuns: number;
  totalFailures: number;
};

export type JobStatus = {
  id: string;
  command: string;
  arguments: string | null;
  cron: string;
  timezone: string;
  enabled: boolean;
  overlap: OverlapMode;
  queueMax: number;
  useVaultLock: boolean;
  running: boolean;
  startedAt: Date | null;
  elapsedSeconds: number | null;
  nextRunAt: Date | null;
  queuedCount: number;
  deferred: boolean;
  skippedRuns: number;
  totalRuns: number;
  totalFailures: number;
  lastRun: RunRecord | null;
};

export type StatusReport = {
  isRunning: boolean;
  activeJobId: string | null;
  elapsedSeconds: number | null;
  jobs: JobStatus[];
};

export type PendingRequest = {
  jobId: string;
  request: RunRequest;
};

/**
 * Process-lifetime run state. The scheduler and the worker share one instance
 * and mutate it only through these methods.
 */
export class StatusStore {
  private states = new Map<string, JobState>();
  private active: { jobId: string; runId: string } | null = null;
  private readonly clock: () => number;

  constructor(opts?: { clock?: () => number }) {
    this.clock = opts?.clock ?? (() => performance.now());
  }

  /**
   * Bring the store in line with a job set. Existing state (counters, last run,
   * pending requests) survives for ids that remain; returns the removed ids.
   */
  sync(jobs: readonly Job[], computeNext: (job: Job) => Date | null): string[] {
    const incoming = new Set(jobs.map((j) => j.id));
    const removed: string[] = [];
    for (const id of this.states.keys()) {
      if (!incoming.has(id)) removed.push(id);
    }
    for (const id of removed) this.states.delete(id);

    for (const job of jobs) {
      const state = this.states.get(job.id);
      if (!state) {
        this.states.set(job.id, {
          job,
          nextRunAt: job.enabled ? computeNext(job) : null,
          active: null,
          queue: new JobQueue(job.overlap === 'queue' ? job.queueMax : 0),
          deferred: null,
          lastRun: null,
          skippedRuns: 0,
          totalRuns: 0,
          totalFailures: 0,
        });
        continue;
      }

      const prev = state.job;
      state.job = job;
      if (prev.cron !== job.cron || prev.timezone !== job.timezone || prev.enabled !== job.enabled) {
        state.nextRunAt = job.enabled ? computeNext(job) : null;
      }
      state.queue.resize(job.overlap === 'queue' ? job.queueMax : 0);
      if (!job.enabled || job.overlap === 'queue' || job.useVaultLock) {
        state.deferred = null;
      }
      if (!job.enabled) state.queue.clear();
    }
    return removed;
  }

  has(jobId: string): boolean {
    return this.states.has(jobId);
  }

  get(jobId: string): Readonly<JobState> | undefined {
    return this.states.get(jobId);
  }

  list(): Readonly<JobState>[] {
    return Array.from(this.states.values());
  }

  get activeJobId(): string | null {
    return this.active?.jobId ?? null;
  }

  setNextRun(jobId: string, at: Date | null): void {
    const state = this.states.get(jobId);
    if (state) state.nextRunAt = at;
  }

  markStarted(jobId: string, runId: string, trigger: RunTrigger, startedAt: Date): void {
    this.active = { jobId, runId };
    const state = this.states.get(jobId);
    if (!state) return;
    state.active = { runId, trigger, startedAt, startedMono: this.clock() };
    state.totalRuns += 1;
  }

  markFinished(record: RunRecord): void {
    if (this.active?.runId === record.runId) this.active = null;
    const state = this.states.get(record.jobId);
    if (!state) return;
    if (state.active?.runId === record.runId) state.active = null;
    state.lastRun = record;
    if (record.status === 'failure' || record.status === 'timeout') state.totalFailures += 1;
  }

  /** The processor of an abandoned run has settled after all. */
  markProcessorStopped(jobId: string, runId: string): void {
    const last = this.states.get(jobId)?.lastRun;
    if (last && last.runId === runId) last.processorState = 'stopped';
  }

  recordSkipped(jobId: string): void {
    const state = this.states.get(jobId);
    if (state) state.skippedRuns += 1;
  }

  enqueue(jobId: string, request: RunRequest): boolean {
    const state = this.states.get(jobId);
    return state ? state.queue.enqueue(request) : false;
  }

  dequeue(jobId: string): RunRequest | undefined {
    return this.states.get(jobId)?.queue.dequeue();
  }

  /** Returns false when the job is unknown or already has a deferred request waiting. */
  setDeferred(jobId: string, request: RunRequest): boolean {
    const state = this.states.get(jobId);
    if (!state || state.deferred) return false;
    state.deferred = request;
    return true;
  }

  takeDeferred(jobId: string): RunRequest | null {
    const state = this.states.get(jobId);
    if (!state) return null;
    const request = state.deferred;
    state.deferred = null;
    return request;
  }

  /** Drop queued and deferred requests; returns the number dropped. */
  clearPending(jobId: string): number {
    const state = this.states.get(jobId);
    if (!state) return 0;
    const cleared = state.queue.clear() + (state.deferred ? 1 : 0);
    state.deferred = null;
    return cleared;
  }

  /** Oldest pending request across all enabled jobs, without removing it. */
  peekPending(): PendingRequest | null {
    let best: PendingRequest | null = null;
    for (const state of this.states.values()) {
      if (!state.job.enabled || state.active) continue;
      for (const request of [state.queue.peek(), state.deferred]) {
        if (!request) continue;
        if (!best || request.enqueuedAt.getTime() < best.request.enqueuedAt.getTime()) {
          best = { jobId: state.job.id, request };
        }
      }
    }
    return best;
  }

  /** Remove a request previously returned by peekPending. */
  takePending(pending: PendingRequest): void {
    const state = this.states.get(pending.jobId);
    if (!state) return;
    if (state.queue.peek() === pending.request) {
      this.dequeue(pending.jobId);
    } else if (state.deferred === pending.request) {
      this.takeDeferred(pending.jobId);
    }
  }

  private elapsedSince(startedMono: number): number {
    return Math.max(0, (this.clock() - startedMono) / 1000);
  }

  report(): StatusReport {
    const jobs: JobStatus[] = [];
    let elapsedSeconds: number | null = null;

    for (const state of this.states.values()) {
      const { job, active } = state;
      const elapsed = active ? this.elapsedSince(active.startedMono) : null;
      if (active && this.active?.runId === active.runId) elapsedSeconds = elapsed;
      jobs.push({
        id: job.id,
        command: job.command,
        arguments: job.arguments ?? null,
        cron: job.cron,
        timezone: job.timezone,
        enabled: job.enabled,
        overlap: job.overlap,
        queueMax: job.queueMax,
        useVaultLock: job.useVaultLock,
        running: active !== null,
        startedAt: active?.startedAt ?? null,
        elapsedSeconds: elapsed,
        nextRunAt: state.nextRunAt,
        queuedCount: state.queue.size,
        deferred: state.deferred !== null,
        skippedRuns: state.skippedRuns,
        totalRuns: state.totalRuns,
        totalFailures: state.totalFailures,
        lastRun: state.lastRun ? { ...state.lastRun } : null,
      });
    }

    return {
      isRunning: this.active !== null,
      activeJobId: this.active?.jobId ?? null,
      elapsedSeconds,
      jobs,
    };
  }
}
