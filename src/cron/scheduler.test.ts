import { describe, expect, it, vi } from 'vitest';
import { Scheduler } from './scheduler.js';
import { Worker } from './worker.js';
import { RunLock } from './run-lock.js';
import { StatusStore } from './status-store.js';
import { JobRegistry } from './job-registry.js';
import { JobNotFoundError } from './errors.js';
import type { ScheduleSource } from './schedule-config.js';
import type { RunSink } from './run-log.js';
import type { CommandProcessor, ProcessorRequest, ProcessorResult } from '../processor/types.js';
import type { LoggerLike } from '../logging.js';

/** Processor whose runs stay open until the test finishes them. */
class ManualProcessor implements CommandProcessor {
  readonly calls: ProcessorRequest[] = [];
  private open: Array<(result: ProcessorResult) => void> = [];
  active = 0;
  maxActive = 0;

  run(req: ProcessorRequest): Promise<ProcessorResult> {
    this.calls.push(req);
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    return new Promise((resolve) => {
      this.open.push((result) => {
        this.active -= 1;
        resolve(result);
      });
    });
  }

  get openCount(): number {
    return this.open.length;
  }

  finishNext(result: ProcessorResult = { success: true }): void {
    const next = this.open.shift();
    if (!next) throw new Error('no open run');
    next(result);
  }
}

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

function setup(
  jobs: unknown[],
  opts: { start?: string; source?: ScheduleSource; log?: LoggerLike; sink?: RunSink } = {},
) {
  const now = new Date(opts.start ?? '2024-03-01T00:00:00Z');
  const lock = new RunLock();
  const store = new StatusStore();
  const processor = new ManualProcessor();
  const worker = new Worker({
    lock,
    store,
    processor,
    defaultTimeoutSeconds: 300,
    ...(opts.sink ? { sink: opts.sink } : {}),
  });
  const scheduler = new Scheduler({
    store,
    lock,
    worker,
    registry: JobRegistry.load({ jobs }),
    now: () => now,
    ...(opts.source ? { source: opts.source } : {}),
    ...(opts.log ? { log: opts.log } : {}),
  });
  return {
    lock,
    store,
    processor,
    worker,
    scheduler,
  };
}

async function finishAll(processor: ManualProcessor): Promise<void> {
  while (processor.openCount > 0) {
    processor.finishNext();
    await flush();
  }
}

describe('Scheduler.tick', () => {
  it('fires */15 at 00:00 and 00:15 but not 00:14', async () => {
    const { scheduler, processor } = setup(
      [{ id: 'q15', command: 'sweep', cron: '*/15 * * * *' }],
      { start: '2024-02-29T23:59:30Z' },
    );

    await scheduler.tick(new Date('2024-03-01T00:00:00Z'));
    expect(processor.calls).toHaveLength(1);
    await finishAll(processor);

    await scheduler.tick(new Date('2024-03-01T00:14:00Z'));
    expect(processor.calls).toHaveLength(1);

    await scheduler.tick(new Date('2024-03-01T00:15:00Z'));
    expect(processor.calls).toHaveLength(2);
    await finishAll(processor);
  });

  it('a disabled job never runs', async () => {
    const { scheduler, store, processor } = setup(
      [{ id: 'off', command: 'sweep', cron: '* * * * *', enabled: false }],
    );
    for (let i = 0; i < 100; i++) {
      await scheduler.tick(new Date(Date.UTC(2024, 2, 1, 0, i + 1)));
    }
    expect(processor.calls).toHaveLength(0);
    expect(store.get('off')?.lastRun).toBeNull();
    expect(store.get('off')?.totalRuns).toBe(0);
  });

  it('advances nextRunAt from the tick instead of replaying missed minutes', async () => {
    const { scheduler, store, processor } = setup(
      [{ id: 'm', command: 'sweep', cron: '* * * * *' }],
      { start: '2024-03-01T00:00:00Z' },
    );
    expect(store.get('m')?.nextRunAt?.toISOString()).toBe('2024-03-01T00:01:00.000Z');

    await scheduler.tick(new Date('2024-03-01T00:10:30Z'));
    expect(processor.calls).toHaveLength(1);
    expect(store.get('m')?.nextRunAt?.toISOString()).toBe('2024-03-01T00:11:00.000Z');
    await finishAll(processor);
  });

  it('skips a skip-mode job while its own run is active', async () => {
    const { scheduler, store, processor } = setup(
      [{ id: 'm', command: 'sweep', cron: '* * * * *' }],
    );
    await scheduler.tick(new Date('2024-03-01T00:01:00Z'));
    await scheduler.tick(new Date('2024-03-01T00:02:00Z'));
    expect(processor.calls).toHaveLength(1);
    expect(store.get('m')?.skippedRuns).toBe(1);
    expect(store.get('m')?.deferred).toBeNull();
    await finishAll(processor);
    expect(processor.calls).toHaveLength(1);
  });

  it('serializes jobs that fall due together', async () => {
    const { scheduler, processor, store } = setup([
      { id: 'a', command: 'one', cron: '* * * * *' },
      { id: 'b', command: 'two', cron: '* * * * *' },
      { id: 'c', command: 'three', cron: '* * * * *' },
    ]);
    await scheduler.tick(new Date('2024-03-01T00:01:00Z'));
    expect(processor.calls.map((c) => c.command)).toEqual(['one']);
    expect(store.get('b')?.deferred?.trigger).toBe('cron');

    await finishAll(processor);
    await scheduler.idle();

    expect(processor.calls.map((c) => c.command)).toEqual(['one', 'two', 'three']);
    expect(processor.maxActive).toBe(1);
    expect(store.get('b')?.lastRun?.trigger).toBe('queued-retry');
    expect(store.get('c')?.lastRun?.trigger).toBe('queued-retry');
  });

  it('skip jobs with use_vault_lock drop instead of deferring behind another job', async () => {
    const { scheduler, processor, store } = setup([
      { id: 'a', command: 'one', cron: '* * * * *' },
      { id: 'v', command: 'two', cron: '* * * * *', use_vault_lock: true },
    ]);
    await scheduler.tick(new Date('2024-03-01T00:01:00Z'));
    expect(store.get('v')?.skippedRuns).toBe(1);
    expect(store.get('v')?.deferred).toBeNull();
    await finishAll(processor);
    expect(processor.calls).toHaveLength(1);
  });

  it('fires a job whose cron matches the start-up minute', async () => {
    const { scheduler, store, processor } = setup(
      [{ id: 'q15', command: 'sweep', cron: '*/15 * * * *' }],
      { start: '2024-03-01T00:15:05Z' },
    );
    expect(store.get('q15')?.nextRunAt?.toISOString()).toBe('2024-03-01T00:30:00.000Z');

    await scheduler.tick(new Date('2024-03-01T00:15:05Z'));
    expect(processor.calls).toHaveLength(1);
    await finishAll(processor);

    // A second tick in the same minute does not fire again.
    await scheduler.tick(new Date('2024-03-01T00:15:35Z'));
    expect(processor.calls).toHaveLength(1);
    expect(store.get('q15')?.skippedRuns).toBe(0);
  });

  it('keeps dispatching the current jobs when a reload fails', async () => {
    const error = vi.fn();
    const log: LoggerLike = { info: vi.fn(), warn: vi.fn(), error };
    const source: ScheduleSource = {
      path: '/tmp/schedule.yaml',
      configError: null,
      loadIfChanged: async () => {
        throw new Error('EACCES');
      },
    };
    const { scheduler, processor } = setup([{ id: 'm', command: 'sweep', cron: '* * * * *' }], { source, log });
    for (let minute = 1; minute <= 5; minute++) {
      await scheduler.tick(new Date(Date.UTC(2024, 2, 1, 0, minute)));
      await finishAll(processor);
    }
    expect(processor.calls).toHaveLength(5);
    expect(error).toHaveBeenCalledWith(
      expect.objectContaining({ err: expect.any(Error), path: '/tmp/schedule.yaml' }),
      'schedule:reload failed, keeping current jobs',
    );
    expect(scheduler.status().configError).toBe('EACCES');
  });

  it('applies a changed registry from the source', async () => {
    let next: JobRegistry | null = JobRegistry.load({ jobs: [{ id: 'n', command: 'new', cron: '* * * * *' }] });
    const source: ScheduleSource = {
      path: '/tmp/schedule.yaml',
      configError: null,
      loadIfChanged: async () => {
        const r = next;
        next = null;
        return r;
      },
    };
    const { scheduler, processor } = setup([], { source });
    await scheduler.tick(new Date('2024-03-01T00:01:00Z'));
    expect(scheduler.jobs.has('n')).toBe(true);
    // nextRunAt was computed from the scheduler clock (00:00), so the job is due now.
    expect(processor.calls.map((c) => c.command)).toEqual(['new']);
    await finishAll(processor);
  });
});

describe('Scheduler.trigger', () => {
  it('starts an idle job and returns its run id', async () => {
    const { scheduler, store, processor } = setup([{ id: 'a', command: 'one', cron: '0 0 1 1 *' }]);
    const result = scheduler.trigger('a');
    expect(result.status).toBe('started');
    expect(result.runId).toBe(store.get('a')?.active?.runId);
    expect(processor.calls[0]?.command).toBe('one');
    await finishAll(processor);
    expect(store.get('a')?.lastRun?.trigger).toBe('manual');
  });

  it('queue mode accepts queue_max requests and rejects the next', async () => {
    const { scheduler, store, processor } = setup([
      { id: 'q', command: 'one', cron: '0 0 1 1 *', overlap: 'queue', queue_max: 2 },
    ]);
    expect(scheduler.trigger('q').status).toBe('started');
    expect(scheduler.trigger('q').status).toBe('queued');
    expect(scheduler.trigger('q').status).toBe('queued');
    expect(scheduler.trigger('q').status).toBe('queue_full');
    expect(store.get('q')?.queue.size).toBe(2);

    await finishAll(processor);
    await scheduler.idle();
    expect(processor.calls).toHaveLength(3);
    expect(store.get('q')?.totalRuns).toBe(3);
    expect(store.get('q')?.lastRun?.trigger).toBe('queued-retry');
  });

  it('serves a queued request before a newer one while the finished run is still being logged', async () => {
    let openGate: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      openGate = resolve;
    });
    const sink: RunSink = { append: () => gate };
    const { scheduler, store, processor, lock } = setup(
      [{ id: 'q', command: 'one', cron: '0 0 1 1 *', overlap: 'queue', queue_max: 1 }],
      { sink },
    );
    expect(scheduler.trigger('q').status).toBe('started');
    expect(scheduler.trigger('q').status).toBe('queued');

    processor.finishNext();
    await flush();
    // First run has released the lock and is waiting on the run log.
    expect(lock.isHeld).toBe(false);
    expect(store.get('q')?.queue.size).toBe(1);

    expect(scheduler.trigger('q').status).toBe('queued');
    expect(store.get('q')?.active?.trigger).toBe('queued-retry');
    expect(processor.calls).toHaveLength(2);

    openGate();
    await finishAll(processor);
    await scheduler.idle();
    expect(processor.calls).toHaveLength(3);
    expect(processor.maxActive).toBe(1);
  });

  it('queue mode drops cron requests past the limit and counts them as skipped', async () => {
    const { scheduler, store, processor } = setup([
      { id: 'q', command: 'one', cron: '* * * * *', overlap: 'queue', queue_max: 1 },
    ]);
    await scheduler.tick(new Date('2024-03-01T00:01:00Z'));
    await scheduler.tick(new Date('2024-03-01T00:02:00Z'));
    await scheduler.tick(new Date('2024-03-01T00:03:00Z'));
    expect(store.get('q')?.queue.size).toBe(1);
    expect(store.get('q')?.skippedRuns).toBe(1);
    await finishAll(processor);
    await scheduler.idle();
    expect(processor.calls).toHaveLength(2);
  });

  it('a manual trigger while another job runs reports busy for skip jobs', async () => {
    const { scheduler, processor, store } = setup([
      { id: 'a', command: 'one', cron: '* * * * *' },
      { id: 'b', command: 'two', cron: '0 0 1 1 *' },
    ]);
    await scheduler.tick(new Date('2024-03-01T00:01:00Z'));
    expect(scheduler.trigger('b')).toEqual({ status: 'busy' });
    expect(processor.calls.map((c) => c.command)).toEqual(['one']);
    expect(store.get('b')?.deferred).toBeNull();
    await finishAll(processor);
    expect(processor.calls).toHaveLength(1);
  });

  it('reports disabled jobs and throws for unknown ids', () => {
    const { scheduler } = setup([{ id: 'off', command: 'one', cron: '* * * * *', enabled: false }]);
    expect(scheduler.trigger('off')).toEqual({ status: 'disabled' });
    expect(() => scheduler.trigger('ghost')).toThrow(JobNotFoundError);
  });

  it('concurrent triggers across jobs never overlap', async () => {
    const jobs = Array.from({ length: 5 }, (_, i) => ({
      id: `j${i}`,
      command: `c${i}`,
      cron: '0 0 1 1 *',
      overlap: 'queue',
      queue_max: 3,
    }));
    const { scheduler, processor, lock } = setup(jobs);
    for (let round = 0; round < 3; round++) {
      for (const job of jobs) scheduler.trigger(job.id);
    }
    await finishAll(processor);
    await scheduler.idle();
    expect(processor.maxActive).toBe(1);
    expect(processor.calls).toHaveLength(15);
    expect(lock.isHeld).toBe(false);
  });
});

describe('Scheduler.cancel', () => {
  it('cancels the active run, clears the queue and frees the lock', async () => {
    const { scheduler, store, lock, processor } = setup([
      { id: 'q', command: 'one', cron: '0 0 1 1 *', overlap: 'queue', queue_max: 3 },
    ]);
    scheduler.trigger('q');
    scheduler.trigger('q');
    scheduler.trigger('q');

    expect(scheduler.cancel('q')).toEqual({ cancelled: true, wasRunning: true, clearedQueueCount: 2 });
    await scheduler.idle();

    expect(lock.isHeld).toBe(false);
    expect(store.get('q')?.lastRun?.status).toBe('cancelled');
    expect(processor.calls).toHaveLength(1);
    expect(processor.calls[0]?.signal.aborted).toBe(true);
  });

  it('is idempotent for an idle job', () => {
    const { scheduler } = setup([{ id: 'a', command: 'one', cron: '* * * * *' }]);
    expect(scheduler.cancel('a')).toEqual({ cancelled: true, wasRunning: false, clearedQueueCount: 0 });
    expect(scheduler.cancel('a')).toEqual({ cancelled: true, wasRunning: false, clearedQueueCount: 0 });
  });

  it('throws for unknown ids', () => {
    const { scheduler } = setup([]);
    expect(() => scheduler.cancel('ghost')).toThrow("Job 'ghost' not found");
  });
});

describe('Scheduler.applyRegistry', () => {
  it('cancels the run of a removed job', async () => {
    const { scheduler, store, processor, lock } = setup([{ id: 'a', command: 'one', cron: '0 0 1 1 *' }]);
    scheduler.trigger('a');
    scheduler.applyRegistry(JobRegistry.load({ jobs: [] }));
    expect(store.has('a')).toBe(false);
    expect(processor.calls[0]?.signal.aborted).toBe(true);
    await scheduler.idle();
    expect(lock.isHeld).toBe(false);
  });

  it('drops pending requests of a job that becomes disabled', () => {
    const { scheduler, store } = setup([
      { id: 'a', command: 'one', cron: '0 0 1 1 *' },
      { id: 'q', command: 'two', cron: '0 0 1 1 *', overlap: 'queue', queue_max: 2 },
    ]);
    scheduler.trigger('a');
    scheduler.trigger('q');
    expect(store.get('q')?.queue.size).toBe(1);
    scheduler.applyRegistry(JobRegistry.load({
      jobs: [
        { id: 'a', command: 'one', cron: '0 0 1 1 *' },
        { id: 'q', command: 'two', cron: '0 0 1 1 *', overlap: 'queue', queue_max: 2, enabled: false },
      ],
    }));
    expect(store.get('q')?.queue.size).toBe(0);
    expect(store.get('q')?.nextRunAt).toBeNull();
    scheduler.cancel('a');
  });
});

describe('Scheduler lifecycle', () => {
  it('stop cancels the active run and waits for it', async () => {
    const { scheduler, lock, store } = setup([{ id: 'a', command: 'one', cron: '0 0 1 1 *' }]);
    scheduler.trigger('a');
    await scheduler.stop();
    expect(lock.isHeld).toBe(false);
    expect(store.get('a')?.lastRun?.status).toBe('cancelled');
    expect(store.get('a')?.lastRun?.error).toBe('Cancelled (shutdown)');
    expect(scheduler.trigger('a')).toEqual({ status: 'busy' });
  });

  it('start ticks on an interval until stopped', async () => {
    vi.useFakeTimers();
    try {
      const tick = vi.fn(async () => {});
      const { scheduler } = setup([]);
      const spy = vi.spyOn(scheduler, 'tick').mockImplementation(tick);
      scheduler.start();
      expect(spy).toHaveBeenCalledTimes(1);
      await vi.advanceTimersByTimeAsync(30_000);
      expect(spy).toHaveBeenCalledTimes(2);
      await scheduler.stop();
      await vi.advanceTimersByTimeAsync(60_000);
      expect(spy).toHaveBeenCalledTimes(2);
    } finally {
      vi.useRealTimers();
    }
  });

  it('status includes the document timezone and load issues', () => {
    const { scheduler } = setup([
      { id: 'a', command: 'one', cron: '* * * * *' },
      { id: 'a', command: 'dup', cron: '* * * * *' },
    ]);
    const status = scheduler.status();
    expect(status.timezone).toBe('UTC');
    expect(status.configPath).toBeNull();
    expect(status.configError).toBeNull();
    expect(status.issues).toHaveLength(1);
    expect(status.issues[0]?.error.code).toBe('DUPLICATE_JOB');
    expect(status.jobs.map((j) => j.id)).toEqual(['a']);
  });
});
