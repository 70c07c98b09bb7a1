import type { FastifyInstance } from 'fastify';
import type { Scheduler } from '../cron/scheduler.js';
import type { JobStatus } from '../cron/status-store.js';
import type { RunLogEntry } from '../cron/run-log.js';
import { serializeRunRecord } from '../cron/run-log.js';
import { JobNotFoundError } from '../cron/errors.js';

export const DEFAULT_RUNS_LIMIT = 20;
export const MAX_RUNS_LIMIT = 200;

export type RecentRuns = {
  recent(limit: number): Promise<RunLogEntry[]>;
};

function roundSeconds(s: number | null): number | null {
  return s == null ? null : Math.round(s * 1000) / 1000;
}

function formatJob(j: JobStatus) {
  const lastRun = j.lastRun ? serializeRunRecord(j.lastRun) : null;
  return {
    id: j.id,
    command: j.command,
    arguments: j.arguments,
    cron: j.cron,
    timezone: j.timezone,
    enabled: j.enabled,
    overlap: j.overlap,
    queue_max: j.queueMax,
    use_vault_lock: j.useVaultLock,
    running: j.running,
    started_at: j.startedAt?.toISOString() ?? null,
    elapsed_seconds: roundSeconds(j.elapsedSeconds),
    next_run_at: j.nextRunAt?.toISOString() ?? null,
    queued_count: j.queuedCount,
    deferred: j.deferred,
    skipped_runs: j.skippedRuns,
    total_runs: j.totalRuns,
    total_failures: j.totalFailures,
    last_run: lastRun
      ? {
          run_id: lastRun.run_id,
          trigger: lastRun.trigger,
          started_at: lastRun.started_at,
          finished_at: lastRun.finished_at,
          status: lastRun.status,
          error: lastRun.error,
          duration_seconds: lastRun.duration_seconds,
          cost_usd: lastRun.cost_usd,
          processor_state: lastRun.processor_state,
        }
      : null,
  };
}

function parseLimit(raw: string | undefined): number | null {
  if (raw == null || raw.trim() === '') return DEFAULT_RUNS_LIMIT;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) return null;
  return Math.min(n, MAX_RUNS_LIMIT);
}

export function registerScheduleRoutes(
  app: FastifyInstance,
  scheduler: Scheduler,
  runs: RecentRuns,
): void {
  // GET /api/v1/schedule/status
  app.get('/api/v1/schedule/status', async () => {
    const status = scheduler.status();
    return {
      timezone: status.timezone,
      config_path: status.configPath,
      config_error: status.configError,
      is_running: status.isRunning,
      active_job_id: status.activeJobId,
      elapsed_seconds: roundSeconds(status.elapsedSeconds),
      issues: status.issues.map((issue) => ({
        index: issue.index,
        job_id: issue.jobId ?? null,
        error: issue.error.code,
        message: issue.error.message,
      })),
      jobs: status.jobs.map(formatJob),
    };
  });

  // POST /api/v1/schedule/jobs/:id/cancel
  app.post<{ Params: { id: string } }>('/api/v1/schedule/jobs/:id/cancel', async (req, reply) => {
    try {
      const result = scheduler.cancel(req.params.id);
      return {
        cancelled: result.cancelled,
        was_running: result.wasRunning,
        cleared_queue_count: result.clearedQueueCount,
      };
    } catch (err) {
      if (err instanceof JobNotFoundError) return reply.notFound(err.message);
      throw err;
    }
  });

  // POST /api/v1/schedule/jobs/:id/trigger: 202 when accepted, 409 when it cannot run now.
  app.post<{ Params: { id: string } }>('/api/v1/schedule/jobs/:id/trigger', async (req, reply) => {
    try {
      const result = scheduler.trigger(req.params.id);
      const accepted = result.status === 'started' || result.status === 'queued';
      return reply.status(accepted ? 202 : 409).send({
        status: result.status,
        ...(result.runId ? { run_id: result.runId } : {}),
      });
    } catch (err) {
      if (err instanceof JobNotFoundError) return reply.notFound(err.message);
      throw err;
    }
  });

  // GET /api/v1/schedule/runs?limit=N
  app.get<{ Querystring: { limit?: string } }>('/api/v1/schedule/runs', async (req, reply) => {
    const limit = parseLimit(req.query.limit);
    if (limit == null) return reply.badRequest('limit must be a positive integer');
    return { runs: await runs.recent(limit) };
  });
}
