import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { RunRecord } from './types.js';

export const runLogEntrySchema = z.object({
  run_id: z.string(),
  job_id: z.string(),
  trigger: z.enum(['cron', 'manual', 'queued-retry']),
  started_at: z.string(),
  finished_at: z.string(),
  status: z.enum(['success', 'failure', 'timeout', 'cancelled']),
  error: z.string().nullable(),
  duration_seconds: z.number(),
  cost_usd: z.number().nullable(),
  processor_state: z.enum(['stopped', 'abandoned']),
});

export type RunLogEntry = z.infer<typeof runLogEntrySchema>;

export function serializeRunRecord(record: RunRecord): RunLogEntry {
  return {
    run_id: record.runId,
    job_id: record.jobId,
    trigger: record.trigger,
    started_at: record.startedAt.toISOString(),
    finished_at: record.finishedAt.toISOString(),
    status: record.status,
    error: record.error ?? null,
    duration_seconds: Math.round(record.durationMs) / 1000,
    cost_usd: record.costUsd ?? null,
    processor_state: record.processorState,
  };
}

/** Where finished runs are persisted. The worker treats failures here as non-fatal. */
export interface RunSink {
  append(record: RunRecord): Promise<void>;
}

/** Append-only JSON-lines audit of finished runs. */
export class RunLog implements RunSink {
  constructor(readonly filePath: string) {}

  async append(record: RunRecord): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.appendFile(this.filePath, JSON.stringify(serializeRunRecord(record)) + '\n', 'utf-8');
  }

  /** Newest first. Unreadable lines are skipped. */
  async recent(limit: number): Promise<RunLogEntry[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
      throw err;
    }

    const entries: RunLogEntry[] = [];
    const lines = raw.split('\n');
    for (let i = lines.length - 1; i >= 0 && entries.length < limit; i--) {
      const line = lines[i]?.trim();
      if (!line) continue;
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        continue;
      }
      const entry = runLogEntrySchema.safeParse(parsed);
      if (entry.success) entries.push(entry.data);
    }
    return entries;
  }
}
