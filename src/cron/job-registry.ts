import { z } from 'zod';
import type { Job } from './types.js';
import { isValidTimezone, resolveTimezone, validateCron } from './cron-engine.js';
import {
  DuplicateJobError,
  InvalidConfigError,
  InvalidScheduleError,
  SchedulerError,
} from './errors.js';

const noWhitespace = (v: string) => !/\s/.test(v);

/** Longest run timeout a Node timer can hold (2^31 - 1 ms, in whole seconds). */
export const MAX_TIMEOUT_SECONDS = 2_147_483;

/** One `jobs[]` entry of the schedule document, as written in YAML. */
export const jobEntrySchema = z.object({
  id: z.string()
    .min(1, 'id must be a non-empty string')
    .refine(noWhitespace, 'id must not contain whitespace'),
  command: z.string()
    .trim()
    .min(1, 'command must be a non-empty string')
    .refine((v) => !v.startsWith('/'), "command must not include leading '/'")
    .refine(noWhitespace, 'command must not contain whitespace'),
  arguments: z.string().nullish(),
  cron: z.string().trim().min(1, 'cron must be a non-empty string'),
  timezone: z.string().trim().min(1).nullish(),
  overlap: z.enum(['skip', 'queue']).default('skip'),
  queue_max: z.number().int('queue_max must be an integer').min(0, 'queue_max must be >= 0').default(1),
  timeout_seconds: z.number()
    .int()
    .positive('timeout_seconds must be a positive integer')
    .max(MAX_TIMEOUT_SECONDS, `timeout_seconds must be at most ${MAX_TIMEOUT_SECONDS}`)
    .nullish(),
  max_budget_usd: z.number().positive('max_budget_usd must be positive').nullish(),
  model: z.string().trim().min(1).nullish(),
  enabled: z.boolean().default(true),
  use_vault_lock: z.boolean().default(false),
});

export type JobEntry = z.infer<typeof jobEntrySchema>;

export type ScheduleDocument = {
  timezone?: string;
  jobs: readonly unknown[];
};

export type JobLoadIssue = {
  index: number;
  jobId?: string;
  error: SchedulerError;
};

function formatZodError(err: z.ZodError): string {
  return err.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'entry'}: ${issue.message}`)
    .join('; ');
}

function rawId(entry: unknown): string | undefined {
  if (entry && typeof entry === 'object' && 'id' in entry) {
    const id = entry.id;
    if (typeof id === 'string' && id) return id;
  }
  return undefined;
}

function toJob(entry: JobEntry, documentTz: string): Job {
  const timezone = resolveTimezone(entry.timezone ?? undefined, documentTz);
  if (!isValidTimezone(timezone)) {
    throw new InvalidConfigError(`Invalid timezone: ${timezone}`, { jobId: entry.id, timezone });
  }
  if (entry.overlap === 'queue' && entry.queue_max < 1) {
    throw new InvalidConfigError('queue_max must be at least 1 when overlap is "queue"', {
      jobId: entry.id,
      queueMax: entry.queue_max,
    });
  }
  validateCron(entry.cron, timezone);

  return Object.freeze({
    id: entry.id,
    command: entry.command,
    ...(entry.arguments ? { arguments: entry.arguments } : {}),
    cron: entry.cron,
    timezone,
    overlap: entry.overlap,
    queueMax: entry.queue_max,
    ...(entry.timeout_seconds != null ? { timeoutSeconds: entry.timeout_seconds } : {}),
    ...(entry.max_budget_usd != null ? { maxBudgetUsd: entry.max_budget_usd } : {}),
    ...(entry.model ? { model: entry.model } : {}),
    enabled: entry.enabled,
    useVaultLock: entry.use_vault_lock,
  });
}

/**
 * Immutable, validated job set. A reload builds a new registry and the
 * scheduler swaps it in whole, so a tick never sees a half-applied job list.
 */
export class JobRegistry {
  private readonly jobs: ReadonlyMap<string, Job>;
  readonly timezone: string;
  readonly issues: readonly JobLoadIssue[];

  private constructor(jobs: Map<string, Job>, timezone: string, issues: JobLoadIssue[]) {
    this.jobs = jobs;
    this.timezone = timezone;
    this.issues = Object.freeze(issues);
  }

  static empty(timezone = resolveTimezone()): JobRegistry {
    return new JobRegistry(new Map(), timezone, []);
  }

  /**
   * Validate every entry on its own: a bad entry is recorded as an issue and
   * left out, the rest still load. Only a bad document timezone fails the
   * whole load.
   */
  static load(doc: ScheduleDocument): JobRegistry {
    const documentTz = resolveTimezone(undefined, doc.timezone);
    if (!isValidTimezone(documentTz)) {
      throw new InvalidConfigError(`Invalid timezone: ${documentTz}`, { timezone: documentTz });
    }

    const jobs = new Map<string, Job>();
    const issues: JobLoadIssue[] = [];

    doc.jobs.forEach((raw, index) => {
      const jobId = rawId(raw);
      const parsed = jobEntrySchema.safeParse(raw);
      if (!parsed.success) {
        issues.push({
          index,
          jobId,
          error: new InvalidConfigError(formatZodError(parsed.error), { index, jobId }),
        });
        return;
      }

      const entry = parsed.data;
      if (jobs.has(entry.id)) {
        issues.push({ index, jobId: entry.id, error: new DuplicateJobError(entry.id) });
        return;
      }

      try {
        jobs.set(entry.id, toJob(entry, documentTz));
      } catch (err) {
        if (err instanceof InvalidScheduleError || err instanceof InvalidConfigError) {
          issues.push({ index, jobId: entry.id, error: err });
          return;
        }
        throw err;
      }
    });

    return new JobRegistry(jobs, documentTz, issues);
  }

  get size(): number {
    return this.jobs.size;
  }

  get(id: string): Job | undefined {
    return this.jobs.get(id);
  }

  has(id: string): boolean {
    return this.jobs.has(id);
  }

  list(): Job[] {
    return Array.from(this.jobs.values());
  }
}
