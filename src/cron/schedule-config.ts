import fs from 'node:fs/promises';
import YAML from 'yaml';
import { z } from 'zod';
import type { LoggerLike } from '../logging.js';
import { InvalidConfigError } from './errors.js';
import { JobRegistry, type ScheduleDocument } from './job-registry.js';

// Entries stay `unknown` here; JobRegistry validates each one on its own.
const scheduleDocumentSchema = z.object({
  timezone: z.string().trim().min(1, 'timezone must be a non-empty string').nullish(),
  jobs: z.array(z.unknown(), { invalid_type_error: 'jobs must be a list' }).nullish(),
});

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Parse the YAML schedule document. An empty document means no jobs; invalid
 * YAML or a malformed top level throws InvalidConfigError.
 */
export function parseScheduleDocument(text: string): ScheduleDocument {
  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (err) {
    throw new InvalidConfigError(`Schedule is not valid YAML: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (raw == null) return { jobs: [] };

  const parsed = scheduleDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new InvalidConfigError(`Schedule document is malformed: ${detail}`);
  }
  return {
    ...(parsed.data.timezone ? { timezone: parsed.data.timezone } : {}),
    jobs: parsed.data.jobs ?? [],
  };
}

/** Where the scheduler gets its job set from. */
export interface ScheduleSource {
  readonly path: string | null;
  /** Last load problem; the previous registry stays in effect while set. */
  readonly configError: string | null;
  /** A fresh registry when the document changed since the last call, else null. */
  loadIfChanged(): Promise<JobRegistry | null>;
}

/**
 * Schedule document on disk, re-read when its mtime changes. A missing file
 * yields an empty registry; a broken one keeps the last good registry.
 */
export class ScheduleFile implements ScheduleSource {
  private loaded = false;
  private mtimeMs: number | null = null;
  private error: string | null = null;

  constructor(
    readonly path: string,
    private readonly log?: LoggerLike,
  ) {}

  get configError(): string | null {
    return this.error;
  }

  async loadIfChanged(): Promise<JobRegistry | null> {
    let mtimeMs: number;
    try {
      mtimeMs = (await fs.stat(this.path)).mtimeMs;
    } catch (err) {
      if (!isMissingFile(err)) throw err;
      if (this.loaded && this.mtimeMs === null) return null;
      this.loaded = true;
      this.mtimeMs = null;
      this.error = null;
      this.log?.info({ path: this.path }, 'schedule:file missing, no jobs');
      return JobRegistry.empty();
    }

    if (this.loaded && this.mtimeMs === mtimeMs) return null;
    this.loaded = true;
    this.mtimeMs = mtimeMs;

    try {
      const text = await fs.readFile(this.path, 'utf-8');
      const registry = JobRegistry.load(parseScheduleDocument(text));
      this.error = null;
      this.log?.info(
        { path: this.path, jobs: registry.size, issues: registry.issues.length, timezone: registry.timezone },
        'schedule:loaded',
      );
      return registry;
    } catch (err) {
      if (!(err instanceof InvalidConfigError)) throw err;
      this.error = err.message;
      this.log?.error({ path: this.path, err }, 'schedule:load failed, keeping previous jobs');
      return null;
    }
  }
}
