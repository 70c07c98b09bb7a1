import { Cron } from 'croner';
import { InvalidScheduleError } from './errors.js';

export const DEFAULT_TIMEZONE = 'UTC';

const MINUTE_MS = 60_000;

export function isValidTimezone(tz: string): boolean {
  if (!tz.trim()) return false;
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

/** Job timezone wins, then the document timezone, then UTC. */
export function resolveTimezone(jobTz?: string, documentTz?: string): string {
  return jobTz?.trim() || documentTz?.trim() || DEFAULT_TIMEZONE;
}

function compile(cron: string, tz: string): Cron {
  // Paused and handler-less: croner never arms a timer for this instance.
  return new Cron(cron, { timezone: tz, paused: true });
}

/**
 * Reject anything that is not a five-field expression croner accepts and that
 * fires at least once. Called at load time so a broken job never reaches a tick.
 */
export function validateCron(cron: string, tz: string = DEFAULT_TIMEZONE): void {
  const fields = cron.trim().split(/\s+/).filter(Boolean);
  if (fields.length !== 5) {
    throw new InvalidScheduleError(cron, `expected 5 fields, got ${fields.length}`);
  }
  if (!isValidTimezone(tz)) {
    throw new InvalidScheduleError(cron, `unknown timezone "${tz}"`, { timezone: tz });
  }

  let next: Date | null;
  try {
    const compiled = compile(cron, tz);
    next = compiled.nextRun(new Date());
    compiled.stop();
  } catch (err) {
    throw new InvalidScheduleError(cron, err instanceof Error ? err.message : String(err));
  }
  if (!next) {
    throw new InvalidScheduleError(cron, 'expression never fires');
  }
}

/** First matching minute strictly after `after`, or null if there is none. */
export function nextRun(cron: string, after: Date, tz: string = DEFAULT_TIMEZONE): Date | null {
  const compiled = compile(cron, tz);
  try {
    return compiled.nextRun(after);
  } finally {
    compiled.stop();
  }
}

export function minuteStart(at: Date): Date {
  return new Date(Math.floor(at.getTime() / MINUTE_MS) * MINUTE_MS);
}

/** True when the minute containing `now` matches the expression in `tz`. */
export function isDue(cron: string, now: Date, tz: string = DEFAULT_TIMEZONE): boolean {
  const start = minuteStart(now);
  const candidate = nextRun(cron, new Date(start.getTime() - 1), tz);
  return candidate != null && candidate.getTime() === start.getTime();
}
