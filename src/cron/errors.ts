export type SchedulerErrorCode =
  | 'INVALID_SCHEDULE'
  | 'DUPLICATE_JOB'
  | 'INVALID_CONFIG'
  | 'PROCESSOR_FAILED'
  | 'RUN_TIMEOUT'
  | 'RUN_CANCELLED'
  | 'RUN_LOCK_VIOLATION'
  | 'JOB_NOT_FOUND';

export class SchedulerError extends Error {
  readonly code: SchedulerErrorCode;
  readonly context: Record<string, unknown>;

  constructor(code: SchedulerErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'SchedulerError';
    this.code = code;
    this.context = context;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/** Malformed or never-firing cron expression. Raised at load time only. */
export class InvalidScheduleError extends SchedulerError {
  constructor(cron: string, reason: string, context: Record<string, unknown> = {}) {
    super('INVALID_SCHEDULE', `Invalid cron expression "${cron}": ${reason}`, { cron, ...context });
    this.name = 'InvalidScheduleError';
  }
}

export class DuplicateJobError extends SchedulerError {
  constructor(jobId: string) {
    super('DUPLICATE_JOB', `Duplicate job id: ${jobId}`, { jobId });
    this.name = 'DuplicateJobError';
  }
}

export class InvalidConfigError extends SchedulerError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super('INVALID_CONFIG', message, context);
    this.name = 'InvalidConfigError';
  }
}

export class ProcessorError extends SchedulerError {
  constructor(jobId: string, message: string) {
    super('PROCESSOR_FAILED', message, { jobId });
    this.name = 'ProcessorError';
  }
}

export class RunTimeoutError extends SchedulerError {
  readonly timeoutMs: number;

  constructor(jobId: string, timeoutMs: number) {
    super('RUN_TIMEOUT', `Timed out after ${formatSeconds(timeoutMs)}`, { jobId, timeoutMs });
    this.name = 'RunTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class RunCancelledError extends SchedulerError {
  constructor(jobId: string, reason = 'cancelled') {
    super('RUN_CANCELLED', reason === 'cancelled' ? 'Cancelled' : `Cancelled (${reason})`, { jobId, reason });
    this.name = 'RunCancelledError';
  }
}

/** The worker was asked to run while another run holds the lock. */
export class RunLockViolationError extends SchedulerError {
  constructor(jobId: string, holder: string | null) {
    super('RUN_LOCK_VIOLATION', `Run lock already held by "${holder ?? 'unknown'}" (requested by "${jobId}")`, { jobId, holder });
    this.name = 'RunLockViolationError';
  }
}

export class JobNotFoundError extends SchedulerError {
  constructor(jobId: string) {
    super('JOB_NOT_FOUND', `Job '${jobId}' not found`, { jobId });
    this.name = 'JobNotFoundError';
  }
}

function formatSeconds(ms: number): string {
  const s = ms / 1000;
  return Number.isInteger(s) ? `${s}s` : `${s.toFixed(1)}s`;
}
