export type ProcessorOverrides = {
  model?: string;
  maxBudgetUsd?: number;
};

export type ProcessorRequest = {
  command: string;
  arguments?: string;
  overrides: ProcessorOverrides;
  /** Aborted on timeout or cancellation; implementations should stop promptly. */
  signal: AbortSignal;
  timeoutMs: number;
  deadline: Date;
};

export type ProcessorResult = {
  success: boolean;
  error?: string;
  costUsd?: number;
};

/**
 * The opaque unit of work behind a job's command. The scheduler never looks
 * inside; it only needs a settle-able, cancellable call.
 */
export interface CommandProcessor {
  run(request: ProcessorRequest): Promise<ProcessorResult>;
}
