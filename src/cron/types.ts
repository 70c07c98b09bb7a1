export type OverlapMode = 'skip' | 'queue';

export type Job = Readonly<{
  id: string;
  command: string;            // opaque, optionally "namespace:command"
  arguments?: string;
  cron: string;               // 5-field cron expression (e.g., "0 7 * * 1-5")
  timezone: string;           // resolved IANA timezone (job -> document -> UTC)
  overlap: OverlapMode;
  queueMax: number;
  timeoutSeconds?: number;
  maxBudgetUsd?: number;
  model?: string;
  enabled: boolean;
  useVaultLock: boolean;
}>;

export type RunTrigger = 'cron' | 'manual' | 'queued-retry';

export type RunRequest = Readonly<{
  jobId: string;
  trigger: RunTrigger;
  enqueuedAt: Date;
}>;

export type RunStatus = 'success' | 'failure' | 'timeout' | 'cancelled';

// "abandoned": the worker stopped waiting but the processor has not settled yet.
export type ProcessorState = 'stopped' | 'abandoned';

export type RunRecord = {
  runId: string;
  jobId: string;
  trigger: RunTrigger;
  startedAt: Date;
  finishedAt: Date;
  status: RunStatus;
  error?: string;
  durationMs: number;
  costUsd?: number;
  processorState: ProcessorState;
};
