import process from 'node:process';
import { execa } from 'execa';
import { z } from 'zod';
import type { LoggerLike } from '../logging.js';
import type { CommandCatalog } from './command-catalog.js';
import type { CommandProcessor, ProcessorRequest, ProcessorResult } from './types.js';

export type SpawnOptions = {
  cwd: string;
  timeout: number;
  cancelSignal: AbortSignal;
  forceKillAfterDelay: number;
  env: Record<string, string | undefined>;
};

export type SpawnResult = {
  exitCode: number | undefined;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  isCanceled: boolean;
  message?: string;
};

/** Runs a subprocess to completion. Never rejects; failures are in the result. */
export type Spawn = (file: string, args: string[], options: SpawnOptions) => Promise<SpawnResult>;

export const execaSpawn: Spawn = async (file, args, options) => {
  const result = await execa(file, args, {
    cwd: options.cwd,
    timeout: options.timeout,
    cancelSignal: options.cancelSignal,
    forceKillAfterDelay: options.forceKillAfterDelay,
    env: options.env,
    reject: false,
    // An inherited stdin can block on an auth prompt.
    stdin: 'ignore',
    stdout: 'pipe',
    stderr: 'pipe',
  });
  return {
    exitCode: result.exitCode,
    stdout: String(result.stdout ?? ''),
    stderr: String(result.stderr ?? ''),
    timedOut: result.timedOut,
    isCanceled: result.isCanceled,
    ...(result instanceof Error ? { message: result.message } : {}),
  };
};

export type CliProcessorOpts = {
  bin: string;
  cwd: string;
  dangerouslySkipPermissions: boolean;
  killGraceMs: number;
  /** When set, commands missing from the catalog fail without spawning. */
  catalog?: CommandCatalog;
  spawn?: Spawn;
  log?: LoggerLike;
};

const resultSchema = z.object({
  is_error: z.boolean().optional(),
  result: z.string().optional(),
  total_cost_usd: z.number().optional(),
  subtype: z.string().optional(),
});

export type ParsedOutput = {
  isError: boolean;
  result?: string;
  costUsd?: number;
};

/** The slash-command prompt handed to the CLI. */
export function formatPrompt(command: string, args?: string): string {
  const trimmed = args?.trim();
  return trimmed ? `/${command} ${trimmed}` : `/${command}`;
}

export function buildProcessorArgs(request: Pick<ProcessorRequest, 'command' | 'arguments' | 'overrides'>, skipPermissions: boolean): string[] {
  const args = ['-p', '--output-format', 'json'];
  if (request.overrides.model) args.push('--model', request.overrides.model);
  if (request.overrides.maxBudgetUsd != null) {
    args.push('--max-budget-usd', String(request.overrides.maxBudgetUsd));
  }
  if (skipPermissions) args.push('--dangerously-skip-permissions');
  // `--` keeps a prompt that starts with a dash from being read as a flag.
  args.push('--', formatPrompt(request.command, request.arguments));
  return args;
}

function tryParse(text: string): ParsedOutput | null {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return null;
  }
  const parsed = resultSchema.safeParse(raw);
  if (!parsed.success) return null;
  const { is_error, result, total_cost_usd, subtype } = parsed.data;
  return {
    isError: is_error === true || (subtype != null && subtype.startsWith('error')),
    ...(result != null ? { result } : {}),
    ...(total_cost_usd != null ? { costUsd: total_cost_usd } : {}),
  };
}

/**
 * Parse the CLI's JSON result. The whole output is tried first, then the last
 * non-empty line (some versions print warnings ahead of the result).
 */
export function parseProcessorOutput(stdout: string): ParsedOutput | null {
  const text = stdout.trim();
  if (!text) return null;
  const whole = tryParse(text);
  if (whole) return whole;
  const lines = text.split('\n').map((l) => l.trim()).filter(Boolean);
  const last = lines[lines.length - 1];
  return last ? tryParse(last) : null;
}

function tail(text: string, max = 400): string {
  const trimmed = text.trim();
  return trimmed.length > max ? trimmed.slice(-max) : trimmed;
}

export function interpretSpawnResult(result: SpawnResult, timeoutMs: number): ProcessorResult {
  if (result.isCanceled) return { success: false, error: 'Cancelled' };
  if (result.timedOut) return { success: false, error: `Processor timed out after ${timeoutMs}ms` };

  const parsed = parseProcessorOutput(result.stdout);
  const cost = parsed?.costUsd != null ? { costUsd: parsed.costUsd } : {};

  if (parsed?.isError) {
    return { success: false, error: parsed.result || 'Processor reported an error', ...cost };
  }
  if (result.exitCode === 0) return { success: true, ...cost };

  const detail = tail(result.stderr) || parsed?.result || result.message || '';
  return {
    success: false,
    error: `Processor exited with code ${result.exitCode ?? 'unknown'}${detail ? `: ${detail}` : ''}`,
    ...cost,
  };
}

/** Runs each job's command as a one-shot, non-interactive CLI invocation in the workspace. */
export function createCliProcessor(opts: CliProcessorOpts): CommandProcessor {
  const spawn = opts.spawn ?? execaSpawn;

  return {
    async run(request: ProcessorRequest): Promise<ProcessorResult> {
      if (opts.catalog && !(await opts.catalog.has(request.command))) {
        return { success: false, error: `Unknown command: /${request.command}` };
      }
      if (request.signal.aborted) return { success: false, error: 'Cancelled before start' };

      const args = buildProcessorArgs(request, opts.dangerouslySkipPermissions);
      opts.log?.debug?.({ bin: opts.bin, args: args.slice(0, -1), command: request.command }, 'processor:spawn');

      const result = await spawn(opts.bin, args, {
        cwd: opts.cwd,
        timeout: request.timeoutMs,
        cancelSignal: request.signal,
        forceKillAfterDelay: opts.killGraceMs,
        env: {
          ...process.env,
          NO_COLOR: process.env.NO_COLOR ?? '1',
          FORCE_COLOR: process.env.FORCE_COLOR ?? '0',
          TERM: process.env.TERM ?? 'dumb',
        },
      });

      const outcome = interpretSpawnResult(result, request.timeoutMs);
      opts.log?.debug?.({ command: request.command, exitCode: result.exitCode, success: outcome.success }, 'processor:exit');
      return outcome;
    },
  };
}
