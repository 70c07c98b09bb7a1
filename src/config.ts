import path from 'node:path';
import process from 'node:process';
import { MAX_TIMEOUT_SECONDS } from './cron/job-registry.js';

type ParseResult = {
  config: SerialcronConfig;
  warnings: string[];
  infos: string[];
};

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type SerialcronConfig = {
  workspaceCwd: string;
  schedulePath: string;
  dataDir: string;
  runLogPath: string;

  tickMs: number;
  defaultTimeoutSeconds: number;

  serverEnabled: boolean;
  serverHost: string;
  serverPort: number;

  processorBin: string;
  dangerouslySkipPermissions: boolean;
  processorKillGraceMs: number;
  commandCheck: boolean;

  logLevel: LogLevel;
};

const LOOPBACK_HOSTS = new Set(['127.0.0.1', 'localhost', '::1']);

function parseBoolean(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: boolean,
): boolean {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return defaultValue;
  const normalized = raw.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true') return true;
  if (normalized === '0' || normalized === 'false') return false;
  throw new Error(`${name} must be "0"/"1" or "true"/"false", got "${raw}"`);
}

function parseNonNegativeNumber(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: number,
): number {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return defaultValue;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < 0) {
    throw new Error(`${name} must be a non-negative number, got "${raw}"`);
  }
  return n;
}

function parsePositiveNumber(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: number,
): number {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return defaultValue;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) {
    throw new Error(`${name} must be a positive number, got "${raw}"`);
  }
  return n;
}

function parseNonNegativeInt(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: number,
): number {
  const n = parseNonNegativeNumber(env, name, defaultValue);
  if (!Number.isInteger(n)) {
    throw new Error(`${name} must be an integer, got "${n}"`);
  }
  return n;
}

function parsePositiveInt(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: number,
): number {
  const n = parsePositiveNumber(env, name, defaultValue);
  if (!Number.isInteger(n)) {
    throw new Error(`${name} must be an integer, got "${n}"`);
  }
  return n;
}

function parseTrimmedString(
  env: NodeJS.ProcessEnv,
  name: string,
): string | undefined {
  const raw = env[name];
  if (raw == null) return undefined;
  const trimmed = raw.trim();
  return trimmed || undefined;
}

function parseEnum<T extends string>(
  env: NodeJS.ProcessEnv,
  name: string,
  validValues: readonly T[],
  defaultValue: T,
): T {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return defaultValue;
  const normalized = raw.trim().toLowerCase();
  const match = validValues.find((v) => v.toLowerCase() === normalized);
  if (!match) {
    throw new Error(`${name} must be one of ${validValues.join('|')}, got "${raw}"`);
  }
  return match;
}

function parsePort(env: NodeJS.ProcessEnv, name: string, defaultValue: number): number {
  const port = parsePositiveInt(env, name, defaultValue);
  if (port > 65535) {
    throw new Error(`${name} must be at most 65535, got "${port}"`);
  }
  return port;
}

function parseTimeoutSeconds(env: NodeJS.ProcessEnv, name: string, defaultValue: number): number {
  const seconds = parsePositiveInt(env, name, defaultValue);
  if (seconds > MAX_TIMEOUT_SECONDS) {
    throw new Error(`${name} must be at most ${MAX_TIMEOUT_SECONDS}, got "${seconds}"`);
  }
  return seconds;
}

export function parseConfig(env: NodeJS.ProcessEnv, cwd: string = process.cwd()): ParseResult {
  const warnings: string[] = [];
  const infos: string[] = [];

  const workspaceCwd = path.resolve(cwd, parseTrimmedString(env, 'SERIALCRON_WORKSPACE') ?? '.');
  const dataDir = path.resolve(workspaceCwd, parseTrimmedString(env, 'SERIALCRON_DATA_DIR') ?? '.schedule');
  const schedulePath = path.resolve(
    workspaceCwd,
    parseTrimmedString(env, 'SERIALCRON_SCHEDULE_PATH') ?? path.join(dataDir, 'schedule.yaml'),
  );

  const tickSeconds = parsePositiveNumber(env, 'SERIALCRON_TICK_SECONDS', 30);
  if (tickSeconds > 60) {
    warnings.push(`SERIALCRON_TICK_SECONDS=${tickSeconds} is longer than a minute: cron runs may start up to ${tickSeconds}s late`);
  }

  const dangerouslySkipPermissions = parseBoolean(env, 'PROCESSOR_SKIP_PERMISSIONS', false);
  if (dangerouslySkipPermissions) {
    warnings.push('PROCESSOR_SKIP_PERMISSIONS=1: scheduled commands run without permission prompts');
  }

  const serverEnabled = parseBoolean(env, 'SERIALCRON_SERVER_ENABLED', true);
  const serverHost = parseTrimmedString(env, 'SERVER_HOST') ?? '127.0.0.1';
  if (!serverEnabled) {
    infos.push('SERIALCRON_SERVER_ENABLED=0; status, cancel and trigger are not reachable over HTTP');
  } else if (!LOOPBACK_HOSTS.has(serverHost)) {
    warnings.push(`SERVER_HOST=${serverHost} exposes unauthenticated cancel/trigger routes beyond this machine`);
  }

  return {
    config: {
      workspaceCwd,
      schedulePath,
      dataDir,
      runLogPath: path.join(dataDir, 'runs.jsonl'),

      tickMs: Math.round(tickSeconds * 1000),
      defaultTimeoutSeconds: parseTimeoutSeconds(env, 'SERIALCRON_DEFAULT_TIMEOUT_SECONDS', 300),

      serverEnabled,
      serverHost,
      serverPort: parsePort(env, 'SERVER_PORT', 4280),

      processorBin: parseTrimmedString(env, 'PROCESSOR_BIN') ?? 'claude',
      dangerouslySkipPermissions,
      processorKillGraceMs: parseNonNegativeInt(env, 'PROCESSOR_KILL_GRACE_MS', 5000),
      commandCheck: parseBoolean(env, 'SERIALCRON_COMMAND_CHECK', true),

      logLevel: parseEnum(env, 'LOG_LEVEL', LOG_LEVELS, 'info'),
    },
    warnings,
    infos,
  };
}
