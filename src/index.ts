#!/usr/bin/env node
import 'dotenv/config';
import process from 'node:process';
import pino from 'pino';

import { parseConfig, type SerialcronConfig } from './config.js';
import { RunLock } from './cron/run-lock.js';
import { StatusStore } from './cron/status-store.js';
import { Worker } from './cron/worker.js';
import { Scheduler } from './cron/scheduler.js';
import { ScheduleFile } from './cron/schedule-config.js';
import { RunLog } from './cron/run-log.js';
import { CommandCatalog } from './processor/command-catalog.js';
import { createCliProcessor } from './processor/cli-processor.js';
import { buildServer } from './server/app.js';

const log = pino({ level: process.env.LOG_LEVEL ?? 'info' });

let cfg: SerialcronConfig;
try {
  const parsed = parseConfig(process.env);
  for (const warning of parsed.warnings) log.warn(warning);
  for (const info of parsed.infos) log.info(info);
  cfg = parsed.config;
} catch (err) {
  log.error({ err }, 'Invalid configuration');
  process.exit(1);
}
log.level = cfg.logLevel;

// --- Engine ---

const lock = new RunLock();
const store = new StatusStore();
const runLog = new RunLog(cfg.runLogPath);
const processor = createCliProcessor({
  bin: cfg.processorBin,
  cwd: cfg.workspaceCwd,
  dangerouslySkipPermissions: cfg.dangerouslySkipPermissions,
  killGraceMs: cfg.processorKillGraceMs,
  ...(cfg.commandCheck ? { catalog: CommandCatalog.forWorkspace(cfg.workspaceCwd) } : {}),
  log,
});
const worker = new Worker({
  lock,
  store,
  processor,
  defaultTimeoutSeconds: cfg.defaultTimeoutSeconds,
  sink: runLog,
  log,
});
const source = new ScheduleFile(cfg.schedulePath, log);

// Load before the first tick so a broken file is reported at start-up.
const initial = await source.loadIfChanged();
const scheduler = new Scheduler({
  store,
  lock,
  worker,
  source,
  tickMs: cfg.tickMs,
  log,
  ...(initial ? { registry: initial } : {}),
});

// --- HTTP ---

const app = cfg.serverEnabled ? await buildServer({ scheduler, runs: runLog }) : null;

let shuttingDown = false;
const shutdown = async (signal: string) => {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info({ signal }, 'serialcron:shutting down');
  try {
    await app?.close();
    await scheduler.stop();
  } catch (err) {
    log.error({ err }, 'serialcron:shutdown failed');
    process.exit(1);
  }
  process.exit(0);
};
process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

scheduler.start();
log.info(
  { workspace: cfg.workspaceCwd, schedule: cfg.schedulePath, jobs: scheduler.jobs.size, tickMs: cfg.tickMs },
  'serialcron:started',
);

if (app) {
  try {
    await app.listen({ host: cfg.serverHost, port: cfg.serverPort });
    log.info({ host: cfg.serverHost, port: cfg.serverPort }, 'server:listening');
  } catch (err) {
    log.error({ err }, 'server:listen failed');
    await scheduler.stop();
    process.exit(1);
  }
}
