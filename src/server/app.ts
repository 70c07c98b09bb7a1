import process from 'node:process';
import Fastify, { type FastifyInstance } from 'fastify';
import sensible from '@fastify/sensible';
import type { Scheduler } from '../cron/scheduler.js';
import { registerScheduleRoutes, type RecentRuns } from './schedule-routes.js';

export type ServerDeps = {
  scheduler: Scheduler;
  runs: RecentRuns;
};

/** Build the HTTP surface without binding it; callers `listen()` or `inject()`. */
export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });
  await app.register(sensible);

  app.get('/health', async () => ({
    ok: true,
    uptime: Math.floor(process.uptime()),
  }));

  registerScheduleRoutes(app, deps.scheduler, deps.runs);
  return app;
}
