import { Router } from 'express';
import { buildStatusSummary } from '../metrics/health.js';
import type { TickFixerContext } from './types.js';

export function makeStatusRoute(ctx: TickFixerContext): Router {
  const router = Router();
  router.get('/status', (_req, res) => {
    res.json(buildStatusSummary(ctx.tickFixer.getStatus(), ctx.counters, ctx.connectionManager.size()));
  });
  router.get('/adapters', (_req, res) => {
    res.json({ adapters: ctx.connectionManager.list() });
  });
  router.get('/healthz', (_req, res) => {
    res.json({ ok: true, port: ctx.port });
  });
  return router;
}
