import express from 'express';
import { makeStatusRoute } from './api/status-route.js';
import { makeSettingsRoute } from './api/settings-route.js';
import type { TickFixerContext } from './api/types.js';

export function createApp(ctx: TickFixerContext): express.Express {
  const app = express();
  app.use(express.json());
  app.use('/api', makeStatusRoute(ctx));
  app.use('/api', makeSettingsRoute(ctx));
  return app;
}
