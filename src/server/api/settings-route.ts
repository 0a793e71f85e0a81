import { Router } from 'express';
import { createLogger, describeError } from '../logging/logger.js';
import type { SettingsPatchResult } from '../settings/settings-schema.js';
import type { TickFixerContext } from './types.js';

const log = createLogger('api');

export function makeSettingsRoute(ctx: TickFixerContext): Router {
  const router = Router();

  router.get('/settings', (_req, res) => {
    res.json({ settings: ctx.tickFixer.getSettings() });
  });

  router.put('/settings', async (req, res) => {
    let result: SettingsPatchResult;
    try {
      result = await ctx.tickFixer.applyPatch(req.body);
    } catch (error) {
      log.error(`applying settings failed: ${describeError(error)}`);
      return res.status(500).json({
        ok: false,
        error: {
          code: 'internal_error',
          message: 'internal error'
        }
      });
    }

    if (!result.ok) {
      return res.status(400).json({
        ok: false,
        error: {
          code: 'invalid_settings',
          message: 'settings rejected',
          issues: result.issues
        }
      });
    }

    if (result.changed.length) ctx.settingsStore.scheduleDebouncedSave(() => ctx.tickFixer.getSettings());
    return res.json({ ok: true, settings: result.settings, changed: result.changed });
  });

  return router;
}
