import path from 'node:path';

export const config = {
  port: Number(process.env.PORT ?? 8787),
  settings: {
    path: process.env.TICK_FIXER_SETTINGS_PATH ?? path.resolve(process.cwd(), 'dist/tick-fixer-settings.json'),
    flushMs: Number(process.env.TICK_FIXER_SETTINGS_FLUSH_MS ?? 1_000)
  },
  keepalive: {
    shutdownGraceMs: Number(process.env.TICK_FIXER_SHUTDOWN_GRACE_MS ?? 2_000),
    allowPublicFallback: (process.env.TICK_FIXER_ALLOW_PUBLIC_FALLBACK ?? 'true') !== 'false'
  }
};
