import { z } from 'zod';
import type { OverlayView } from '../types.js';

const statusResponseSchema = z.object({
  ticks: z
    .object({
      waiting: z.boolean(),
      quality: z.number(),
      averageMs: z.number(),
      jitterMs: z.number(),
      lastDeltaMs: z.number(),
      thresholdMs: z.number()
    })
    .nullable(),
  keepalive: z.object({ status: z.enum(['OFF', 'PAUSED', 'ACTIVE']) })
});

const settingsResponseSchema = z.object({
  settings: z.object({ showOverlay: z.boolean() })
});

export async function useTickFixerState(baseUrl = 'http://localhost:8787/api'): Promise<OverlayView> {
  const [statusRes, settingsRes] = await Promise.all([
    fetch(`${baseUrl}/status`).then((r) => r.json()),
    fetch(`${baseUrl}/settings`).then((r) => r.json())
  ]);

  const status = statusResponseSchema.parse(statusRes);
  const { settings } = settingsResponseSchema.parse(settingsRes);

  return {
    showOverlay: settings.showOverlay,
    ticks: status.ticks,
    keepalive: status.keepalive.status
  };
}
