import { z } from 'zod';

export const settingsShape = z.object({
  keepaliveEnabled: z.boolean(),
  keepaliveIntervalMs: z.number().int().min(10).max(200),
  targetHost: z.string().trim().max(253),
  targetPort: z.number().int().min(1).max(65535),
  onlyWhenLoggedIn: z.boolean(),
  tickSampleSize: z.number().int().min(10).max(500),
  tickQualityThresholdMs: z.number().int().min(5).max(100),
  showOverlay: z.boolean()
});

export type Settings = z.infer<typeof settingsShape>;
export type SettingsKey = keyof Settings;

export const DEFAULT_SETTINGS: Readonly<Settings> = {
  keepaliveEnabled: true,
  keepaliveIntervalMs: 50,
  targetHost: 'gateway',
  targetPort: 9,
  onlyWhenLoggedIn: true,
  tickSampleSize: 100,
  tickQualityThresholdMs: 30,
  showOverlay: true
};

/** Settings file: every key optional, unknown keys dropped. */
export const settingsFileSchema = settingsShape.partial();

/** Runtime edits: every key optional, unknown keys rejected. */
export const settingsPatchSchema = settingsShape.partial().strict();

export const SETTINGS_KEYS = settingsShape.keyof().options;

export type SettingsPatchResult =
  | { ok: true; settings: Settings; changed: SettingsKey[] }
  | { ok: false; issues: string[] };

export function applySettingsPatch(current: Settings, patch: unknown): SettingsPatchResult {
  const parsed = settingsPatchSchema.safeParse(patch ?? {});
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message))
    };
  }
  const settings: Settings = { ...current, ...parsed.data };
  const changed = SETTINGS_KEYS.filter((k) => settings[k] !== current[k]);
  return { ok: true, settings, changed };
}
