import fs from 'node:fs/promises';
import path from 'node:path';
import { createLogger, describeError } from '../logging/logger.js';
import { DEFAULT_SETTINGS, settingsFileSchema, type Settings } from './settings-schema.js';

const log = createLogger('settings');

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class SettingsStore {
  private timer?: NodeJS.Timeout;
  private pending?: () => Settings;

  constructor(private readonly filePath: string, private readonly flushMs: number) {}

  /** Missing keys take their defaults; an unreadable or invalid file yields the defaults. */
  async loadSettings(): Promise<Settings> {
    try {
      const data = await fs.readFile(this.filePath, 'utf8');
      return { ...DEFAULT_SETTINGS, ...settingsFileSchema.parse(JSON.parse(data)) };
    } catch (error) {
      if (!isMissingFile(error)) log.warn(`ignoring ${this.filePath}: ${describeError(error)}`);
      return { ...DEFAULT_SETTINGS };
    }
  }

  async saveSettings(settings: Settings): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(settings, null, 2));
  }

  scheduleDebouncedSave(getter: () => Settings): void {
    if (this.timer) clearTimeout(this.timer);
    this.pending = getter;
    this.timer = setTimeout(() => {
      void this.flush();
    }, this.flushMs);
  }

  /** Writes a pending debounced save now. */
  async flush(): Promise<void> {
    if (this.timer) clearTimeout(this.timer);
    this.timer = undefined;
    const getter = this.pending;
    this.pending = undefined;
    if (!getter) return;
    try {
      await this.saveSettings(getter());
    } catch (error) {
      log.error(`failed to save ${this.filePath}: ${describeError(error)}`);
    }
  }
}
