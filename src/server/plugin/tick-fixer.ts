import { createLogger, describeError } from '../logging/logger.js';
import { KeepaliveScheduler } from '../keepalive/keepalive-scheduler.js';
import { defaultResolverDeps, resolveTarget } from '../keepalive/target-resolver.js';
import { TickQualityTracker, type Clock } from '../ticks/tick-quality-tracker.js';
import { applySettingsPatch, type Settings, type SettingsKey, type SettingsPatchResult } from '../settings/settings-schema.js';
import type { GameState, KeepaliveStatus, TickFixerStatus } from '../types.js';

const log = createLogger('tick-fixer');

export interface TickFixerOptions {
  createScheduler?: () => KeepaliveScheduler;
  resolve?: (host: string) => Promise<string | null>;
  clock?: Clock;
  allowPublicFallback?: boolean;
  shutdownGraceMs?: number;
}

// States after which the next LOGGED_IN starts a new session.
const SESSION_BREAKS: ReadonlySet<GameState> = new Set(['LOGIN_SCREEN', 'LOGGING_IN', 'CONNECTION_LOST', 'HOPPING']);

/**
 * Host-side controller: owns one keepalive scheduler and one tick tracker and
 * drives them from game events and settings edits. Lifecycle calls and
 * settings edits run one at a time.
 */
export class TickFixer {
  private scheduler: KeepaliveScheduler | null = null;
  private tracker: TickQualityTracker | null = null;
  private gameState: GameState = 'LOGIN_SCREEN';
  private sessionBroken = true;
  private active = false;
  private work: Promise<void> = Promise.resolve();

  private readonly createScheduler: () => KeepaliveScheduler;
  private readonly resolve: (host: string) => Promise<string | null>;
  private readonly clock?: Clock;

  constructor(private settings: Settings, opts: TickFixerOptions = {}) {
    this.createScheduler = opts.createScheduler ?? (() => new KeepaliveScheduler({ shutdownGraceMs: opts.shutdownGraceMs }));
    this.resolve = opts.resolve ?? ((host) => resolveTarget(host, defaultResolverDeps, { allowPublicFallback: opts.allowPublicFallback }));
    this.clock = opts.clock;
  }

  startUp(): Promise<void> {
    return this.enqueue(async () => {
      if (this.active) return;
      this.active = true;
      this.tracker = this.newTracker();
      if (this.settings.keepaliveEnabled) await this.startKeepalive();
      log.info('started');
    });
  }

  shutDown(): Promise<void> {
    return this.enqueue(async () => {
      if (!this.active) return;
      this.active = false;
      await this.stopKeepalive();
      this.tracker = null;
      log.info('stopped');
    });
  }

  onGameTick(): void {
    this.tracker?.recordTick();
  }

  onGameStateChanged(state: GameState): void {
    this.gameState = state;
    if (SESSION_BREAKS.has(state)) {
      this.sessionBroken = true;
    } else if (state === 'LOGGED_IN' && this.sessionBroken) {
      this.sessionBroken = false;
      this.tracker?.reset();
    }
    this.applyPausePolicy();
  }

  /**
   * Validates `patch` against the settings current when the edit reaches the
   * front of the queue, then applies each changed key in order.
   */
  applyPatch(patch: unknown): Promise<SettingsPatchResult> {
    return this.enqueue(async () => {
      const result = applySettingsPatch(this.settings, patch);
      if (!result.ok) return result;
      this.settings = result.settings;
      // A host change re-resolves with the new port already in place.
      const keys = result.changed.includes('targetHost') ? result.changed.filter((k) => k !== 'targetPort') : result.changed;
      for (const key of keys) await this.onConfigChanged(key);
      return result;
    });
  }

  async onConfigChanged(key: SettingsKey): Promise<void> {
    if (!this.active) return;
    const s = this.settings;
    switch (key) {
      case 'keepaliveEnabled':
        if (s.keepaliveEnabled) await this.startKeepalive();
        else await this.stopKeepalive();
        break;
      case 'keepaliveIntervalMs':
        this.scheduler?.setInterval(s.keepaliveIntervalMs);
        break;
      case 'targetHost':
        await this.retarget();
        break;
      case 'targetPort': {
        const destination = this.scheduler?.getDestination();
        if (destination) this.scheduler?.setTarget(destination.address, s.targetPort);
        else await this.retarget();
        break;
      }
      case 'onlyWhenLoggedIn':
        this.applyPausePolicy();
        break;
      case 'tickSampleSize':
        this.tracker = this.newTracker();
        break;
      case 'tickQualityThresholdMs':
        this.tracker?.setThresholdMs(s.tickQualityThresholdMs);
        break;
      case 'showOverlay':
        break;
    }
  }

  getSettings(): Settings {
    return this.settings;
  }

  getStatus(): TickFixerStatus {
    const t = this.tracker;
    const k = this.scheduler;
    const destination = k?.getDestination() ?? null;
    const totals = k?.getTotals() ?? { totalSent: 0, totalErrors: 0 };
    let status: KeepaliveStatus = 'OFF';
    if (k?.isRunning()) status = k.isPaused() ? 'PAUSED' : 'ACTIVE';

    return {
      gameState: this.gameState,
      ticks: t
        ? {
            waiting: t.isWaiting(),
            quality: t.quality(),
            averageMs: t.averageMs(),
            jitterMs: t.jitterMs(),
            lastDeltaMs: t.lastDeltaMs(),
            samples: t.sampleCount(),
            capacity: t.capacity,
            thresholdMs: t.getThresholdMs()
          }
        : null,
      keepalive: {
        status,
        target: destination?.address ?? null,
        port: destination?.port ?? null,
        intervalMs: k?.getIntervalMs() ?? this.settings.keepaliveIntervalMs,
        ...totals
      }
    };
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.work.then(task);
    this.work = run.then(
      () => undefined,
      (error: unknown) => log.error(`task failed: ${describeError(error)}`)
    );
    return run;
  }

  private newTracker(): TickQualityTracker {
    return new TickQualityTracker(this.settings.tickSampleSize, this.settings.tickQualityThresholdMs, this.clock);
  }

  private applyPausePolicy(): void {
    const k = this.scheduler;
    if (!k) return;
    if (this.settings.onlyWhenLoggedIn && this.gameState !== 'LOGGED_IN') k.pause();
    else k.unpause();
  }

  private async startKeepalive(): Promise<void> {
    if (this.scheduler) return;
    const target = await this.resolve(this.settings.targetHost);
    if (!target) {
      log.warn('keepalive not started: no usable target');
      return;
    }

    const scheduler = this.createScheduler();
    scheduler.configure(target, this.settings.targetPort, this.settings.keepaliveIntervalMs);
    this.scheduler = scheduler;
    this.applyPausePolicy();
    if (!(await scheduler.start())) {
      this.scheduler = null;
      log.warn('keepalive not started: socket unavailable');
    }
  }

  private async stopKeepalive(): Promise<void> {
    const scheduler = this.scheduler;
    this.scheduler = null;
    await scheduler?.shutdown();
  }

  private async retarget(): Promise<void> {
    const scheduler = this.scheduler;
    if (!scheduler) {
      if (this.settings.keepaliveEnabled) await this.startKeepalive();
      return;
    }
    const target = await this.resolve(this.settings.targetHost);
    if (!target) {
      log.warn(`keeping previous target: could not resolve '${this.settings.targetHost}'`);
      return;
    }
    scheduler.setTarget(target, this.settings.targetPort);
  }
}
