import { createLogger, describeError, type Logger } from '../logging/logger.js';
import { openUdpSocket, type KeepaliveSocket, type KeepaliveSocketFactory } from './udp-socket.js';

export const MIN_INTERVAL_MS = 10;
export const MAX_INTERVAL_MS = 200;
export const DEFAULT_INTERVAL_MS = 50;
/** Discard service; unlikely to provoke ICMP replies. */
export const DEFAULT_TARGET_PORT = 9;
export const DEFAULT_SHUTDOWN_GRACE_MS = 2_000;
const ERROR_LOG_EVERY = 100;

const KEEPALIVE_PAYLOAD = Uint8Array.of(0x00);

export interface KeepaliveDestination {
  readonly address: string;
  readonly port: number;
}

export interface KeepaliveTotals {
  totalSent: number;
  totalErrors: number;
}

export interface KeepaliveSchedulerOptions {
  openSocket?: KeepaliveSocketFactory;
  shutdownGraceMs?: number;
  logger?: Logger;
}

export function clampInterval(ms: number): number {
  if (!Number.isFinite(ms)) return DEFAULT_INTERVAL_MS;
  return Math.max(MIN_INTERVAL_MS, Math.min(MAX_INTERVAL_MS, Math.round(ms)));
}

function settleWithin(pending: Promise<void>, ms: number): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<void>((resolve) => {
    timer = setTimeout(resolve, ms);
  });
  return Promise.race([pending, deadline]).finally(() => clearTimeout(timer));
}

/**
 * Sends a one-byte datagram to the destination every `intervalMs` so the
 * Wi-Fi radio never idles long enough to enter power-save polling.
 *
 * The destination is an immutable object replaced as a whole, so a fire reads
 * one consistent address/port pair. Pausing leaves the timer running.
 */
export class KeepaliveScheduler {
  private destination: KeepaliveDestination | null = null;
  private intervalMs = DEFAULT_INTERVAL_MS;
  private paused = false;
  private running = false;
  private starting: Promise<boolean> | null = null;
  private stopping: Promise<void> | null = null;
  private socket: KeepaliveSocket | null = null;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private totalSent = 0;
  private totalErrors = 0;

  private readonly openSocket: KeepaliveSocketFactory;
  private readonly shutdownGraceMs: number;
  private readonly log: Logger;

  constructor(opts: KeepaliveSchedulerOptions = {}) {
    this.openSocket = opts.openSocket ?? openUdpSocket;
    this.shutdownGraceMs = opts.shutdownGraceMs ?? DEFAULT_SHUTDOWN_GRACE_MS;
    this.log = opts.logger ?? createLogger('keepalive');
  }

  /** Initial state; ignored once running. */
  configure(target: string | null, port: number, intervalMs: number): void {
    if (this.running) return;
    this.destination = target ? { address: target, port } : null;
    this.intervalMs = clampInterval(intervalMs);
  }

  /** Resolves false when the socket could not be opened; the scheduler then stays stopped. */
  async start(): Promise<boolean> {
    if (this.stopping) await this.stopping;
    if (this.running) return true;
    if (!this.starting) {
      this.starting = this.open().finally(() => {
        this.starting = null;
      });
    }
    return this.starting;
  }

  pause(): void {
    this.paused = true;
  }

  unpause(): void {
    this.paused = false;
  }

  setInterval(ms: number): void {
    this.intervalMs = clampInterval(ms);
    this.reschedule();
  }

  setTarget(address: string | null, port: number): void {
    this.destination = address ? { address, port } : null;
  }

  async shutdown(): Promise<void> {
    if (this.starting) await this.starting;
    if (this.stopping) return this.stopping;
    if (!this.running) return;
    this.stopping = this.stop().finally(() => {
      this.stopping = null;
    });
    return this.stopping;
  }

  isRunning(): boolean { return this.running; }
  isPaused(): boolean { return this.paused; }
  getIntervalMs(): number { return this.intervalMs; }
  getDestination(): KeepaliveDestination | null { return this.destination; }
  getTotals(): KeepaliveTotals { return { totalSent: this.totalSent, totalErrors: this.totalErrors }; }

  private async open(): Promise<boolean> {
    try {
      this.socket = await this.openSocket();
    } catch (error) {
      this.log.error(`failed to create keepalive socket: ${describeError(error)}`);
      return false;
    }
    this.running = true;
    this.schedule();
    const target = this.destination ? `${this.destination.address}:${this.destination.port}` : 'none';
    this.log.info(`started (interval=${this.intervalMs}ms, target=${target})`);
    return true;
  }

  // Timer and socket are detached before the first await; a start() issued
  // meanwhile waits on `stopping`.
  private async stop(): Promise<void> {
    this.running = false;
    const timer = this.timer;
    const socket = this.socket;
    const inFlight = this.inFlight;
    this.timer = null;
    this.socket = null;

    if (timer) clearInterval(timer);
    if (inFlight) await settleWithin(inFlight, this.shutdownGraceMs);
    if (socket) {
      try {
        await socket.close();
      } catch (error) {
        this.log.warn(`socket close failed: ${describeError(error)}`);
      }
    }

    this.log.info(`stopped (sent ${this.totalSent} packets, ${this.totalErrors} errors)`);
  }

  private schedule(): void {
    this.fire();
    this.timer = setInterval(() => this.fire(), this.intervalMs);
    this.timer.unref();
  }

  private reschedule(): void {
    if (!this.running || !this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.schedule();
  }

  // A fire that finds the previous send still pending is dropped, never queued.
  private fire(): void {
    if (this.inFlight) return;
    this.inFlight = this.sendKeepalive().finally(() => {
      this.inFlight = null;
    });
  }

  private async sendKeepalive(): Promise<void> {
    if (!this.running || this.paused) return;
    const destination = this.destination;
    const socket = this.socket;
    if (!destination || !socket) return;

    try {
      await socket.send(KEEPALIVE_PAYLOAD, destination.port, destination.address);
      this.totalSent += 1;
    } catch (error) {
      this.totalErrors += 1;
      if (this.totalErrors % ERROR_LOG_EVERY === 1) {
        this.log.warn(`send error (total errors: ${this.totalErrors}): ${describeError(error)}`);
      }
    }
  }
}
