import { performance } from 'node:perf_hooks';

export const IDEAL_TICK_MS = 600;
export const WARMUP_TICKS = 15;

export type Clock = () => number;

/**
 * Measures tick regularity from the interval between consecutive game ticks.
 *
 * Deltas live in a fixed ring buffer; every statistic is computed from the
 * buffer on read. After construction or `reset()` the first tick only seeds
 * the timestamp and the next {@link WARMUP_TICKS} deltas are discarded, which
 * absorbs the irregular ticks that follow a login or world hop.
 */
export class TickQualityTracker {
  readonly capacity: number;
  private readonly deltas: Float64Array;
  private head = 0;
  private count = 0;
  private lastTickAt: number | null = null;
  private warmupRemaining = WARMUP_TICKS;
  private thresholdMs: number;

  constructor(sampleSize: number, thresholdMs: number, private readonly now: Clock = () => performance.now()) {
    if (!Number.isInteger(sampleSize) || sampleSize < 1) {
      throw new RangeError(`sample size must be a positive integer, got ${sampleSize}`);
    }
    this.capacity = sampleSize;
    this.deltas = new Float64Array(sampleSize);
    this.thresholdMs = thresholdMs;
  }

  recordTick(): void {
    const now = this.now();
    const last = this.lastTickAt;
    this.lastTickAt = now;
    if (last === null) return;

    if (this.warmupRemaining > 0) {
      this.warmupRemaining -= 1;
      return;
    }

    this.deltas[this.head] = Math.trunc(now - last);
    this.head = (this.head + 1) % this.capacity;
    if (this.count < this.capacity) this.count += 1;
  }

  isWaiting(): boolean {
    return this.warmupRemaining > 0;
  }

  /** Percentage (0-100) of samples within `thresholdMs` of the ideal tick. */
  quality(): number {
    if (this.count === 0) return 100;
    let good = 0;
    for (let i = 0; i < this.count; i++) {
      if (Math.abs(this.deltas[i] - IDEAL_TICK_MS) <= this.thresholdMs) good += 1;
    }
    return (good * 100) / this.count;
  }

  averageMs(): number {
    if (this.count === 0) return IDEAL_TICK_MS;
    let sum = 0;
    for (let i = 0; i < this.count; i++) sum += this.deltas[i];
    return sum / this.count;
  }

  /** Population standard deviation of the samples. */
  jitterMs(): number {
    if (this.count < 2) return 0;
    const mean = this.averageMs();
    let sumSq = 0;
    for (let i = 0; i < this.count; i++) {
      const diff = this.deltas[i] - mean;
      sumSq += diff * diff;
    }
    return Math.sqrt(sumSq / this.count);
  }

  /** -1 until a delta has been recorded. */
  lastDeltaMs(): number {
    if (this.count === 0) return -1;
    return this.deltas[(this.head - 1 + this.capacity) % this.capacity];
  }

  sampleCount(): number {
    return this.count;
  }

  getThresholdMs(): number {
    return this.thresholdMs;
  }

  setThresholdMs(thresholdMs: number): void {
    this.thresholdMs = thresholdMs;
  }

  reset(): void {
    this.head = 0;
    this.count = 0;
    this.lastTickAt = null;
    this.warmupRemaining = WARMUP_TICKS;
  }
}
