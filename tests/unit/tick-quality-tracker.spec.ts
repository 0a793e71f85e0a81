import { describe, expect, it } from 'vitest';
import { TickQualityTracker, WARMUP_TICKS } from '../../src/server/ticks/tick-quality-tracker.js';

function makeTracker(capacity = 100, thresholdMs = 30) {
  let now = 1_000;
  const tracker = new TickQualityTracker(capacity, thresholdMs, () => now);
  const tick = (deltaMs: number) => {
    now += deltaMs;
    tracker.recordTick();
  };
  // seed tick plus the discarded warm-up deltas
  const warmUp = () => {
    for (let i = 0; i <= WARMUP_TICKS; i++) tick(600);
  };
  const feed = (deltas: number[]) => deltas.forEach(tick);
  return { tracker, tick, warmUp, feed };
}

describe('tick-quality-tracker', () => {
  it('keeps waiting through the first 15 ticks and leaves warm-up on the 16th', () => {
    const { tracker, tick } = makeTracker();
    for (let i = 0; i < 15; i++) tick(600);
    expect(tracker.isWaiting()).toBe(true);
    expect(tracker.sampleCount()).toBe(0);

    tick(600);
    expect(tracker.isWaiting()).toBe(false);
    expect(tracker.sampleCount()).toBe(0);

    tick(600);
    expect(tracker.sampleCount()).toBe(1);
  });

  it('reports steady ticks as perfect', () => {
    const { tracker, warmUp, feed } = makeTracker();
    warmUp();
    feed([600, 600, 600, 600]);
    expect(tracker.quality()).toBe(100);
    expect(tracker.averageMs()).toBe(600);
    expect(tracker.jitterMs()).toBe(0);
  });

  it('counts deltas within the threshold as good and reports population jitter', () => {
    const { tracker, warmUp, feed } = makeTracker();
    warmUp();
    feed([600, 630, 570, 600]);
    expect(tracker.quality()).toBe(100);
    expect(tracker.averageMs()).toBe(600);
    expect(tracker.jitterMs()).toBeCloseTo(Math.sqrt(450), 10);
    expect(tracker.jitterMs()).toBeCloseTo(21.2, 1);
  });

  it('halves quality when two of four deltas are off', () => {
    const { tracker, warmUp, feed } = makeTracker();
    warmUp();
    feed([600, 700, 500, 600]);
    expect(tracker.quality()).toBe(50);
  });

  it('applies a new threshold to samples already collected', () => {
    const { tracker, warmUp, feed } = makeTracker();
    warmUp();
    feed([600, 640, 560, 600]);
    expect(tracker.quality()).toBe(50);
    tracker.setThresholdMs(40);
    expect(tracker.quality()).toBe(100);
    expect(tracker.sampleCount()).toBe(4);
  });

  it('uses healthy defaults without samples', () => {
    const { tracker } = makeTracker();
    expect(tracker.quality()).toBe(100);
    expect(tracker.averageMs()).toBe(600);
    expect(tracker.jitterMs()).toBe(0);
    expect(tracker.lastDeltaMs()).toBe(-1);
  });

  it('reports jitter only from two samples on', () => {
    const { tracker, warmUp, feed } = makeTracker();
    warmUp();
    feed([900]);
    expect(tracker.jitterMs()).toBe(0);
    feed([300]);
    expect(tracker.jitterMs()).toBe(300);
  });

  it('never exposes a discarded warm-up delta as the last delta', () => {
    const { tracker, tick, feed } = makeTracker();
    tick(600);
    for (let i = 0; i < WARMUP_TICKS; i++) tick(1_234);
    expect(tracker.lastDeltaMs()).toBe(-1);
    feed([612]);
    expect(tracker.lastDeltaMs()).toBe(612);
    feed([588]);
    expect(tracker.lastDeltaMs()).toBe(588);
  });

  it('truncates fractional milliseconds', () => {
    const { tracker, warmUp, feed } = makeTracker();
    warmUp();
    feed([600.9]);
    expect(tracker.lastDeltaMs()).toBe(600);
  });

  it('overwrites the oldest samples once full', () => {
    const { tracker, warmUp, feed } = makeTracker(10);
    warmUp();
    feed([1_000, 1_000, 600, 600, 600, 600, 600, 600, 600, 600, 600, 600]);
    expect(tracker.sampleCount()).toBe(10);
    expect(tracker.quality()).toBe(100);
    expect(tracker.averageMs()).toBe(600);
    expect(tracker.lastDeltaMs()).toBe(600);
  });

  it('reset discards history and restarts warm-up', () => {
    const { tracker, warmUp, feed, tick } = makeTracker();
    warmUp();
    feed([700, 500, 800]);
    expect(tracker.quality()).toBe(0);

    tracker.reset();
    expect(tracker.isWaiting()).toBe(true);
    expect(tracker.quality()).toBe(100);
    expect(tracker.sampleCount()).toBe(0);
    expect(tracker.lastDeltaMs()).toBe(-1);

    // the first tick after reset only seeds the timestamp
    tick(60_000);
    for (let i = 0; i < WARMUP_TICKS; i++) tick(600);
    expect(tracker.isWaiting()).toBe(false);
    feed([600]);
    expect(tracker.lastDeltaMs()).toBe(600);
  });

  it('rejects a non-positive sample size', () => {
    expect(() => new TickQualityTracker(0, 30)).toThrow(RangeError);
  });
});
