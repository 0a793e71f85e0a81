import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { KeepaliveScheduler, clampInterval } from '../../src/server/keepalive/keepalive-scheduler.js';
import { FakeSocket, silentLogger } from '../support/fakes.js';

function makeScheduler(socket = new FakeSocket()) {
  const logger = silentLogger();
  const openSocket = vi.fn(async () => socket);
  const scheduler = new KeepaliveScheduler({ openSocket, logger, shutdownGraceMs: 2_000 });
  scheduler.configure('10.0.0.1', 9, 50);
  return { scheduler, socket, logger, openSocket };
}

const settle = () => vi.advanceTimersByTimeAsync(0);

describe('keepalive-scheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('sends a single zero byte immediately and then every interval', async () => {
    const { scheduler, socket } = makeScheduler();
    expect(await scheduler.start()).toBe(true);
    await settle();
    expect(socket.sent).toEqual([{ payload: [0], port: 9, address: '10.0.0.1' }]);

    await vi.advanceTimersByTimeAsync(200);
    expect(socket.sent).toHaveLength(5);
    expect(scheduler.getTotals()).toEqual({ totalSent: 5, totalErrors: 0 });
    await scheduler.shutdown();
  });

  it('clamps requested intervals into 10..200 ms', () => {
    const { scheduler } = makeScheduler();
    for (const [requested, effective] of [[5, 10], [0, 10], [-40, 10], [250, 200], [10_000, 200], [75, 75]]) {
      scheduler.setInterval(requested);
      expect(scheduler.getIntervalMs()).toBe(effective);
    }
    scheduler.configure('10.0.0.1', 9, 1);
    expect(scheduler.getIntervalMs()).toBe(10);
    expect(clampInterval(Number.NaN)).toBe(50);
  });

  it('reschedules at the clamped period while running', async () => {
    const { scheduler, socket } = makeScheduler();
    await scheduler.start();
    await settle();
    expect(socket.sent).toHaveLength(1);

    scheduler.setInterval(500);
    await settle();
    expect(socket.sent).toHaveLength(2);

    await vi.advanceTimersByTimeAsync(199);
    expect(socket.sent).toHaveLength(2);
    await vi.advanceTimersByTimeAsync(1);
    expect(socket.sent).toHaveLength(3);
    await scheduler.shutdown();
  });

  it('sends nothing while paused and resumes on the next fire', async () => {
    const { scheduler, socket } = makeScheduler();
    await scheduler.start();
    await settle();
    scheduler.pause();

    await vi.advanceTimersByTimeAsync(1_000);
    expect(socket.sent).toHaveLength(1);
    expect(scheduler.getTotals()).toEqual({ totalSent: 1, totalErrors: 0 });
    expect(scheduler.isRunning()).toBe(true);
    expect(scheduler.isPaused()).toBe(true);

    scheduler.unpause();
    await vi.advanceTimersByTimeAsync(50);
    expect(socket.sent).toHaveLength(2);
    await scheduler.shutdown();
  });

  it('uses a swapped target on the next fire', async () => {
    const { scheduler, socket } = makeScheduler();
    await scheduler.start();
    await settle();

    scheduler.setTarget('10.0.0.2', 7);
    await vi.advanceTimersByTimeAsync(50);
    expect(socket.sent[1]).toEqual({ payload: [0], port: 7, address: '10.0.0.2' });

    scheduler.setTarget(null, 7);
    await vi.advanceTimersByTimeAsync(100);
    expect(socket.sent).toHaveLength(2);
    await scheduler.shutdown();
  });

  it('counts send failures, keeps running and logs them sparingly', async () => {
    const socket = new FakeSocket();
    socket.failWith = new Error('EHOSTUNREACH');
    const { scheduler, logger } = makeScheduler(socket);
    await scheduler.start();

    await vi.advanceTimersByTimeAsync(5_000);
    expect(scheduler.getTotals()).toEqual({ totalSent: 0, totalErrors: 101 });
    expect(scheduler.isRunning()).toBe(true);
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenLastCalledWith('send error (total errors: 101): EHOSTUNREACH');

    socket.failWith = null;
    await vi.advanceTimersByTimeAsync(50);
    expect(scheduler.getTotals()).toEqual({ totalSent: 1, totalErrors: 101 });
    await scheduler.shutdown();
  });

  it('stays stopped when the socket cannot be opened', async () => {
    const logger = silentLogger();
    const scheduler = new KeepaliveScheduler({
      openSocket: async () => {
        throw new Error('EACCES');
      },
      logger
    });
    scheduler.configure('10.0.0.1', 9, 50);

    expect(await scheduler.start()).toBe(false);
    expect(scheduler.isRunning()).toBe(false);
    expect(logger.error).toHaveBeenCalledWith('failed to create keepalive socket: EACCES');
    await expect(scheduler.shutdown()).resolves.toBeUndefined();
  });

  it('opens one socket for concurrent starts', async () => {
    const { scheduler, openSocket } = makeScheduler();
    const [a, b] = await Promise.all([scheduler.start(), scheduler.start()]);
    expect(a).toBe(true);
    expect(b).toBe(true);
    expect(await scheduler.start()).toBe(true);
    expect(openSocket).toHaveBeenCalledTimes(1);
    await scheduler.shutdown();
  });

  it('ignores mutators after shutdown and never sends again', async () => {
    const { scheduler, socket } = makeScheduler();
    await scheduler.start();
    await settle();
    await scheduler.shutdown();
    expect(socket.closed).toBe(true);
    expect(scheduler.isRunning()).toBe(false);

    expect(() => {
      scheduler.setInterval(20);
      scheduler.setTarget('10.0.0.3', 9);
      scheduler.pause();
      scheduler.unpause();
      scheduler.configure('10.0.0.4', 9, 30);
    }).not.toThrow();
    await scheduler.shutdown();

    await vi.advanceTimersByTimeAsync(1_000);
    expect(socket.sent).toHaveLength(1);
  });

  it('lets an in-flight send finish before closing the socket', async () => {
    const socket = new FakeSocket();
    let release: () => void = () => undefined;
    socket.hold = new Promise<void>((resolve) => {
      release = resolve;
    });
    const { scheduler } = makeScheduler(socket);
    await scheduler.start();

    const stopped = scheduler.shutdown();
    await vi.advanceTimersByTimeAsync(500);
    expect(socket.closed).toBe(false);

    release();
    await stopped;
    expect(socket.closed).toBe(true);
    expect(scheduler.getTotals().totalSent).toBe(1);
  });

  it('forces the socket closed after the grace period', async () => {
    const socket = new FakeSocket();
    socket.hold = new Promise<void>(() => undefined);
    const { scheduler } = makeScheduler(socket);
    await scheduler.start();

    const stopped = scheduler.shutdown();
    await vi.advanceTimersByTimeAsync(2_000);
    await stopped;
    expect(socket.closed).toBe(true);
    expect(scheduler.getTotals().totalSent).toBe(0);
  });

  it('restarts on a fresh socket when started during a pending shutdown', async () => {
    const first = new FakeSocket();
    const second = new FakeSocket();
    let release: () => void = () => undefined;
    first.hold = new Promise<void>((resolve) => {
      release = resolve;
    });
    const sockets = [first, second];
    const openSocket = vi.fn(async () => {
      const next = sockets.shift();
      if (!next) throw new Error('no socket left');
      return next;
    });
    const scheduler = new KeepaliveScheduler({ openSocket, logger: silentLogger() });
    scheduler.configure('10.0.0.1', 9, 50);
    await scheduler.start();
    await settle();
    expect(first.sent).toHaveLength(1);

    const stopped = scheduler.shutdown();
    const restarted = scheduler.start();
    await settle();
    expect(scheduler.isRunning()).toBe(false);
    expect(openSocket).toHaveBeenCalledTimes(1);

    release();
    await stopped;
    expect(await restarted).toBe(true);
    await settle();

    expect(scheduler.isRunning()).toBe(true);
    expect(first.closed).toBe(true);
    expect(second.closed).toBe(false);
    expect(second.sent).toEqual([{ payload: [0], port: 9, address: '10.0.0.1' }]);

    await scheduler.shutdown();
    expect(second.closed).toBe(true);
  });
});
