/**
 * TaskScheduler Unit Tests
 *
 * Loops run on real timers with short intervals; every test stops the
 * scheduler so nothing keeps running after it.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { TaskScheduler } from './task-scheduler';
import type { Logger } from '../logger';

function recordingLogger() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('TaskScheduler', () => {
  let scheduler: TaskScheduler | null = null;

  afterEach(async () => {
    await scheduler?.stop();
    scheduler = null;
  });

  it('ticks repeatedly and stops ticking after stop()', async () => {
    scheduler = new TaskScheduler(recordingLogger());
    let runs = 0;
    scheduler.register({
      name: 'counter',
      intervalMs: 5,
      runOnStart: true,
      run: async () => {
        runs++;
      },
    });

    scheduler.start();
    await vi.waitFor(() => expect(runs).toBeGreaterThanOrEqual(2));
    await scheduler.stop();

    const afterStop = runs;
    await delay(30);
    expect(runs).toBe(afterStop);
    expect(scheduler.running).toBe(false);
  });

  it('logs a failing tick and keeps looping', async () => {
    const logger = recordingLogger();
    scheduler = new TaskScheduler(logger);
    const failure = new Error('store unavailable');
    let runs = 0;
    scheduler.register({
      name: 'flaky',
      intervalMs: 5,
      runOnStart: true,
      run: async () => {
        runs++;
        if (runs === 1) {
          throw failure;
        }
      },
    });

    scheduler.start();
    await vi.waitFor(() => expect(runs).toBeGreaterThanOrEqual(2));

    expect(logger.error).toHaveBeenCalledWith('[tasks] flaky tick failed:', failure);
  });

  it('waits for the in-flight tick before stop() resolves', async () => {
    scheduler = new TaskScheduler(recordingLogger());
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    let started = false;
    let finished = false;
    scheduler.register({
      name: 'slow',
      intervalMs: 1000,
      runOnStart: true,
      run: async () => {
        started = true;
        await gate;
        finished = true;
      },
    });

    scheduler.start();
    await vi.waitFor(() => expect(started).toBe(true));

    let stopped = false;
    const stopping = scheduler.stop().then(() => {
      stopped = true;
    });
    await delay(20);
    expect(stopped).toBe(false);

    release();
    await stopping;
    expect(finished).toBe(true);
    expect(stopped).toBe(true);
  });

  it('cuts the wait between ticks short on stop()', async () => {
    scheduler = new TaskScheduler(recordingLogger());
    const run = vi.fn(async () => undefined);
    scheduler.register({ name: 'hourly', intervalMs: 60 * 60 * 1000, run });

    scheduler.start();
    await scheduler.stop();

    expect(run).not.toHaveBeenCalled();
  });

  it('passes the clock time to each tick', async () => {
    const fixed = new Date('2024-03-01T08:00:00Z');
    scheduler = new TaskScheduler(recordingLogger(), () => fixed);
    const seen: Date[] = [];
    scheduler.register({
      name: 'clocked',
      intervalMs: 1000,
      runOnStart: true,
      run: async (now) => {
        seen.push(now);
      },
    });

    scheduler.start();
    await vi.waitFor(() => expect(seen).toHaveLength(1));

    expect(seen[0]).toBe(fixed);
  });

  it('treats stop() without start() as a no-op', async () => {
    const logger = recordingLogger();
    scheduler = new TaskScheduler(logger);

    await scheduler.stop();

    expect(logger.log).not.toHaveBeenCalled();
  });
});
