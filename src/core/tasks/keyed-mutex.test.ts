import { describe, it, expect } from 'vitest';
import { KeyedMutex } from './keyed-mutex';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('KeyedMutex', () => {
  it('runs operations on the same key one at a time, in call order', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const first = mutex.run('owner-1', async () => {
      events.push('first:start');
      await delay(20);
      events.push('first:end');
    });
    const second = mutex.run('owner-1', async () => {
      events.push('second');
    });

    await Promise.all([first, second]);

    expect(events).toEqual(['first:start', 'first:end', 'second']);
  });

  it('lets different keys proceed independently', async () => {
    const mutex = new KeyedMutex();
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const blocked = mutex.run('owner-1', () => gate.then(() => 'one'));
    const other = await mutex.run('owner-2', async () => 'two');

    expect(other).toBe('two');
    release();
    expect(await blocked).toBe('one');
  });

  it('queues a nested run on the held key behind the running work', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    let nested: Promise<void> = Promise.resolve();

    await mutex.run('owner-1', async () => {
      nested = mutex.run('owner-1', async () => {
        events.push('nested');
      });
      await delay(10);
      events.push('outer:end');
    });
    await nested;

    expect(events).toEqual(['outer:end', 'nested']);
  });

  it('keeps the queue moving after a failure', async () => {
    const mutex = new KeyedMutex();

    const failing = mutex.run('owner-1', async () => {
      throw new Error('boom');
    });
    const next = mutex.run('owner-1', async () => 42);

    await expect(failing).rejects.toThrow('boom');
    expect(await next).toBe(42);
  });

  it('forgets keys once their work has settled', async () => {
    const mutex = new KeyedMutex();

    await mutex.run('owner-1', async () => 'done');
    await delay(0);

    expect(mutex.size).toBe(0);
  });
});
