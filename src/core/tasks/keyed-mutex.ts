/**
 * Keyed Mutex
 *
 * Serializes async work per key (one queue per owner) while work for
 * different keys runs concurrently. Operations queued on the same key run
 * strictly one after another in call order. A failing operation rejects
 * its own caller and does not block the queue.
 *
 * The lock only covers this process; the store's compare-and-set guards
 * catch anything that slips past it. It is not reentrant: awaiting `run`
 * on a key from inside work already holding that key never resolves, so
 * callers wrap plain store work, not manager methods that lock themselves.
 */

export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Runs `fn` once every earlier operation on `key` has settled.
   *
   * @example
   * ```typescript
   * const mutex = new KeyedMutex();
   * const created = await mutex.run(owner, async () => {
   *   const existing = await sessions.findById(owner);
   *   return existing ? null : sessions.create({ owner, queue, startedAt: now });
   * });
   * ```
   */
  run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(fn);

    const release = (): void => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
    const tail: Promise<void> = result.then(release, release);
    this.tails.set(key, tail);

    return result;
  }

  /** Number of keys with queued or running work. */
  get size(): number {
    return this.tails.size;
  }
}
