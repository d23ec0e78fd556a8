/**
 * Background Task Scheduler
 *
 * Runs each registered PeriodicTask in its own loop: tick, wait the
 * interval, repeat. All loops share one AbortController. `stop()` aborts
 * it, cuts any pending wait short, lets in-flight ticks finish and
 * resolves once every loop has exited.
 *
 * A tick that throws is logged and the loop carries on with the next one.
 *
 * @example
 * ```typescript
 * const scheduler = new TaskScheduler(console);
 * scheduler.register({
 *   name: 'quiz-sweeper',
 *   intervalMs: 60_000,
 *   run: (now) => quizzes.sweep(now),
 * });
 * scheduler.start();
 * // ... on shutdown
 * await scheduler.stop();
 * ```
 */

import type { Logger } from '../logger';

/**
 * A unit of background work executed every `intervalMs`.
 */
export interface PeriodicTask {
  /** Used in log lines */
  name: string;
  /** Pause between the end of one tick and the start of the next */
  intervalMs: number;
  /** Whether to tick once right after start instead of waiting first */
  runOnStart?: boolean;
  run(now: Date): Promise<unknown>;
}

/** Supplies the current instant; replaced by a fixed clock in tests. */
export type Clock = () => Date;

/**
 * Resolves after `ms`, or as soon as `signal` aborts.
 */
function pause(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

export class TaskScheduler {
  private readonly tasks: PeriodicTask[] = [];
  private controller: AbortController | null = null;
  private loops: Promise<void>[] = [];

  constructor(
    private readonly logger: Logger,
    private readonly clock: Clock = () => new Date()
  ) {}

  /**
   * Adds a task. Tasks registered after `start()` begin on the next start.
   */
  register(task: PeriodicTask): void {
    this.tasks.push(task);
  }

  get running(): boolean {
    return this.controller !== null;
  }

  /**
   * Starts one loop per registered task. Calling it twice is a no-op.
   */
  start(): void {
    if (this.controller) {
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.loops = this.tasks.map((task) => this.loop(task, controller.signal));
    this.logger.log(`[tasks] Started ${this.tasks.length} background task(s)`);
  }

  /**
   * Signals every loop to exit and waits for them.
   */
  async stop(): Promise<void> {
    const controller = this.controller;
    if (!controller) {
      return;
    }
    controller.abort();
    await Promise.all(this.loops);
    this.loops = [];
    this.controller = null;
    this.logger.log('[tasks] All background tasks stopped');
  }

  private async loop(task: PeriodicTask, signal: AbortSignal): Promise<void> {
    if (!task.runOnStart) {
      await pause(task.intervalMs, signal);
    }
    while (!signal.aborted) {
      await this.tick(task);
      await pause(task.intervalMs, signal);
    }
  }

  private async tick(task: PeriodicTask): Promise<void> {
    try {
      await task.run(this.clock());
    } catch (error) {
      this.logger.error(`[tasks] ${task.name} tick failed:`, error);
    }
  }
}
