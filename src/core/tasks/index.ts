/**
 * Tasks Module - Barrel Export
 *
 * Concurrency building blocks: a per-key async mutex and the scheduler
 * that drives the background loops.
 */

export { KeyedMutex } from './keyed-mutex';
export { TaskScheduler, type PeriodicTask, type Clock } from './task-scheduler';
