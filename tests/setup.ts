/**
 * Test Setup Module
 *
 * Builds isolated application contexts on an in-memory SQLite database,
 * with a recording gateway, a recording logger and a controllable clock
 * in place of the real ones.
 *
 * @example
 * ```typescript
 * let ctx: TestContext;
 * beforeEach(() => { ctx = createTestContext(); });
 * afterEach(async () => { await cleanupTestContext(ctx); });
 * ```
 */

import type { Hono } from 'hono';
import { loadConfig, type Config, type Environment } from '../src/config';
import { createAppContext, type AppContext } from '../src/context';
import { createApp } from '../src/api';
import { createDatabase, type DatabaseHandle } from '../src/storage';
import type { RandomSource } from '../src/core/scheduling';
import { FakeClock, RecordingGateway, RecordingLogger, T0 } from './helpers';

export interface TestContext {
  app: AppContext;
  config: Config;
  gateway: RecordingGateway;
  logger: RecordingLogger;
  clock: FakeClock;
}

export interface TestContextOptions {
  /** Extra environment variables for loadConfig */
  env?: Environment;
  /** Start time of the fake clock */
  now?: Date;
  random?: RandomSource;
}

/**
 * Fresh in-memory database with all migrations applied.
 */
export function createTestDatabase(): DatabaseHandle {
  return createDatabase(':memory:');
}

export function createTestContext(options: TestContextOptions = {}): TestContext {
  const config = loadConfig({ NODE_ENV: 'test', ...options.env });
  const gateway = new RecordingGateway();
  const logger = new RecordingLogger();
  const clock = new FakeClock(options.now ?? T0);

  const app = createAppContext(config, {
    database: createTestDatabase(),
    gateway,
    logger,
    clock: clock.now,
    // Deterministic: front-to-back questions, first cards of a shuffle
    random: options.random ?? (() => 0),
  });

  return { app, config, gateway, logger, clock };
}

export async function cleanupTestContext(ctx: TestContext): Promise<void> {
  await ctx.app.close();
}

/**
 * Hono app wired to the test context's command router.
 */
export function createTestApp(ctx: TestContext): Hono {
  return createApp({
    router: ctx.app.router,
    environment: ctx.config.server.nodeEnv,
    logger: ctx.logger,
  });
}
