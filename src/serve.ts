/**
 * Server Runner
 *
 * Builds the application context for a parsed Config, starts the HTTP
 * surface and the background tasks, and shuts both down on SIGINT/SIGTERM.
 * Used by `npm start` and by `cli serve`.
 */

import type { Config } from './config';
import { createAppContext } from './context';
import { createApp, startServer } from './api';

export async function runServer(config: Config): Promise<void> {
  const context = createAppContext(config);

  const app = createApp({
    router: context.router,
    environment: config.server.nodeEnv,
    logger: context.logger,
  });
  const server = await startServer(app, {
    port: config.server.port,
    hostname: config.server.host,
  });
  context.tasks.start();

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) {
      return;
    }
    stopping = true;
    console.log(`\n[Server] Received ${signal}, shutting down...`);
    await server.close();
    await context.close();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        console.error('[Server] Shutdown failed:', error);
        process.exit(1);
      });
    });
  }
}
