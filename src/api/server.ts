/**
 * Vocab Reminder API Server
 *
 * Hono application the chat transport talks to, served on Node by
 * @hono/node-server.
 *
 * Routes:
 * - GET  /health   liveness probe
 * - POST /updates  one chat update, handled by the command router
 *
 * Middleware order: request logger, then routes; `onError` renders every
 * thrown error as the standard envelope.
 */

import { Hono } from 'hono';
import { serve, type ServerType } from '@hono/node-server';
import type { CommandRouter } from '@/bot/command-router';
import type { Logger } from '@/core/logger';
import { errorHandler, loggerMiddleware } from './middleware';
import { healthRoutes, updatesRoutes } from './routes';
import { error } from './utils/response';

export interface AppOptions {
  router: CommandRouter;
  environment: string;
  logger?: Logger;
}

export function createApp(options: AppOptions): Hono {
  const logger = options.logger ?? console;
  const production = options.environment === 'production';
  const app = new Hono();

  app.onError(errorHandler({ logger, production }));
  app.use('*', loggerMiddleware({ logger, colorize: !production }));

  app.route('/health', healthRoutes(options.environment));
  app.route('/updates', updatesRoutes(options.router));

  app.notFound((c) => error(c, 'NOT_FOUND', `Route ${c.req.method} ${c.req.path} not found`, 404));

  return app;
}

export interface ServerOptions {
  port: number;
  hostname: string;
}

export interface RunningServer {
  port: number;
  close(): Promise<void>;
}

/**
 * Starts listening and resolves once the socket is bound.
 */
export function startServer(
  app: Hono,
  options: ServerOptions,
  logger: Logger = console
): Promise<RunningServer> {
  return new Promise((resolve) => {
    const server: ServerType = serve(
      { fetch: app.fetch, port: options.port, hostname: options.hostname },
      (info) => {
        logger.log(`[Server] Listening on http://${options.hostname}:${info.port}`);
        resolve({
          port: info.port,
          close: () =>
            new Promise<void>((done, fail) => {
              server.close((err) => (err ? fail(err) : done()));
            }),
        });
      }
    );
  });
}
