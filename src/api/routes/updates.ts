/**
 * Updates Route
 *
 * The chat transport posts every user action here. The body is validated,
 * handed to the command router, and the replies leave through the
 * messaging gateway; the HTTP response only says whether the update was
 * recognized.
 *
 * POST /updates
 * ```json
 * { "type": "message", "owner": "42", "chatId": "42", "text": "/review" }
 * ```
 * Response: `{ "success": true, "data": { "handled": true } }`
 */

import { Hono } from 'hono';
import type { CommandRouter } from '@/bot/command-router';
import { validateBody } from '../middleware/validate';
import { success } from '../utils/response';
import { incomingUpdateSchema, type UpdateHandledData } from '../types';

export function updatesRoutes(router: CommandRouter): Hono {
  const app = new Hono();

  app.post('/', async (c) => {
    const update = await validateBody(c, incomingUpdateSchema);
    const data: UpdateHandledData = { handled: await router.handle(update) };
    return success(c, data);
  });

  return app;
}
