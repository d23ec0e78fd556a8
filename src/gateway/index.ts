/**
 * Gateway Module - Barrel Export
 *
 * @example
 * ```typescript
 * import { createGateway } from '@/gateway';
 *
 * const gateway = createGateway(config.gateway, console);
 * await gateway.send('42', 'Hello');
 * ```
 */

import type { Logger } from '@/core/logger';
import { ConsoleMessagingGateway } from './console-gateway';
import { HttpMessagingGateway } from './http-gateway';
import type { MessagingGateway } from './types';

export type {
  MessagingGateway,
  SendOptions,
  InlineButton,
  ButtonRows,
  OutgoingFile,
} from './types';
export { HttpMessagingGateway, type HttpMessagingGatewayOptions, type FetchFn } from './http-gateway';
export { ConsoleMessagingGateway } from './console-gateway';

/**
 * HTTP delivery when a URL is configured, console output otherwise.
 */
export function createGateway(
  settings: { url?: string; token?: string },
  logger: Logger
): MessagingGateway {
  if (settings.url) {
    return new HttpMessagingGateway({ url: settings.url, token: settings.token });
  }
  logger.warn('[gateway] GATEWAY_URL is not set; messages will be printed to the console');
  return new ConsoleMessagingGateway(logger);
}
