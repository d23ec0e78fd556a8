/**
 * Console Messaging Gateway
 *
 * Prints outgoing messages instead of delivering them. Used when no
 * gateway URL is configured, e.g. during local development.
 */

import type { Logger } from '@/core/logger';
import type { MessagingGateway, SendOptions } from './types';

export class ConsoleMessagingGateway implements MessagingGateway {
  constructor(private readonly logger: Logger = console) {}

  async send(chatId: string, text: string, options: SendOptions = {}): Promise<void> {
    this.logger.log(`[gateway] -> ${chatId}\n${text}`);

    for (const row of options.buttons ?? []) {
      this.logger.log(`[gateway]    ${row.map((b) => `[${b.text} | ${b.data}]`).join(' ')}`);
    }
    if (options.file) {
      this.logger.log(
        `[gateway]    attachment ${options.file.name} (${options.file.content.length} chars)`
      );
    }
  }
}
