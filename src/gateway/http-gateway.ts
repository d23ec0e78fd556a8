/**
 * HTTP Messaging Gateway
 *
 * Posts each outgoing message as JSON to a chat relay endpoint. The relay
 * owns the platform credentials and turns the payload into a real chat
 * message.
 *
 * Request body:
 * ```json
 * { "chatId": "42", "text": "...", "format": "markdown",
 *   "buttons": [[{ "text": "Good", "data": "r:4" }]],
 *   "file": { "name": "vocabulary-20240301.csv", "mimeType": "text/csv", "content": "..." } }
 * ```
 *
 * Any network failure or non-2xx response becomes a DeliveryError.
 */

import { DeliveryError } from '@/core/errors';
import type { MessagingGateway, SendOptions } from './types';

/** Minimal fetch signature, so tests can pass a stub. */
export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpMessagingGatewayOptions {
  /** Relay endpoint receiving the POSTs */
  url: string;
  /** Sent as a bearer token when set */
  token?: string;
  /** Abort a request after this long (default 10s) */
  timeoutMs?: number;
  fetch?: FetchFn;
}

export class HttpMessagingGateway implements MessagingGateway {
  private readonly fetchFn: FetchFn;
  private readonly timeoutMs: number;

  constructor(private readonly options: HttpMessagingGatewayOptions) {
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  async send(chatId: string, text: string, options: SendOptions = {}): Promise<void> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.options.token) {
      headers.Authorization = `Bearer ${this.options.token}`;
    }

    let response: Response;
    try {
      response = await this.fetchFn(this.options.url, {
        method: 'POST',
        headers,
        body: JSON.stringify({
          chatId,
          text,
          format: options.format ?? 'plain',
          buttons: options.buttons ?? [],
          file: options.file,
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new DeliveryError(`Could not reach the messaging gateway for chat ${chatId}`, error);
    }

    if (!response.ok) {
      throw new DeliveryError(
        `Messaging gateway rejected the message for chat ${chatId} (HTTP ${response.status})`
      );
    }
  }
}
