/**
 * Incoming Chat Updates
 *
 * What the chat transport delivers to the bot, already normalized: a text
 * message, an inline button press or an uploaded document. `owner` is the
 * id of the user who acted; replies go to `chatId`.
 */

export interface MessageUpdate {
  type: 'message';
  owner: string;
  chatId: string;
  text: string;
}

export interface CallbackUpdate {
  type: 'callback';
  owner: string;
  chatId: string;
  data: string;
}

export interface DocumentUpdate {
  type: 'document';
  owner: string;
  chatId: string;
  fileName: string;
  /** File contents decoded as UTF-8 text */
  content: string;
}

export type IncomingUpdate = MessageUpdate | CallbackUpdate | DocumentUpdate;
