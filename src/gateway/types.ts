/**
 * Messaging Gateway Types
 *
 * The outgoing side of the chat transport. Everything the bot says goes
 * through `MessagingGateway.send`; implementations deliver over HTTP or
 * print to the console.
 */

/**
 * One inline button. `data` is callback data (see `bot/callback-data`).
 */
export interface InlineButton {
  text: string;
  data: string;
}

/** Button rows, top to bottom. */
export type ButtonRows = InlineButton[][];

/**
 * A document attached to a message.
 */
export interface OutgoingFile {
  name: string;
  mimeType: string;
  content: string;
}

export interface SendOptions {
  buttons?: ButtonRows;
  file?: OutgoingFile;
  /** 'markdown' when `text` is pre-escaped markdown; plain text otherwise */
  format?: 'markdown' | 'plain';
}

/**
 * Delivers messages to chats.
 *
 * Implementations throw `DeliveryError` when a message cannot be delivered.
 */
export interface MessagingGateway {
  send(chatId: string, text: string, options?: SendOptions): Promise<void>;
}
