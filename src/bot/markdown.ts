/**
 * Chat Markdown Helpers
 *
 * Outgoing messages use the chat platform's strict markdown dialect, in
 * which every reserved character in user text must be backslash-escaped.
 */

const RESERVED = /[_*[\]()~`>#+\-=|{}.!\\]/g;

/**
 * Escapes user-provided text for a markdown message.
 *
 * @example
 * ```typescript
 * escapeMarkdown('a.b (c)'); // 'a\\.b \\(c\\)'
 * ```
 */
export function escapeMarkdown(text: string): string {
  return text.replace(RESERVED, (char) => `\\${char}`);
}

/** Text shown only after the reader taps it. */
export function spoiler(text: string): string {
  return `||${escapeMarkdown(text)}||`;
}

export function bold(text: string): string {
  return `*${escapeMarkdown(text)}*`;
}

export function italic(text: string): string {
  return `_${escapeMarkdown(text)}_`;
}
