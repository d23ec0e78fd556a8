/**
 * Test Helpers Module
 *
 * Fakes for the outside world (gateway, logger, clock) and small factories
 * for test data.
 */

import { DeliveryError } from '../src/core/errors';
import type { Logger } from '../src/core/logger';
import type { Card } from '../src/core/models';
import type { CardRepository } from '../src/storage';
import type { MessagingGateway, SendOptions } from '../src/gateway';

// ============================================================================
// Time
// ============================================================================

export const MINUTE = 60 * 1000;
export const HOUR = 60 * MINUTE;
export const DAY = 24 * HOUR;

/** Fixed reference instant used across the suite. */
export const T0 = new Date('2024-03-01T08:00:00.000Z');

export function at(offsetMs: number, base: Date = T0): Date {
  return new Date(base.getTime() + offsetMs);
}

/**
 * A clock that only moves when told to.
 */
export class FakeClock {
  private current: Date;

  constructor(start: Date = T0) {
    this.current = new Date(start.getTime());
  }

  /** Bound so it can be passed around as a Clock. */
  readonly now = (): Date => new Date(this.current.getTime());

  advance(ms: number): Date {
    this.current = new Date(this.current.getTime() + ms);
    return this.now();
  }

  set(date: Date): void {
    this.current = new Date(date.getTime());
  }
}

// ============================================================================
// Gateway and logger fakes
// ============================================================================

export interface SentMessage {
  chatId: string;
  text: string;
  options?: SendOptions;
}

/**
 * Keeps every message instead of delivering it. Chats listed in
 * `failFor` get a DeliveryError.
 */
export class RecordingGateway implements MessagingGateway {
  readonly sent: SentMessage[] = [];
  readonly failFor = new Set<string>();

  async send(chatId: string, text: string, options?: SendOptions): Promise<void> {
    if (this.failFor.has(chatId)) {
      throw new DeliveryError(`Chat ${chatId} unreachable`);
    }
    this.sent.push({ chatId, text, options });
  }

  /** Messages sent to one chat, oldest first. */
  to(chatId: string): SentMessage[] {
    return this.sent.filter((message) => message.chatId === chatId);
  }

  last(): SentMessage | undefined {
    return this.sent[this.sent.length - 1];
  }

  clear(): void {
    this.sent.length = 0;
  }
}

export interface LogEntry {
  level: 'log' | 'warn' | 'error';
  message: string;
  details: unknown[];
}

export class RecordingLogger implements Logger {
  readonly entries: LogEntry[] = [];

  log(message: string, ...details: unknown[]): void {
    this.entries.push({ level: 'log', message, details });
  }

  warn(message: string, ...details: unknown[]): void {
    this.entries.push({ level: 'warn', message, details });
  }

  error(message: string, ...details: unknown[]): void {
    this.entries.push({ level: 'error', message, details });
  }

  messages(level: LogEntry['level']): string[] {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
  }
}

// ============================================================================
// Data factories
// ============================================================================

/**
 * Inserts `count` cards named `word1`/`meaning1`... for `owner`.
 * `dueAt` defaults to T0, so all of them are due at T0.
 */
export async function seedCards(
  cards: CardRepository,
  owner: string,
  count: number,
  dueAt: Date = T0
): Promise<Card[]> {
  const created: Card[] = [];
  for (let i = 1; i <= count; i++) {
    created.push(await cards.create({ owner, front: `word${i}`, back: `meaning${i}`, dueAt }));
  }
  return created;
}

/** Parses a JSON response body; assert on it with toEqual/toMatchObject. */
export async function getJsonResponse(response: Response): Promise<unknown> {
  return response.json();
}
