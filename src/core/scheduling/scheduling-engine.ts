/**
 * Scheduling Engine
 *
 * Connects the pure SM-2 rule and due-set selection to the card store.
 * Session managers and the reminder dispatcher ask it which cards to show
 * and hand it answers to record.
 */

import type { Card } from '../models';
import type { CardRepository } from '@/storage/repositories/card.repository';
import { selectDueSet, type RandomSource } from './due-set';
import { applyAnswer } from './sm2';

/**
 * @example
 * ```typescript
 * const engine = new SchedulingEngine(new CardRepository(db));
 *
 * const batch = await engine.dueSet('42', new Date(), 5);
 * await engine.recordAnswer(batch[0].id, 4, new Date());
 * ```
 */
export class SchedulingEngine {
  constructor(
    private readonly cards: CardRepository,
    private readonly random: RandomSource = Math.random
  ) {}

  /**
   * Up to `limit` cards of `owner`: due ones first by (dueAt, id), then
   * random non-due ones until the limit or the deck runs out.
   */
  async dueSet(owner: string, now: Date, limit: number): Promise<Card[]> {
    if (limit <= 0) {
      return [];
    }

    const due = await this.cards.findDue(owner, now, limit);
    if (due.length >= limit) {
      return due;
    }

    const fallback = await this.cards.findNotDue(owner, now);
    return selectDueSet(due, fallback, limit, this.random);
  }

  /** Size of the owner's backlog at `now`. */
  async countDue(owner: string, now: Date): Promise<number> {
    return this.cards.countDue(owner, now);
  }

  /**
   * Snoozes the owner's backlog: every card due at `now` comes due again
   * at `until`.
   *
   * @returns Number of cards snoozed
   */
  async postponeDue(owner: string, now: Date, until: Date): Promise<number> {
    return this.cards.postponeDue(owner, now, until);
  }

  /**
   * Applies an answer to a stored card and persists the result.
   *
   * @returns The updated card, or null if the card no longer exists
   * @throws {InvariantError} If `quality` is not an integer in 0..5
   */
  async recordAnswer(cardId: number, quality: number, now: Date): Promise<Card | null> {
    const card = await this.cards.findById(cardId);
    if (!card) {
      return null;
    }
    return this.cards.updateReviewState(card.id, applyAnswer(card, quality, now));
  }
}
