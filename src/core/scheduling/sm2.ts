/**
 * SM-2 Update Rule
 *
 * Pure function computing a card's next review state from an answer
 * quality. It never touches the store; callers read the card, apply the
 * answer and write the result back through the card repository.
 *
 * Rules, for quality q on a card with ease EF and interval I:
 * - q < 3: repetitions reset to 0, interval 1 day, EF unchanged
 * - q >= 3: repetitions + 1; interval 1 on the first success, 6 on the
 *   second, round(I × EF) afterwards (EF taken before this answer's
 *   adjustment); EF' = max(1.3, EF + 0.1 − (5−q)(0.08 + (5−q)·0.02))
 *
 * In both cases the card is stamped reviewed at `now` and due
 * `interval` days later.
 */

import type { ReviewState } from '../models';
import { MIN_EASE_FACTOR } from '../models';
import { InvariantError } from '../errors';
import { isQuality } from './grades';

/** Milliseconds in one scheduling day. */
export const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Applies one answer to a card's review state.
 *
 * @param card - Current state; any object carrying the review fields
 * @param quality - Integer answer quality 0..5
 * @param now - Instant of the answer
 * @returns A copy of `card` with the updated review fields
 * @throws {InvariantError} If `quality` is not an integer in 0..5
 *
 * @example
 * ```typescript
 * const next = applyAnswer(card, 5, new Date());
 * await cards.updateReviewState(card.id, next);
 * ```
 */
export function applyAnswer<T extends ReviewState>(card: T, quality: number, now: Date): T {
  if (!isQuality(quality)) {
    throw new InvariantError(`Answer quality must be an integer from 0 to 5, got ${quality}`);
  }

  let { easeFactor, intervalDays, repetitions } = card;

  if (quality < 3) {
    repetitions = 0;
    intervalDays = 1;
  } else {
    repetitions += 1;
    if (repetitions === 1) {
      intervalDays = 1;
    } else if (repetitions === 2) {
      intervalDays = 6;
    } else {
      intervalDays = Math.round(intervalDays * easeFactor);
    }

    const miss = 5 - quality;
    easeFactor = Math.max(MIN_EASE_FACTOR, easeFactor + (0.1 - miss * (0.08 + miss * 0.02)));
  }

  return {
    ...card,
    easeFactor,
    intervalDays,
    repetitions,
    lastReviewedAt: now,
    dueAt: new Date(now.getTime() + intervalDays * DAY_MS),
  };
}
