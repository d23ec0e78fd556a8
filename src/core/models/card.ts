/**
 * Card Domain Types
 *
 * A Card is one vocabulary pair owned by a single user, together with the
 * SM-2 review state that decides when it is next shown. Cards are created
 * by CSV import, mutated only by the scheduling engine's update rule and
 * deleted by an explicit clear.
 *
 * This module contains only pure TypeScript types with no runtime dependencies.
 */

/**
 * SM-2 review state carried by every card.
 *
 * Invariants maintained by the scheduling engine:
 * - easeFactor >= 1.3
 * - intervalDays >= 0
 * - repetitions >= 0
 */
export interface ReviewState {
  /** Multiplier controlling how fast intervals grow for remembered cards */
  easeFactor: number;

  /** Days between the last review and the next one (0 for never-reviewed cards) */
  intervalDays: number;

  /** Consecutive correct answers since the last lapse */
  repetitions: number;

  /** When the card becomes due for review */
  dueAt: Date;

  /** When the card was last answered, or null if it never was */
  lastReviewedAt: Date | null;
}

/**
 * A vocabulary pair with its review state.
 *
 * @example
 * ```typescript
 * const card: Card = {
 *   id: 7,
 *   owner: '100200300',
 *   front: 'der Apfel',
 *   back: 'the apple',
 *   easeFactor: 2.5,
 *   intervalDays: 0,
 *   repetitions: 0,
 *   dueAt: new Date('2024-03-01T08:00:00Z'),
 *   lastReviewedAt: null,
 * };
 * ```
 */
export interface Card extends ReviewState {
  /** Store-assigned identifier; ascending ids break due-date ties */
  id: number;

  /** Identifier of the user who owns the card */
  owner: string;

  /** Prompt side of the pair (unique per owner) */
  front: string;

  /** Answer side of the pair */
  back: string;
}

/** Review state every freshly imported card starts with. */
export const INITIAL_EASE_FACTOR = 2.5;

/** Lower bound SM-2 keeps the ease factor at. */
export const MIN_EASE_FACTOR = 1.3;
