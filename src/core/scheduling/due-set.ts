/**
 * Due-Set Selection
 *
 * Picks the cards for one review batch: due cards first (earliest due,
 * then lowest id), topped up with randomly chosen cards that are not due
 * yet when too few are due. The random source is a parameter so selection
 * is reproducible in tests.
 */

import type { Card } from '../models';

/** Returns a float in [0, 1), like Math.random. */
export type RandomSource = () => number;

/**
 * Orders cards by due date, ties broken by ascending id.
 */
export function compareByDue(a: Card, b: Card): number {
  return a.dueAt.getTime() - b.dueAt.getTime() || a.id - b.id;
}

/**
 * Draws up to `count` distinct items from `pool` uniformly at random
 * (partial Fisher-Yates on a copy; `pool` is left untouched).
 */
export function sample<T>(pool: readonly T[], count: number, random: RandomSource): T[] {
  const items = [...pool];
  const take = Math.min(count, items.length);
  for (let i = 0; i < take; i++) {
    const j = i + Math.floor(random() * (items.length - i));
    [items[i], items[j]] = [items[j], items[i]];
  }
  return items.slice(0, take);
}

/**
 * Builds a batch of at most `limit` cards.
 *
 * @param due - Cards with dueAt <= now, in any order
 * @param fallback - Cards of the same owner that are not due
 * @param limit - Batch size; zero or less yields an empty batch
 * @param random - Random source for the fallback draw
 * @returns Due cards in (dueAt, id) order followed by fallback cards,
 *   never containing the same card twice
 */
export function selectDueSet(
  due: readonly Card[],
  fallback: readonly Card[],
  limit: number,
  random: RandomSource = Math.random
): Card[] {
  if (limit <= 0) {
    return [];
  }

  const selected = [...due].sort(compareByDue).slice(0, limit);
  if (selected.length === limit) {
    return selected;
  }

  const taken = new Set(selected.map((card) => card.id));
  const candidates = fallback.filter((card) => !taken.has(card.id));
  return [...selected, ...sample(candidates, limit - selected.length, random)];
}
