/**
 * Card Repository Implementation
 *
 * Data access for vocabulary cards. Maps database rows to the `Card`
 * domain model and owns the queries the scheduling engine relies on:
 * due cards in (dueAt, id) order and the non-due pool used for
 * fallback-fill.
 *
 * Every method reports driver failures as `StoreError`.
 */

import { and, asc, count, eq, gt, lte, sql } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { cards } from '../schema';
import type { Card, ReviewState } from '@/core/models';
import { INITIAL_EASE_FACTOR } from '@/core/models';
import { withStore } from '@/core/errors';
import type { Repository } from './base';

/**
 * Input type for creating a new Card.
 * Review state starts fresh; the card is due at `dueAt` (import time).
 */
export interface CreateCardInput {
  owner: string;
  front: string;
  back: string;
  dueAt: Date;
}

/**
 * One vocabulary pair to import.
 */
export interface CardPair {
  front: string;
  back: string;
}

/**
 * Outcome of a bulk import.
 */
export interface UpsertResult {
  /** Pairs whose front was new for the owner */
  created: number;
  /** Pairs whose front already existed; only the back was replaced */
  updated: number;
}

/**
 * Maps a database row to a Card domain model.
 *
 * @param row - Raw database row from Drizzle query
 * @returns Card domain model (Drizzle's timestamp_ms mode already yields Dates)
 */
function mapToDomain(row: typeof cards.$inferSelect): Card {
  return {
    id: row.id,
    owner: row.owner,
    front: row.front,
    back: row.back,
    easeFactor: row.easeFactor,
    intervalDays: row.intervalDays,
    repetitions: row.repetitions,
    dueAt: row.dueAt,
    lastReviewedAt: row.lastReviewedAt,
  };
}

/**
 * Repository for Card data access operations.
 *
 * @example
 * ```typescript
 * const repo = new CardRepository(db);
 *
 * await repo.upsertMany('42', [{ front: 'der Hund', back: 'the dog' }], new Date());
 * const due = await repo.findDue('42', new Date(), 5);
 * ```
 */
export class CardRepository implements Repository<Card, number, CreateCardInput> {
  constructor(private readonly db: AppDatabase) {}

  async findById(id: number): Promise<Card | null> {
    return withStore('load card', async () => {
      const result = await this.db.select().from(cards).where(eq(cards.id, id)).limit(1);
      return result.length === 0 ? null : mapToDomain(result[0]);
    });
  }

  /**
   * All cards of an owner, sorted by front then id (the export order).
   */
  async findByOwner(owner: string): Promise<Card[]> {
    return withStore('list cards', async () => {
      const results = await this.db
        .select()
        .from(cards)
        .where(eq(cards.owner, owner))
        .orderBy(asc(cards.front), asc(cards.id));
      return results.map(mapToDomain);
    });
  }

  /**
   * Up to `limit` cards with `dueAt <= asOf`, earliest due first, ties
   * broken by ascending id.
   */
  async findDue(owner: string, asOf: Date, limit: number): Promise<Card[]> {
    if (limit <= 0) {
      return [];
    }
    return withStore('load due cards', async () => {
      const results = await this.db
        .select()
        .from(cards)
        .where(and(eq(cards.owner, owner), lte(cards.dueAt, asOf)))
        .orderBy(asc(cards.dueAt), asc(cards.id))
        .limit(limit);
      return results.map(mapToDomain);
    });
  }

  /**
   * Every card of the owner that is not yet due; the fallback-fill pool.
   */
  async findNotDue(owner: string, asOf: Date): Promise<Card[]> {
    return withStore('load fallback cards', async () => {
      const results = await this.db
        .select()
        .from(cards)
        .where(and(eq(cards.owner, owner), gt(cards.dueAt, asOf)))
        .orderBy(asc(cards.id));
      return results.map(mapToDomain);
    });
  }

  /**
   * A uniformly random card of the owner, or null for an empty deck.
   */
  async findRandom(owner: string): Promise<Card | null> {
    return withStore('load random card', async () => {
      const result = await this.db
        .select()
        .from(cards)
        .where(eq(cards.owner, owner))
        .orderBy(sql`RANDOM()`)
        .limit(1);
      return result.length === 0 ? null : mapToDomain(result[0]);
    });
  }

  async countByOwner(owner: string): Promise<number> {
    return withStore('count cards', async () => {
      const result = await this.db
        .select({ value: count() })
        .from(cards)
        .where(eq(cards.owner, owner));
      return result[0]?.value ?? 0;
    });
  }

  /**
   * Number of the owner's cards with `dueAt <= asOf`.
   */
  async countDue(owner: string, asOf: Date): Promise<number> {
    return withStore('count due cards', async () => {
      const result = await this.db
        .select({ value: count() })
        .from(cards)
        .where(and(eq(cards.owner, owner), lte(cards.dueAt, asOf)));
      return result[0]?.value ?? 0;
    });
  }

  /**
   * Moves every card due at `asOf` to `until`. Review state is untouched.
   *
   * @returns Number of cards moved
   */
  async postponeDue(owner: string, asOf: Date, until: Date): Promise<number> {
    return withStore('postpone due cards', () => {
      const result = this.db
        .update(cards)
        .set({ dueAt: until })
        .where(and(eq(cards.owner, owner), lte(cards.dueAt, asOf)))
        .run();
      return result.changes;
    });
  }

  async create(input: CreateCardInput): Promise<Card> {
    return withStore('create card', async () => {
      const result = await this.db
        .insert(cards)
        .values({
          owner: input.owner,
          front: input.front,
          back: input.back,
          easeFactor: INITIAL_EASE_FACTOR,
          intervalDays: 0,
          repetitions: 0,
          dueAt: input.dueAt,
          lastReviewedAt: null,
          createdAt: input.dueAt,
        })
        .returning();
      return mapToDomain(result[0]);
    });
  }

  /**
   * Imports pairs in one transaction. A front the owner already has keeps
   * its review state and only gets the new back; new fronts start fresh
   * and are due at `now`.
   */
  async upsertMany(owner: string, pairs: CardPair[], now: Date): Promise<UpsertResult> {
    return withStore('import cards', () =>
      this.db.transaction((tx) => {
        const outcome: UpsertResult = { created: 0, updated: 0 };
        for (const pair of pairs) {
          const existing = tx
            .select({ id: cards.id })
            .from(cards)
            .where(and(eq(cards.owner, owner), eq(cards.front, pair.front)))
            .get();

          if (existing) {
            tx.update(cards).set({ back: pair.back }).where(eq(cards.id, existing.id)).run();
            outcome.updated++;
          } else {
            tx.insert(cards)
              .values({
                owner,
                front: pair.front,
                back: pair.back,
                easeFactor: INITIAL_EASE_FACTOR,
                intervalDays: 0,
                repetitions: 0,
                dueAt: now,
                lastReviewedAt: null,
                createdAt: now,
              })
              .run();
            outcome.created++;
          }
        }
        return outcome;
      })
    );
  }

  /**
   * Writes the SM-2 state produced by the scheduling engine.
   *
   * @returns The updated card, or null if it was deleted meanwhile
   */
  async updateReviewState(id: number, state: ReviewState): Promise<Card | null> {
    return withStore('update card', async () => {
      const result = await this.db
        .update(cards)
        .set({
          easeFactor: state.easeFactor,
          intervalDays: state.intervalDays,
          repetitions: state.repetitions,
          dueAt: state.dueAt,
          lastReviewedAt: state.lastReviewedAt,
        })
        .where(eq(cards.id, id))
        .returning();
      return result.length === 0 ? null : mapToDomain(result[0]);
    });
  }

  async delete(id: number): Promise<boolean> {
    return withStore('delete card', () => {
      const result = this.db.delete(cards).where(eq(cards.id, id)).run();
      return result.changes > 0;
    });
  }

  /**
   * Removes every card of the owner. Quiz sessions built from them go
   * with them through the foreign key cascade.
   *
   * @returns Number of cards removed
   */
  async deleteByOwner(owner: string): Promise<number> {
    return withStore('clear cards', () => {
      const result = this.db.delete(cards).where(eq(cards.owner, owner)).run();
      return result.changes;
    });
  }
}
