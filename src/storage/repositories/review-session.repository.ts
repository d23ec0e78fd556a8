/**
 * ReviewSession Repository Implementation
 *
 * Persists review walk-throughs, one row per owner. Every mutation after
 * creation is a compare-and-set on the `version` column: the caller passes
 * the version it read and the write only lands if nobody changed the row
 * in between. A lost race is reported as `false`, never as an exception.
 */

import { and, eq, lt, sql } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { cards, reviewSessions } from '../schema';
import type { ReviewSession, ReviewSessionState, ReviewState } from '@/core/models';
import { ConflictError, withStore } from '@/core/errors';
import { isConstraintViolation, type Repository } from './base';

/**
 * Input type for creating a new ReviewSession.
 * The session starts `in_progress` at position 0 with version 0.
 */
export interface CreateReviewSessionInput {
  owner: string;
  queue: number[];
  startedAt: Date;
}

/**
 * Fields written when a session moves between live states.
 */
export interface ReviewSessionPatch {
  position: number;
  state: ReviewSessionState;
  lastActivityAt: Date;
}

/**
 * Card update committed together with an answer.
 */
export interface AnsweredCard {
  id: number;
  state: ReviewState;
}

/**
 * Maps a database row to a ReviewSession domain model.
 */
function mapToDomain(row: typeof reviewSessions.$inferSelect): ReviewSession {
  return {
    owner: row.owner,
    queue: row.queue,
    position: row.position,
    state: row.state,
    startedAt: row.startedAt,
    lastActivityAt: row.lastActivityAt,
    version: row.version,
  };
}

/**
 * Repository for ReviewSession data access operations.
 *
 * @example
 * ```typescript
 * const repo = new ReviewSessionRepository(db);
 *
 * const session = await repo.create({ owner: '42', queue: [3, 9], startedAt: now });
 * const moved = await repo.updateIfVersion('42', session.version, {
 *   position: 0,
 *   state: 'awaiting_answer',
 *   lastActivityAt: now,
 * });
 * ```
 */
export class ReviewSessionRepository
  implements Repository<ReviewSession, string, CreateReviewSessionInput>
{
  constructor(private readonly db: AppDatabase) {}

  /**
   * @param owner - Sessions are keyed by their owner
   */
  async findById(owner: string): Promise<ReviewSession | null> {
    return withStore('load review session', async () => {
      const result = await this.db
        .select()
        .from(reviewSessions)
        .where(eq(reviewSessions.owner, owner))
        .limit(1);
      return result.length === 0 ? null : mapToDomain(result[0]);
    });
  }

  /**
   * Creates the owner's session.
   *
   * @throws {ConflictError} If the owner already has a session row
   */
  async create(input: CreateReviewSessionInput): Promise<ReviewSession> {
    return withStore('create review session', async () => {
      try {
        const result = await this.db
          .insert(reviewSessions)
          .values({
            owner: input.owner,
            queue: input.queue,
            position: 0,
            state: 'in_progress',
            startedAt: input.startedAt,
            lastActivityAt: input.startedAt,
            version: 0,
          })
          .returning();
        return mapToDomain(result[0]);
      } catch (error) {
        if (isConstraintViolation(error)) {
          throw new ConflictError('A review session is already running');
        }
        throw error;
      }
    });
  }

  /**
   * Moves the session to a new position/state if its version still matches.
   *
   * @returns false when the session changed or vanished since it was read
   */
  async updateIfVersion(
    owner: string,
    expectedVersion: number,
    patch: ReviewSessionPatch
  ): Promise<boolean> {
    return withStore('update review session', () => {
      const result = this.db
        .update(reviewSessions)
        .set({
          position: patch.position,
          state: patch.state,
          lastActivityAt: patch.lastActivityAt,
          version: sql`${reviewSessions.version} + 1`,
        })
        .where(
          and(eq(reviewSessions.owner, owner), eq(reviewSessions.version, expectedVersion))
        )
        .run();
      return result.changes > 0;
    });
  }

  /**
   * Records an answer: writes the card's new review state and advances
   * (or, when `next` is null, deletes) the session, all in one transaction
   * guarded by the session version. Nothing is written if the guard fails.
   *
   * @param card - New state for the answered card; null if the card is gone
   * @param next - Session fields after the answer; null completes the session
   * @returns false when the session changed or vanished since it was read
   */
  async commitAnswer(
    owner: string,
    expectedVersion: number,
    card: AnsweredCard | null,
    next: ReviewSessionPatch | null
  ): Promise<boolean> {
    return withStore('record answer', () =>
      this.db.transaction((tx) => {
        const guard = and(
          eq(reviewSessions.owner, owner),
          eq(reviewSessions.version, expectedVersion)
        );

        const sessionResult = next
          ? tx
              .update(reviewSessions)
              .set({
                position: next.position,
                state: next.state,
                lastActivityAt: next.lastActivityAt,
                version: sql`${reviewSessions.version} + 1`,
              })
              .where(guard)
              .run()
          : tx.delete(reviewSessions).where(guard).run();

        if (sessionResult.changes === 0) {
          return false;
        }

        if (card) {
          tx.update(cards)
            .set({
              easeFactor: card.state.easeFactor,
              intervalDays: card.state.intervalDays,
              repetitions: card.state.repetitions,
              dueAt: card.state.dueAt,
              lastReviewedAt: card.state.lastReviewedAt,
            })
            .where(eq(cards.id, card.id))
            .run();
        }
        return true;
      })
    );
  }

  /**
   * Deletes the owner's session whatever its state.
   */
  async delete(owner: string): Promise<boolean> {
    return withStore('delete review session', () => {
      const result = this.db.delete(reviewSessions).where(eq(reviewSessions.owner, owner)).run();
      return result.changes > 0;
    });
  }

  /**
   * Deletes the owner's session only if it is still at `expectedVersion`.
   */
  async deleteIfVersion(owner: string, expectedVersion: number): Promise<boolean> {
    return withStore('delete review session', () => {
      const result = this.db
        .delete(reviewSessions)
        .where(
          and(eq(reviewSessions.owner, owner), eq(reviewSessions.version, expectedVersion))
        )
        .run();
      return result.changes > 0;
    });
  }

  /**
   * Removes every session idle since before `cutoff`.
   *
   * @returns Number of sessions removed
   */
  async deleteIdleSince(cutoff: Date): Promise<number> {
    return withStore('sweep review sessions', () => {
      const result = this.db
        .delete(reviewSessions)
        .where(lt(reviewSessions.lastActivityAt, cutoff))
        .run();
      return result.changes;
    });
  }
}
