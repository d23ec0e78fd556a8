/**
 * QuizSession Repository Implementation
 *
 * Stores issued quiz questions by token. Revealing is a single guarded
 * UPDATE (`revealed = 0 AND expires_at >= now`), so of two concurrent
 * reveals exactly one sees a changed row.
 */

import { and, eq, gte, lt } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { quizSessions } from '../schema';
import type { QuizDirection, QuizSession } from '@/core/models';
import { withStore } from '@/core/errors';
import type { Repository } from './base';

/**
 * Input type for creating a new QuizSession.
 */
export interface CreateQuizSessionInput {
  token: string;
  owner: string;
  cardId: number;
  prompt: string;
  correctAnswer: string;
  direction: QuizDirection;
  createdAt: Date;
  expiresAt: Date;
}

function mapToDomain(row: typeof quizSessions.$inferSelect): QuizSession {
  return {
    token: row.token,
    owner: row.owner,
    cardId: row.cardId,
    prompt: row.prompt,
    correctAnswer: row.correctAnswer,
    direction: row.direction,
    createdAt: row.createdAt,
    expiresAt: row.expiresAt,
    revealed: row.revealed,
  };
}

/**
 * Repository for QuizSession data access operations.
 */
export class QuizSessionRepository
  implements Repository<QuizSession, string, CreateQuizSessionInput>
{
  constructor(private readonly db: AppDatabase) {}

  /**
   * @param token - Quiz sessions are keyed by their token
   */
  async findById(token: string): Promise<QuizSession | null> {
    return withStore('load quiz session', async () => {
      const result = await this.db
        .select()
        .from(quizSessions)
        .where(eq(quizSessions.token, token))
        .limit(1);
      return result.length === 0 ? null : mapToDomain(result[0]);
    });
  }

  async create(input: CreateQuizSessionInput): Promise<QuizSession> {
    return withStore('create quiz session', async () => {
      const result = await this.db
        .insert(quizSessions)
        .values({ ...input, revealed: false })
        .returning();
      return mapToDomain(result[0]);
    });
  }

  /**
   * Marks the question revealed if it is unrevealed and unexpired at `now`.
   *
   * @returns true for the single caller that flipped the flag
   */
  async markRevealed(token: string, now: Date): Promise<boolean> {
    return withStore('reveal quiz answer', () => {
      const result = this.db
        .update(quizSessions)
        .set({ revealed: true })
        .where(
          and(
            eq(quizSessions.token, token),
            eq(quizSessions.revealed, false),
            gte(quizSessions.expiresAt, now)
          )
        )
        .run();
      return result.changes > 0;
    });
  }

  async delete(token: string): Promise<boolean> {
    return withStore('delete quiz session', () => {
      const result = this.db.delete(quizSessions).where(eq(quizSessions.token, token)).run();
      return result.changes > 0;
    });
  }

  /**
   * Removes every session with `expiresAt < now`, revealed or not.
   *
   * @returns Number of sessions removed
   */
  async deleteExpired(now: Date): Promise<number> {
    return withStore('sweep quiz sessions', () => {
      const result = this.db.delete(quizSessions).where(lt(quizSessions.expiresAt, now)).run();
      return result.changes;
    });
  }

  async deleteByOwner(owner: string): Promise<number> {
    return withStore('clear quiz sessions', () => {
      const result = this.db.delete(quizSessions).where(eq(quizSessions.owner, owner)).run();
      return result.changes;
    });
  }
}
