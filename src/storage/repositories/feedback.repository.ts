/**
 * Feedback Repository Implementation
 *
 * Append-only record of /feedback messages.
 */

import { desc, eq } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { feedback } from '../schema';
import type { Feedback } from '@/core/models';
import { withStore } from '@/core/errors';
import type { Repository } from './base';

export interface CreateFeedbackInput {
  owner: string;
  text: string;
  createdAt: Date;
}

function mapToDomain(row: typeof feedback.$inferSelect): Feedback {
  return {
    id: row.id,
    owner: row.owner,
    text: row.text,
    createdAt: row.createdAt,
  };
}

export class FeedbackRepository implements Repository<Feedback, number, CreateFeedbackInput> {
  constructor(private readonly db: AppDatabase) {}

  async findById(id: number): Promise<Feedback | null> {
    return withStore('load feedback', async () => {
      const result = await this.db.select().from(feedback).where(eq(feedback.id, id)).limit(1);
      return result.length === 0 ? null : mapToDomain(result[0]);
    });
  }

  /**
   * Most recent feedback first.
   */
  async findByOwner(owner: string): Promise<Feedback[]> {
    return withStore('list feedback', async () => {
      const results = await this.db
        .select()
        .from(feedback)
        .where(eq(feedback.owner, owner))
        .orderBy(desc(feedback.createdAt), desc(feedback.id));
      return results.map(mapToDomain);
    });
  }

  async create(input: CreateFeedbackInput): Promise<Feedback> {
    return withStore('save feedback', async () => {
      const result = await this.db.insert(feedback).values(input).returning();
      return mapToDomain(result[0]);
    });
  }

  async delete(id: number): Promise<boolean> {
    return withStore('delete feedback', () => {
      const result = this.db.delete(feedback).where(eq(feedback.id, id)).run();
      return result.changes > 0;
    });
  }
}
