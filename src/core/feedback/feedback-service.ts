/**
 * Feedback Service
 *
 * Stores /feedback messages and forwards each one to the configured
 * admins. A failed forward is logged; the feedback is still stored.
 */

import type { Feedback } from '../models';
import { ValidationError } from '../errors';
import type { Logger } from '../logger';
import type { MessagingGateway } from '@/gateway';
import type { FeedbackRepository } from '@/storage/repositories/feedback.repository';

/** Longest accepted feedback message, in characters. */
export const MAX_FEEDBACK_LENGTH = 2000;

export interface FeedbackServiceOptions {
  feedback: FeedbackRepository;
  gateway: MessagingGateway;
  /** Chat ids of the admins receiving forwarded feedback */
  adminIds: string[];
  logger: Logger;
}

export interface FeedbackReceipt {
  feedback: Feedback;
  /** Admins the message reached */
  delivered: number;
}

export class FeedbackService {
  constructor(private readonly options: FeedbackServiceOptions) {}

  /**
   * @throws {ValidationError} If the text is empty or too long
   */
  async submit(owner: string, text: string, now: Date): Promise<FeedbackReceipt> {
    const trimmed = text.trim();
    if (trimmed === '') {
      throw new ValidationError('Write your message after /feedback, e.g. /feedback Love it!');
    }
    if (trimmed.length > MAX_FEEDBACK_LENGTH) {
      throw new ValidationError(`Feedback is limited to ${MAX_FEEDBACK_LENGTH} characters`);
    }

    const { feedback, gateway, adminIds, logger } = this.options;
    const stored = await feedback.create({ owner, text: trimmed, createdAt: now });

    let delivered = 0;
    for (const adminId of adminIds) {
      try {
        await gateway.send(adminId, `Feedback from ${owner}:\n${trimmed}`, { format: 'plain' });
        delivered++;
      } catch (error) {
        logger.error(`[feedback] Forward to admin ${adminId} failed:`, error);
      }
    }

    return { feedback: stored, delivered };
  }
}
