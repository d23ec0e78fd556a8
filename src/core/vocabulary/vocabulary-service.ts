/**
 * Vocabulary Service
 *
 * Everything that touches a user's deck as a whole: CSV import and
 * export, a random pair for /getpair, and /clear.
 *
 * Import rules:
 * - the separator is detected (`,` `;` tab) and a UTF-8 BOM is ignored
 * - the first row is skipped when its first two cells are both header
 *   words (front, back, word1, word2, source, target)
 * - rows with two or three columns import as front and back; a third
 *   column is accepted and ignored
 * - blank rows are ignored; any other row is rejected on its own and
 *   reported back with its line number
 */

import type { Card } from '../models';
import { NoCardsError, ValidationError } from '../errors';
import type { CardPair, CardRepository } from '@/storage/repositories/card.repository';
import type { QuizSessionRepository } from '@/storage/repositories/quiz-session.repository';
import type { ReviewSessionManager } from '../review';
import { detectDelimiter, isBlankRecord, parseCsv, stripBom, writeCsv } from './csv';

const HEADER_WORDS = new Set(['front', 'back', 'word1', 'word2', 'source', 'target']);

/**
 * A row that could not be imported.
 */
export interface RejectedRow {
  line: number;
  /** The row as it appeared, cells joined by the detected separator */
  content: string;
  reason: string;
}

export interface ParsedVocabulary {
  pairs: CardPair[];
  rejected: RejectedRow[];
}

export interface ImportResult {
  created: number;
  updated: number;
  rejected: RejectedRow[];
}

export interface ExportFile {
  fileName: string;
  content: string;
  count: number;
}

export interface ClearResult {
  cards: number;
  quizzes: number;
  reviewCancelled: boolean;
}

function isHeader(fields: readonly string[]): boolean {
  const [left, right] = fields;
  return (
    left !== undefined &&
    right !== undefined &&
    HEADER_WORDS.has(left.trim().toLowerCase()) &&
    HEADER_WORDS.has(right.trim().toLowerCase())
  );
}

/**
 * Reads vocabulary pairs from an uploaded file.
 *
 * @throws {ValidationError} If the file is not readable CSV at all
 */
export function parseVocabulary(text: string): ParsedVocabulary {
  const body = stripBom(text);
  const delimiter = detectDelimiter(body);
  const records = parseCsv(body, delimiter).filter((record) => !isBlankRecord(record.fields));

  const pairs: CardPair[] = [];
  const rejected: RejectedRow[] = [];

  records.forEach((record, index) => {
    if (index === 0 && isHeader(record.fields)) {
      return;
    }

    const content = record.fields.join(delimiter);
    if (record.fields.length < 2 || record.fields.length > 3) {
      rejected.push({
        line: record.line,
        content,
        reason: `expected 2 or 3 columns, found ${record.fields.length}`,
      });
      return;
    }

    const front = record.fields[0].trim();
    const back = record.fields[1].trim();
    if (front === '' || back === '') {
      rejected.push({ line: record.line, content, reason: 'empty word' });
      return;
    }
    pairs.push({ front, back });
  });

  return { pairs, rejected };
}

/** `vocabulary-YYYYMMDD.csv`, using the UTC date. */
export function exportFileName(now: Date): string {
  return `vocabulary-${now.toISOString().slice(0, 10).replace(/-/g, '')}.csv`;
}

export interface VocabularyServiceOptions {
  cards: CardRepository;
  quizzes: QuizSessionRepository;
  reviews: ReviewSessionManager;
}

export class VocabularyService {
  constructor(private readonly options: VocabularyServiceOptions) {}

  /**
   * Imports an uploaded CSV file into the owner's deck.
   *
   * @throws {ValidationError} If the file contains no importable pair
   */
  async importCsv(owner: string, text: string, now: Date): Promise<ImportResult> {
    const { pairs, rejected } = parseVocabulary(text);
    if (pairs.length === 0) {
      throw new ValidationError('The file contains no vocabulary pairs', { rejected });
    }

    const { created, updated } = await this.options.cards.upsertMany(owner, pairs, now);
    return { created, updated, rejected };
  }

  /**
   * The owner's deck as CSV, sorted by front.
   *
   * @throws {NoCardsError} If the deck is empty
   */
  async exportCsv(owner: string, now: Date): Promise<ExportFile> {
    const cards = await this.options.cards.findByOwner(owner);
    if (cards.length === 0) {
      throw new NoCardsError('You have no cards to export yet.');
    }
    return {
      fileName: exportFileName(now),
      content: writeCsv(cards.map((card) => [card.front, card.back])),
      count: cards.length,
    };
  }

  /**
   * @throws {NoCardsError} If the deck is empty
   */
  async randomPair(owner: string): Promise<Card> {
    const card = await this.options.cards.findRandom(owner);
    if (!card) {
      throw new NoCardsError('You have no cards yet. Upload a CSV file first.');
    }
    return card;
  }

  /**
   * Deletes the owner's cards, quiz questions and review session.
   */
  async clear(owner: string): Promise<ClearResult> {
    const reviewCancelled = await this.options.reviews.cancel(owner);
    const quizzes = await this.options.quizzes.deleteByOwner(owner);
    const cards = await this.options.cards.deleteByOwner(owner);
    return { cards, quizzes, reviewCancelled };
  }
}
