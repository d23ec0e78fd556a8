/**
 * Scheduling Module - Barrel Export
 *
 * SM-2 spaced repetition for vocabulary cards.
 *
 * Exports:
 * - applyAnswer: the pure SM-2 update rule
 * - selectDueSet: pure batch selection with fallback-fill
 * - SchedulingEngine: both of the above wired to the card repository
 * - Grade helpers mapping button names onto SM-2 qualities
 *
 * @example
 * ```typescript
 * import { SchedulingEngine, GRADE_ALIASES } from '@/core/scheduling';
 *
 * const engine = new SchedulingEngine(cardRepository);
 * await engine.recordAnswer(cardId, GRADE_ALIASES.good, new Date());
 * ```
 */

export { SchedulingEngine } from './scheduling-engine';
export { applyAnswer, DAY_MS } from './sm2';
export { selectDueSet, compareByDue, sample, type RandomSource } from './due-set';
export {
  GRADE_ALIASES,
  GRADE_NAMES,
  isQuality,
  parseGrade,
  type Quality,
  type GradeName,
} from './grades';
