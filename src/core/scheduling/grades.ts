/**
 * Answer Grades
 *
 * SM-2 grades answers on a 0..5 scale. The review buttons only offer four
 * named grades, mapped onto that scale below.
 */

/** A valid SM-2 answer quality. */
export type Quality = 0 | 1 | 2 | 3 | 4 | 5;

/** Grade names shown on the review buttons. */
export type GradeName = 'again' | 'hard' | 'good' | 'easy';

/**
 * Quality behind each named grade.
 */
export const GRADE_ALIASES: Readonly<Record<GradeName, Quality>> = {
  again: 0,
  hard: 3,
  good: 4,
  easy: 5,
};

/** Button order, from worst to best recall. */
export const GRADE_NAMES: readonly GradeName[] = ['again', 'hard', 'good', 'easy'];

/**
 * Type guard for qualities; rejects fractions, negatives and values above 5.
 */
export function isQuality(value: number): value is Quality {
  return Number.isInteger(value) && value >= 0 && value <= 5;
}

function isGradeName(value: string): value is GradeName {
  return value === 'again' || value === 'hard' || value === 'good' || value === 'easy';
}

/**
 * Reads a grade written either as a name (`good`) or a digit (`4`).
 *
 * @returns The quality, or null for anything else
 *
 * @example
 * ```typescript
 * parseGrade('easy'); // 5
 * parseGrade('2');    // 2
 * parseGrade('7');    // null
 * ```
 */
export function parseGrade(raw: string): Quality | null {
  if (isGradeName(raw)) {
    return GRADE_ALIASES[raw];
  }
  if (!/^\d$/.test(raw)) {
    return null;
  }
  const value = Number(raw);
  return isQuality(value) ? value : null;
}
