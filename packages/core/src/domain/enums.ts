export enum ReviewQuality {
  INCORRECT = 'incorrect',
  PARTIALLY_CORRECT = 'partially_correct',
  CORRECT = 'correct',
  UNRATED = 'unrated',
}

/**
 * What a partially correct answer does to the repetition count:
 * `hold` keeps it, `increment` counts the review as a success.
 */
export type PartialRepetitionPolicy = 'hold' | 'increment';

export const PARTIAL_REPETITION_POLICIES = ['hold', 'increment'] as const;
