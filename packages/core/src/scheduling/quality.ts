import { ReviewQuality } from '../domain/enums';
import { UnknownQualitySignalError } from '../errors';

/**
 * Accepted spellings of each quality signal. The short forms are the
 * labels review logs were historically written with.
 */
const QUALITY_LOOKUP: ReadonlyMap<string, ReviewQuality> = new Map([
  ['incorrect', ReviewQuality.INCORRECT],
  ['partially_correct', ReviewQuality.PARTIALLY_CORRECT],
  ['correct', ReviewQuality.CORRECT],
  ['unrated', ReviewQuality.UNRATED],
  ['bad', ReviewQuality.INCORRECT],
  ['attention', ReviewQuality.PARTIALLY_CORRECT],
  ['good', ReviewQuality.CORRECT],
  ['skipped', ReviewQuality.UNRATED],
]);

export const ACCEPTED_QUALITY_SIGNALS: readonly string[] = [...QUALITY_LOOKUP.keys()];

function normalizeSignal(value: string): string {
  return value.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

/**
 * Resolve a raw quality signal ("Partially correct", "GOOD", "skipped", ...)
 * to a `ReviewQuality`. Throws `UnknownQualitySignalError` otherwise.
 */
export function parseReviewQuality(value: unknown): ReviewQuality {
  if (typeof value === 'string') {
    const quality = QUALITY_LOOKUP.get(normalizeSignal(value));
    if (quality !== undefined) {
      return quality;
    }
  }
  throw new UnknownQualitySignalError(value);
}
