import { addDays, toCalendarDate } from '../domain/calendar';
import { ReviewQuality } from '../domain/enums';
import {
  EARLIEST_REVIEW_TIME,
  LATEST_REVIEW_TIME,
  NewReviewableItemSchema,
  type NewReviewableItem,
  type ReviewableItem,
} from '../domain/review';
import { DEFAULT_SCHEDULER_CONFIG, type SchedulerConfig } from '../config/scheduling-config';
import { InvalidItemStateError } from '../errors';
import { assertReviewableItem, readItemId, validateSchema } from '../validation/validator';
import { parseReviewQuality } from './quality';

/**
 * Build an item in its initial state: never reviewed, due on the day it
 * was created.
 */
export function createReviewableItem(
  input: NewReviewableItem,
  config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG,
  createdAt: Date = new Date()
): ReviewableItem {
  const result = validateSchema(NewReviewableItemSchema, input);
  if (!result.valid) {
    throw new InvalidItemStateError(readItemId(input), result.errors);
  }

  return {
    ...result.data,
    repetitionCount: 0,
    easeFactor: config.initialEaseFactor,
    currentIntervalDays: 0,
    dueDate: toCalendarDate(createdAt),
    lastReviewedAt: null,
  };
}

/**
 * SM-2 style review scheduler working on four quality levels.
 *
 * - incorrect: repetition count resets, the item is relearned after
 *   `relearnIntervalDays`, ease drops by `incorrectEasePenalty`
 * - partially correct: ease drops by `partialEasePenalty`, the interval
 *   grows by `partialIntervalMultiplier`
 * - correct: `bootstrapIntervals` for the first successes, then
 *   `interval * ease`; ease grows by `correctEaseBonus`
 * - unrated: nothing but `lastReviewedAt` changes
 *
 * Intervals stay within [minIntervalDays, maxIntervalDays]. Ease factors
 * are kept at two decimals and clamped to [easeFloor, easeCap].
 * The scheduler never mutates its input.
 */
export class ReviewScheduler {
  constructor(private readonly config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG) {}

  get settings(): SchedulerConfig {
    return this.config;
  }

  createItem(input: NewReviewableItem, createdAt: Date = new Date()): ReviewableItem {
    return createReviewableItem(input, this.config, createdAt);
  }

  /**
   * Apply one review to an item snapshot.
   *
   * @throws InvalidItemStateError when the snapshot is malformed
   * @throws UnknownQualitySignalError when `quality` is not a known signal
   */
  schedule(
    item: unknown,
    quality: ReviewQuality | string,
    reviewedAt: Date = new Date()
  ): ReviewableItem {
    const current = assertReviewableItem(item);
    const signal = parseReviewQuality(quality);

    const time = reviewedAt.getTime();
    if (
      Number.isNaN(time) ||
      time < EARLIEST_REVIEW_TIME.getTime() ||
      time > LATEST_REVIEW_TIME.getTime()
    ) {
      throw new RangeError('reviewedAt must be a valid date between 1900 and 9899');
    }

    if (signal === ReviewQuality.UNRATED) {
      return { ...current, lastReviewedAt: reviewedAt };
    }

    const next = this.computeNext(current, signal);

    return {
      ...current,
      ...next,
      lastReviewedAt: reviewedAt,
      dueDate: addDays(toCalendarDate(reviewedAt), next.currentIntervalDays),
    };
  }

  private computeNext(
    item: ReviewableItem,
    quality: Exclude<ReviewQuality, ReviewQuality.UNRATED>
  ): Pick<ReviewableItem, 'repetitionCount' | 'easeFactor' | 'currentIntervalDays'> {
    const { config } = this;

    switch (quality) {
      case ReviewQuality.INCORRECT:
        return {
          repetitionCount: 0,
          easeFactor: this.adjustEase(item.easeFactor, -config.incorrectEasePenalty),
          currentIntervalDays: this.clampInterval(config.relearnIntervalDays),
        };

      case ReviewQuality.PARTIALLY_CORRECT:
        return {
          repetitionCount:
            config.partialRepetitionPolicy === 'increment'
              ? item.repetitionCount + 1
              : item.repetitionCount,
          easeFactor: this.adjustEase(item.easeFactor, -config.partialEasePenalty),
          currentIntervalDays: this.clampInterval(
            Math.round(item.currentIntervalDays * config.partialIntervalMultiplier)
          ),
        };

      case ReviewQuality.CORRECT: {
        const easeFactor = this.adjustEase(item.easeFactor, config.correctEaseBonus);
        const repetitionCount = item.repetitionCount + 1;
        const bootstrap = config.bootstrapIntervals[repetitionCount - 1];
        const candidate =
          bootstrap !== undefined ? bootstrap : Math.round(item.currentIntervalDays * easeFactor);

        return {
          repetitionCount,
          easeFactor,
          currentIntervalDays: this.clampInterval(Math.max(candidate, item.currentIntervalDays)),
        };
      }
    }
  }

  /**
   * Shift the ease factor, round it to two decimals and clamp it to
   * [easeFloor, easeCap]. A bound off the 0.01 grid is returned as is.
   */
  adjustEase(easeFactor: number, delta: number): number {
    const rounded = Math.round((easeFactor + delta) * 100) / 100;
    return Math.min(this.config.easeCap, Math.max(this.config.easeFloor, rounded));
  }

  private clampInterval(days: number): number {
    return Math.min(this.config.maxIntervalDays, Math.max(this.config.minIntervalDays, days));
  }
}
