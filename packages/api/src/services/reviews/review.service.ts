import {
  parseReviewQuality,
  processPendingReviews,
  type ReviewableItem,
  type ReviewEvent,
  type ReviewQuality,
  type ReviewScheduler,
} from '@study-cadence/core';
import type { ItemRepository, ReviewEventRepository } from '@study-cadence/db';
import {
  createChildLogger,
  logPerformance,
  logPersistFailures,
  logRejections,
  type Logger,
} from '../../utils/logger';
import type { ProcessSummary, ReviewSubmission } from './review.interface';

/**
 * ReviewService records review outcomes and applies them to their items
 */
export class ReviewService {
  constructor(
    private readonly items: ItemRepository,
    private readonly events: ReviewEventRepository,
    private readonly scheduler: ReviewScheduler,
    private readonly log: Logger = createChildLogger({ component: 'review-service' })
  ) {}

  /**
   * Store a review outcome for later processing. The quality signal is
   * checked up front and stored in its canonical form.
   *
   * @throws UnknownQualitySignalError
   * @throws ItemNotFoundError
   */
  async recordReview(submission: ReviewSubmission): Promise<ReviewEvent> {
    const quality = parseReviewQuality(submission.quality);

    return this.events.recordEvent({
      itemId: submission.itemId,
      quality,
      occurredAt: submission.occurredAt ?? new Date(),
    });
  }

  async processPending(): Promise<ProcessSummary> {
    const startTime = Date.now();

    const result = await processPendingReviews({
      itemSource: this.items,
      eventSource: this.events,
      stateSink: {
        persistItem: (item) => this.items.persistItem(item),
        markEventProcessed: (eventId) => this.events.markEventProcessed(eventId),
      },
      scheduler: this.scheduler,
    });

    logRejections('process_pending_reviews', result.rejected, this.log);
    logPersistFailures('process_pending_reviews', result.persistFailures, this.log);
    logPerformance(
      {
        operation: 'process_pending_reviews',
        durationMs: Date.now() - startTime,
        success: result.persistFailures.length === 0,
        metadata: {
          fetched: result.fetched,
          completed: result.completed.length,
          rejected: result.rejected.length,
          deferred: result.deferred.length,
        },
      },
      this.log
    );

    return {
      fetched: result.fetched,
      completed: result.completed.map((review) => ({
        eventId: review.eventId,
        itemId: review.itemId,
        quality: review.quality,
        dueDate: review.item.dueDate,
        intervalDays: review.item.currentIntervalDays,
      })),
      rejected: result.rejected,
      persistFailures: result.persistFailures,
      deferred: result.deferred,
    };
  }

  /**
   * Compute the outcome of a review without storing anything
   */
  previewReview(item: unknown, quality: ReviewQuality | string, reviewedAt: Date = new Date()): ReviewableItem {
    return this.scheduler.schedule(item, quality, reviewedAt);
  }
}
