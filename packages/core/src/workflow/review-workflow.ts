import type { ReviewableItem } from '../domain/review';
import { describeError, type RejectedInput } from '../errors';
import type { EventSource, ItemSource, StateSink } from '../ports';
import { scheduleReviewBatch, type AppliedReview } from '../scheduling/batch';
import type { ReviewScheduler } from '../scheduling/review-scheduler';

export type PersistStage = 'persist_item' | 'mark_event' | 'persist_plan';

/**
 * A collaborator call that failed after the computation succeeded.
 * Never a scheduling rejection: the input itself was fine.
 */
export interface PersistFailure {
  id: string;
  stage: PersistStage;
  reason: string;
}

export interface ReviewWorkflowContext {
  itemSource: ItemSource;
  eventSource: EventSource;
  stateSink: StateSink;
  scheduler: ReviewScheduler;
}

export interface ReviewWorkflowResult {
  /** Number of unprocessed events fetched. */
  fetched: number;
  /** Events whose new item state was persisted and which were marked processed. */
  completed: AppliedReview[];
  rejected: RejectedInput[];
  persistFailures: PersistFailure[];
  /** Event ids left unprocessed because an earlier event of the same item failed to persist. */
  deferred: string[];
}

interface ItemOutcome {
  completed: AppliedReview[];
  failure: PersistFailure | null;
  deferred: string[];
}

async function commitItem(sink: StateSink, reviews: readonly AppliedReview[]): Promise<ItemOutcome> {
  const completed: AppliedReview[] = [];

  for (const [index, review] of reviews.entries()) {
    const deferred = () => reviews.slice(index + 1).map((next) => next.eventId);

    try {
      await sink.persistItem(review.item);
    } catch (error) {
      return {
        completed,
        failure: { id: review.eventId, stage: 'persist_item', reason: describeError(error) },
        deferred: deferred(),
      };
    }

    try {
      await sink.markEventProcessed(review.eventId);
    } catch (error) {
      return {
        completed,
        failure: { id: review.eventId, stage: 'mark_event', reason: describeError(error) },
        deferred: deferred(),
      };
    }

    completed.push(review);
  }

  return { completed, failure: null, deferred: [] };
}

/**
 * Fetch pending review events, schedule them and commit the results.
 *
 * Items are committed concurrently; the events of one item are committed
 * one after another, in the order they were applied. Rejected events are
 * left unprocessed.
 */
export async function processPendingReviews(
  context: ReviewWorkflowContext
): Promise<ReviewWorkflowResult> {
  const events = await context.eventSource.fetchUnprocessedEvents();
  if (events.length === 0) {
    return { fetched: 0, completed: [], rejected: [], persistFailures: [], deferred: [] };
  }

  const itemIds = [...new Set(events.map((event) => event.itemId))];
  const items: ReviewableItem[] = await context.itemSource.fetchItemsByIds(itemIds);
  const batch = scheduleReviewBatch(items, events, context.scheduler);

  const byItem = new Map<string, AppliedReview[]>();
  for (const review of batch.applied) {
    const group = byItem.get(review.itemId);
    if (group) {
      group.push(review);
    } else {
      byItem.set(review.itemId, [review]);
    }
  }

  const outcomes = await Promise.all(
    [...byItem.values()].map((reviews) => commitItem(context.stateSink, reviews))
  );

  const persistFailures: PersistFailure[] = [];
  for (const outcome of outcomes) {
    if (outcome.failure) {
      persistFailures.push(outcome.failure);
    }
  }

  return {
    fetched: events.length,
    completed: outcomes.flatMap((outcome) => outcome.completed),
    rejected: batch.rejected,
    persistFailures,
    deferred: outcomes.flatMap((outcome) => outcome.deferred),
  };
}
