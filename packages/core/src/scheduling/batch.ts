import type { ReviewQuality } from '../domain/enums';
import { ReviewEventSchema, type ReviewableItem, type ReviewEvent } from '../domain/review';
import { ItemNotFoundError, SchedulingError, type RejectedInput, type RejectionCode } from '../errors';
import { assertReviewableItem, readItemId, validateSchema } from '../validation/validator';
import { parseReviewQuality } from './quality';
import type { ReviewScheduler } from './review-scheduler';

export interface AppliedReview {
  eventId: string;
  itemId: string;
  quality: ReviewQuality;
  previous: ReviewableItem;
  item: ReviewableItem;
}

export interface ReviewBatchResult {
  /** Final state of every item that at least one event touched. */
  updatedItems: ReviewableItem[];
  /** Applied events in the order they were applied. */
  applied: AppliedReview[];
  rejected: RejectedInput[];
}

function compareEvents(a: ReviewEvent, b: ReviewEvent): number {
  const byTime = a.occurredAt.getTime() - b.occurredAt.getTime();
  if (byTime !== 0) {
    return byTime;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function rejection(id: string, code: RejectionCode, reason: string): RejectedInput {
  return { id, code, reason };
}

/**
 * Apply review events to item snapshots in chronological order.
 *
 * Several events for the same item chain: each one sees the state the
 * previous one produced. A rejected event never aborts the batch; once an
 * item snapshot is found malformed every later event for it is rejected too.
 */
export function scheduleReviewBatch(
  items: readonly unknown[],
  events: readonly unknown[],
  scheduler: ReviewScheduler
): ReviewBatchResult {
  const snapshots = new Map<string, unknown>();
  for (const item of items) {
    const id = readItemId(item);
    if (id !== null && !snapshots.has(id)) {
      snapshots.set(id, item);
    }
  }

  const rejected: RejectedInput[] = [];
  const valid: ReviewEvent[] = [];

  for (const event of events) {
    const parsed = validateSchema(ReviewEventSchema, event);
    if (parsed.valid) {
      valid.push(parsed.data);
      continue;
    }
    const reason = parsed.errors.map((issue) => `${issue.field}: ${issue.message}`).join('; ');
    rejected.push(rejection(readItemId(event) ?? '<unknown>', 'INVALID_ITEM_STATE', `Malformed event: ${reason}`));
  }

  valid.sort(compareEvents);

  const working = new Map<string, ReviewableItem>();
  const poisoned = new Map<string, string>();
  const applied: AppliedReview[] = [];

  for (const event of valid) {
    const poisonReason = poisoned.get(event.itemId);
    if (poisonReason !== undefined) {
      rejected.push(rejection(event.id, 'INVALID_ITEM_STATE', poisonReason));
      continue;
    }

    const snapshot = working.get(event.itemId) ?? snapshots.get(event.itemId);
    if (snapshot === undefined) {
      rejected.push(rejection(event.id, 'ITEM_NOT_FOUND', new ItemNotFoundError(event.itemId).message));
      continue;
    }

    try {
      const previous = working.get(event.itemId) ?? assertReviewableItem(snapshot);
      const quality = parseReviewQuality(event.quality);
      const item = scheduler.schedule(previous, quality, event.occurredAt);
      applied.push({ eventId: event.id, itemId: event.itemId, quality, previous, item });
      working.set(event.itemId, item);
    } catch (error) {
      if (!(error instanceof SchedulingError)) {
        throw error;
      }
      const code = error.code;
      if (code === 'INVALID_CONFIGURATION') {
        throw error;
      }
      if (code === 'INVALID_ITEM_STATE') {
        poisoned.set(event.itemId, error.message);
      }
      rejected.push(rejection(event.id, code, error.message));
    }
  }

  return { updatedItems: [...working.values()], applied, rejected };
}
