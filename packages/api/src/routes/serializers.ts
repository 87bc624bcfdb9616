import type { ReviewableItem, ReviewEvent } from '@study-cadence/core';
import type { ItemResponse } from '../schemas/study';

export function toItemResponse(item: ReviewableItem): ItemResponse {
  return {
    id: item.id,
    subject: item.subject,
    topics: item.topics,
    repetitionCount: item.repetitionCount,
    easeFactor: item.easeFactor,
    currentIntervalDays: item.currentIntervalDays,
    dueDate: item.dueDate,
    lastReviewedAt: item.lastReviewedAt ? item.lastReviewedAt.toISOString() : null,
  };
}

export function toEventResponse(event: ReviewEvent) {
  return {
    id: event.id,
    itemId: event.itemId,
    quality: event.quality,
    occurredAt: event.occurredAt.toISOString(),
  };
}
