import type { CalendarDate } from './domain/calendar';
import type { DayPlan } from './domain/plan';
import type { ReviewableItem, ReviewEvent } from './domain/review';

/**
 * Read access to item snapshots. Implementations may return raw records;
 * the scheduler and the selector validate every entry.
 */
export interface ItemSource {
  /** Items due on or before `asOf`. */
  fetchDueItems(asOf: CalendarDate): Promise<ReviewableItem[]>;
  fetchItemsByIds(ids: readonly string[]): Promise<ReviewableItem[]>;
}

export interface EventSource {
  /** Events not yet marked processed, oldest first. */
  fetchUnprocessedEvents(): Promise<ReviewEvent[]>;
}

export interface StateSink {
  persistItem(item: ReviewableItem): Promise<void>;
  /** Must be idempotent: marking an event twice is not an error. */
  markEventProcessed(eventId: string): Promise<void>;
}

export interface PlanSink {
  persistPlan(plan: DayPlan): Promise<void>;
}
