/**
 * A review outcome reported by a client
 */
export interface ReviewSubmission {
  itemId: string;
  quality: string;
  /** Defaults to now */
  occurredAt?: Date;
}

/**
 * Summary of one pass over the pending review events
 */
export interface ProcessSummary {
  fetched: number;
  completed: Array<{
    eventId: string;
    itemId: string;
    quality: string;
    dueDate: string;
    intervalDays: number;
  }>;
  rejected: Array<{ id: string; code: string; reason: string }>;
  persistFailures: Array<{ id: string; stage: string; reason: string }>;
  deferred: string[];
}
