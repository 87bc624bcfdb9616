import { z } from 'zod';
import { CalendarDateSchema } from './calendar';

/** Longest interval an item can carry, in days (about a century). */
export const MAX_INTERVAL_DAYS = 36500;

// Review times outside this window would push a due date past year 9999.
export const EARLIEST_REVIEW_TIME = new Date('1900-01-01T00:00:00.000Z');
export const LATEST_REVIEW_TIME = new Date('9899-12-31T23:59:59.999Z');

export const ReviewableItemSchema = z.object({
  id: z.string().min(1).max(100),
  subject: z.string().min(1).max(100),
  topics: z.array(z.string().min(1).max(100)).max(20).default([]),
  repetitionCount: z.number().int().nonnegative(),
  easeFactor: z.number().positive().finite(),
  currentIntervalDays: z.number().int().nonnegative().max(MAX_INTERVAL_DAYS),
  dueDate: CalendarDateSchema,
  lastReviewedAt: z.date().nullable(),
});

export type ReviewableItem = z.infer<typeof ReviewableItemSchema>;

export const NewReviewableItemSchema = ReviewableItemSchema.pick({
  id: true,
  subject: true,
  topics: true,
});

export type NewReviewableItem = z.input<typeof NewReviewableItemSchema>;

// `quality` stays a raw string here: it is resolved, and possibly rejected,
// when the event is scheduled.
export const ReviewEventSchema = z.object({
  id: z.string().min(1),
  itemId: z.string().min(1).max(100),
  quality: z.string(),
  occurredAt: z.date().min(EARLIEST_REVIEW_TIME).max(LATEST_REVIEW_TIME),
});

export type ReviewEvent = z.infer<typeof ReviewEventSchema>;
