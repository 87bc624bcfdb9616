import { Type, type Static } from '@sinclair/typebox';
import { ACCEPTED_QUALITY_SIGNALS, MAX_INTERVAL_DAYS } from '@study-cadence/core';
import { CalendarDateString, PersistFailureSchema, RejectedInputSchema } from './common';

const ItemId = Type.String({ minLength: 1, maxLength: 100 });
const Subject = Type.String({ minLength: 1, maxLength: 100 });
const Topics = Type.Array(Type.String({ minLength: 1, maxLength: 100 }), { maxItems: 20 });

export const ItemSchema = Type.Object({
  id: ItemId,
  subject: Subject,
  topics: Topics,
  repetitionCount: Type.Integer({ minimum: 0 }),
  easeFactor: Type.Number({ exclusiveMinimum: 0 }),
  currentIntervalDays: Type.Integer({ minimum: 0, maximum: MAX_INTERVAL_DAYS }),
  dueDate: CalendarDateString,
  lastReviewedAt: Type.Union([Type.String({ format: 'date-time' }), Type.Null()]),
});

export type ItemResponse = Static<typeof ItemSchema>;

export const ItemParamsSchema = Type.Object({
  id: ItemId,
});

export type ItemParams = Static<typeof ItemParamsSchema>;

export const CreateItemBodySchema = Type.Object({
  id: ItemId,
  subject: Subject,
  topics: Type.Optional(Topics),
});

export type CreateItemBody = Static<typeof CreateItemBodySchema>;

export const DueItemsQuerySchema = Type.Object({
  asOf: Type.Optional(CalendarDateString),
});

export type DueItemsQuery = Static<typeof DueItemsQuerySchema>;

export const DueItemsResponseSchema = Type.Object({
  asOf: CalendarDateString,
  items: Type.Array(ItemSchema),
  total: Type.Integer(),
});

const QualitySignal = Type.String({
  minLength: 1,
  maxLength: 32,
  description: `One of: ${ACCEPTED_QUALITY_SIGNALS.join(', ')}`,
});

export const ReviewBodySchema = Type.Object({
  itemId: ItemId,
  quality: QualitySignal,
  occurredAt: Type.Optional(Type.String({ format: 'date-time' })),
});

export type ReviewBody = Static<typeof ReviewBodySchema>;

export const ReviewEventResponseSchema = Type.Object({
  id: Type.String(),
  itemId: ItemId,
  quality: Type.String(),
  occurredAt: Type.String({ format: 'date-time' }),
});

export const PreviewBodySchema = Type.Object({
  item: Type.Object({
    id: ItemId,
    subject: Subject,
    topics: Type.Optional(Topics),
    repetitionCount: Type.Number(),
    easeFactor: Type.Number(),
    currentIntervalDays: Type.Number(),
    dueDate: Type.String(),
    lastReviewedAt: Type.Optional(Type.Union([Type.String({ format: 'date-time' }), Type.Null()])),
  }),
  quality: QualitySignal,
  reviewedAt: Type.Optional(Type.String({ format: 'date-time' })),
});

export type PreviewBody = Static<typeof PreviewBodySchema>;

export const ProcessResponseSchema = Type.Object({
  fetched: Type.Integer(),
  completed: Type.Array(
    Type.Object({
      eventId: Type.String(),
      itemId: Type.String(),
      quality: Type.String(),
      dueDate: CalendarDateString,
      intervalDays: Type.Integer(),
    })
  ),
  rejected: Type.Array(RejectedInputSchema),
  persistFailures: Type.Array(PersistFailureSchema),
  deferred: Type.Array(Type.String()),
});

export const PlannedItemSchema = Type.Object({
  id: Type.String(),
  subject: Type.String(),
  dueDate: CalendarDateString,
  topics: Type.Array(Type.String()),
});

export const PlanShortfallSchema = Type.Object({
  requiredSubjects: Type.Integer(),
  availableSubjects: Type.Integer(),
  requiredItems: Type.Integer(),
  availableItems: Type.Integer(),
});

export const DayPlanSchema = Type.Object({
  date: CalendarDateString,
  items: Type.Array(PlannedItemSchema),
  subjects: Type.Array(Type.String()),
  topics: Type.Array(Type.String()),
  shortfall: Type.Union([PlanShortfallSchema, Type.Null()]),
});

export const GeneratePlanBodySchema = Type.Object({
  startDate: Type.Optional(CalendarDateString),
  horizonDays: Type.Optional(Type.Integer({ minimum: 1, maximum: 366 })),
});

export type GeneratePlanBody = Static<typeof GeneratePlanBodySchema>;

export const GeneratePlanResponseSchema = Type.Object({
  plans: Type.Array(DayPlanSchema),
  rejected: Type.Array(RejectedInputSchema),
  excluded: Type.Array(Type.String()),
  persisted: Type.Array(CalendarDateString),
  persistFailures: Type.Array(PersistFailureSchema),
});

export const ListPlansQuerySchema = Type.Object({
  from: CalendarDateString,
  to: CalendarDateString,
});

export type ListPlansQuery = Static<typeof ListPlansQuerySchema>;
