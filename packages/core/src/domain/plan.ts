import { z } from 'zod';
import { CalendarDateSchema } from './calendar';

export const PlannedItemSchema = z.object({
  id: z.string().min(1),
  subject: z.string().min(1),
  dueDate: CalendarDateSchema,
  topics: z.array(z.string()),
});

export type PlannedItem = z.infer<typeof PlannedItemSchema>;

/**
 * Reported when the due pool cannot meet the daily minimum
 * (`minSubjectsPerDay` subjects with `minItemsPerSubject` items each).
 */
export const PlanShortfallSchema = z.object({
  requiredSubjects: z.number().int().nonnegative(),
  availableSubjects: z.number().int().nonnegative(),
  requiredItems: z.number().int().nonnegative(),
  availableItems: z.number().int().nonnegative(),
});

export type PlanShortfall = z.infer<typeof PlanShortfallSchema>;

export const DayPlanSchema = z.object({
  date: CalendarDateSchema,
  items: z.array(PlannedItemSchema),
  subjects: z.array(z.string()),
  topics: z.array(z.string()),
  shortfall: PlanShortfallSchema.nullable(),
});

export type DayPlan = z.infer<typeof DayPlanSchema>;

export const PlanHorizonSchema = z.object({
  startDate: CalendarDateSchema,
  horizonDays: z.number().int().min(1).max(366),
});

export type PlanHorizon = z.infer<typeof PlanHorizonSchema>;
