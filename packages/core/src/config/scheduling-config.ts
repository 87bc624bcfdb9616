import { z } from 'zod';
import { PARTIAL_REPETITION_POLICIES, type PartialRepetitionPolicy } from '../domain/enums';
import { MAX_INTERVAL_DAYS } from '../domain/review';
import { InvalidConfigurationError } from '../errors';
import { toValidationIssues } from '../validation/validator';

/**
 * Partially correct answers keep the repetition count unchanged unless the
 * configuration says otherwise.
 */
export const DEFAULT_PARTIAL_REPETITION_POLICY: PartialRepetitionPolicy = 'hold';

/**
 * Tunable constants of the review scheduler.
 *
 * Defaults:
 * - easeFloor 1.3, easeCap 3.0, initialEaseFactor 2.5
 * - bootstrapIntervals [1, 6]: intervals of the first and second success
 * - relearnIntervalDays 1: interval after an incorrect answer
 * - minIntervalDays 1: smallest interval any judged review produces
 * - maxIntervalDays 36500: every computed interval is capped here
 * - correctEaseBonus 0.1, incorrectEasePenalty 0.2, partialEasePenalty 0.15
 * - partialIntervalMultiplier 1.2
 * - partialRepetitionPolicy 'hold'
 */
export const SchedulerConfigSchema = z
  .object({
    easeFloor: z.number().positive().default(1.3),
    easeCap: z.number().positive().default(3.0),
    initialEaseFactor: z.number().positive().default(2.5),
    bootstrapIntervals: z.array(z.number().int().positive()).min(1).max(10).default([1, 6]),
    relearnIntervalDays: z.number().int().positive().default(1),
    minIntervalDays: z.number().int().positive().default(1),
    maxIntervalDays: z.number().int().positive().max(MAX_INTERVAL_DAYS).default(MAX_INTERVAL_DAYS),
    correctEaseBonus: z.number().nonnegative().default(0.1),
    incorrectEasePenalty: z.number().nonnegative().default(0.2),
    partialEasePenalty: z.number().nonnegative().default(0.15),
    partialIntervalMultiplier: z.number().min(1).max(2.5).default(1.2),
    partialRepetitionPolicy: z
      .enum(PARTIAL_REPETITION_POLICIES)
      .default(DEFAULT_PARTIAL_REPETITION_POLICY),
  })
  .superRefine((config, ctx) => {
    if (config.easeFloor > config.easeCap) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['easeFloor'],
        message: 'easeFloor must not exceed easeCap',
      });
    }
    if (config.initialEaseFactor < config.easeFloor || config.initialEaseFactor > config.easeCap) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['initialEaseFactor'],
        message: 'initialEaseFactor must lie between easeFloor and easeCap',
      });
    }
    config.bootstrapIntervals.forEach((interval, index) => {
      const previous = config.bootstrapIntervals[index - 1];
      if (previous !== undefined && interval < previous) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['bootstrapIntervals', index],
          message: 'bootstrapIntervals must be non-decreasing',
        });
      }
    });
    if (config.minIntervalDays > config.maxIntervalDays) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['minIntervalDays'],
        message: 'minIntervalDays must not exceed maxIntervalDays',
      });
    }
  });

export type SchedulerConfig = z.infer<typeof SchedulerConfigSchema>;
export type SchedulerConfigInput = z.input<typeof SchedulerConfigSchema>;

/**
 * Load-balancing constraints of the plan selector.
 *
 * Defaults: at least 2 subjects with 2 items each, up to 3 subjects,
 * at most 2 items per subject and 6 items per day. `activeSubjects`
 * (null = every subject) restricts planning to the listed subjects.
 */
export const PlanConstraintsSchema = z
  .object({
    minSubjectsPerDay: z.number().int().positive().default(2),
    maxSubjectsPerDay: z.number().int().positive().default(3),
    minItemsPerSubject: z.number().int().positive().default(2),
    maxItemsPerSubject: z.number().int().positive().default(2),
    maxItemsPerDay: z.number().int().positive().default(6),
    activeSubjects: z.array(z.string().min(1)).nullable().default(null),
  })
  .superRefine((constraints, ctx) => {
    if (constraints.minSubjectsPerDay > constraints.maxSubjectsPerDay) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['minSubjectsPerDay'],
        message: 'minSubjectsPerDay must not exceed maxSubjectsPerDay',
      });
    }
    if (constraints.minItemsPerSubject > constraints.maxItemsPerSubject) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['minItemsPerSubject'],
        message: 'minItemsPerSubject must not exceed maxItemsPerSubject',
      });
    }
    if (constraints.minSubjectsPerDay * constraints.minItemsPerSubject > constraints.maxItemsPerDay) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['maxItemsPerDay'],
        message: 'maxItemsPerDay must hold minSubjectsPerDay * minItemsPerSubject items',
      });
    }
  });

export type PlanConstraints = z.infer<typeof PlanConstraintsSchema>;
export type PlanConstraintsInput = z.input<typeof PlanConstraintsSchema>;

export const SchedulingConfigSchema = z.object({
  scheduler: SchedulerConfigSchema.default({}),
  constraints: PlanConstraintsSchema.default({}),
});

export type SchedulingConfig = z.infer<typeof SchedulingConfigSchema>;
export type SchedulingConfigInput = z.input<typeof SchedulingConfigSchema>;

function parseOrThrow<Output, Input>(
  schema: z.ZodType<Output, z.ZodTypeDef, Input>,
  input: unknown
): Output {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new InvalidConfigurationError(toValidationIssues(result.error));
  }
  return result.data;
}

export function resolveSchedulerConfig(input: SchedulerConfigInput = {}): SchedulerConfig {
  return parseOrThrow(SchedulerConfigSchema, input);
}

export function resolvePlanConstraints(input: PlanConstraintsInput = {}): PlanConstraints {
  return parseOrThrow(PlanConstraintsSchema, input);
}

export function resolveSchedulingConfig(input: SchedulingConfigInput = {}): SchedulingConfig {
  return parseOrThrow(SchedulingConfigSchema, input);
}

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = resolveSchedulerConfig();
export const DEFAULT_PLAN_CONSTRAINTS: PlanConstraints = resolvePlanConstraints();
