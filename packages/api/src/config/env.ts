import { z } from 'zod';
import {
  PARTIAL_REPETITION_POLICIES,
  resolveSchedulingConfig,
  type SchedulingConfig,
} from '@study-cadence/core';

const optionalInt = z
  .string()
  .regex(/^\d+$/, 'must be a whole number')
  .transform((val) => parseInt(val, 10))
  .optional();

const optionalNumber = z
  .string()
  .regex(/^\d+(\.\d+)?$/, 'must be a number')
  .transform((val) => parseFloat(val))
  .optional();

const optionalList = z
  .string()
  .transform((val) =>
    val
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0)
  )
  .optional();

const optionalIntList = z
  .string()
  .regex(/^\s*\d+\s*(,\s*\d+\s*)*$/, 'must be a comma-separated list of whole numbers')
  .transform((val) => val.split(',').map((entry) => parseInt(entry.trim(), 10)))
  .optional();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z
    .string()
    .default('3000')
    .transform((val) => parseInt(val, 10)),
  HOST: z.string().default('0.0.0.0'),

  DATABASE_URL: z.string().url(),

  CORS_ORIGIN: z.string().url().default('http://localhost:5173'),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

  RATE_LIMIT_MAX: z
    .string()
    .default('100')
    .transform((val) => parseInt(val, 10)),
  RATE_LIMIT_WINDOW: z.string().default('1 minute'),

  APP_VERSION: z.string().optional().default('0.1.0'),

  PLAN_MIN_SUBJECTS_PER_DAY: optionalInt,
  PLAN_MAX_SUBJECTS_PER_DAY: optionalInt,
  PLAN_MIN_ITEMS_PER_SUBJECT: optionalInt,
  PLAN_MAX_ITEMS_PER_SUBJECT: optionalInt,
  PLAN_MAX_ITEMS_PER_DAY: optionalInt,
  PLAN_ACTIVE_SUBJECTS: optionalList,
  PLAN_DEFAULT_HORIZON_DAYS: z
    .string()
    .default('1')
    .transform((val) => parseInt(val, 10)),

  SCHED_EASE_FLOOR: optionalNumber,
  SCHED_EASE_CAP: optionalNumber,
  SCHED_INITIAL_EASE_FACTOR: optionalNumber,
  SCHED_BOOTSTRAP_INTERVALS: optionalIntList,
  SCHED_RELEARN_INTERVAL_DAYS: optionalInt,
  SCHED_MAX_INTERVAL_DAYS: optionalInt,
  SCHED_PARTIAL_REPETITION_POLICY: z.enum(PARTIAL_REPETITION_POLICIES).optional(),
});

export type Env = z.infer<typeof envSchema>;

let validatedEnv: Env | null = null;

export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    process.stderr.write('❌ Environment validation failed:\n');
    for (const issue of result.error.issues) {
      process.stderr.write(`  - ${issue.path.join('.')}: ${issue.message}\n`);
    }
    process.exit(1);
  }

  validatedEnv = result.data;
  return validatedEnv;
}

export function getEnv(): Env {
  if (process.env.NODE_ENV === 'test') {
    validatedEnv = null;
  }
  if (!validatedEnv) {
    return validateEnv();
  }
  return validatedEnv;
}

export function resetEnv(): void {
  validatedEnv = null;
}

/**
 * Scheduler and planner settings from the environment. Unset variables
 * fall back to the documented defaults; inconsistent combinations throw
 * `InvalidConfigurationError`.
 */
export function getSchedulingConfig(env: Env = getEnv()): SchedulingConfig {
  return resolveSchedulingConfig({
    scheduler: {
      easeFloor: env.SCHED_EASE_FLOOR,
      easeCap: env.SCHED_EASE_CAP,
      initialEaseFactor: env.SCHED_INITIAL_EASE_FACTOR,
      bootstrapIntervals: env.SCHED_BOOTSTRAP_INTERVALS,
      relearnIntervalDays: env.SCHED_RELEARN_INTERVAL_DAYS,
      maxIntervalDays: env.SCHED_MAX_INTERVAL_DAYS,
      partialRepetitionPolicy: env.SCHED_PARTIAL_REPETITION_POLICY,
    },
    constraints: {
      minSubjectsPerDay: env.PLAN_MIN_SUBJECTS_PER_DAY,
      maxSubjectsPerDay: env.PLAN_MAX_SUBJECTS_PER_DAY,
      minItemsPerSubject: env.PLAN_MIN_ITEMS_PER_SUBJECT,
      maxItemsPerSubject: env.PLAN_MAX_ITEMS_PER_SUBJECT,
      maxItemsPerDay: env.PLAN_MAX_ITEMS_PER_DAY,
      activeSubjects:
        env.PLAN_ACTIVE_SUBJECTS && env.PLAN_ACTIVE_SUBJECTS.length > 0 ? env.PLAN_ACTIVE_SUBJECTS : null,
    },
  });
}
