import { addDays } from '../domain/calendar';
import { PlanHorizonSchema, type PlanHorizon } from '../domain/plan';
import { describeError, InvalidConfigurationError } from '../errors';
import type { ItemSource, PlanSink } from '../ports';
import { toValidationIssues } from '../validation/validator';
import type { PlanResult, PlanSelector } from '../planning/plan-selector';
import type { PersistFailure } from './review-workflow';

export interface PlanWorkflowContext {
  itemSource: ItemSource;
  planSink: PlanSink;
  selector: PlanSelector;
}

export interface PlanWorkflowResult extends PlanResult {
  /** Dates of the plans that were stored. */
  persisted: string[];
  persistFailures: PersistFailure[];
}

/**
 * Plan a horizon from the items due by its last day and store each day
 * plan in date order. A failed store is reported, the computed plans are
 * still returned.
 */
export async function generateStudyPlan(
  context: PlanWorkflowContext,
  horizon: PlanHorizon
): Promise<PlanWorkflowResult> {
  const parsed = PlanHorizonSchema.safeParse(horizon);
  if (!parsed.success) {
    throw new InvalidConfigurationError(toValidationIssues(parsed.error));
  }

  const lastDay = addDays(parsed.data.startDate, parsed.data.horizonDays - 1);
  const dueItems = await context.itemSource.fetchDueItems(lastDay);
  const result = context.selector.plan(dueItems, parsed.data);

  const persisted: string[] = [];
  const persistFailures: PersistFailure[] = [];

  for (const plan of result.plans) {
    try {
      await context.planSink.persistPlan(plan);
      persisted.push(plan.date);
    } catch (error) {
      persistFailures.push({ id: plan.date, stage: 'persist_plan', reason: describeError(error) });
    }
  }

  return { ...result, persisted, persistFailures };
}
