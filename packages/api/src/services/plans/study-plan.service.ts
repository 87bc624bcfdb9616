import {
  InvalidConfigurationError,
  generateStudyPlan,
  type CalendarDate,
  type DayPlan,
  type PlanHorizon,
  type PlanSelector,
  type PlanWorkflowResult,
} from '@study-cadence/core';
import type { DayPlanRepository, ItemRepository } from '@study-cadence/db';
import {
  createChildLogger,
  logPerformance,
  logPersistFailures,
  logRejections,
  type Logger,
} from '../../utils/logger';

export class StudyPlanService {
  constructor(
    private readonly items: ItemRepository,
    private readonly plans: DayPlanRepository,
    private readonly selector: PlanSelector,
    private readonly log: Logger = createChildLogger({ component: 'study-plan-service' })
  ) {}

  async generate(horizon: PlanHorizon): Promise<PlanWorkflowResult> {
    const startTime = Date.now();

    const result = await generateStudyPlan(
      { itemSource: this.items, planSink: this.plans, selector: this.selector },
      horizon
    );

    for (const plan of result.plans) {
      if (plan.shortfall) {
        this.log.info(
          { date: plan.date, shortfall: plan.shortfall },
          `Due pool for ${plan.date} is below the daily minimum`
        );
      }
    }

    logRejections('generate_study_plan', result.rejected, this.log);
    logPersistFailures('generate_study_plan', result.persistFailures, this.log);
    logPerformance(
      {
        operation: 'generate_study_plan',
        durationMs: Date.now() - startTime,
        success: result.persistFailures.length === 0,
        metadata: {
          days: result.plans.length,
          items: result.plans.reduce((total, plan) => total + plan.items.length, 0),
          excluded: result.excluded.length,
        },
      },
      this.log
    );

    return result;
  }

  async listPlans(from: CalendarDate, to: CalendarDate): Promise<DayPlan[]> {
    if (from > to) {
      throw new InvalidConfigurationError([
        { field: 'from', message: 'from must not be after to', code: 'custom' },
      ]);
    }
    return this.plans.listPlans(from, to);
  }
}
