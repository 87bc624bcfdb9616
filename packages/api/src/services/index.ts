import type { Pool } from 'pg';
import { PlanSelector, ReviewScheduler, type SchedulingConfig } from '@study-cadence/core';
import {
  createDayPlanRepository,
  createItemRepository,
  createReviewEventRepository,
  type DayPlanRepository,
  type ItemRepository,
  type ReviewEventRepository,
} from '@study-cadence/db';
import { CatalogService } from './catalog/catalog.service';
import { ReviewService } from './reviews/review.service';
import { StudyPlanService } from './plans/study-plan.service';

export interface AppServices {
  catalog: CatalogService;
  reviews: ReviewService;
  plans: StudyPlanService;
  /** Resolves when the database answers; rejects otherwise. */
  checkDatabase(): Promise<void>;
}

export interface Repositories {
  items: ItemRepository;
  events: ReviewEventRepository;
  plans: DayPlanRepository;
}

export function createServicesFromRepositories(
  repositories: Repositories,
  config: SchedulingConfig,
  checkDatabase: () => Promise<void>
): AppServices {
  const scheduler = new ReviewScheduler(config.scheduler);
  const selector = new PlanSelector(config.constraints);

  return {
    catalog: new CatalogService(repositories.items, scheduler),
    reviews: new ReviewService(repositories.items, repositories.events, scheduler),
    plans: new StudyPlanService(repositories.items, repositories.plans, selector),
    checkDatabase,
  };
}

export function createServices(pool: Pool, config: SchedulingConfig): AppServices {
  return createServicesFromRepositories(
    {
      items: createItemRepository(pool),
      events: createReviewEventRepository(pool),
      plans: createDayPlanRepository(pool),
    },
    config,
    async () => {
      await pool.query('SELECT 1');
    }
  );
}

export { CatalogService, ReviewService, StudyPlanService };
export type { ProcessSummary, ReviewSubmission } from './reviews/review.interface';
