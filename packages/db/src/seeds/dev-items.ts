import type { Pool } from 'pg';
import { DuplicateItemError, ReviewScheduler, type NewReviewableItem } from '@study-cadence/core';
import { createItemRepository } from '../repositories/items';

export const DEV_ITEMS: NewReviewableItem[] = [
  { id: 'math-derivatives-1', subject: 'math', topics: ['derivatives'] },
  { id: 'math-derivatives-2', subject: 'math', topics: ['derivatives'] },
  { id: 'math-integrals-1', subject: 'math', topics: ['integrals'] },
  { id: 'physics-kinematics-1', subject: 'physics', topics: ['kinematics'] },
  { id: 'physics-kinematics-2', subject: 'physics', topics: ['kinematics'] },
  { id: 'chemistry-bonds-1', subject: 'chemistry', topics: ['bonds'] },
  { id: 'chemistry-bonds-2', subject: 'chemistry', topics: ['bonds'] },
];

/**
 * Insert the development items, skipping those already present.
 * Returns the number of items created.
 */
export async function seedDevItems(
  pool: Pool,
  scheduler: ReviewScheduler = new ReviewScheduler(),
  createdAt: Date = new Date()
): Promise<number> {
  const items = createItemRepository(pool);
  let created = 0;

  for (const input of DEV_ITEMS) {
    try {
      await items.createItem(scheduler.createItem(input, createdAt));
      created++;
    } catch (error) {
      if (!(error instanceof DuplicateItemError)) {
        throw error;
      }
    }
  }

  return created;
}
