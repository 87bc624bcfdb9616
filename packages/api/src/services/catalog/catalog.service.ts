import {
  ItemNotFoundError,
  type CalendarDate,
  type NewReviewableItem,
  type ReviewableItem,
  type ReviewScheduler,
} from '@study-cadence/core';
import type { ItemRepository } from '@study-cadence/db';

/**
 * CatalogService registers new items and answers due-item queries
 */
export class CatalogService {
  constructor(
    private readonly items: ItemRepository,
    private readonly scheduler: ReviewScheduler
  ) {}

  /**
   * Register a new item, due on the day it is created
   *
   * @throws DuplicateItemError when the id is taken
   */
  async createItem(input: NewReviewableItem, createdAt: Date = new Date()): Promise<ReviewableItem> {
    const item = this.scheduler.createItem(input, createdAt);
    return this.items.createItem(item);
  }

  async getItem(id: string): Promise<ReviewableItem> {
    const item = await this.items.findById(id);
    if (!item) {
      throw new ItemNotFoundError(id);
    }
    return item;
  }

  async getDueItems(asOf: CalendarDate): Promise<ReviewableItem[]> {
    return this.items.fetchDueItems(asOf);
  }
}
