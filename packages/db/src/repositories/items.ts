import type { Pool } from 'pg';
import {
  DuplicateItemError,
  type CalendarDate,
  type ItemSource,
  type ReviewableItem,
  type StateSink,
} from '@study-cadence/core';
import { query } from '../connection';

export interface ReviewableItemRow {
  id: string;
  subject: string;
  topics: string[];
  repetitionCount: number;
  easeFactor: number;
  currentIntervalDays: number;
  dueDate: string;
  lastReviewedAt: Date | null;
}

export interface ItemRepository extends ItemSource {
  persistItem: StateSink['persistItem'];
  createItem(item: ReviewableItem): Promise<ReviewableItem>;
  findById(id: string): Promise<ReviewableItem | null>;
}

const ITEM_COLUMNS = `id, subject, topics,
       repetition_count AS "repetitionCount",
       ease_factor::float8 AS "easeFactor",
       current_interval_days AS "currentIntervalDays",
       to_char(due_date, 'YYYY-MM-DD') AS "dueDate",
       last_reviewed_at AS "lastReviewedAt"`;

export function toReviewableItem(row: ReviewableItemRow): ReviewableItem {
  return {
    id: row.id,
    subject: row.subject,
    topics: row.topics,
    repetitionCount: row.repetitionCount,
    easeFactor: Number(row.easeFactor),
    currentIntervalDays: row.currentIntervalDays,
    dueDate: row.dueDate,
    lastReviewedAt: row.lastReviewedAt,
  };
}

export function createItemRepository(pool: Pool): ItemRepository {
  return {
    async fetchDueItems(asOf: CalendarDate): Promise<ReviewableItem[]> {
      const result = await query<ReviewableItemRow>(
        pool,
        `SELECT ${ITEM_COLUMNS}
         FROM reviewable_items
         WHERE due_date <= $1::date
         ORDER BY due_date ASC, id ASC`,
        [asOf]
      );

      return result.rows.map(toReviewableItem);
    },

    async fetchItemsByIds(ids: readonly string[]): Promise<ReviewableItem[]> {
      if (ids.length === 0) {
        return [];
      }

      const result = await query<ReviewableItemRow>(
        pool,
        `SELECT ${ITEM_COLUMNS}
         FROM reviewable_items
         WHERE id = ANY($1::varchar[])
         ORDER BY id ASC`,
        [[...ids]]
      );

      return result.rows.map(toReviewableItem);
    },

    async findById(id: string): Promise<ReviewableItem | null> {
      const result = await query<ReviewableItemRow>(
        pool,
        `SELECT ${ITEM_COLUMNS}
         FROM reviewable_items
         WHERE id = $1`,
        [id]
      );

      const [row] = result.rows;
      return row ? toReviewableItem(row) : null;
    },

    async createItem(item: ReviewableItem): Promise<ReviewableItem> {
      const result = await query<ReviewableItemRow>(
        pool,
        `INSERT INTO reviewable_items
           (id, subject, topics, repetition_count, ease_factor, current_interval_days, due_date, last_reviewed_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7::date, $8)
         ON CONFLICT (id) DO NOTHING
         RETURNING ${ITEM_COLUMNS}`,
        [
          item.id,
          item.subject,
          item.topics,
          item.repetitionCount,
          item.easeFactor,
          item.currentIntervalDays,
          item.dueDate,
          item.lastReviewedAt,
        ]
      );

      const [row] = result.rows;
      if (!row) {
        throw new DuplicateItemError(item.id);
      }
      return toReviewableItem(row);
    },

    async persistItem(item: ReviewableItem): Promise<void> {
      await query(
        pool,
        `INSERT INTO reviewable_items
           (id, subject, topics, repetition_count, ease_factor, current_interval_days, due_date, last_reviewed_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7::date, $8)
         ON CONFLICT (id)
         DO UPDATE SET subject = $2,
                       topics = $3,
                       repetition_count = $4,
                       ease_factor = $5,
                       current_interval_days = $6,
                       due_date = $7::date,
                       last_reviewed_at = $8`,
        [
          item.id,
          item.subject,
          item.topics,
          item.repetitionCount,
          item.easeFactor,
          item.currentIntervalDays,
          item.dueDate,
          item.lastReviewedAt,
        ]
      );
    },
  };
}
