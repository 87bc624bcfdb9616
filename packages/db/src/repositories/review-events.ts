import { DatabaseError, type Pool } from 'pg';
import {
  ItemNotFoundError,
  type EventSource,
  type ReviewEvent,
  type StateSink,
} from '@study-cadence/core';
import { query } from '../connection';

const FOREIGN_KEY_VIOLATION = '23503';

export interface NewReviewEvent {
  itemId: string;
  quality: string;
  occurredAt: Date;
}

export interface ReviewEventRepository extends EventSource {
  recordEvent(event: NewReviewEvent): Promise<ReviewEvent>;
  markEventProcessed: StateSink['markEventProcessed'];
}

interface ReviewEventRow {
  id: string;
  itemId: string;
  quality: string;
  occurredAt: Date;
}

export function createReviewEventRepository(pool: Pool): ReviewEventRepository {
  return {
    async recordEvent(event: NewReviewEvent): Promise<ReviewEvent> {
      try {
        const result = await query<ReviewEventRow>(
          pool,
          `INSERT INTO review_events (item_id, quality, occurred_at)
           VALUES ($1, $2, $3)
           RETURNING id, item_id AS "itemId", quality, occurred_at AS "occurredAt"`,
          [event.itemId, event.quality, event.occurredAt]
        );

        const [row] = result.rows;
        if (!row) {
          throw new Error(`Review event for item ${event.itemId} was not stored`);
        }
        return { ...row };
      } catch (error) {
        if (error instanceof DatabaseError && error.code === FOREIGN_KEY_VIOLATION) {
          throw new ItemNotFoundError(event.itemId);
        }
        throw error;
      }
    },

    async fetchUnprocessedEvents(): Promise<ReviewEvent[]> {
      const result = await query<ReviewEventRow>(
        pool,
        `SELECT id, item_id AS "itemId", quality, occurred_at AS "occurredAt"
         FROM review_events
         WHERE processed_at IS NULL
         ORDER BY occurred_at ASC, id ASC`
      );

      return result.rows.map((row) => ({ ...row }));
    },

    async markEventProcessed(eventId: string): Promise<void> {
      await query(
        pool,
        `UPDATE review_events
         SET processed_at = current_timestamp
         WHERE id = $1 AND processed_at IS NULL`,
        [eventId]
      );
    },
  };
}
