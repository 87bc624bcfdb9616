import type { Pool } from 'pg';
import {
  PlanShortfallSchema,
  type CalendarDate,
  type DayPlan,
  type PlannedItem,
  type PlanSink,
} from '@study-cadence/core';
import { query } from '../connection';

export interface DayPlanRepository extends PlanSink {
  listPlans(from: CalendarDate, to: CalendarDate): Promise<DayPlan[]>;
}

interface DayPlanRow {
  id: string;
  date: string;
  subjects: string[];
  topics: string[];
  shortfall: unknown;
}

interface DayPlanItemRow {
  planId: string;
  id: string;
  subject: string;
  dueDate: string;
  topics: string[];
}

const NullableShortfallSchema = PlanShortfallSchema.nullable();

export function createDayPlanRepository(pool: Pool): DayPlanRepository {
  return {
    /**
     * Store a day plan, replacing any plan stored earlier for the same date.
     */
    async persistPlan(plan: DayPlan): Promise<void> {
      const client = await pool.connect();

      try {
        await client.query('BEGIN');
        await client.query('DELETE FROM day_plans WHERE plan_date = $1::date', [plan.date]);

        const inserted = await client.query<{ id: string }>(
          `INSERT INTO day_plans (plan_date, subjects, topics, shortfall)
           VALUES ($1::date, $2, $3, $4)
           RETURNING id`,
          [
            plan.date,
            plan.subjects,
            plan.topics,
            plan.shortfall === null ? null : JSON.stringify(plan.shortfall),
          ]
        );

        const [row] = inserted.rows;
        if (!row) {
          throw new Error(`Day plan for ${plan.date} was not stored`);
        }

        for (const [position, item] of plan.items.entries()) {
          await client.query(
            `INSERT INTO day_plan_items (plan_id, item_id, position, subject, due_date, topics)
             VALUES ($1, $2, $3, $4, $5::date, $6)`,
            [row.id, item.id, position, item.subject, item.dueDate, item.topics]
          );
        }

        await client.query('COMMIT');
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      } finally {
        client.release();
      }
    },

    async listPlans(from: CalendarDate, to: CalendarDate): Promise<DayPlan[]> {
      const plans = await query<DayPlanRow>(
        pool,
        `SELECT id, to_char(plan_date, 'YYYY-MM-DD') AS date, subjects, topics, shortfall
         FROM day_plans
         WHERE plan_date BETWEEN $1::date AND $2::date
         ORDER BY plan_date ASC`,
        [from, to]
      );

      if (plans.rows.length === 0) {
        return [];
      }

      const items = await query<DayPlanItemRow>(
        pool,
        `SELECT plan_id AS "planId", item_id AS id, subject,
                to_char(due_date, 'YYYY-MM-DD') AS "dueDate", topics
         FROM day_plan_items
         WHERE plan_id = ANY($1::uuid[])
         ORDER BY plan_id, position ASC`,
        [plans.rows.map((plan) => plan.id)]
      );

      const itemsByPlan = new Map<string, PlannedItem[]>();
      for (const { planId, ...item } of items.rows) {
        const bucket = itemsByPlan.get(planId) ?? [];
        bucket.push(item);
        itemsByPlan.set(planId, bucket);
      }

      return plans.rows.map((plan) => ({
        date: plan.date,
        items: itemsByPlan.get(plan.id) ?? [],
        subjects: plan.subjects,
        topics: plan.topics,
        shortfall: NullableShortfallSchema.parse(plan.shortfall),
      }));
    },
  };
}
