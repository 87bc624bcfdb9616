import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Pool, QueryResult } from 'pg';
import type { DayPlan } from '@study-cadence/core';
import { createDayPlanRepository } from '../../src/repositories/day-plans';

const mockQuery = vi.fn();
const clientQuery = vi.fn();
const release = vi.fn();
const mockPool = {
  query: mockQuery,
  connect: vi.fn().mockImplementation(async () => ({ query: clientQuery, release })),
} as unknown as Pool;

const plan: DayPlan = {
  date: '2024-03-01',
  items: [
    { id: 'm1', subject: 'math', dueDate: '2024-02-28', topics: ['algebra'] },
    { id: 'p1', subject: 'physics', dueDate: '2024-03-01', topics: [] },
  ],
  subjects: ['math', 'physics'],
  topics: ['algebra'],
  shortfall: null,
};

describe('DayPlanRepository', () => {
  const repository = createDayPlanRepository(mockPool);

  beforeEach(() => {
    vi.clearAllMocks();
    clientQuery.mockImplementation(async (sql: string) =>
      sql.includes('RETURNING id') ? { rows: [{ id: 'plan-1' }], rowCount: 1 } : { rows: [], rowCount: 0 }
    );
  });

  describe('persistPlan', () => {
    it('should replace the plan for the date inside a transaction', async () => {
      await repository.persistPlan(plan);

      const statements = clientQuery.mock.calls.map((call) => String(call[0]).trim().split(/\s+/)[0]);
      expect(statements).toEqual(['BEGIN', 'DELETE', 'INSERT', 'INSERT', 'INSERT', 'COMMIT']);
      expect(clientQuery).toHaveBeenCalledWith(expect.stringContaining('INSERT INTO day_plan_items'), [
        'plan-1',
        'p1',
        1,
        'physics',
        '2024-03-01',
        [],
      ]);
      expect(release).toHaveBeenCalledTimes(1);
    });

    it('should store the shortfall as JSON', async () => {
      const shortfall = { requiredSubjects: 2, availableSubjects: 1, requiredItems: 4, availableItems: 1 };

      await repository.persistPlan({ ...plan, items: [], shortfall });

      expect(clientQuery).toHaveBeenCalledWith(expect.stringContaining('INSERT INTO day_plans'), [
        '2024-03-01',
        ['math', 'physics'],
        ['algebra'],
        JSON.stringify(shortfall),
      ]);
    });

    it('should roll back and release the client on failure', async () => {
      clientQuery.mockImplementation(async (sql: string) => {
        if (sql.includes('INSERT INTO day_plan_items')) {
          throw new Error('unknown item');
        }
        return sql.includes('RETURNING id') ? { rows: [{ id: 'plan-1' }], rowCount: 1 } : { rows: [], rowCount: 0 };
      });

      await expect(repository.persistPlan(plan)).rejects.toThrow('unknown item');
      expect(clientQuery).toHaveBeenCalledWith('ROLLBACK');
      expect(clientQuery).not.toHaveBeenCalledWith('COMMIT');
      expect(release).toHaveBeenCalledTimes(1);
    });
  });

  describe('listPlans', () => {
    it('should return no plans without querying items', async () => {
      mockQuery.mockResolvedValueOnce({ rows: [], rowCount: 0 } as unknown as QueryResult);

      expect(await repository.listPlans('2024-03-01', '2024-03-07')).toEqual([]);
      expect(mockQuery).toHaveBeenCalledTimes(1);
    });

    it('should assemble plans with their items in position order', async () => {
      mockQuery
        .mockResolvedValueOnce({
          rows: [
            { id: 'plan-1', date: '2024-03-01', subjects: ['math', 'physics'], topics: ['algebra'], shortfall: null },
            {
              id: 'plan-2',
              date: '2024-03-02',
              subjects: [],
              topics: [],
              shortfall: { requiredSubjects: 2, availableSubjects: 0, requiredItems: 4, availableItems: 0 },
            },
          ],
          rowCount: 2,
        } as unknown as QueryResult)
        .mockResolvedValueOnce({
          rows: [
            { planId: 'plan-1', id: 'm1', subject: 'math', dueDate: '2024-02-28', topics: ['algebra'] },
            { planId: 'plan-1', id: 'p1', subject: 'physics', dueDate: '2024-03-01', topics: [] },
          ],
          rowCount: 2,
        } as unknown as QueryResult);

      const plans = await repository.listPlans('2024-03-01', '2024-03-07');

      expect(plans).toEqual([
        plan,
        {
          date: '2024-03-02',
          items: [],
          subjects: [],
          topics: [],
          shortfall: { requiredSubjects: 2, availableSubjects: 0, requiredItems: 4, availableItems: 0 },
        },
      ]);
      expect(mockQuery).toHaveBeenLastCalledWith(expect.stringContaining('WHERE plan_id = ANY($1::uuid[])'), [
        ['plan-1', 'plan-2'],
      ]);
    });
  });
});
