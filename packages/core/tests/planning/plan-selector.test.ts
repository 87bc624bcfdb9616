import { describe, it, expect, beforeEach } from 'vitest';
import { PlanSelector } from '../../src/planning/plan-selector';
import { resolvePlanConstraints } from '../../src/config/scheduling-config';
import { InvalidConfigurationError } from '../../src/errors';
import { dueItem, makeItem } from '../helpers/items';

const ids = (plan: { items: Array<{ id: string }> } | undefined): string[] =>
  plan ? plan.items.map((item) => item.id) : [];

describe('PlanSelector', () => {
  let selector: PlanSelector;

  beforeEach(() => {
    selector = new PlanSelector();
  });

  describe('single day', () => {
    it('should balance three subjects within the daily cap', () => {
      const items = [
        dueItem('a1', 'art', '2024-03-01'),
        dueItem('a2', 'art', '2024-03-02'),
        dueItem('a3', 'art', '2024-03-03'),
        dueItem('a4', 'art', '2024-03-04'),
        dueItem('b1', 'biology', '2024-03-01'),
        dueItem('b2', 'biology', '2024-03-02'),
        dueItem('b3', 'biology', '2024-03-03'),
        dueItem('c1', 'chemistry', '2024-03-01'),
        dueItem('c2', 'chemistry', '2024-03-02'),
      ];

      const { plans } = selector.plan(items, { startDate: '2024-03-10', horizonDays: 1 });

      expect(plans).toHaveLength(1);
      expect(ids(plans[0])).toEqual(['a1', 'a2', 'b1', 'b2', 'c1', 'c2']);
      expect(plans[0]?.subjects).toEqual(['art', 'biology', 'chemistry']);
      expect(plans[0]?.shortfall).toBeNull();
    });

    it('should take the most overdue items of each subject', () => {
      const items = [
        dueItem('m-late', 'math', '2024-03-09'),
        dueItem('m-early', 'math', '2024-03-01'),
        dueItem('m-mid', 'math', '2024-03-05'),
        dueItem('p1', 'physics', '2024-03-02'),
        dueItem('p2', 'physics', '2024-03-03'),
      ];
      const strict = new PlanSelector(
        resolvePlanConstraints({ maxSubjectsPerDay: 2, maxItemsPerDay: 4 })
      );

      const { plans } = strict.plan(items, { startDate: '2024-03-10', horizonDays: 1 });

      expect(ids(plans[0])).toEqual(['m-early', 'm-mid', 'p1', 'p2']);
    });

    it('should rank tied backlogs by earliest due date', () => {
      const items = [
        dueItem('x1', 'zoology', '2024-03-01'),
        dueItem('x2', 'zoology', '2024-03-04'),
        dueItem('y1', 'algebra', '2024-03-02'),
        dueItem('y2', 'algebra', '2024-03-03'),
      ];

      const { plans } = selector.plan(items, { startDate: '2024-03-10', horizonDays: 1 });

      expect(plans[0]?.subjects).toEqual(['zoology', 'algebra']);
    });

    it('should extend with one item per further subject before topping up', () => {
      const items = [
        dueItem('a1', 'art', '2024-03-01'),
        dueItem('a2', 'art', '2024-03-01'),
        dueItem('a3', 'art', '2024-03-01'),
        dueItem('b1', 'biology', '2024-03-01'),
        dueItem('b2', 'biology', '2024-03-01'),
        dueItem('c1', 'chemistry', '2024-03-01'),
        dueItem('d1', 'drama', '2024-03-01'),
      ];
      const roomy = new PlanSelector(
        resolvePlanConstraints({ maxSubjectsPerDay: 4, maxItemsPerSubject: 3, maxItemsPerDay: 7 })
      );

      const { plans } = roomy.plan(items, { startDate: '2024-03-01', horizonDays: 1 });

      // primary a1 a2 b1 b2, extension c1 d1, top-up a3
      expect(ids(plans[0])).toEqual(['a1', 'a2', 'a3', 'b1', 'b2', 'c1', 'd1']);
      expect(plans[0]?.subjects).toEqual(['art', 'biology', 'chemistry', 'drama']);
    });

    it('should collect the sorted topics of the selected items', () => {
      const items = [
        dueItem('m1', 'math', '2024-03-01', ['geometry', 'algebra']),
        dueItem('m2', 'math', '2024-03-01', ['algebra']),
        dueItem('p1', 'physics', '2024-03-01', ['optics']),
        dueItem('p2', 'physics', '2024-03-01', []),
      ];

      const { plans } = selector.plan(items, { startDate: '2024-03-01', horizonDays: 1 });

      expect(plans[0]?.topics).toEqual(['algebra', 'geometry', 'optics']);
      expect(plans[0]?.items[0]).toEqual({
        id: 'm1',
        subject: 'math',
        dueDate: '2024-03-01',
        topics: ['geometry', 'algebra'],
      });
    });
  });

  describe('shortfall', () => {
    it('should plan every item of a single overdue subject and report the shortfall', () => {
      const items = ['m1', 'm2', 'm3', 'm4', 'm5'].map((id, index) =>
        dueItem(id, 'math', `2024-03-0${index + 1}`)
      );

      const { plans } = selector.plan(items, { startDate: '2024-03-10', horizonDays: 1 });

      expect(ids(plans[0])).toEqual(['m1', 'm2', 'm3', 'm4', 'm5']);
      expect(plans[0]?.shortfall).toEqual({
        requiredSubjects: 2,
        availableSubjects: 1,
        requiredItems: 4,
        availableItems: 5,
      });
    });

    it('should cap a degraded day at the daily maximum', () => {
      const items = Array.from({ length: 9 }, (_, index) => dueItem(`m${index + 1}`, 'math', '2024-03-01'));

      const { plans } = selector.plan(items, { startDate: '2024-03-01', horizonDays: 1 });

      expect(ids(plans[0])).toEqual(['m1', 'm2', 'm3', 'm4', 'm5', 'm6']);
      expect(plans[0]?.shortfall?.availableItems).toBe(9);
    });

    it('should degrade when the second subject has too few items', () => {
      const items = [
        dueItem('m1', 'math', '2024-03-01'),
        dueItem('m2', 'math', '2024-03-01'),
        dueItem('m3', 'math', '2024-03-01'),
        dueItem('p1', 'physics', '2024-03-01'),
      ];

      const { plans } = selector.plan(items, { startDate: '2024-03-01', horizonDays: 1 });

      expect(ids(plans[0])).toEqual(['m1', 'm2', 'm3', 'p1']);
      expect(plans[0]?.shortfall).toEqual({
        requiredSubjects: 2,
        availableSubjects: 2,
        requiredItems: 4,
        availableItems: 4,
      });
    });

    it('should return an empty plan for an empty pool', () => {
      const { plans } = selector.plan([], { startDate: '2024-03-01', horizonDays: 1 });

      expect(plans).toEqual([
        {
          date: '2024-03-01',
          items: [],
          subjects: [],
          topics: [],
          shortfall: { requiredSubjects: 2, availableSubjects: 0, requiredItems: 4, availableItems: 0 },
        },
      ]);
    });
  });

  describe('horizon', () => {
    it('should never repeat an item across a three-day horizon', () => {
      const items = [
        ...['m1', 'm2', 'm3', 'm4'].map((id) => dueItem(id, 'math', '2024-03-01')),
        ...['p1', 'p2', 'p3', 'p4'].map((id) => dueItem(id, 'physics', '2024-03-01')),
      ];

      const { plans } = selector.plan(items, { startDate: '2024-03-01', horizonDays: 3 });
      const planned = plans.flatMap((plan) => ids(plan));

      expect(plans.map((plan) => plan.date)).toEqual(['2024-03-01', '2024-03-02', '2024-03-03']);
      expect(ids(plans[0])).toEqual(['m1', 'm2', 'p1', 'p2']);
      expect(ids(plans[1])).toEqual(['m3', 'm4', 'p3', 'p4']);
      expect(ids(plans[2])).toEqual([]);
      expect(new Set(planned).size).toBe(planned.length);
      expect(planned).toHaveLength(8);
    });

    it('should only plan items on or after their due date', () => {
      const items = [
        dueItem('m1', 'math', '2024-03-10'),
        dueItem('m2', 'math', '2024-03-10'),
        dueItem('p1', 'physics', '2024-03-10'),
        dueItem('p2', 'physics', '2024-03-10'),
        dueItem('m3', 'math', '2024-03-11'),
        dueItem('m4', 'math', '2024-03-11'),
        dueItem('c1', 'chemistry', '2024-03-11'),
        dueItem('c2', 'chemistry', '2024-03-11'),
      ];

      const { plans } = selector.plan(items, { startDate: '2024-03-10', horizonDays: 2 });

      expect(ids(plans[0])).toEqual(['m1', 'm2', 'p1', 'p2']);
      expect(ids(plans[1])).toEqual(['c1', 'c2', 'm3', 'm4']);
      expect(plans[1]?.subjects).toEqual(['chemistry', 'math']);
    });

    it('should reject an invalid horizon', () => {
      expect(() => selector.plan([], { startDate: '2024-03-01', horizonDays: 0 })).toThrow(
        InvalidConfigurationError
      );
      expect(() => selector.plan([], { startDate: 'tomorrow', horizonDays: 1 })).toThrow(
        InvalidConfigurationError
      );
    });
  });

  describe('determinism', () => {
    const items = [
      dueItem('a1', 'art', '2024-03-03', ['colour']),
      dueItem('a2', 'art', '2024-03-01'),
      dueItem('b1', 'biology', '2024-03-02', ['cells']),
      dueItem('b2', 'biology', '2024-03-04'),
      dueItem('b3', 'biology', '2024-03-05'),
      dueItem('c1', 'chemistry', '2024-03-01'),
      dueItem('c2', 'chemistry', '2024-03-06'),
      dueItem('d1', 'drama', '2024-03-02'),
    ];
    const horizon = { startDate: '2024-03-05', horizonDays: 3 };

    it('should give identical output for identical input', () => {
      expect(selector.plan(items, horizon)).toEqual(selector.plan(items, horizon));
    });

    it('should not depend on input order', () => {
      const expected = selector.plan(items, horizon);

      expect(selector.plan([...items].reverse(), horizon)).toEqual(expected);
      expect(selector.plan([...items.slice(3), ...items.slice(0, 3)], horizon)).toEqual(expected);
    });
  });

  describe('input hygiene', () => {
    it('should keep the earliest-due copy of a duplicated id', () => {
      const items = [
        dueItem('m1', 'math', '2024-03-05'),
        dueItem('m1', 'math', '2024-03-01'),
        dueItem('m2', 'math', '2024-03-01'),
        dueItem('p1', 'physics', '2024-03-01'),
        dueItem('p2', 'physics', '2024-03-01'),
      ];

      const result = selector.plan(items, { startDate: '2024-03-01', horizonDays: 1 });

      expect(ids(result.plans[0])).toEqual(['m1', 'm2', 'p1', 'p2']);
      expect(result.plans[0]?.items[0]?.dueDate).toBe('2024-03-01');
      expect(result.rejected).toEqual([
        {
          id: 'm1',
          code: 'DUPLICATE_ITEM',
          reason: 'Item m1 appears more than once; kept the entry due 2024-03-01',
        },
      ]);
    });

    it('should reject malformed items and plan the rest', () => {
      const items = [
        makeItem({ id: 'bad', currentIntervalDays: -1 }),
        { subject: 'math' },
        dueItem('m1', 'math', '2024-03-01'),
      ];

      const result = selector.plan(items, { startDate: '2024-03-01', horizonDays: 1 });

      expect(result.rejected.map((rejected) => [rejected.id, rejected.code])).toEqual([
        ['<unknown>', 'INVALID_ITEM_STATE'],
        ['bad', 'INVALID_ITEM_STATE'],
      ]);
      expect(ids(result.plans[0])).toEqual(['m1']);
    });

    it('should leave out subjects that are not active', () => {
      const focused = new PlanSelector(resolvePlanConstraints({ activeSubjects: ['math', 'physics'] }));
      const items = [
        dueItem('h1', 'history', '2024-03-01'),
        dueItem('m1', 'math', '2024-03-01'),
        dueItem('m2', 'math', '2024-03-01'),
        dueItem('p1', 'physics', '2024-03-01'),
        dueItem('p2', 'physics', '2024-03-01'),
        dueItem('h0', 'history', '2024-03-01'),
      ];

      const result = focused.plan(items, { startDate: '2024-03-01', horizonDays: 1 });

      expect(result.excluded).toEqual(['h0', 'h1']);
      expect(ids(result.plans[0])).toEqual(['m1', 'm2', 'p1', 'p2']);
    });
  });
});
