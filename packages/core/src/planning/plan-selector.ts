import { addDays, type CalendarDate } from '../domain/calendar';
import {
  PlanHorizonSchema,
  type DayPlan,
  type PlanHorizon,
  type PlannedItem,
  type PlanShortfall,
} from '../domain/plan';
import { ReviewableItemSchema, type ReviewableItem } from '../domain/review';
import { DEFAULT_PLAN_CONSTRAINTS, type PlanConstraints } from '../config/scheduling-config';
import { InvalidConfigurationError, type RejectedInput } from '../errors';
import { readItemId, validateSchema } from '../validation/validator';

export interface PlanResult {
  plans: DayPlan[];
  /** Malformed or duplicated items, sorted by id. */
  rejected: RejectedInput[];
  /** Ids of valid items left out because their subject is not active. */
  excluded: string[];
}

interface SubjectBacklog {
  subject: string;
  items: ReviewableItem[];
  earliestDue: CalendarDate;
  smallestId: string;
}

interface SubjectPick {
  backlog: SubjectBacklog;
  taken: number;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareCanonical(a: ReviewableItem, b: ReviewableItem): number {
  return (
    compareStrings(a.id, b.id) ||
    compareStrings(a.dueDate, b.dueDate) ||
    compareStrings(a.subject, b.subject) ||
    compareStrings(a.topics.join('\u0000'), b.topics.join('\u0000'))
  );
}

function compareByDue(a: ReviewableItem, b: ReviewableItem): number {
  return compareStrings(a.dueDate, b.dueDate) || compareStrings(a.id, b.id);
}

function compareBacklogs(a: SubjectBacklog, b: SubjectBacklog): number {
  return (
    b.items.length - a.items.length ||
    compareStrings(a.earliestDue, b.earliestDue) ||
    compareStrings(a.smallestId, b.smallestId) ||
    compareStrings(a.subject, b.subject)
  );
}

function toPlannedItem(item: ReviewableItem): PlannedItem {
  return { id: item.id, subject: item.subject, dueDate: item.dueDate, topics: [...item.topics] };
}

/**
 * Selects which due items to study on each day of a horizon.
 *
 * Each day draws from items due on or before that day that no earlier day
 * of the same run took. Subjects are ranked by backlog so the largest
 * backlogs drain first; the day holds at least `minSubjectsPerDay`
 * subjects with `minItemsPerSubject` items each, and is then extended up
 * to the maximums. A pool that cannot meet the minimum still produces a
 * best-effort day, flagged with a `shortfall`.
 *
 * Output depends only on the set of input items, never on their order.
 */
export class PlanSelector {
  constructor(private readonly constraints: PlanConstraints = DEFAULT_PLAN_CONSTRAINTS) {}

  get settings(): PlanConstraints {
    return this.constraints;
  }

  plan(dueItems: readonly unknown[], horizon: PlanHorizon): PlanResult {
    const parsedHorizon = validateSchema(PlanHorizonSchema, horizon);
    if (!parsedHorizon.valid) {
      throw new InvalidConfigurationError(parsedHorizon.errors);
    }
    const { startDate, horizonDays } = parsedHorizon.data;

    const { candidates, rejected, excluded } = this.prepare(dueItems);
    const consumed = new Set<string>();
    const plans: DayPlan[] = [];

    for (let offset = 0; offset < horizonDays; offset++) {
      const date = addDays(startDate, offset);
      const pool = candidates.filter((item) => item.dueDate <= date && !consumed.has(item.id));
      const plan = this.planDay(date, pool);
      for (const item of plan.items) {
        consumed.add(item.id);
      }
      plans.push(plan);
    }

    return { plans, rejected, excluded };
  }

  /**
   * Validate, deduplicate and filter the input into a canonical order.
   */
  private prepare(dueItems: readonly unknown[]): {
    candidates: ReviewableItem[];
    rejected: RejectedInput[];
    excluded: string[];
  } {
    const rejected: RejectedInput[] = [];
    const valid: ReviewableItem[] = [];

    for (const raw of dueItems) {
      const result = validateSchema(ReviewableItemSchema, raw);
      if (result.valid) {
        valid.push(result.data);
      } else {
        rejected.push({
          id: readItemId(raw) ?? '<unknown>',
          code: 'INVALID_ITEM_STATE',
          reason: result.errors.map((issue) => `${issue.field}: ${issue.message}`).join('; '),
        });
      }
    }

    valid.sort(compareCanonical);

    const seen = new Set<string>();
    const unique: ReviewableItem[] = [];
    for (const item of valid) {
      if (seen.has(item.id)) {
        rejected.push({
          id: item.id,
          code: 'DUPLICATE_ITEM',
          reason: `Item ${item.id} appears more than once; kept the entry due ${unique[unique.length - 1]?.dueDate ?? item.dueDate}`,
        });
        continue;
      }
      seen.add(item.id);
      unique.push(item);
    }

    const active = this.constraints.activeSubjects;
    const activeSet = active === null ? null : new Set(active);
    const candidates = activeSet === null ? unique : unique.filter((item) => activeSet.has(item.subject));
    const excluded =
      activeSet === null ? [] : unique.filter((item) => !activeSet.has(item.subject)).map((item) => item.id);

    rejected.sort((a, b) => compareStrings(a.id, b.id) || compareStrings(a.reason, b.reason));

    return { candidates, rejected, excluded };
  }

  private rankSubjects(pool: readonly ReviewableItem[]): SubjectBacklog[] {
    const bySubject = new Map<string, ReviewableItem[]>();
    for (const item of pool) {
      const bucket = bySubject.get(item.subject);
      if (bucket) {
        bucket.push(item);
      } else {
        bySubject.set(item.subject, [item]);
      }
    }

    const backlogs: SubjectBacklog[] = [];
    for (const [subject, items] of bySubject) {
      items.sort(compareByDue);
      const [first] = items;
      if (first === undefined) {
        continue;
      }
      backlogs.push({
        subject,
        items,
        earliestDue: first.dueDate,
        smallestId: items.reduce((min, item) => (item.id < min ? item.id : min), first.id),
      });
    }

    return backlogs.sort(compareBacklogs);
  }

  private planDay(date: CalendarDate, pool: readonly ReviewableItem[]): DayPlan {
    const {
      minSubjectsPerDay,
      maxSubjectsPerDay,
      minItemsPerSubject,
      maxItemsPerSubject,
      maxItemsPerDay,
    } = this.constraints;

    const ranked = this.rankSubjects(pool);
    const meetsMinimum =
      ranked.length >= minSubjectsPerDay &&
      ranked.slice(0, minSubjectsPerDay).every((backlog) => backlog.items.length >= minItemsPerSubject);

    if (!meetsMinimum) {
      const selected = ranked.flatMap((backlog) => backlog.items).slice(0, maxItemsPerDay);
      const shortfall: PlanShortfall = {
        requiredSubjects: minSubjectsPerDay,
        availableSubjects: ranked.length,
        requiredItems: minSubjectsPerDay * minItemsPerSubject,
        availableItems: pool.length,
      };
      return this.buildDayPlan(date, selected, shortfall);
    }

    const picks: SubjectPick[] = [];
    let remaining = maxItemsPerDay;

    // Primary phase
    for (const backlog of ranked.slice(0, minSubjectsPerDay)) {
      const taken = Math.min(minItemsPerSubject, remaining);
      picks.push({ backlog, taken });
      remaining -= taken;
    }

    // Extension phase: one item from each further subject
    for (const backlog of ranked.slice(minSubjectsPerDay)) {
      if (remaining <= 0 || picks.length >= maxSubjectsPerDay) {
        break;
      }
      picks.push({ backlog, taken: 1 });
      remaining -= 1;
    }

    // Top-up rounds
    let progressed = true;
    while (remaining > 0 && progressed) {
      progressed = false;
      for (const pick of picks) {
        const limit = Math.min(maxItemsPerSubject, pick.backlog.items.length);
        if (remaining > 0 && pick.taken < limit) {
          pick.taken += 1;
          remaining -= 1;
          progressed = true;
        }
      }
    }

    const selected = picks.flatMap((pick) => pick.backlog.items.slice(0, pick.taken));
    return this.buildDayPlan(date, selected, null);
  }

  private buildDayPlan(
    date: CalendarDate,
    selected: readonly ReviewableItem[],
    shortfall: PlanShortfall | null
  ): DayPlan {
    const subjects: string[] = [];
    for (const item of selected) {
      if (!subjects.includes(item.subject)) {
        subjects.push(item.subject);
      }
    }

    const topics = [...new Set(selected.flatMap((item) => item.topics))].sort(compareStrings);

    return {
      date,
      items: selected.map(toPlannedItem),
      subjects,
      topics,
      shortfall,
    };
  }
}
