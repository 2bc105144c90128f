import {
  calendarDateOf,
  daysBetween,
  parseCalendarDate,
  toEpochDay,
} from "./dates.js";
import type { DateParse } from "./status-classifier.js";
import type { Homework, ListedHomework, StatusTag } from "./types.js";

// Most urgent first: today's deadlines, then anything already late.
export const STATUS_WEIGHT: Record<StatusTag, number> = {
  due_today: 0,
  overdue: 1,
  due_soon: 2,
  pending: 3,
  completed: 4,
};

/**
 * Completed homework drops out of the list once its due date has passed.
 * Everything else, including items with unreadable dates, stays visible.
 */
export function shouldDisplay(
  item: Homework,
  now: Date,
  parse: DateParse = parseCalendarDate
): boolean {
  if (item.status !== "completed") {
    return true;
  }
  const due = parse(item.dueDate);
  if (!due) {
    return true;
  }
  return daysBetween(calendarDateOf(now), due) >= 0;
}

export function withTags(
  items: readonly Homework[],
  tagOf: (code: string) => StatusTag
): ListedHomework[] {
  return items.map((item) => ({ ...item, tag: tagOf(item.code) }));
}

/**
 * Sorts by status weight, then by due date ascending. Unreadable due dates
 * sort first within their bucket; ties keep their incoming order.
 */
export function sortByUrgency(
  items: readonly ListedHomework[],
  parse: DateParse = parseCalendarDate
): ListedHomework[] {
  const keyed = items.map((item) => {
    const due = parse(item.dueDate);
    return {
      item,
      weight: STATUS_WEIGHT[item.tag],
      dueDay: due ? toEpochDay(due) : Number.NEGATIVE_INFINITY,
    };
  });

  keyed.sort((a, b) => {
    if (a.weight !== b.weight) {
      return a.weight - b.weight;
    }
    if (a.dueDay === b.dueDay) {
      return 0;
    }
    return a.dueDay < b.dueDay ? -1 : 1;
  });

  return keyed.map((entry) => entry.item);
}

/** The list the refresh task shows: filtered, tagged and sorted. */
export function buildDisplayList(
  items: readonly Homework[],
  tagOf: (code: string) => StatusTag,
  now: Date,
  parse: DateParse = parseCalendarDate
): ListedHomework[] {
  const visible = items.filter((item) => shouldDisplay(item, now, parse));
  return sortByUrgency(withTags(visible, tagOf), parse);
}
