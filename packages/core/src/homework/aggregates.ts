import {
  addDays,
  calendarDateOf,
  formatCalendarDate,
  parseCalendarDate,
} from "./dates.js";
import { shouldDisplay } from "./ordering.js";
import type { DateParse } from "./status-classifier.js";
import type {
  DailyVolume,
  DerivedViews,
  Homework,
  StatusCounts,
  StatusTag,
  SummaryStats,
} from "./types.js";

export function emptyStatusCounts(): StatusCounts {
  return {
    due_today: 0,
    overdue: 0,
    due_soon: 0,
    pending: 0,
    completed: 0,
  };
}

export function countByStatus(
  items: readonly Homework[],
  tagOf: (code: string) => StatusTag
): StatusCounts {
  const counts = emptyStatusCounts();
  for (const item of items) {
    const tag = item.status === "completed" ? "completed" : tagOf(item.code);
    counts[tag] += 1;
  }
  return counts;
}

/**
 * Created/due counts for each of the last `days` days, oldest first, ending
 * with today.
 */
export function dailyVolume(
  items: readonly Homework[],
  now: Date,
  days: number,
  parse: DateParse = parseCalendarDate
): DailyVolume[] {
  const today = calendarDateOf(now);
  const series: DailyVolume[] = [];
  const indexByDate = new Map<string, number>();

  for (let offset = days - 1; offset >= 0; offset--) {
    const date = formatCalendarDate(addDays(today, -offset));
    indexByDate.set(date, series.length);
    series.push({ date, created: 0, due: 0 });
  }

  const normalize = (value: string): string => {
    const parsed = parse(value);
    return parsed ? formatCalendarDate(parsed) : value;
  };

  for (const item of items) {
    const createdIdx = indexByDate.get(normalize(item.createDate));
    if (createdIdx !== undefined) {
      series[createdIdx].created += 1;
    }
    const dueIdx = indexByDate.get(normalize(item.dueDate));
    if (dueIdx !== undefined) {
      series[dueIdx].due += 1;
    }
  }

  return series;
}

export function summarize(counts: StatusCounts): SummaryStats {
  const total = Object.values(counts).reduce((sum, n) => sum + n, 0);
  return {
    total,
    completed: counts.completed,
    overdue: counts.overdue,
    dueToday: counts.due_today,
  };
}

export interface DerivedViewsInput {
  items: readonly Homework[];
  tagOf: (code: string) => StatusTag;
  now: Date;
  chartDays: number;
  parse?: DateParse;
}

/** Status distribution and summary cover visible items; the daily series covers all of them. */
export function computeDerivedViews(input: DerivedViewsInput): DerivedViews {
  const parse = input.parse ?? parseCalendarDate;
  const visible = input.items.filter((item) => shouldDisplay(item, input.now, parse));
  const counts = countByStatus(visible, input.tagOf);
  return {
    counts,
    daily: dailyVolume(input.items, input.now, input.chartDays, parse),
    summary: summarize(counts),
  };
}
