import {
  calendarDateOf,
  daysBetween,
  parseCalendarDate,
  type CalendarDate,
} from "./dates.js";
import type { HomeworkStatus, StatusTag } from "./types.js";

export type DateParse = (input: string) => CalendarDate | null;

/**
 * Classifies a homework item relative to `now`. Pure: the same inputs always
 * give the same tag, and a malformed due date reads as `pending`.
 */
export function classify(
  dueDate: string,
  explicitStatus: HomeworkStatus,
  now: Date,
  remindDays: number,
  parse: DateParse = parseCalendarDate
): StatusTag {
  if (explicitStatus === "completed") {
    return "completed";
  }

  const due = parse(dueDate);
  if (!due) {
    return "pending";
  }

  const remaining = daysBetween(calendarDateOf(now), due);
  if (remaining < 0) return "overdue";
  if (remaining === 0) return "due_today";
  if (remaining <= remindDays) return "due_soon";
  return "pending";
}
