import { LruCache } from "./lru-cache.js";

export interface CalendarDate {
  year: number;
  month: number; // 1-12
  day: number; // 1-31
}

export const DEFAULT_DATE_CACHE_CAPACITY = 1000;

const MS_PER_DAY = 86_400_000;
const DATE_PATTERN = /^(\d{1,2})[/-](\d{1,2})[/-](\d{1,4})$/;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Parses `D/M/YYYY`, `DD/MM/YYYY`, `DD/MM/YY` and the same shapes with `-`
 * separators. Two-digit years land in the 2000s. Returns null for anything
 * that is not a real calendar day.
 */
export function parseCalendarDate(input: string): CalendarDate | null {
  const match = input.trim().match(DATE_PATTERN);
  if (!match) {
    return null;
  }

  const day = Number.parseInt(match[1], 10);
  const month = Number.parseInt(match[2], 10);
  let year = Number.parseInt(match[3], 10);
  if (year < 100) {
    year += 2000;
  }

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;

  return { year, month, day };
}

export function formatCalendarDate(date: CalendarDate): string {
  const dd = String(date.day).padStart(2, "0");
  const mm = String(date.month).padStart(2, "0");
  const yyyy = String(date.year).padStart(4, "0");
  return `${dd}/${mm}/${yyyy}`;
}

/** Local calendar day of an instant. */
export function calendarDateOf(instant: Date): CalendarDate {
  return {
    year: instant.getFullYear(),
    month: instant.getMonth() + 1,
    day: instant.getDate(),
  };
}

export function toEpochDay(date: CalendarDate): number {
  return Math.floor(Date.UTC(date.year, date.month - 1, date.day) / MS_PER_DAY);
}

export function fromEpochDay(epochDay: number): CalendarDate {
  const instant = new Date(epochDay * MS_PER_DAY);
  return {
    year: instant.getUTCFullYear(),
    month: instant.getUTCMonth() + 1,
    day: instant.getUTCDate(),
  };
}

/** Whole days from `from` to `to`; negative when `to` is earlier. */
export function daysBetween(from: CalendarDate, to: CalendarDate): number {
  return toEpochDay(to) - toEpochDay(from);
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return fromEpochDay(toEpochDay(date) + days);
}

/**
 * Memoizing front for `parseCalendarDate`. The memo is bounded so that a
 * long-running desk fed with many distinct strings does not grow forever.
 */
export class DateParser {
  private readonly memo: LruCache<string, CalendarDate | null>;

  constructor(capacity: number = DEFAULT_DATE_CACHE_CAPACITY) {
    this.memo = new LruCache(capacity);
  }

  get cachedEntries(): number {
    return this.memo.size;
  }

  parse(input: string): CalendarDate | null {
    const cached = this.memo.get(input);
    if (cached !== undefined) {
      return cached;
    }
    const parsed = parseCalendarDate(input);
    this.memo.set(input, parsed);
    return parsed;
  }

  /** Canonical `DD/MM/YYYY`, or the input unchanged when it does not parse. */
  normalize(input: string): string {
    const parsed = this.parse(input);
    return parsed ? formatCalendarDate(parsed) : input;
  }

  clear(): void {
    this.memo.clear();
  }
}
