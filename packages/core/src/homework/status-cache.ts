import { parseCalendarDate } from "./dates.js";
import { classify, type DateParse } from "./status-classifier.js";
import type { Homework, StatusTag } from "./types.js";

export interface ClassifyContext {
  now: Date;
  remindDays: number;
}

export interface StatusCacheOptions {
  /** Looks an item up in the live collection; used to heal a miss. */
  findItem: (code: string) => Homework | undefined;
  /** Current time and reminder window, read on every miss. */
  context: () => ClassifyContext;
  parse?: DateParse;
}

const FALLBACK_TAG: StatusTag = "pending";

/**
 * Memoized `code -> tag` map. A miss is never an error: the tag is computed
 * from the live item, stored and returned.
 */
export class StatusCache {
  private readonly tags = new Map<string, StatusTag>();
  private readonly findItem: (code: string) => Homework | undefined;
  private readonly context: () => ClassifyContext;
  private readonly parse: DateParse;
  private recomputedAt: Date | null = null;

  constructor(options: StatusCacheOptions) {
    this.findItem = options.findItem;
    this.context = options.context;
    this.parse = options.parse ?? parseCalendarDate;
  }

  get size(): number {
    return this.tags.size;
  }

  get lastRecomputedAt(): Date | null {
    return this.recomputedAt;
  }

  has(code: string): boolean {
    return this.tags.has(code);
  }

  recomputeAll(items: readonly Homework[], now: Date, remindDays: number): void {
    this.tags.clear();
    for (const item of items) {
      this.tags.set(
        item.code,
        classify(item.dueDate, item.status, now, remindDays, this.parse)
      );
    }
    this.recomputedAt = now;
  }

  get(code: string): StatusTag {
    const cached = this.tags.get(code);
    if (cached) {
      return cached;
    }

    const item = this.findItem(code);
    if (!item) {
      return FALLBACK_TAG;
    }

    const { now, remindDays } = this.context();
    const tag = classify(item.dueDate, item.status, now, remindDays, this.parse);
    this.tags.set(code, tag);
    return tag;
  }

  set(code: string, tag: StatusTag): void {
    this.tags.set(code, tag);
  }

  invalidate(code: string): void {
    this.tags.delete(code);
  }

  clear(): void {
    this.tags.clear();
  }
}
