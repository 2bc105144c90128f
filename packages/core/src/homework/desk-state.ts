import type { DeskError } from "../errors.js";
import { DateParser, DEFAULT_DATE_CACHE_CAPACITY } from "./dates.js";
import { StatusCache } from "./status-cache.js";
import type { DeskSettings, Homework } from "./types.js";
import { DEFAULT_SETTINGS } from "./types.js";

export interface DeskStateOptions {
  clock: () => Date;
  settings?: DeskSettings;
  dateCacheCapacity?: number;
}

function cloneSettings(settings: DeskSettings): DeskSettings {
  return { ...settings, extra: { ...settings.extra } };
}

/**
 * The shared homework collection plus everything derived from it. Only the
 * task coordinator's handlers mutate it, one task at a time.
 */
export class DeskState {
  readonly dates: DateParser;
  readonly statuses: StatusCache;
  private items: Homework[] = [];
  private currentSettings: DeskSettings;
  private loadAttempted = false;
  private unreadable: unknown[] = [];
  private loadFailure: DeskError | null = null;

  constructor(private readonly options: DeskStateOptions) {
    this.currentSettings = cloneSettings(options.settings ?? DEFAULT_SETTINGS);
    this.dates = new DateParser(options.dateCacheCapacity ?? DEFAULT_DATE_CACHE_CAPACITY);
    this.statuses = new StatusCache({
      findItem: (code) => this.find(code),
      context: () => ({
        now: this.options.clock(),
        remindDays: this.currentSettings.remindDays,
      }),
      parse: (input) => this.dates.parse(input),
    });
  }

  get homeworks(): readonly Homework[] {
    return this.items;
  }

  /** True once a load has finished, successfully or not. */
  get loaded(): boolean {
    return this.loadAttempted;
  }

  /** Document records the last load could not use; saves write them back as they were. */
  get setAside(): readonly unknown[] {
    return this.unreadable;
  }

  /**
   * Set while the document on disk exists but failed to load. Saving then would
   * replace it with whatever is in memory.
   */
  get saveBlockedBy(): DeskError | null {
    return this.loadFailure;
  }

  /** Frozen copy; later setting changes do not leak into it. */
  settingsSnapshot(): Readonly<DeskSettings> {
    const copy = cloneSettings(this.currentSettings);
    Object.freeze(copy.extra);
    return Object.freeze(copy);
  }

  /** Private copies of every item, safe to hand to background work. */
  snapshot(): Homework[] {
    return this.items.map((item) => ({ ...item }));
  }

  find(code: string): Homework | undefined {
    return this.items.find((item) => item.code === code);
  }

  has(code: string): boolean {
    return this.items.some((item) => item.code === code);
  }

  append(item: Homework): void {
    if (this.has(item.code)) {
      throw new Error(`Duplicate homework code: ${item.code}`);
    }
    this.items.push(item);
  }

  /** Removes every item whose code is in `codes`; returns how many went. */
  removeCodes(codes: ReadonlySet<string>): number {
    const before = this.items.length;
    this.items = this.items.filter((item) => !codes.has(item.code));
    for (const code of codes) {
      this.statuses.invalidate(code);
    }
    return before - this.items.length;
  }

  markCompleted(code: string): boolean {
    const item = this.find(code);
    if (!item) {
      return false;
    }
    item.status = "completed";
    this.statuses.set(code, "completed");
    return true;
  }

  /** Installs a freshly loaded collection and recomputes every status. */
  applyLoad(
    items: Homework[],
    settings: DeskSettings | null,
    now: Date,
    setAside: readonly unknown[] = []
  ): void {
    this.items = items;
    this.unreadable = [...setAside];
    this.loadFailure = null;
    if (settings) {
      this.currentSettings = cloneSettings(settings);
    }
    this.loadAttempted = true;
    this.recomputeStatuses(now);
  }

  /**
   * A failed load leaves an empty collection behind. Pass null when there was
   * simply no document yet, so the first save may create it.
   */
  applyFailedLoad(failure: DeskError | null): void {
    this.items = [];
    this.unreadable = [];
    this.statuses.clear();
    this.loadFailure = failure;
    this.loadAttempted = true;
  }

  clear(): void {
    this.items = [];
    this.unreadable = [];
    this.statuses.clear();
    this.dates.clear();
  }

  updateSettings(patch: Partial<Pick<DeskSettings, "remindDays" | "chartDays">>): void {
    this.currentSettings = {
      ...this.currentSettings,
      ...patch,
      extra: { ...this.currentSettings.extra },
    };
  }

  recomputeStatuses(now: Date): void {
    this.statuses.recomputeAll(this.items, now, this.currentSettings.remindDays);
  }
}
