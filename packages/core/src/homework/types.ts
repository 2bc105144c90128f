export type HomeworkStatus = "pending" | "completed";

export type StatusTag =
  | "pending"
  | "due_soon"
  | "due_today"
  | "overdue"
  | "completed";

export interface Homework {
  code: string; // primary key, immutable once created
  subject: string;
  content: string;
  createDate: string; // DD/MM/YYYY
  dueDate: string; // DD/MM/YYYY
  status: HomeworkStatus;
}

export interface ListedHomework extends Homework {
  tag: StatusTag;
}

export type SettingScalar = string | number | boolean | null;

export interface DeskSettings {
  remindDays: number;
  chartDays: number;
  // Presentation preferences (theme, font sizes, window size) carried through untouched
  extra: Record<string, SettingScalar>;
}

export const DEFAULT_SETTINGS: DeskSettings = {
  remindDays: 3,
  chartDays: 5,
  extra: {},
};

export type StatusCounts = Record<StatusTag, number>;

export interface DailyVolume {
  date: string; // DD/MM/YYYY
  created: number;
  due: number;
}

export interface SummaryStats {
  total: number;
  completed: number;
  overdue: number;
  dueToday: number;
}

export interface DerivedViews {
  counts: StatusCounts;
  daily: DailyVolume[];
  summary: SummaryStats;
}

export type NoticeSeverity = "info" | "warning" | "error";

/**
 * The presentation layer the core reports into. Everything the core shows to
 * a user goes through these three calls.
 */
export interface DeskPresenter {
  notifyUser(message: string, severity: NoticeSeverity): void;
  presentList(items: readonly ListedHomework[], progressFraction?: number): void;
  presentAggregates(views: DerivedViews): void;
}
