import { z } from "zod";

import type { DeskSettings, Homework, SettingScalar } from "../homework/types.js";
import { DEFAULT_SETTINGS } from "../homework/types.js";

export const HomeworkRecordSchema = z.object({
  code: z.string(),
  subject: z.string(),
  content: z.string(),
  create_date: z.string(),
  due_date: z.string(),
  // Missing or unrecognised statuses read as pending.
  status: z.enum(["pending", "completed"]).catch("pending"),
});

export type HomeworkRecord = z.output<typeof HomeworkRecordSchema>;

const SettingScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const RemindDaysSchema = z.number().int().min(0);
const ChartDaysSchema = z.number().int().min(1);

const SETTING_KEY_ALIASES = {
  remindDays: ["remind_days", "remindDays"],
  chartDays: ["chart_days", "chartDays"],
} as const;

const KNOWN_SETTING_KEYS = new Set<string>([
  ...SETTING_KEY_ALIASES.remindDays,
  ...SETTING_KEY_ALIASES.chartDays,
]);

export interface HomeworkDocument {
  /** Readable records, followed by any set aside at load time, verbatim. */
  homeworks: unknown[];
  settings: Record<string, SettingScalar>;
}

export type DocumentShape =
  | { kind: "wrapped"; records: unknown[]; settings: unknown }
  | { kind: "legacy"; records: unknown[] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Current documents wrap the list as `{ homeworks, settings }`; older ones are
 * a bare array of items. Anything else is rejected.
 */
export function detectDocumentShape(parsed: unknown): DocumentShape {
  if (Array.isArray(parsed)) {
    return { kind: "legacy", records: parsed };
  }
  if (isRecord(parsed) && Array.isArray(parsed.homeworks)) {
    return { kind: "wrapped", records: parsed.homeworks, settings: parsed.settings };
  }
  throw new Error("Unrecognized document shape: expected an array or { homeworks, settings }");
}

function pickSetting(
  source: Record<string, unknown>,
  keys: readonly string[]
): unknown {
  for (const key of keys) {
    if (key in source) {
      return source[key];
    }
  }
  return undefined;
}

/**
 * Reads the `settings` map of a wrapped document. Unknown scalar keys are kept
 * in `extra`; non-scalar values are dropped.
 */
export function parseDocumentSettings(raw: unknown): DeskSettings {
  if (raw === undefined || raw === null) {
    return { ...DEFAULT_SETTINGS, extra: {} };
  }
  if (!isRecord(raw)) {
    throw new Error("Invalid settings: expected an object");
  }

  const remindRaw = pickSetting(raw, SETTING_KEY_ALIASES.remindDays);
  const chartRaw = pickSetting(raw, SETTING_KEY_ALIASES.chartDays);

  const remind = RemindDaysSchema.safeParse(remindRaw ?? DEFAULT_SETTINGS.remindDays);
  if (!remind.success) {
    throw new Error(`Invalid settings.remind_days: ${String(remindRaw)}`);
  }
  const chart = ChartDaysSchema.safeParse(chartRaw ?? DEFAULT_SETTINGS.chartDays);
  if (!chart.success) {
    throw new Error(`Invalid settings.chart_days: ${String(chartRaw)}`);
  }

  const extra: Record<string, SettingScalar> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (KNOWN_SETTING_KEYS.has(key)) continue;
    const scalar = SettingScalarSchema.safeParse(value);
    if (scalar.success) {
      extra[key] = scalar.data;
    }
  }

  return { remindDays: remind.data, chartDays: chart.data, extra };
}

export function fromRecord(record: HomeworkRecord): Homework {
  return {
    code: record.code,
    subject: record.subject,
    content: record.content,
    createDate: record.create_date,
    dueDate: record.due_date,
    status: record.status,
  };
}

export function toRecord(item: Homework): HomeworkRecord {
  return {
    code: item.code,
    subject: item.subject,
    content: item.content,
    create_date: item.createDate,
    due_date: item.dueDate,
    status: item.status,
  };
}

export function buildDocument(
  items: readonly Homework[],
  settings: DeskSettings,
  setAside: readonly unknown[] = []
): HomeworkDocument {
  return {
    homeworks: [...items.map(toRecord), ...setAside],
    settings: {
      ...settings.extra,
      remind_days: settings.remindDays,
      chart_days: settings.chartDays,
    },
  };
}

export function serializeDocument(document: HomeworkDocument): string {
  return JSON.stringify(document, null, 2) + "\n";
}
