import type { Logger } from "pino";

import type { DeskError } from "../errors.js";
import type { DeskState } from "../homework/desk-state.js";
import type { DeskPresenter, DeskSettings } from "../homework/types.js";

type NoParams = Record<string, never>;

export interface AddHomeworkParams {
  code: string;
  subject: string;
  content: string;
  createDate: string;
  dueDate: string;
}

export type QueryField = "due" | "create";

export interface QueryParams {
  date: string;
  field: QueryField;
}

export interface RefreshParams {
  /** Recompute every cached status before building the list. */
  recomputeStatuses?: boolean;
}

export interface SettingsPatch {
  remindDays?: number;
  chartDays?: number;
}

export interface TaskParamsMap {
  load: NoParams;
  save: NoParams;
  add: AddHomeworkParams;
  refresh: RefreshParams;
  updateDerivedViews: NoParams;
  query: QueryParams;
  delete: { codes: readonly string[] };
  clearAll: NoParams;
  markCompleted: { code: string };
  updateSettings: SettingsPatch;
}

export type TaskKind = keyof TaskParamsMap;

export interface Task<K extends TaskKind = TaskKind> {
  id: number;
  kind: K;
  params: TaskParamsMap[K];
  submittedAt: Date;
}

/** Every submittable request, one payload shape per kind. */
export type TaskRequest = {
  [K in TaskKind]: { kind: K; params: TaskParamsMap[K] };
}[TaskKind];

export type TaskOutcome =
  | { status: "succeeded"; notice?: string }
  | { status: "failed"; error: DeskError };

export type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * A handler that started background work. The coordinator stays busy until
 * `start` hands back a completion, which it then applies on its own tick.
 */
export interface SuspendedTask {
  status: "suspended";
  start(deliver: (complete: () => TaskOutcome) => void): void;
}

export type HandlerResult = TaskOutcome | SuspendedTask;

export interface HandlerContext {
  state: DeskState;
  settings: Readonly<DeskSettings>;
  presenter: DeskPresenter;
  logger: Logger;
  now(): Date;
  submit<K extends TaskKind>(kind: K, params: TaskParamsMap[K]): void;
}

export type TaskHandler<K extends TaskKind> = (
  params: TaskParamsMap[K],
  context: HandlerContext
) => HandlerResult;

export type TaskHandlerTable = { [K in TaskKind]: TaskHandler<K> };

export function succeeded(notice?: string): TaskOutcome {
  return notice === undefined ? { status: "succeeded" } : { status: "succeeded", notice };
}

export function failed(error: DeskError): TaskOutcome {
  return { status: "failed", error };
}

/**
 * Runs `work` off the coordinator and routes its settlement back through
 * `complete`, which is invoked by the coordinator, never by the work itself.
 */
export function suspend<T>(
  work: () => Promise<T>,
  complete: (result: Settled<T>) => TaskOutcome
): SuspendedTask {
  return {
    status: "suspended",
    start(deliver) {
      void Promise.resolve()
        .then(work)
        .then(
          (value) => deliver(() => complete({ ok: true, value })),
          (error: unknown) => deliver(() => complete({ ok: false, error }))
        );
    },
  };
}
