import type { Logger } from "pino";

import { calendarDateOf, daysBetween } from "../homework/dates.js";
import type { DeskState } from "../homework/desk-state.js";
import type { TaskKind, TaskParamsMap } from "./tasks.js";

export const DEFAULT_STATUS_REFRESH_INTERVAL_MS = 60 * 60 * 1000;
export const DEFAULT_STATUS_CHECK_INTERVAL_MS = 60 * 1000;

export interface TaskSubmitter {
  submit<K extends TaskKind>(kind: K, params: TaskParamsMap[K]): unknown;
}

export interface StatusRefreshTimerOptions {
  coordinator: TaskSubmitter;
  state: DeskState;
  logger: Logger;
  intervalMs?: number;
  checkIntervalMs?: number;
  clock?: () => Date;
}

/**
 * Periodically asks the coordinator to recompute every status, so tags roll
 * over at midnight even when nobody touches the desk.
 */
export class StatusRefreshTimer {
  private readonly coordinator: TaskSubmitter;
  private readonly state: DeskState;
  private readonly logger: Logger;
  private readonly intervalMs: number;
  private readonly checkIntervalMs: number;
  private readonly clock: () => Date;
  private timer: ReturnType<typeof setInterval> | null = null;
  // Recompute stamp seen when the last refresh was submitted.
  private submittedAgainst: number | null | undefined = undefined;

  constructor(options: StatusRefreshTimerOptions) {
    this.coordinator = options.coordinator;
    this.state = options.state;
    this.logger = options.logger;
    this.intervalMs = options.intervalMs ?? DEFAULT_STATUS_REFRESH_INTERVAL_MS;
    this.checkIntervalMs = options.checkIntervalMs ?? DEFAULT_STATUS_CHECK_INTERVAL_MS;
    this.clock = options.clock ?? (() => new Date());
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => this.check(), this.checkIntervalMs);
    this.timer.unref?.();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** Submits a recomputing refresh when one is due. Returns whether it did. */
  check(): boolean {
    if (!this.isDue()) {
      return false;
    }
    this.logger.debug("Status refresh due");
    this.coordinator.submit("refresh", { recomputeStatuses: true });
    this.submittedAgainst = this.state.statuses.lastRecomputedAt?.getTime() ?? null;
    return true;
  }

  private isDue(): boolean {
    const { state } = this;
    if (!state.loaded || state.homeworks.length === 0) {
      return false;
    }

    const last = state.statuses.lastRecomputedAt;
    const stamp = last?.getTime() ?? null;
    if (this.submittedAgainst !== undefined) {
      if (this.submittedAgainst === stamp) {
        return false;
      }
      this.submittedAgainst = undefined;
    }
    if (last === null) {
      return true;
    }

    const now = this.clock();
    if (now.getTime() - last.getTime() >= this.intervalMs) {
      return true;
    }
    return daysBetween(calendarDateOf(last), calendarDateOf(now)) !== 0;
  }
}
