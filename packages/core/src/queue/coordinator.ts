import type { Logger } from "pino";

import { DeskError, toDeskError } from "../errors.js";
import type { DeskState } from "../homework/desk-state.js";
import type { DeskPresenter, NoticeSeverity } from "../homework/types.js";
import {
  failed,
  type HandlerContext,
  type HandlerResult,
  type Task,
  type TaskHandlerTable,
  type TaskKind,
  type TaskOutcome,
  type TaskParamsMap,
  type TaskRequest,
} from "./tasks.js";

export const DEFAULT_TICK_INTERVAL_MS = 50;

export type CoordinatorEvent =
  | { type: "task_submitted"; task: Task; queueDepth: number }
  | { type: "task_started"; task: Task; queueDepth: number }
  | { type: "task_finished"; task: Task; outcome: TaskOutcome; durationMs: number };

export type CoordinatorSubscriber = (event: CoordinatorEvent) => void;

export interface TaskCoordinatorOptions {
  handlers: TaskHandlerTable;
  state: DeskState;
  presenter: DeskPresenter;
  logger: Logger;
  tickIntervalMs?: number;
  clock?: () => Date;
}

interface QueuedTask {
  task: Task;
  run: (context: HandlerContext) => HandlerResult;
}

interface ActiveTask {
  task: Task;
  startedAt: number;
}

interface Completion {
  taskId: number;
  complete: () => TaskOutcome;
}

/**
 * Runs submitted tasks strictly one at a time, in submission order.
 *
 * Each tick first applies completions delivered by background work, then,
 * if nothing is in flight, dispatches the next queued task. A task that
 * suspends keeps the coordinator busy until its completion is applied, so
 * handlers never interleave their writes to the shared state.
 */
export class TaskCoordinator {
  private readonly handlers: TaskHandlerTable;
  private readonly state: DeskState;
  private readonly presenter: DeskPresenter;
  private readonly logger: Logger;
  private readonly tickIntervalMs: number;
  private readonly clock: () => Date;
  private readonly queue: QueuedTask[] = [];
  private readonly inbox: Completion[] = [];
  private readonly subscribers = new Set<CoordinatorSubscriber>();
  private readonly idleWaiters: (() => void)[] = [];
  private active: ActiveTask | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;
  private stopped = false;
  private nextTaskId = 1;

  constructor(options: TaskCoordinatorOptions) {
    this.handlers = options.handlers;
    this.state = options.state;
    this.presenter = options.presenter;
    this.logger = options.logger;
    this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
    this.clock = options.clock ?? (() => new Date());
  }

  submit<K extends TaskKind>(kind: K, params: TaskParamsMap[K]): Task<K> {
    const task: Task<K> = {
      id: this.nextTaskId++,
      kind,
      params,
      submittedAt: this.clock(),
    };

    if (this.stopped) {
      this.logger.warn({ taskId: task.id, kind }, "Coordinator stopped; task discarded");
      return task;
    }

    const handler = this.handlers[kind];
    this.queue.push({
      task,
      run: (context) => handler(params, context),
    });
    this.emit({ type: "task_submitted", task, queueDepth: this.queue.length });
    return task;
  }

  submitRequest(request: TaskRequest): Task {
    switch (request.kind) {
      case "load":
        return this.submit("load", request.params);
      case "save":
        return this.submit("save", request.params);
      case "add":
        return this.submit("add", request.params);
      case "refresh":
        return this.submit("refresh", request.params);
      case "updateDerivedViews":
        return this.submit("updateDerivedViews", request.params);
      case "query":
        return this.submit("query", request.params);
      case "delete":
        return this.submit("delete", request.params);
      case "clearAll":
        return this.submit("clearAll", request.params);
      case "markCompleted":
        return this.submit("markCompleted", request.params);
      case "updateSettings":
        return this.submit("updateSettings", request.params);
    }
  }

  queueDepth(): number {
    return this.queue.length;
  }

  currentTaskKind(): TaskKind | null {
    return this.active?.task.kind ?? null;
  }

  isBusy(): boolean {
    return this.active !== null;
  }

  subscribe(subscriber: CoordinatorSubscriber): () => void {
    this.subscribers.add(subscriber);
    return () => {
      this.subscribers.delete(subscriber);
    };
  }

  start(): void {
    if (this.timer || this.stopped) {
      return;
    }
    this.timer = setInterval(() => this.tick(), this.tickIntervalMs);
    this.logger.debug({ tickIntervalMs: this.tickIntervalMs }, "Coordinator started");
  }

  /**
   * Stops ticking and discards whatever is still queued. A completion that
   * arrives afterwards is never applied.
   */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    const discarded = this.queue.splice(0);
    if (discarded.length > 0 || this.active) {
      this.logger.info(
        {
          discarded: discarded.length,
          inFlight: this.active?.task.kind ?? null,
        },
        "Coordinator stopped with unfinished work"
      );
    }
    this.active = null;
    this.inbox.length = 0;
    this.releaseIdleWaiters();
  }

  /** Resolves once nothing is queued or in flight (or the coordinator stops). */
  whenIdle(): Promise<void> {
    if (this.stopped || this.isDrained()) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /** One scheduling step: apply delivered completions, then maybe dispatch. */
  tick(): void {
    if (this.stopped) {
      return;
    }

    for (const completion of this.inbox.splice(0)) {
      this.applyCompletion(completion);
    }

    if (!this.active) {
      const next = this.queue.shift();
      if (next) {
        this.dispatch(next);
      }
    }

    if (this.isDrained()) {
      this.releaseIdleWaiters();
    }
  }

  private dispatch(queued: QueuedTask): void {
    const { task } = queued;
    this.active = { task, startedAt: Date.now() };
    this.emit({ type: "task_started", task, queueDepth: this.queue.length });
    this.logger.debug({ taskId: task.id, kind: task.kind }, "Task started");

    let result: HandlerResult;
    try {
      result = queued.run(this.buildContext());
    } catch (error) {
      result = failed(this.crashed(task, error));
    }

    if (result.status !== "suspended") {
      this.finish(task, result);
      return;
    }

    try {
      result.start((complete) => {
        this.inbox.push({ taskId: task.id, complete });
      });
    } catch (error) {
      this.finish(task, failed(this.crashed(task, error)));
    }
  }

  private applyCompletion(completion: Completion): void {
    const active = this.active;
    if (!active || active.task.id !== completion.taskId) {
      this.logger.warn({ taskId: completion.taskId }, "Dropping completion for a task that is not in flight");
      return;
    }

    let outcome: TaskOutcome;
    try {
      outcome = completion.complete();
    } catch (error) {
      outcome = failed(this.crashed(active.task, error));
    }
    this.finish(active.task, outcome);
  }

  private finish(task: Task, outcome: TaskOutcome): void {
    const durationMs = this.active ? Date.now() - this.active.startedAt : 0;
    this.active = null;

    if (outcome.status === "failed") {
      this.logger.warn(
        { taskId: task.id, kind: task.kind, code: outcome.error.code, durationMs },
        outcome.error.message
      );
      this.notify(outcome.error.message, "error");
    } else {
      this.logger.debug({ taskId: task.id, kind: task.kind, durationMs }, "Task finished");
      if (outcome.notice) {
        this.notify(outcome.notice, "info");
      }
    }

    this.emit({ type: "task_finished", task, outcome, durationMs });
  }

  private crashed(task: Task, error: unknown): DeskError {
    const deskError = toDeskError(error);
    if (deskError.code === "HANDLER_CRASHED") {
      this.logger.error({ err: error, taskId: task.id, kind: task.kind }, "Task handler crashed");
    }
    return deskError;
  }

  private buildContext(): HandlerContext {
    return {
      state: this.state,
      settings: this.state.settingsSnapshot(),
      presenter: this.presenter,
      logger: this.logger,
      now: this.clock,
      submit: (kind, params) => {
        this.submit(kind, params);
      },
    };
  }

  private isDrained(): boolean {
    return !this.active && this.queue.length === 0 && this.inbox.length === 0;
  }

  private releaseIdleWaiters(): void {
    for (const resolve of this.idleWaiters.splice(0)) {
      resolve();
    }
  }

  private notify(message: string, severity: NoticeSeverity): void {
    try {
      this.presenter.notifyUser(message, severity);
    } catch (error) {
      this.logger.error({ err: error, severity }, "Presenter failed to show a notice");
    }
  }

  private emit(event: CoordinatorEvent): void {
    for (const subscriber of this.subscribers) {
      try {
        subscriber(event);
      } catch (error) {
        this.logger.error({ err: error, event: event.type }, "Coordinator subscriber failed");
      }
    }
  }
}
