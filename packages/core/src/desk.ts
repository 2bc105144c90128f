import type { Logger } from "pino";

import type { DeskConfig } from "./config.js";
import { DeskState } from "./homework/desk-state.js";
import type { DeskPresenter } from "./homework/types.js";
import { HomeworkDocumentStore, type DocumentSink, type DocumentSource } from "./pipeline/document-store.js";
import { TaskCoordinator, type CoordinatorSubscriber } from "./queue/coordinator.js";
import { createTaskHandlers } from "./queue/handlers.js";
import { StatusRefreshTimer } from "./queue/status-refresh-timer.js";
import type { Task, TaskKind, TaskParamsMap } from "./queue/tasks.js";

export type HomeworkDeskOptions = {
  config: Pick<
    DeskConfig,
    | "documentPath"
    | "tickIntervalMs"
    | "statusRefreshIntervalMs"
    | "statusCheckIntervalMs"
    | "batchSize"
    | "channelCapacity"
    | "eagerBatches"
    | "dateCacheCapacity"
  >;
  presenter: DeskPresenter;
  logger: Logger;
  /** Defaults to the JSON file at `config.documentPath`. */
  documents?: DocumentSource & DocumentSink;
  clock?: () => Date;
};

/**
 * Wires the shared state, the task coordinator and the status refresh timer
 * around one homework document.
 */
export class HomeworkDesk {
  readonly state: DeskState;
  private readonly coordinator: TaskCoordinator;
  private readonly refreshTimer: StatusRefreshTimer;
  private readonly logger: Logger;
  private started = false;

  constructor(options: HomeworkDeskOptions) {
    const { config, presenter } = options;
    const clock = options.clock ?? (() => new Date());
    this.logger = options.logger.child({ module: "desk" });

    this.state = new DeskState({ clock, dateCacheCapacity: config.dateCacheCapacity });
    this.coordinator = new TaskCoordinator({
      handlers: createTaskHandlers({
        documents: options.documents ?? new HomeworkDocumentStore(config.documentPath),
        pipeline: {
          batchSize: config.batchSize,
          channelCapacity: config.channelCapacity,
          eagerBatches: config.eagerBatches,
        },
        logger: options.logger,
      }),
      state: this.state,
      presenter,
      logger: options.logger.child({ module: "coordinator" }),
      tickIntervalMs: config.tickIntervalMs,
      clock,
    });
    this.refreshTimer = new StatusRefreshTimer({
      coordinator: this.coordinator,
      state: this.state,
      logger: options.logger.child({ module: "status-refresh" }),
      intervalMs: config.statusRefreshIntervalMs,
      checkIntervalMs: config.statusCheckIntervalMs,
      clock,
    });
  }

  /** Queues the initial load, then starts ticking. */
  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    this.coordinator.submit("load", {});
    this.coordinator.start();
    this.refreshTimer.start();
    this.logger.debug("Homework desk started");
  }

  stop(): void {
    this.refreshTimer.stop();
    this.coordinator.stop();
  }

  submit<K extends TaskKind>(kind: K, params: TaskParamsMap[K]): Task<K> {
    return this.coordinator.submit(kind, params);
  }

  queueDepth(): number {
    return this.coordinator.queueDepth();
  }

  currentTaskKind(): TaskKind | null {
    return this.coordinator.currentTaskKind();
  }

  whenIdle(): Promise<void> {
    return this.coordinator.whenIdle();
  }

  subscribe(subscriber: CoordinatorSubscriber): () => void {
    return this.coordinator.subscribe(subscriber);
  }
}
