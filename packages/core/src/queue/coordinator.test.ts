import { afterEach, describe, expect, it } from "vitest";

import { ValidationError } from "../errors.js";
import { DeskState } from "../homework/desk-state.js";
import { createTestLogger, RecordingPresenter } from "../test-utils/fakes.js";
import { TaskCoordinator, type CoordinatorEvent } from "./coordinator.js";
import {
  failed,
  succeeded,
  suspend,
  type TaskHandlerTable,
} from "./tasks.js";

const NOW = new Date(2025, 2, 10, 12, 0, 0);

function handlerTable(overrides: Partial<TaskHandlerTable> = {}): TaskHandlerTable {
  const ok = () => succeeded();
  return {
    load: ok,
    save: ok,
    add: ok,
    refresh: ok,
    updateDerivedViews: ok,
    query: ok,
    delete: ok,
    clearAll: ok,
    markCompleted: ok,
    updateSettings: ok,
    ...overrides,
  };
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("TaskCoordinator", () => {
  let coordinator: TaskCoordinator | null = null;

  function createCoordinator(handlers: TaskHandlerTable) {
    const presenter = new RecordingPresenter();
    const events: CoordinatorEvent[] = [];
    const created = new TaskCoordinator({
      handlers,
      state: new DeskState({ clock: () => NOW }),
      presenter,
      logger: createTestLogger(),
      tickIntervalMs: 1,
      clock: () => NOW,
    });
    created.subscribe((event) => events.push(event));
    coordinator = created;
    return { coordinator: created, presenter, events };
  }

  afterEach(() => {
    coordinator?.stop();
    coordinator = null;
  });

  it("runs one task at a time in submission order", async () => {
    const { coordinator, events } = createCoordinator(
      handlerTable({
        save: () => suspend(() => delay(20), () => succeeded()),
        refresh: () => suspend(() => delay(5), () => succeeded()),
      })
    );

    coordinator.submit("save", {});
    coordinator.submit("refresh", {});
    coordinator.submit("updateDerivedViews", {});
    expect(coordinator.queueDepth()).toBe(3);

    coordinator.start();
    await coordinator.whenIdle();

    const lifecycle = events
      .filter((event) => event.type !== "task_submitted")
      .map((event) => `${event.type}:${event.task.kind}`);
    expect(lifecycle).toEqual([
      "task_started:save",
      "task_finished:save",
      "task_started:refresh",
      "task_finished:refresh",
      "task_started:updateDerivedViews",
      "task_finished:updateDerivedViews",
    ]);
  });

  it("reports the kind in flight while a task is suspended", async () => {
    let release: () => void = () => {};
    const { coordinator } = createCoordinator(
      handlerTable({
        load: () =>
          suspend(
            () =>
              new Promise<void>((resolve) => {
                release = () => resolve();
              }),
            () => succeeded()
          ),
      })
    );

    coordinator.submit("load", {});
    coordinator.submit("refresh", {});
    coordinator.tick();

    expect(coordinator.currentTaskKind()).toBe("load");
    expect(coordinator.isBusy()).toBe(true);
    expect(coordinator.queueDepth()).toBe(1);

    coordinator.start();
    await delay(5);
    expect(coordinator.currentTaskKind()).toBe("load");

    release();
    await coordinator.whenIdle();
    expect(coordinator.currentTaskKind()).toBeNull();
    expect(coordinator.queueDepth()).toBe(0);
  });

  it("keeps going after a failed task and notifies the user", async () => {
    const ran: string[] = [];
    const { coordinator, presenter } = createCoordinator(
      handlerTable({
        add: () => failed(new ValidationError("Homework code 'X' already exists")),
        query: () => {
          ran.push("query");
          return succeeded();
        },
      })
    );

    coordinator.submitRequest({
      kind: "add",
      params: { code: "X", subject: "s", content: "c", createDate: "1/1/2025", dueDate: "2/1/2025" },
    });
    coordinator.submitRequest({ kind: "query", params: { date: "1/1/2025", field: "due" } });
    coordinator.start();
    await coordinator.whenIdle();

    expect(presenter.notices).toEqual([
      { message: "Homework code 'X' already exists", severity: "error" },
    ]);
    expect(ran).toEqual(["query"]);
  });

  it("turns a thrown handler error into a crashed outcome", async () => {
    const { coordinator, presenter, events } = createCoordinator(
      handlerTable({
        clearAll: () => {
          throw new Error("boom");
        },
      })
    );

    coordinator.submit("clearAll", {});
    coordinator.submit("save", {});
    coordinator.start();
    await coordinator.whenIdle();

    const finished = events.flatMap((event) =>
      event.type === "task_finished" ? [event] : []
    );
    expect(finished.map((event) => event.task.kind)).toEqual(["clearAll", "save"]);
    const outcome = finished[0].outcome;
    expect(outcome.status === "failed" && outcome.error.code).toBe("HANDLER_CRASHED");
    expect(presenter.errors()).toEqual(["boom"]);
  });

  it("hands rejected background work to the completion", async () => {
    const { coordinator, presenter } = createCoordinator(
      handlerTable({
        save: () =>
          suspend(
            () => Promise.reject(new Error("disk full")),
            (result) =>
              result.ok ? succeeded() : failed(new ValidationError("save rejected"))
          ),
      })
    );

    coordinator.submit("save", {});
    coordinator.start();
    await coordinator.whenIdle();

    expect(presenter.errors()).toEqual(["save rejected"]);
  });

  it("queues cascaded submissions behind earlier ones", async () => {
    const order: string[] = [];
    const { coordinator } = createCoordinator(
      handlerTable({
        markCompleted: (_params, context) => {
          order.push("markCompleted");
          context.submit("refresh", {});
          return succeeded("done");
        },
        refresh: () => {
          order.push("refresh");
          return succeeded();
        },
        query: () => {
          order.push("query");
          return succeeded();
        },
      })
    );

    coordinator.submit("markCompleted", { code: "A" });
    coordinator.submit("query", { date: "10/03/2025", field: "due" });
    coordinator.start();
    await coordinator.whenIdle();

    expect(order).toEqual(["markCompleted", "query", "refresh"]);
  });

  it("shows a success notice as info", async () => {
    const { coordinator, presenter } = createCoordinator(
      handlerTable({ clearAll: () => succeeded("All homework cleared") })
    );

    coordinator.submit("clearAll", {});
    coordinator.start();
    await coordinator.whenIdle();

    expect(presenter.notices).toEqual([{ message: "All homework cleared", severity: "info" }]);
  });

  it("keeps one task in flight while another caller submits mid-task", async () => {
    let release: () => void = () => {};
    const { coordinator, events } = createCoordinator(
      handlerTable({
        load: () =>
          suspend(
            () =>
              new Promise<void>((resolve) => {
                release = () => resolve();
              }),
            () => succeeded()
          ),
        save: () => suspend(() => delay(2), () => succeeded()),
      })
    );
    const otherCaller = () => {
      coordinator.submit("save", {});
      coordinator.submit("refresh", {});
    };

    const samples: { busy: boolean; kind: string | null }[] = [];
    coordinator.submit("load", {});
    for (let step = 0; step < 50; step++) {
      coordinator.tick();
      samples.push({ busy: coordinator.isBusy(), kind: coordinator.currentTaskKind() });
      if (step === 2) otherCaller();
      if (step === 4) release();
      if (step > 4 && !coordinator.isBusy() && coordinator.queueDepth() === 0) break;
      await delay(1);
    }

    expect(samples.slice(0, 5)).toEqual(Array.from({ length: 5 }, () => ({ busy: true, kind: "load" })));
    expect(samples.every((sample) => sample.busy === (sample.kind !== null))).toBe(true);
    expect(samples.some((sample) => sample.kind === "save")).toBe(true);

    const lifecycle = events.filter((event) => event.type !== "task_submitted");
    lifecycle.forEach((event, index) => {
      expect(event.type).toBe(index % 2 === 0 ? "task_started" : "task_finished");
      if (index % 2 === 1) {
        expect(event.task.id).toBe(lifecycle[index - 1]?.task.id);
      }
    });
    expect(lifecycle.map((event) => `${event.type}:${event.task.kind}`)).toEqual([
      "task_started:load",
      "task_finished:load",
      "task_started:save",
      "task_finished:save",
      "task_started:refresh",
      "task_finished:refresh",
    ]);
  });

  it("keeps going when the presenter throws on a notice", async () => {
    const { coordinator, presenter, events } = createCoordinator(
      handlerTable({ clearAll: () => succeeded("All homework cleared") })
    );
    presenter.notifyUser = () => {
      throw new Error("window closed");
    };

    coordinator.submit("clearAll", {});
    coordinator.submit("save", {});
    expect(() => {
      coordinator.tick();
      coordinator.tick();
    }).not.toThrow();

    await coordinator.whenIdle();
    expect(
      events.filter((event) => event.type === "task_finished").map((event) => event.task.kind)
    ).toEqual(["clearAll", "save"]);
  });

  it("discards queued work on stop and ignores later submissions", async () => {
    const { coordinator, events } = createCoordinator(handlerTable());
    coordinator.submit("save", {});
    coordinator.submit("refresh", {});

    coordinator.stop();
    coordinator.submit("load", {});

    expect(coordinator.queueDepth()).toBe(0);
    await coordinator.whenIdle();
    expect(events.filter((event) => event.type === "task_started")).toHaveLength(0);
  });
});
