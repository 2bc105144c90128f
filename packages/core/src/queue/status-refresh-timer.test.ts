import { describe, expect, it } from "vitest";

import { DeskState } from "../homework/desk-state.js";
import type { Homework } from "../homework/types.js";
import { createTestLogger } from "../test-utils/fakes.js";
import { StatusRefreshTimer } from "./status-refresh-timer.js";
import type { TaskKind, TaskParamsMap } from "./tasks.js";

const HOUR = 60 * 60 * 1000;

const ITEM: Homework = {
  code: "M1",
  subject: "Math",
  content: "Ex 4",
  createDate: "01/03/2025",
  dueDate: "12/03/2025",
  status: "pending",
};

function setup(start: Date) {
  let now = start;
  const submitted: { kind: TaskKind; params: unknown }[] = [];
  const state = new DeskState({ clock: () => now });
  const timer = new StatusRefreshTimer({
    coordinator: {
      submit<K extends TaskKind>(kind: K, params: TaskParamsMap[K]) {
        submitted.push({ kind, params });
      },
    },
    state,
    logger: createTestLogger(),
    intervalMs: HOUR,
    clock: () => now,
  });
  return {
    state,
    timer,
    submitted,
    advanceTo(next: Date) {
      now = next;
    },
  };
}

describe("StatusRefreshTimer", () => {
  it("waits for a loaded, non-empty desk", () => {
    const start = new Date(2025, 2, 10, 9, 0);
    const { state, timer, submitted } = setup(start);
    expect(timer.check()).toBe(false);

    state.applyLoad([], null, start);
    expect(timer.check()).toBe(false);
    expect(submitted).toEqual([]);
  });

  it("asks for a recompute once the interval has passed", () => {
    const start = new Date(2025, 2, 10, 9, 0);
    const { state, timer, submitted, advanceTo } = setup(start);
    state.applyLoad([ITEM], null, start);

    advanceTo(new Date(2025, 2, 10, 9, 30));
    expect(timer.check()).toBe(false);

    advanceTo(new Date(2025, 2, 10, 10, 0));
    expect(timer.check()).toBe(true);
    expect(submitted).toEqual([{ kind: "refresh", params: { recomputeStatuses: true } }]);
  });

  it("does not resubmit until the pending refresh has run", () => {
    const start = new Date(2025, 2, 10, 9, 0);
    const { state, timer, submitted, advanceTo } = setup(start);
    state.applyLoad([ITEM], null, start);

    const later = new Date(2025, 2, 10, 11, 0);
    advanceTo(later);
    expect(timer.check()).toBe(true);
    expect(timer.check()).toBe(false);

    state.recomputeStatuses(later);
    expect(timer.check()).toBe(false);
    expect(submitted).toHaveLength(1);
  });

  it("recomputes after midnight even within the interval", () => {
    const start = new Date(2025, 2, 10, 23, 50);
    const { state, timer, advanceTo } = setup(start);
    state.applyLoad([ITEM], null, start);

    advanceTo(new Date(2025, 2, 11, 0, 5));
    expect(timer.check()).toBe(true);
  });
});
