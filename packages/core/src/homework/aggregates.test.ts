import { describe, expect, it } from "vitest";

import { computeDerivedViews, dailyVolume, summarize } from "./aggregates.js";
import { classify } from "./status-classifier.js";
import type { Homework } from "./types.js";

const NOW = new Date(2025, 2, 10, 12, 0, 0);

const ITEMS: Homework[] = [
  { code: "A", subject: "Math", content: "p.12", createDate: "8/3/2025", dueDate: "10/03/2025", status: "pending" },
  { code: "B", subject: "Math", content: "p.13", createDate: "09/03/2025", dueDate: "09/03/2025", status: "completed" },
  { code: "C", subject: "Physics", content: "Lab", createDate: "01/01/2025", dueDate: "20/03/2025", status: "pending" },
  { code: "D", subject: "Physics", content: "Notes", createDate: "10/03/2025", dueDate: "12/03/2025", status: "completed" },
];

function tagOf(code: string) {
  const item = ITEMS.find((candidate) => candidate.code === code);
  return item ? classify(item.dueDate, item.status, NOW, 3) : "pending";
}

describe("computeDerivedViews", () => {
  it("counts visible items and charts every item", () => {
    const views = computeDerivedViews({ items: ITEMS, tagOf, now: NOW, chartDays: 3 });

    expect(views.counts).toEqual({
      due_today: 1,
      overdue: 0,
      due_soon: 0,
      pending: 1,
      completed: 1,
    });
    expect(views.summary).toEqual({ total: 3, completed: 1, overdue: 0, dueToday: 1 });
    expect(views.daily).toEqual([
      { date: "08/03/2025", created: 1, due: 0 },
      { date: "09/03/2025", created: 1, due: 1 },
      { date: "10/03/2025", created: 1, due: 1 },
    ]);
  });
});

describe("dailyVolume", () => {
  it("returns an empty-count series ending today", () => {
    expect(dailyVolume([], NOW, 2)).toEqual([
      { date: "09/03/2025", created: 0, due: 0 },
      { date: "10/03/2025", created: 0, due: 0 },
    ]);
  });
});

describe("summarize", () => {
  it("totals every bucket", () => {
    expect(
      summarize({ due_today: 2, overdue: 1, due_soon: 0, pending: 4, completed: 3 })
    ).toEqual({ total: 10, completed: 3, overdue: 1, dueToday: 2 });
  });
});
