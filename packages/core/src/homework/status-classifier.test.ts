import { describe, expect, it } from "vitest";

import { classify } from "./status-classifier.js";

// Noon local time on 10 March 2025.
const NOW = new Date(2025, 2, 10, 12, 0, 0);

describe("classify", () => {
  it("tags by days remaining", () => {
    expect(classify("09/03/2025", "pending", NOW, 3)).toBe("overdue");
    expect(classify("10/03/2025", "pending", NOW, 3)).toBe("due_today");
    expect(classify("11/03/2025", "pending", NOW, 3)).toBe("due_soon");
    expect(classify("13/03/2025", "pending", NOW, 3)).toBe("due_soon");
    expect(classify("14/03/2025", "pending", NOW, 3)).toBe("pending");
  });

  it("lets an explicit completed status win over any date", () => {
    expect(classify("01/01/2020", "completed", NOW, 3)).toBe("completed");
    expect(classify("not a date", "completed", NOW, 3)).toBe("completed");
  });

  it("reads an unparseable due date as pending", () => {
    expect(classify("someday", "pending", NOW, 3)).toBe("pending");
  });

  it("treats a zero reminder window as today-only", () => {
    expect(classify("11/03/2025", "pending", NOW, 0)).toBe("pending");
    expect(classify("10/03/2025", "pending", NOW, 0)).toBe("due_today");
  });

  it("is pure", () => {
    const first = classify("12/03/2025", "pending", NOW, 3);
    const second = classify("12/03/2025", "pending", NOW, 3);
    expect(first).toBe(second);
  });
});
