import { describe, it, expect } from "vitest";

import { escapeHtml, formatTaskLine } from "../../src/bot/format.js";
import type { Task } from "../../src/types/index.js";

const base: Task = {
  id: 12,
  chatId: "100",
  description: "Buy milk",
  rawText: "Buy milk tomorrow",
  dueAt: new Date("2025-06-02T15:00:00Z"),
  priority: "normal",
  status: "pending",
  createdAt: new Date("2025-06-01T08:00:00Z"),
};

describe("formatTaskLine", () => {
  it("shows id, description and local due time", () => {
    expect(formatTaskLine(base, "Europe/Vienna")).toBe("#12 Buy milk - 2025-06-02 17:00");
  });

  it("tags high priority and omits a missing due date", () => {
    expect(formatTaskLine({ ...base, priority: "high", dueAt: null }, "Europe/Vienna")).toBe("#12 [high] Buy milk");
  });
});

describe("escapeHtml", () => {
  it("escapes the characters Telegram HTML reserves", () => {
    expect(escapeHtml("a < b && c > d")).toBe("a &lt; b &amp;&amp; c &gt; d");
  });
});
