// ============================================================================
// REPLY FORMATTING
// ============================================================================
// Replies use Telegram HTML parse mode. Everything a user typed goes
// through escapeHtml.

import { Task } from "../types/index.js";
import { formatDueAt } from "../time/index.js";

export function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

/**
 * "#12 [high] Buy milk - 2025-06-02 17:00"; the tag and date only when present.
 */
export function formatTaskLine(task: Task, timezone: string): string {
  const parts = [`#${task.id}`];
  if (task.priority === "high") parts.push("[high]");
  parts.push(escapeHtml(task.description));

  const line = parts.join(" ");
  return task.dueAt ? `${line} - ${formatDueAt(task.dueAt, timezone)}` : line;
}

export function formatTaskList(tasks: Task[], timezone: string, emptyText: string): string {
  if (tasks.length === 0) return emptyText;
  return tasks.map((task) => formatTaskLine(task, timezone)).join("\n");
}
