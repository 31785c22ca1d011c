// ============================================================================
// COMMAND HANDLERS
// ============================================================================
// Transport-independent handlers. Each returns the reply as Telegram HTML.

import { ITaskStore, TaskValidationError } from "../storage/index.js";
import { TaskExtractor } from "../extraction/index.js";
import { ChatId } from "../types/index.js";
import { dayBounds, formatDueAt } from "../time/index.js";
import { escapeHtml, formatTaskLine, formatTaskList } from "./format.js";
import { createLogger, describeError, Logger } from "../logger/index.js";

export const GENERIC_ERROR_REPLY = "Something went wrong while talking to the task store. Please try again.";

export const WELCOME_TEXT = [
  "<b>Hi! I keep your to-do list.</b>",
  "",
  "Send me any message and I will save it as a task, e.g.",
  "<i>Buy milk tomorrow at 5pm</i>",
  "",
  "Every morning I send a summary of what is due. /help lists all commands.",
].join("\n");

export const HELP_TEXT = [
  "<b>Commands</b>",
  "/today - tasks due for the rest of today",
  "/all - all pending tasks",
  "/missed - overdue tasks",
  "/general - tasks without a due date",
  "/done &lt;id&gt; - mark a task as done",
  "/delete &lt;id&gt; - delete a task",
  "",
  "Any other message is saved as a new task.",
].join("\n");

export const BOT_COMMANDS = [
  { command: "start", description: "Introduction" },
  { command: "help", description: "List commands" },
  { command: "today", description: "Tasks due today" },
  { command: "all", description: "All pending tasks" },
  { command: "missed", description: "Overdue tasks" },
  { command: "general", description: "Tasks without a due date" },
  { command: "done", description: "Mark a task as done: /done 42" },
  { command: "delete", description: "Delete a task: /delete 42" },
] as const;

/**
 * Accepts "42" or "#42". Returns null for anything else.
 */
export function parseTaskId(value: string): number | null {
  const match = value.trim().match(/^#?(\d+)$/);
  if (!match) return null;

  const id = Number(match[1]);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

export interface TaskCommandsOptions {
  store: ITaskStore;
  extractor: TaskExtractor;
  timezone: string;
  now?: () => Date;
  logger?: Logger;
}

export class TaskCommands {
  private store: ITaskStore;
  private extractor: TaskExtractor;
  private timezone: string;
  private now: () => Date;
  private logger: Logger;

  constructor(options: TaskCommandsOptions) {
    this.store = options.store;
    this.extractor = options.extractor;
    this.timezone = options.timezone;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger("commands");
  }

  start(): string {
    return WELCOME_TEXT;
  }

  help(): string {
    return HELP_TEXT;
  }

  // ---- Listing ----

  async today(chatId: ChatId): Promise<string> {
    return this.guard("today", async () => {
      const now = this.now();
      const { end } = dayBounds(now, this.timezone);
      const tasks = await this.store.listDueBetween(chatId, now, end);
      return withTitle("Due today", formatTaskList(tasks, this.timezone, "Nothing due today."));
    });
  }

  async all(chatId: ChatId): Promise<string> {
    return this.guard("all", async () => {
      const tasks = await this.store.listPending(chatId);
      return withTitle("Pending tasks", formatTaskList(tasks, this.timezone, "No pending tasks."));
    });
  }

  async missed(chatId: ChatId): Promise<string> {
    return this.guard("missed", async () => {
      const tasks = await this.store.listOverdue(chatId, this.now());
      return withTitle("Overdue tasks", formatTaskList(tasks, this.timezone, "Nothing overdue."));
    });
  }

  async general(chatId: ChatId): Promise<string> {
    return this.guard("general", async () => {
      const tasks = await this.store.listUndated(chatId);
      return withTitle("No due date", formatTaskList(tasks, this.timezone, "No undated tasks."));
    });
  }

  // ---- Status Changes ----

  async done(chatId: ChatId, arg: string): Promise<string> {
    const id = parseTaskId(arg);
    if (!arg.trim()) return "Usage: /done &lt;id&gt;, e.g. /done 42";
    if (id === null) return `Task id must be a number, e.g. /done 42 (got "${escapeHtml(arg.trim())}").`;

    return this.guard("done", async () => {
      const result = await this.store.markDone(chatId, id);
      switch (result.outcome) {
        case "changed":
          return `Done: ${formatTaskLine(result.task, this.timezone)}`;
        case "unchanged":
          return `Task #${id} is already done.`;
        case "rejected":
        case "not_found":
          return `Task #${id} not found.`;
      }
    });
  }

  async delete(chatId: ChatId, arg: string): Promise<string> {
    const id = parseTaskId(arg);
    if (!arg.trim()) return "Usage: /delete &lt;id&gt;, e.g. /delete 42";
    if (id === null) return `Task id must be a number, e.g. /delete 42 (got "${escapeHtml(arg.trim())}").`;

    return this.guard("delete", async () => {
      const result = await this.store.markDeleted(chatId, id);
      switch (result.outcome) {
        case "changed":
          return `Deleted: ${formatTaskLine(result.task, this.timezone)}`;
        case "unchanged":
          return `Task #${id} is already deleted.`;
        case "rejected":
          return `Task #${id} is already done and cannot be deleted.`;
        case "not_found":
          return `Task #${id} not found.`;
      }
    });
  }

  // ---- Task Creation ----

  async text(chatId: ChatId, rawText: string): Promise<string> {
    const text = rawText.trim();
    if (!text) return "Send me a task as text, e.g. <i>Buy milk tomorrow at 5pm</i>.";

    const extracted = await this.extractor.extract(text, this.now());

    return this.guard("create", async () => {
      const task = await this.store.insertTask({
        chatId,
        description: extracted.description,
        rawText: text,
        dueAt: extracted.dueAt,
        priority: extracted.priority,
      });

      return [
        `Saved task #${task.id}: ${escapeHtml(task.description)}`,
        `Due: ${task.dueAt ? formatDueAt(task.dueAt, this.timezone) : "no due date"}`,
        `Priority: ${task.priority}`,
      ].join("\n");
    });
  }

  // ---- Private Helper Methods ----

  private async guard(command: string, handler: () => Promise<string>): Promise<string> {
    try {
      return await handler();
    } catch (error) {
      if (error instanceof TaskValidationError) {
        return escapeHtml(error.message);
      }
      this.logger.error(`/${command} failed`, describeError(error));
      return GENERIC_ERROR_REPLY;
    }
  }
}

function withTitle(title: string, body: string): string {
  return `<b>${title}</b>\n${body}`;
}
