// ============================================================================
// STORAGE INTERFACE CONTRACT
// ============================================================================
// This interface defines the contract that all task store backends implement.
// Every read and write is scoped to a single chat id.

import { z } from "zod";

import {
  ChatId,
  NewTask,
  Task,
  TaskStatus,
  TransitionResult,
  StorageConfig,
} from "../types/index.js";

export class TaskValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TaskValidationError";
  }
}

/**
 * Task store that all backends must implement.
 */
export interface ITaskStore {
  // ---- Lifecycle ----

  /**
   * Create tables and indexes (idempotent)
   */
  initialize(): Promise<void>;

  close(): Promise<void>;

  isReady(): Promise<boolean>;

  // ---- Task Operations ----

  /**
   * Insert a pending task. The store assigns id and createdAt.
   * @throws TaskValidationError when the description is blank
   */
  insertTask(task: NewTask): Promise<Task>;

  /**
   * Look up a task of this chat in any status
   */
  findTask(chatId: ChatId, id: number): Promise<Task | null>;

  /**
   * Pending tasks ordered by due date (undated last), then id
   */
  listPending(chatId: ChatId): Promise<Task[]>;

  /**
   * Pending tasks with from <= dueAt < to
   */
  listDueBetween(chatId: ChatId, from: Date, to: Date): Promise<Task[]>;

  /**
   * Pending tasks with dueAt < now
   */
  listOverdue(chatId: ChatId, now: Date): Promise<Task[]>;

  /**
   * Pending tasks without a due date
   */
  listUndated(chatId: ChatId): Promise<Task[]>;

  markDone(chatId: ChatId, id: number): Promise<TransitionResult>;

  markDeleted(chatId: ChatId, id: number): Promise<TransitionResult>;

  /**
   * Every chat id that ever stored a task
   */
  listChatIds(): Promise<ChatId[]>;
}

/**
 * Factory function type for creating store instances
 */
export type TaskStoreFactory = (config: StorageConfig) => ITaskStore;

// ---- Row Mapping ----

export const TaskRowSchema = z.object({
  id: z.coerce.number().int(),
  chat_id: z.string(),
  description: z.string(),
  raw_text: z.string(),
  due_at: z.union([z.string(), z.date()]).nullable(),
  priority: z.enum(["normal", "high"]),
  status: z.enum(["pending", "done", "deleted"]),
  created_at: z.union([z.string(), z.date()]),
});

/**
 * Abstract base class with the status transition rules.
 * Backends supply the atomic conditional update and the lookup.
 */
export abstract class BaseTaskStore implements ITaskStore {
  protected config: StorageConfig;

  constructor(config: StorageConfig) {
    this.config = config;
  }

  abstract initialize(): Promise<void>;
  abstract close(): Promise<void>;
  abstract isReady(): Promise<boolean>;
  abstract findTask(chatId: ChatId, id: number): Promise<Task | null>;
  abstract listPending(chatId: ChatId): Promise<Task[]>;
  abstract listDueBetween(chatId: ChatId, from: Date, to: Date): Promise<Task[]>;
  abstract listOverdue(chatId: ChatId, now: Date): Promise<Task[]>;
  abstract listUndated(chatId: ChatId): Promise<Task[]>;
  abstract listChatIds(): Promise<ChatId[]>;

  /**
   * Insert an already validated task
   */
  protected abstract insertRow(task: Required<NewTask>, createdAt: Date): Promise<Task>;

  /**
   * Single statement: set `status` where id, chat and status = 'pending' match.
   * Returns the updated task, or null when no row matched.
   */
  protected abstract updatePendingStatus(
    chatId: ChatId,
    id: number,
    status: Exclude<TaskStatus, "pending">
  ): Promise<Task | null>;

  async insertTask(task: NewTask): Promise<Task> {
    const description = task.description.trim();
    if (!description) {
      throw new TaskValidationError("Task description must not be empty");
    }
    if (!task.chatId) {
      throw new TaskValidationError("Task must belong to a chat");
    }

    return this.insertRow(
      {
        chatId: task.chatId,
        description,
        rawText: task.rawText,
        dueAt: task.dueAt,
        priority: task.priority ?? "normal",
      },
      new Date()
    );
  }

  async markDone(chatId: ChatId, id: number): Promise<TransitionResult> {
    const updated = await this.updatePendingStatus(chatId, id, "done");
    if (updated) return { outcome: "changed", task: updated };

    const current = await this.findTask(chatId, id);
    // Deleted tasks are invisible to every command
    if (!current || current.status === "deleted") return { outcome: "not_found" };
    return { outcome: "unchanged", task: current };
  }

  async markDeleted(chatId: ChatId, id: number): Promise<TransitionResult> {
    const updated = await this.updatePendingStatus(chatId, id, "deleted");
    if (updated) return { outcome: "changed", task: updated };

    const current = await this.findTask(chatId, id);
    if (!current) return { outcome: "not_found" };
    if (current.status === "deleted") return { outcome: "unchanged", task: current };
    return { outcome: "rejected", task: current };
  }

  // ---- Protected Helper Methods ----

  protected rowToTask(row: unknown): Task {
    const parsed = TaskRowSchema.parse(row);
    return {
      id: parsed.id,
      chatId: parsed.chat_id,
      description: parsed.description,
      rawText: parsed.raw_text,
      dueAt: parsed.due_at === null ? null : toDate(parsed.due_at),
      priority: parsed.priority,
      status: parsed.status,
      createdAt: toDate(parsed.created_at),
    };
  }

  protected rowsToTasks(rows: unknown[]): Task[] {
    return rows.map((row) => this.rowToTask(row));
  }
}

function toDate(value: string | Date): Date {
  return value instanceof Date ? value : new Date(value);
}

