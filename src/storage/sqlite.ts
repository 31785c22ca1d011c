// ============================================================================
// SQLITE TASK STORE
// ============================================================================
// SQLite-backed store for single-host deployments. Instants are stored as
// ISO-8601 UTC text, which sorts chronologically as plain strings.

import { mkdirSync } from "fs";
import { dirname } from "path";
import type Database from "better-sqlite3";

import { BaseTaskStore } from "./interface.js";
import {
  ChatId,
  NewTask,
  Task,
  TaskStatus,
  SQLiteStorageConfig,
} from "../types/index.js";

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS tasks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    chat_id TEXT NOT NULL,
    description TEXT NOT NULL,
    raw_text TEXT NOT NULL,
    due_at TEXT,
    priority TEXT NOT NULL DEFAULT 'normal',
    status TEXT NOT NULL DEFAULT 'pending',
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_tasks_chat_status_due ON tasks(chat_id, status, due_at);
`;

// Undated last, then by id
const ORDER = "ORDER BY due_at IS NULL, due_at, id";

export class SQLiteTaskStore extends BaseTaskStore {
  private db: Database.Database | null = null;
  private dbPath: string;

  constructor(config: SQLiteStorageConfig) {
    super(config);
    this.dbPath = config.path;
  }

  async initialize(): Promise<void> {
    if (this.db) return;

    // Dynamic import so the driver only loads for this backend
    const { default: SQLite } = await import("better-sqlite3");

    if (this.dbPath !== ":memory:") {
      mkdirSync(dirname(this.dbPath), { recursive: true });
    }

    const db = new SQLite(this.dbPath);
    db.pragma("journal_mode = WAL");
    db.exec(SCHEMA);
    this.db = db;
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  async isReady(): Promise<boolean> {
    if (!this.db) return false;
    try {
      this.db.prepare("SELECT 1").get();
      return true;
    } catch {
      return false;
    }
  }

  // ---- Task Operations ----

  protected async insertRow(task: Required<NewTask>, createdAt: Date): Promise<Task> {
    const db = this.ensureDb();

    const row = db
      .prepare(
        `INSERT INTO tasks (chat_id, description, raw_text, due_at, priority, status, created_at)
         VALUES (?, ?, ?, ?, ?, 'pending', ?)
         RETURNING *`
      )
      .get(
        task.chatId,
        task.description,
        task.rawText,
        task.dueAt ? task.dueAt.toISOString() : null,
        task.priority,
        createdAt.toISOString()
      );

    return this.rowToTask(row);
  }

  protected async updatePendingStatus(
    chatId: ChatId,
    id: number,
    status: Exclude<TaskStatus, "pending">
  ): Promise<Task | null> {
    const db = this.ensureDb();

    const row = db
      .prepare(
        `UPDATE tasks SET status = ?
         WHERE id = ? AND chat_id = ? AND status = 'pending'
         RETURNING *`
      )
      .get(status, id, chatId);

    return row === undefined ? null : this.rowToTask(row);
  }

  async findTask(chatId: ChatId, id: number): Promise<Task | null> {
    const db = this.ensureDb();

    const row = db.prepare("SELECT * FROM tasks WHERE id = ? AND chat_id = ?").get(id, chatId);
    return row === undefined ? null : this.rowToTask(row);
  }

  async listPending(chatId: ChatId): Promise<Task[]> {
    const db = this.ensureDb();

    const rows = db
      .prepare(`SELECT * FROM tasks WHERE chat_id = ? AND status = 'pending' ${ORDER}`)
      .all(chatId);
    return this.rowsToTasks(rows);
  }

  async listDueBetween(chatId: ChatId, from: Date, to: Date): Promise<Task[]> {
    const db = this.ensureDb();

    const rows = db
      .prepare(
        `SELECT * FROM tasks
         WHERE chat_id = ? AND status = 'pending' AND due_at >= ? AND due_at < ?
         ${ORDER}`
      )
      .all(chatId, from.toISOString(), to.toISOString());
    return this.rowsToTasks(rows);
  }

  async listOverdue(chatId: ChatId, now: Date): Promise<Task[]> {
    const db = this.ensureDb();

    const rows = db
      .prepare(
        `SELECT * FROM tasks
         WHERE chat_id = ? AND status = 'pending' AND due_at IS NOT NULL AND due_at < ?
         ${ORDER}`
      )
      .all(chatId, now.toISOString());
    return this.rowsToTasks(rows);
  }

  async listUndated(chatId: ChatId): Promise<Task[]> {
    const db = this.ensureDb();

    const rows = db
      .prepare("SELECT * FROM tasks WHERE chat_id = ? AND status = 'pending' AND due_at IS NULL ORDER BY id")
      .all(chatId);
    return this.rowsToTasks(rows);
  }

  async listChatIds(): Promise<ChatId[]> {
    const db = this.ensureDb();

    const rows = db.prepare("SELECT DISTINCT chat_id FROM tasks ORDER BY chat_id").pluck().all();
    return rows.filter((value): value is string => typeof value === "string");
  }

  // ---- Private Helper Methods ----

  private ensureDb(): Database.Database {
    if (!this.db) {
      throw new Error("SQLite store not initialized. Call initialize() first.");
    }
    return this.db;
  }
}
