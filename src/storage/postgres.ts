// ============================================================================
// POSTGRESQL TASK STORE
// ============================================================================
// PostgreSQL-backed store for hosted deployments with several workers.

import type { Pool } from "pg";

import { BaseTaskStore } from "./interface.js";
import {
  ChatId,
  NewTask,
  Task,
  TaskStatus,
  PostgresStorageConfig,
} from "../types/index.js";

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS tasks (
    id SERIAL PRIMARY KEY,
    chat_id TEXT NOT NULL,
    description TEXT NOT NULL,
    raw_text TEXT NOT NULL,
    due_at TIMESTAMPTZ,
    priority TEXT NOT NULL DEFAULT 'normal',
    status TEXT NOT NULL DEFAULT 'pending',
    created_at TIMESTAMPTZ NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_tasks_chat_status_due ON tasks(chat_id, status, due_at);
`;

const ORDER = "ORDER BY due_at ASC NULLS LAST, id ASC";

export class PostgresTaskStore extends BaseTaskStore {
  private pool: Pool | null = null;
  private pgConfig: PostgresStorageConfig;

  constructor(config: PostgresStorageConfig) {
    super(config);
    this.pgConfig = config;
  }

  async initialize(): Promise<void> {
    if (this.pool) return;

    // Dynamic import so the driver only loads for this backend
    const { default: pg } = await import("pg");

    const pool = new pg.Pool({
      connectionString: this.pgConfig.connectionString,
      ssl: this.pgConfig.ssl ? { rejectUnauthorized: false } : false,
    });

    await pool.query(SCHEMA);
    this.pool = pool;
  }

  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
  }

  async isReady(): Promise<boolean> {
    if (!this.pool) return false;
    try {
      await this.pool.query("SELECT 1");
      return true;
    } catch {
      return false;
    }
  }

  // ---- Task Operations ----

  protected async insertRow(task: Required<NewTask>, createdAt: Date): Promise<Task> {
    const pool = this.ensurePool();

    const result = await pool.query(
      `INSERT INTO tasks (chat_id, description, raw_text, due_at, priority, status, created_at)
       VALUES ($1, $2, $3, $4, $5, 'pending', $6)
       RETURNING *`,
      [task.chatId, task.description, task.rawText, task.dueAt, task.priority, createdAt]
    );

    return this.rowToTask(result.rows[0]);
  }

  protected async updatePendingStatus(
    chatId: ChatId,
    id: number,
    status: Exclude<TaskStatus, "pending">
  ): Promise<Task | null> {
    const pool = this.ensurePool();

    const result = await pool.query(
      `UPDATE tasks SET status = $1
       WHERE id = $2 AND chat_id = $3 AND status = 'pending'
       RETURNING *`,
      [status, id, chatId]
    );

    return result.rows.length > 0 ? this.rowToTask(result.rows[0]) : null;
  }

  async findTask(chatId: ChatId, id: number): Promise<Task | null> {
    const pool = this.ensurePool();

    const result = await pool.query("SELECT * FROM tasks WHERE id = $1 AND chat_id = $2", [id, chatId]);
    return result.rows.length > 0 ? this.rowToTask(result.rows[0]) : null;
  }

  async listPending(chatId: ChatId): Promise<Task[]> {
    const pool = this.ensurePool();

    const result = await pool.query(
      `SELECT * FROM tasks WHERE chat_id = $1 AND status = 'pending' ${ORDER}`,
      [chatId]
    );
    return this.rowsToTasks(result.rows);
  }

  async listDueBetween(chatId: ChatId, from: Date, to: Date): Promise<Task[]> {
    const pool = this.ensurePool();

    const result = await pool.query(
      `SELECT * FROM tasks
       WHERE chat_id = $1 AND status = 'pending' AND due_at >= $2 AND due_at < $3
       ${ORDER}`,
      [chatId, from, to]
    );
    return this.rowsToTasks(result.rows);
  }

  async listOverdue(chatId: ChatId, now: Date): Promise<Task[]> {
    const pool = this.ensurePool();

    const result = await pool.query(
      `SELECT * FROM tasks
       WHERE chat_id = $1 AND status = 'pending' AND due_at IS NOT NULL AND due_at < $2
       ${ORDER}`,
      [chatId, now]
    );
    return this.rowsToTasks(result.rows);
  }

  async listUndated(chatId: ChatId): Promise<Task[]> {
    const pool = this.ensurePool();

    const result = await pool.query(
      "SELECT * FROM tasks WHERE chat_id = $1 AND status = 'pending' AND due_at IS NULL ORDER BY id",
      [chatId]
    );
    return this.rowsToTasks(result.rows);
  }

  async listChatIds(): Promise<ChatId[]> {
    const pool = this.ensurePool();

    const result = await pool.query<{ chat_id: string }>(
      "SELECT DISTINCT chat_id FROM tasks ORDER BY chat_id"
    );
    return result.rows.map((row) => row.chat_id);
  }

  // ---- Private Helper Methods ----

  private ensurePool(): Pool {
    if (!this.pool) {
      throw new Error("PostgreSQL store not initialized. Call initialize() first.");
    }
    return this.pool;
  }
}
