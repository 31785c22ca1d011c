// ============================================================================
// CORE TYPES - Shared across bot, storage, summary and server
// ============================================================================

// ---- Task Types ----

export type TaskStatus = "pending" | "done" | "deleted";

export type TaskPriority = "normal" | "high";

/**
 * Telegram chat ids are 52-bit integers and may be negative (groups).
 * They are kept as strings end to end.
 */
export type ChatId = string;

export interface Task {
  id: number;
  chatId: ChatId;
  description: string;
  // The message the task was created from
  rawText: string;
  dueAt: Date | null;
  priority: TaskPriority;
  status: TaskStatus;
  createdAt: Date;
}

export interface NewTask {
  chatId: ChatId;
  description: string;
  rawText: string;
  dueAt: Date | null;
  priority?: TaskPriority;
}

/**
 * Result of moving a task out of "pending".
 * - changed: the task was pending and now carries the target status
 * - unchanged: the task already carries the target status
 * - rejected: the task is in a status that cannot move to the target
 * - not_found: no such task for this chat
 */
export type TransitionResult =
  | { outcome: "changed"; task: Task }
  | { outcome: "unchanged"; task: Task }
  | { outcome: "rejected"; task: Task }
  | { outcome: "not_found" };

// ---- Digest Types ----

export interface TaskDigest {
  today: Task[];
  overdue: Task[];
  undated: Task[];
}

export interface DailyTime {
  hour: number;
  minute: number;
}

// ---- LLM Provider Config Types ----

export interface OpenAIConfig {
  baseUrl: string;
  apiKey: string;
  model: string;
}

export interface LocalConfig {
  baseUrl: string;
  model: string;
  apiKey?: string;
}

export interface BedrockConfig {
  model: string;
  region: string;
}

export type LLMProvider = "openai" | "local" | "bedrock";

export interface LLMConfig {
  provider: LLMProvider;
  openai?: OpenAIConfig;
  local?: LocalConfig;
  bedrock?: BedrockConfig;
  // Applies to every provider
  timeoutMs: number;
}

// ---- Storage Config Types ----

export interface SQLiteStorageConfig {
  type: "sqlite";
  path: string; // File path or ":memory:"
}

export interface PostgresStorageConfig {
  type: "postgres";
  connectionString: string;
  ssl?: boolean;
}

export type StorageConfig = SQLiteStorageConfig | PostgresStorageConfig;

// ---- Main Config Type ----

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface SummaryConfig {
  time: DailyTime;
}

export interface ServerConfig {
  port: number;
  // Webhook mode when set, long polling otherwise
  publicUrl?: string;
  webhookSecret?: string;
}

export interface BotConfig {
  telegramToken: string;
  timezone: string;
  llm: LLMConfig;
  storage: StorageConfig;
  summary: SummaryConfig;
  server: ServerConfig;
  logLevel: LogLevel;
}

// ---- Default Configurations ----

export const DEFAULT_TIMEZONE = "Europe/Vienna";

export const DEFAULT_LLM_CONFIG: LLMConfig = {
  provider: "openai",
  openai: {
    baseUrl: "https://openrouter.ai/api/v1",
    apiKey: "",
    model: "openrouter/auto",
  },
  local: {
    baseUrl: "http://localhost:11434/v1",
    model: "llama3.2",
  },
  bedrock: {
    model: "anthropic.claude-3-5-sonnet-20241022-v2:0",
    region: "us-east-1",
  },
  timeoutMs: 30_000,
};

export const DEFAULT_SQLITE_STORAGE_CONFIG: SQLiteStorageConfig = {
  type: "sqlite",
  path: "./data/tasks.db",
};

export const DEFAULT_SUMMARY_TIME: DailyTime = { hour: 7, minute: 0 };

export const DEFAULT_PORT = 8000;
