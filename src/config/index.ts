// ============================================================================
// CONFIGURATION MANAGEMENT
// ============================================================================
// Reads the bot configuration from environment variables (optionally loaded
// from a .env file), validates it and normalizes it into a BotConfig.

import dotenv from "dotenv";
import { z } from "zod";

import {
  BotConfig,
  LLMConfig,
  LogLevel,
  StorageConfig,
  SQLiteStorageConfig,
  PostgresStorageConfig,
  DEFAULT_LLM_CONFIG,
  DEFAULT_PORT,
  DEFAULT_SQLITE_STORAGE_CONFIG,
  DEFAULT_SUMMARY_TIME,
  DEFAULT_TIMEZONE,
} from "../types/index.js";
import { formatDailyTime, isValidTimezone, parseDailyTime } from "../time/index.js";

export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(
      `Configuration validation failed:\n${problems.map((p) => `  - ${p}`).join("\n")}\n\n` +
        "Please check your .env file and environment variables."
    );
    this.name = "ConfigError";
  }
}

// ---- Environment Schema ----

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const EnvSchema = z.object({
  TELEGRAM_BOT_TOKEN: optionalString,
  OPENROUTER_API_KEY: optionalString,
  OPENROUTER_MODEL: optionalString,
  AI_PROVIDER: z.enum(["openai", "local", "bedrock"]).default("openai"),
  AI_BASE_URL: optionalString,
  AI_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_LLM_CONFIG.timeoutMs),
  AWS_REGION: optionalString,
  TIMEZONE: z.string().trim().default(DEFAULT_TIMEZONE),
  DAILY_SUMMARY_TIME: z.string().trim().default(formatDailyTime(DEFAULT_SUMMARY_TIME)),
  DATABASE_URL: optionalString,
  PUBLIC_URL: optionalString,
  PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT),
  WEBHOOK_SECRET: optionalString,
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

type Env = z.infer<typeof EnvSchema>;

// ---- .env Loading ----

/**
 * Load a .env file into process.env. Variables already set win.
 */
export function loadEnvFile(path?: string): void {
  dotenv.config(path ? { path } : undefined);
}

// ---- Config Loading ----

/**
 * Build the bot configuration from an environment map.
 * All problems are collected and reported together.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  const problems: string[] = [];

  if (!vars.TELEGRAM_BOT_TOKEN) {
    problems.push("TELEGRAM_BOT_TOKEN is required");
  }

  if (!isValidTimezone(vars.TIMEZONE)) {
    problems.push(`Invalid TIMEZONE: ${vars.TIMEZONE} (expected an IANA zone such as Europe/Vienna)`);
  }

  const summaryTime = parseDailyTime(vars.DAILY_SUMMARY_TIME);
  if (!summaryTime) {
    problems.push(`Invalid DAILY_SUMMARY_TIME: ${vars.DAILY_SUMMARY_TIME} (expected HH:mm)`);
  }

  let storage: StorageConfig = DEFAULT_SQLITE_STORAGE_CONFIG;
  try {
    storage = vars.DATABASE_URL ? parseDatabaseUrl(vars.DATABASE_URL) : DEFAULT_SQLITE_STORAGE_CONFIG;
  } catch (error) {
    problems.push(error instanceof Error ? error.message : String(error));
  }

  if (vars.PUBLIC_URL) {
    try {
      new URL(vars.PUBLIC_URL);
    } catch {
      problems.push(`Invalid PUBLIC_URL: ${vars.PUBLIC_URL} (must be a valid URL)`);
    }
  }

  const llm = buildLLMConfig(vars, problems);

  if (problems.length > 0 || !summaryTime) {
    throw new ConfigError(problems);
  }

  return {
    telegramToken: vars.TELEGRAM_BOT_TOKEN ?? "",
    timezone: vars.TIMEZONE,
    llm,
    storage,
    summary: { time: summaryTime },
    server: {
      port: vars.PORT,
      publicUrl: vars.PUBLIC_URL?.replace(/\/+$/, ""),
      webhookSecret: vars.WEBHOOK_SECRET,
    },
    logLevel: vars.LOG_LEVEL satisfies LogLevel,
  };
}

function buildLLMConfig(vars: Env, problems: string[]): LLMConfig {
  const defaults = DEFAULT_LLM_CONFIG;

  switch (vars.AI_PROVIDER) {
    case "openai":
      if (!vars.OPENROUTER_API_KEY) {
        problems.push("OPENROUTER_API_KEY is required when AI_PROVIDER is openai");
      }
      return {
        provider: "openai",
        openai: {
          baseUrl: vars.AI_BASE_URL ?? defaults.openai?.baseUrl ?? "https://openrouter.ai/api/v1",
          apiKey: vars.OPENROUTER_API_KEY ?? "",
          model: vars.OPENROUTER_MODEL ?? defaults.openai?.model ?? "openrouter/auto",
        },
        timeoutMs: vars.AI_TIMEOUT_MS,
      };
    case "local":
      return {
        provider: "local",
        local: {
          baseUrl: vars.AI_BASE_URL ?? defaults.local?.baseUrl ?? "http://localhost:11434/v1",
          model: vars.OPENROUTER_MODEL ?? defaults.local?.model ?? "llama3.2",
          apiKey: vars.OPENROUTER_API_KEY,
        },
        timeoutMs: vars.AI_TIMEOUT_MS,
      };
    case "bedrock":
      return {
        provider: "bedrock",
        bedrock: {
          model: vars.OPENROUTER_MODEL ?? defaults.bedrock?.model ?? "anthropic.claude-3-5-sonnet-20241022-v2:0",
          region: vars.AWS_REGION ?? defaults.bedrock?.region ?? "us-east-1",
        },
        timeoutMs: vars.AI_TIMEOUT_MS,
      };
  }
}

// ---- Storage Helpers ----

/**
 * Turn a DATABASE_URL into a storage config.
 * Accepts sqlite:path, sqlite://path, sqlite:///abs/path, :memory:,
 * postgres:// and postgresql:// URLs.
 */
export function parseDatabaseUrl(url: string): StorageConfig {
  const value = url.trim();

  if (value === ":memory:") {
    return createSQLiteStorageConfig(":memory:");
  }

  if (value.startsWith("sqlite:")) {
    // sqlite:///abs/path keeps its leading slash, sqlite://rel and sqlite:rel do not
    const path = value.replace(/^sqlite:(\/\/)?/, "");
    if (!path) {
      throw new Error(`Invalid DATABASE_URL: ${url} (missing SQLite path)`);
    }
    return createSQLiteStorageConfig(path);
  }

  if (value.startsWith("postgres://") || value.startsWith("postgresql://")) {
    let parsed: URL;
    try {
      parsed = new URL(value);
    } catch {
      throw new Error(`Invalid DATABASE_URL: ${url} (malformed PostgreSQL URL)`);
    }
    const sslmode = parsed.searchParams.get("sslmode");
    return createPostgresStorageConfig(value, sslmode === "require" || sslmode === "verify-full");
  }

  throw new Error(`Invalid DATABASE_URL: ${url} (expected sqlite:, postgres:// or postgresql://)`);
}

export function createSQLiteStorageConfig(path?: string): SQLiteStorageConfig {
  return {
    type: "sqlite",
    path: path || DEFAULT_SQLITE_STORAGE_CONFIG.path,
  };
}

export function createPostgresStorageConfig(connectionString: string, ssl = false): PostgresStorageConfig {
  return {
    type: "postgres",
    connectionString,
    ssl,
  };
}

// ---- Display Helpers ----

function maskConnectionString(value: string): string {
  return value.replace(/\/\/([^:@/]+):[^@]+@/, "//$1:***@");
}

/**
 * Get a human-readable description of the config, without secrets
 */
export function describeConfig(config: BotConfig): string {
  const lines: string[] = [];

  lines.push(`LLM Provider: ${config.llm.provider}`);

  switch (config.llm.provider) {
    case "openai":
      lines.push(`  Base URL: ${config.llm.openai?.baseUrl || "not set"}`);
      lines.push(`  Model: ${config.llm.openai?.model || "not set"}`);
      lines.push(`  API Key: ${config.llm.openai?.apiKey ? "***configured***" : "not set"}`);
      break;
    case "local":
      lines.push(`  Base URL: ${config.llm.local?.baseUrl || "not set"}`);
      lines.push(`  Model: ${config.llm.local?.model || "not set"}`);
      break;
    case "bedrock":
      lines.push(`  Model: ${config.llm.bedrock?.model || "default"}`);
      lines.push(`  Region: ${config.llm.bedrock?.region || "default"}`);
      break;
  }
  lines.push(`  Timeout: ${config.llm.timeoutMs}ms`);

  lines.push(`Storage: ${config.storage.type}`);
  switch (config.storage.type) {
    case "sqlite":
      lines.push(`  Database: ${config.storage.path}`);
      break;
    case "postgres":
      lines.push(`  URL: ${maskConnectionString(config.storage.connectionString)}`);
      lines.push(`  SSL: ${config.storage.ssl ? "enabled" : "disabled"}`);
      break;
  }

  lines.push(`Timezone: ${config.timezone}`);
  lines.push(`Daily summary: ${formatDailyTime(config.summary.time)}`);
  lines.push(
    config.server.publicUrl
      ? `Transport: webhook (${config.server.publicUrl}, port ${config.server.port})`
      : `Transport: long polling (health on port ${config.server.port})`
  );

  return lines.join("\n");
}
