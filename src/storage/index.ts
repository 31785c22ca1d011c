// ============================================================================
// STORAGE MODULE EXPORTS
// ============================================================================
// Central export point for task store implementations and factory.

export type { ITaskStore, TaskStoreFactory } from "./interface.js";
export { BaseTaskStore, TaskValidationError } from "./interface.js";
export { SQLiteTaskStore } from "./sqlite.js";
export { PostgresTaskStore } from "./postgres.js";

import { ITaskStore } from "./interface.js";
import { SQLiteTaskStore } from "./sqlite.js";
import { PostgresTaskStore } from "./postgres.js";
import { StorageConfig } from "../types/index.js";

/**
 * Factory function to create the appropriate store backend
 * based on configuration.
 */
export function createTaskStore(config: StorageConfig): ITaskStore {
  switch (config.type) {
    case "sqlite":
      return new SQLiteTaskStore(config);
    case "postgres":
      return new PostgresTaskStore(config);
  }
}

/**
 * Helper to get the storage type name for display
 */
export function getStorageTypeName(config: StorageConfig): string {
  switch (config.type) {
    case "sqlite":
      return `SQLite (${config.path})`;
    case "postgres": {
      const host = config.connectionString.match(/@([^/?]+)/)?.[1] ?? "unknown host";
      return `PostgreSQL (${host})`;
    }
  }
}
