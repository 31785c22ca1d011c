import { vi } from "vitest";

import type { Logger } from "../src/logger/index.js";
import type { ExtractedTask, TaskExtractor } from "../src/extraction/index.js";

export function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/**
 * Extractor that returns a fixed result, or the raw text when none is given
 */
export function fixedExtractor(result?: Partial<ExtractedTask>): TaskExtractor {
  return {
    extract: async (rawText) => ({
      description: rawText.trim(),
      dueAt: null,
      priority: "normal",
      source: "model",
      ...result,
    }),
  };
}
