// ============================================================================
// TASK EXTRACTION MODULE
// ============================================================================
// Turns a free-text chat message into a structured task (description, due
// date, priority) with one completion request. Never throws: any failure
// yields the raw text as an undated normal-priority task.

import { ChatBedrockConverse } from "@langchain/aws";
import { ChatOpenAI } from "@langchain/openai";
import { SystemMessage, HumanMessage } from "@langchain/core/messages";
import type { MessageContent } from "@langchain/core/messages";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { z } from "zod";

import { LLMConfig, TaskPriority } from "../types/index.js";
import { describeReferenceTime, parseDueAt } from "../time/index.js";
import { createLogger, describeError, Logger } from "../logger/index.js";

// ============================================================================
// LLM MODEL CREATION
// ============================================================================

export function createModel(llmConfig: LLMConfig): BaseChatModel {
  switch (llmConfig.provider) {
    case "bedrock":
      return new ChatBedrockConverse({
        model: llmConfig.bedrock?.model || "anthropic.claude-3-5-sonnet-20241022-v2:0",
        region: llmConfig.bedrock?.region || "us-east-1",
        maxRetries: 1,
      });
    case "openai":
      if (!llmConfig.openai) throw new Error("OpenAI config not found");
      return new ChatOpenAI({
        modelName: llmConfig.openai.model,
        openAIApiKey: llmConfig.openai.apiKey,
        configuration: { baseURL: llmConfig.openai.baseUrl },
        timeout: llmConfig.timeoutMs,
        maxRetries: 1,
        modelKwargs: { response_format: { type: "json_object" } },
      });
    case "local":
      if (!llmConfig.local) throw new Error("Local config not found");
      return new ChatOpenAI({
        modelName: llmConfig.local.model,
        openAIApiKey: llmConfig.local.apiKey || "not-needed",
        configuration: { baseURL: llmConfig.local.baseUrl },
        timeout: llmConfig.timeoutMs,
        maxRetries: 1,
      });
  }
}

// ============================================================================
// TYPES
// ============================================================================

export interface ExtractedTask {
  description: string;
  dueAt: Date | null;
  priority: TaskPriority;
  // "fallback" when the model could not be used
  source: "model" | "fallback";
}

export interface TaskExtractor {
  extract(rawText: string, referenceTime: Date): Promise<ExtractedTask>;
}

/**
 * The part of a chat model the extractor needs
 */
export type ChatInvoker = Pick<BaseChatModel, "invoke">;

export interface LLMTaskExtractorOptions {
  model: ChatInvoker;
  timezone: string;
  timeoutMs: number;
  logger?: Logger;
}

// ---- Reply Schema ----

const optionalText = z.string().optional().catch(undefined);

const ExtractionPayloadSchema = z.object({
  description: optionalText,
  // Some models answer with "title" instead
  title: optionalText,
  due_at: z.unknown().optional(),
  priority: z
    .preprocess(
      (value) => (typeof value === "string" ? value.trim().toLowerCase() : value),
      z.enum(["normal", "high"])
    )
    .optional()
    .catch(undefined),
});

// ============================================================================
// PROMPT
// ============================================================================

function getExtractionPrompt(referenceTime: Date, timezone: string): string {
  return `You convert chat messages into tasks for a personal to-do list.

Current time: ${describeReferenceTime(referenceTime, timezone)}
Timezone: ${timezone}

Respond with a single JSON object and nothing else:
{
  "description": "short imperative description of the task",
  "due_at": "YYYY-MM-DDTHH:mm in ${timezone}, or null when the message names no time",
  "priority": "normal" or "high"
}

Rules:
- Resolve relative dates ("tomorrow", "next Friday", "in 2 hours") against the current time.
- A date without a clock time is due at 09:00 local time.
- "high" only when the message signals urgency ("urgent", "asap", "important", "!!").
- Drop the date and urgency words from the description.

Examples (current time Sunday, 2025-06-01 10:00):
"Buy milk tomorrow at 5pm" -> {"description": "Buy milk", "due_at": "2025-06-02T17:00", "priority": "normal"}
"URGENT: send the invoice friday" -> {"description": "Send the invoice", "due_at": "2025-06-06T09:00", "priority": "high"}
"water the plants" -> {"description": "Water the plants", "due_at": null, "priority": "normal"}`;
}

// ============================================================================
// EXTRACTOR
// ============================================================================

export class LLMTaskExtractor implements TaskExtractor {
  private model: ChatInvoker;
  private timezone: string;
  private timeoutMs: number;
  private logger: Logger;

  constructor(options: LLMTaskExtractorOptions) {
    this.model = options.model;
    this.timezone = options.timezone;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? createLogger("extraction");
  }

  async extract(rawText: string, referenceTime: Date): Promise<ExtractedTask> {
    const text = rawText.trim();

    let content: string;
    try {
      const response = await this.model.invoke(
        [new SystemMessage(getExtractionPrompt(referenceTime, this.timezone)), new HumanMessage(text)],
        { timeout: this.timeoutMs }
      );
      content = contentText(response.content);
    } catch (error) {
      this.logger.warn("Model request failed, storing message as is", describeError(error));
      return createFallbackTask(text);
    }

    const jsonMatch = content.match(/\{[\s\S]*\}/);
    if (!jsonMatch) {
      this.logger.warn("Model reply contained no JSON object");
      return createFallbackTask(text);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(jsonMatch[0]);
    } catch (error) {
      this.logger.warn("Model reply was not valid JSON", describeError(error));
      return createFallbackTask(text);
    }

    const parsed = ExtractionPayloadSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn("Model reply had an unexpected shape");
      return createFallbackTask(text);
    }

    const payload = parsed.data;
    const description = (payload.description ?? payload.title ?? "").trim();

    return {
      description: description || text,
      dueAt: parseDueAt(payload.due_at, this.timezone),
      priority: payload.priority ?? "normal",
      source: "model",
    };
  }
}

/**
 * Plain text of a reply; providers such as Bedrock answer with content blocks
 */
function contentText(content: MessageContent): string {
  if (typeof content === "string") return content;
  return content
    .map((part) => ("text" in part && typeof part.text === "string" ? part.text : ""))
    .join("");
}

function createFallbackTask(text: string): ExtractedTask {
  return { description: text, dueAt: null, priority: "normal", source: "fallback" };
}
