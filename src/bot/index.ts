// ============================================================================
// TELEGRAM BOT WIRING
// ============================================================================
// Maps grammy updates onto TaskCommands.

import { Bot, Context, webhookCallback } from "grammy";
import type { BotConfig as GrammyBotConfig } from "grammy";
import type { IncomingMessage, ServerResponse } from "http";

import { BOT_COMMANDS, TaskCommands } from "./commands.js";
import { createLogger, describeError, Logger } from "../logger/index.js";

export { TaskCommands, parseTaskId, GENERIC_ERROR_REPLY } from "./commands.js";
export { escapeHtml, formatTaskLine, formatTaskList } from "./format.js";
export { createTelegramSender } from "./sender.js";
export type { ChatSender } from "./sender.js";

export interface CreateBotOptions {
  token: string;
  commands: TaskCommands;
  // Passed to grammy, e.g. a different API root
  botConfig?: GrammyBotConfig<Context>;
  logger?: Logger;
}

async function replyHtml(ctx: Context, text: string): Promise<void> {
  await ctx.reply(text, { parse_mode: "HTML" });
}

export function createBot(options: CreateBotOptions): Bot {
  const { commands } = options;
  const logger = options.logger ?? createLogger("bot");
  const bot = new Bot(options.token, options.botConfig);

  bot.command("start", (ctx) => replyHtml(ctx, commands.start()));
  bot.command("help", (ctx) => replyHtml(ctx, commands.help()));

  bot.command("today", async (ctx) => replyHtml(ctx, await commands.today(String(ctx.chat.id))));
  bot.command("all", async (ctx) => replyHtml(ctx, await commands.all(String(ctx.chat.id))));
  bot.command("missed", async (ctx) => replyHtml(ctx, await commands.missed(String(ctx.chat.id))));
  bot.command("general", async (ctx) => replyHtml(ctx, await commands.general(String(ctx.chat.id))));

  bot.command("done", async (ctx) => replyHtml(ctx, await commands.done(String(ctx.chat.id), ctx.match)));
  bot.command("delete", async (ctx) => replyHtml(ctx, await commands.delete(String(ctx.chat.id), ctx.match)));

  bot.on("message:text", async (ctx) => {
    const text = ctx.message.text;
    if (text.startsWith("/")) {
      await replyHtml(ctx, "Unknown command. /help lists what I understand.");
      return;
    }
    await replyHtml(ctx, await commands.text(String(ctx.chat.id), text));
  });

  bot.catch((err) => {
    logger.error(`Update ${err.ctx.update.update_id} failed`, describeError(err.error));
  });

  return bot;
}

/**
 * Publish the command list shown in Telegram's menu
 */
export async function registerCommands(bot: Bot): Promise<void> {
  await bot.api.setMyCommands([...BOT_COMMANDS]);
}

// ---- Webhook ----

export interface WebhookHandlerOptions {
  secretToken?: string;
  // How long a delivery may run before Telegram gets its 200
  timeoutMs: number;
}

/**
 * Allowance for one update: the model call and its retry, plus the store.
 */
export function webhookTimeoutFor(llmTimeoutMs: number): number {
  return 2 * llmTimeoutMs + 10_000;
}

/**
 * Node HTTP handler for Telegram deliveries. A slow update still gets a 2xx
 * once the timeout passes and keeps running, so Telegram never redelivers it.
 */
export function createWebhookHandler(
  bot: Bot,
  options: WebhookHandlerOptions
): (req: IncomingMessage, res: ServerResponse) => Promise<void> {
  return webhookCallback(bot, "http", {
    secretToken: options.secretToken,
    timeoutMilliseconds: options.timeoutMs,
    onTimeout: "return",
  });
}
