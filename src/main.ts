// ============================================================================
// ENTRY POINT
// ============================================================================
// Wires configuration, storage, extraction, the Telegram bot, the HTTP
// server and the daily summary together.

import { ConfigError, describeConfig, loadConfig, loadEnvFile } from "./config/index.js";
import { createLogger, describeError, setLogLevel } from "./logger/index.js";
import { createTaskStore, getStorageTypeName } from "./storage/index.js";
import { createModel, LLMTaskExtractor } from "./extraction/index.js";
import {
  createBot,
  createTelegramSender,
  createWebhookHandler,
  registerCommands,
  TaskCommands,
  webhookTimeoutFor,
} from "./bot/index.js";
import { Scheduler } from "./scheduler/index.js";
import { DailySummaryJob } from "./summary/index.js";
import { createServer, WEBHOOK_PATH } from "./server/index.js";
import { BotConfig } from "./types/index.js";

const logger = createLogger("main");

function readConfig(): BotConfig {
  loadEnvFile();
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const config = readConfig();
  setLogLevel(config.logLevel);

  for (const line of describeConfig(config).split("\n")) {
    logger.info(line);
  }

  // ---- Components ----

  const store = createTaskStore(config.storage);
  await store.initialize();
  logger.info(`Storage ready: ${getStorageTypeName(config.storage)}`);

  const extractor = new LLMTaskExtractor({
    model: createModel(config.llm),
    timezone: config.timezone,
    timeoutMs: config.llm.timeoutMs,
  });

  const commands = new TaskCommands({ store, extractor, timezone: config.timezone });
  const bot = createBot({ token: config.telegramToken, commands });

  const scheduler = new Scheduler(config.timezone);
  const summary = new DailySummaryJob({
    store,
    sender: createTelegramSender(bot.api),
    timezone: config.timezone,
  });
  summary.attach(scheduler, config.summary.time);

  const { publicUrl, webhookSecret } = config.server;
  const server = createServer({
    port: config.server.port,
    store,
    timezone: config.timezone,
    webhookHandler: publicUrl
      ? createWebhookHandler(bot, {
          secretToken: webhookSecret,
          timeoutMs: webhookTimeoutFor(config.llm.timeoutMs),
        })
      : undefined,
  });

  // ---- Startup ----

  await server.start();

  try {
    await registerCommands(bot);
  } catch (error) {
    logger.warn("Could not publish the command menu", describeError(error));
  }

  if (publicUrl) {
    await bot.api.setWebhook(`${publicUrl}${WEBHOOK_PATH}`, { secret_token: webhookSecret });
    logger.info(`Webhook set to ${publicUrl}${WEBHOOK_PATH}`);
  } else {
    await bot.api.deleteWebhook();
    bot
      .start({ onStart: (info) => logger.info(`Polling as @${info.username}`) })
      .catch((error: unknown) => logger.error("Polling stopped", describeError(error)));
  }

  // ---- Shutdown ----

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info(`${signal} received, shutting down`);

    scheduler.stopAll();
    try {
      if (publicUrl) {
        await bot.api.deleteWebhook();
      } else {
        await bot.stop();
      }
      await server.stop();
    } finally {
      await store.close();
    }
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error("Shutdown failed", describeError(error));
        process.exit(1);
      });
    });
  }
}

process.on("unhandledRejection", (reason) => {
  logger.error("Unhandled rejection", describeError(reason));
});

main().catch((error: unknown) => {
  logger.error("Startup failed", describeError(error));
  process.exit(1);
});
