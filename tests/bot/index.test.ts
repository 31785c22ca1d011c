import { describe, it, expect, afterEach, vi } from "vitest";

import { createBot, createWebhookHandler, TaskCommands, webhookTimeoutFor } from "../../src/bot/index.js";
import { createServer, WEBHOOK_PATH } from "../../src/server/index.js";
import type { BotServer } from "../../src/server/index.js";
import { SQLiteTaskStore } from "../../src/storage/index.js";
import type { TaskExtractor } from "../../src/extraction/index.js";
import { startFakeTelegram } from "../fake-telegram.js";
import type { FakeTelegram } from "../fake-telegram.js";
import { fixedExtractor, silentLogger } from "../helpers.js";

const TIMEZONE = "Europe/Vienna";
const NOW = new Date("2025-06-01T08:00:00Z");

interface Harness {
  url: string;
  store: SQLiteTaskStore;
  telegram: FakeTelegram;
  server: BotServer;
}

let harness: Harness | undefined;

async function startBot(options: {
  extractor?: TaskExtractor;
  timeoutMs?: number;
  secretToken?: string;
} = {}): Promise<Harness> {
  const telegram = await startFakeTelegram();
  const store = new SQLiteTaskStore({ type: "sqlite", path: ":memory:" });
  await store.initialize();

  const commands = new TaskCommands({
    store,
    extractor: options.extractor ?? fixedExtractor(),
    timezone: TIMEZONE,
    now: () => NOW,
    logger: silentLogger(),
  });
  const bot = createBot({
    token: "test-token",
    commands,
    botConfig: { client: { apiRoot: telegram.apiRoot } },
    logger: silentLogger(),
  });

  const server = createServer({
    port: 0,
    host: "127.0.0.1",
    store,
    timezone: TIMEZONE,
    webhookHandler: createWebhookHandler(bot, {
      secretToken: options.secretToken,
      timeoutMs: options.timeoutMs ?? 5000,
    }),
    logger: silentLogger(),
  });
  await server.start();

  harness = { url: `http://127.0.0.1:${server.getPort()}`, store, telegram, server };
  return harness;
}

let nextUpdateId = 1;

function textUpdate(text: string) {
  const id = nextUpdateId++;
  const command = text.startsWith("/") ? text.split(" ")[0] : undefined;
  return {
    update_id: id,
    message: {
      message_id: id,
      date: 1748764800,
      chat: { id: 100, type: "private", first_name: "Ann" },
      from: { id: 100, is_bot: false, first_name: "Ann" },
      text,
      entities: command ? [{ type: "bot_command", offset: 0, length: command.length }] : undefined,
    },
  };
}

function deliver(target: Harness, text: string, headers: Record<string, string> = {}): Promise<Response> {
  return fetch(`${target.url}${WEBHOOK_PATH}`, {
    method: "POST",
    headers: { "Content-Type": "application/json", ...headers },
    body: JSON.stringify(textUpdate(text)),
  });
}

afterEach(async () => {
  if (!harness) return;
  await harness.server.stop();
  await harness.telegram.close();
  await harness.store.close();
  harness = undefined;
});

describe("webhook deliveries", () => {
  it("stores a task from a text message and replies in HTML", async () => {
    const app = await startBot();

    const response = await deliver(app, "Buy milk");

    expect(response.status).toBe(200);
    expect((await app.store.listPending("100")).map((t) => t.description)).toEqual(["Buy milk"]);
    expect(app.telegram.calls).toHaveLength(1);
    expect(app.telegram.calls[0]).toMatchObject({
      method: "sendMessage",
      payload: {
        chat_id: 100,
        text: "Saved task #1: Buy milk\nDue: no due date\nPriority: normal",
        parse_mode: "HTML",
      },
    });
  });

  it("routes commands to their handlers", async () => {
    const app = await startBot();
    await deliver(app, "Buy milk");

    await deliver(app, "/done 1");

    expect(app.telegram.calls[1]?.payload.text).toBe("Done: #1 Buy milk");
    expect((await app.store.findTask("100", 1))?.status).toBe("done");
  });

  it("answers unknown commands with a hint", async () => {
    const app = await startBot();

    await deliver(app, "/unknown");

    expect(app.telegram.calls[0]?.payload.text).toBe("Unknown command. /help lists what I understand.");
    expect(await app.store.listPending("100")).toEqual([]);
  });

  it("acknowledges a slow update once and stores it once", async () => {
    const slowExtractor: TaskExtractor = {
      extract: async (rawText) => {
        await new Promise((resolve) => setTimeout(resolve, 300));
        return { description: rawText, dueAt: null, priority: "normal", source: "model" };
      },
    };
    const app = await startBot({ extractor: slowExtractor, timeoutMs: 50 });

    const response = await deliver(app, "Buy milk");

    expect(response.status).toBe(200);
    await vi.waitFor(() => expect(app.telegram.calls).toHaveLength(1));
    expect(await app.store.listPending("100")).toHaveLength(1);
  });

  it("rejects deliveries without the secret token", async () => {
    const app = await startBot({ secretToken: "test-secret" });

    const rejected = await deliver(app, "Buy milk");
    const accepted = await deliver(app, "Buy bread", { "X-Telegram-Bot-Api-Secret-Token": "test-secret" });

    expect(rejected.status).toBe(401);
    expect(accepted.status).toBe(200);
    expect((await app.store.listPending("100")).map((t) => t.description)).toEqual(["Buy bread"]);
  });
});

describe("webhookTimeoutFor", () => {
  it("covers a model call, its retry and the store", () => {
    expect(webhookTimeoutFor(30_000)).toBe(70_000);
  });
});
