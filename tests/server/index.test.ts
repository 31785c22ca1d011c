import { describe, it, expect, afterEach, vi } from "vitest";
import type http from "http";

import { createServer, WEBHOOK_PATH } from "../../src/server/index.js";
import type { BotServer, RequestHandler } from "../../src/server/index.js";
import { SQLiteTaskStore } from "../../src/storage/index.js";
import { silentLogger } from "../helpers.js";

let server: BotServer | undefined;
let store: SQLiteTaskStore | undefined;

async function start(webhookHandler?: RequestHandler): Promise<string> {
  store = new SQLiteTaskStore({ type: "sqlite", path: ":memory:" });
  await store.initialize();
  server = createServer({
    port: 0,
    host: "127.0.0.1",
    store,
    timezone: "Europe/Vienna",
    webhookHandler,
    logger: silentLogger(),
  });
  await server.start();
  return `http://127.0.0.1:${server.getPort()}`;
}

function okHandler() {
  return vi.fn((_req: http.IncomingMessage, res: http.ServerResponse) => {
    res.writeHead(200).end();
  });
}

afterEach(async () => {
  await server?.stop();
  await store?.close();
  server = undefined;
  store = undefined;
});

describe("createServer", () => {
  it("serves the health query over HTTP", async () => {
    const url = await start();

    const response = await fetch(`${url}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      result: { data: { status: "ok", storageReady: true, mode: "polling", timezone: "Europe/Vienna" } },
    });
  });

  it("reports webhook mode when a handler is mounted", async () => {
    const url = await start(okHandler());

    const response = await fetch(`${url}/health`);

    expect(await response.json()).toEqual({
      result: { data: { status: "ok", storageReady: true, mode: "webhook", timezone: "Europe/Vienna" } },
    });
  });

  it("passes POSTs on the webhook path to the handler", async () => {
    const handler = okHandler();
    const url = await start(handler);

    const response = await fetch(`${url}${WEBHOOK_PATH}`, { method: "POST", body: "{}" });

    expect(response.status).toBe(200);
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it("refuses other methods on the webhook path", async () => {
    const handler = okHandler();
    const url = await start(handler);

    const response = await fetch(`${url}${WEBHOOK_PATH}`);

    expect(response.status).toBe(405);
    expect(response.headers.get("allow")).toBe("POST");
    expect(handler).not.toHaveBeenCalled();
  });

  it("answers 500 when the handler fails", async () => {
    const url = await start(vi.fn().mockRejectedValue(new Error("boom")));

    const response = await fetch(`${url}${WEBHOOK_PATH}`, { method: "POST", body: "{}" });

    expect(response.status).toBe(500);
  });

  it("reports the bound port", async () => {
    await start();

    expect(server?.getPort()).toBeGreaterThan(0);
  });
});
