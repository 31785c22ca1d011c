import { describe, it, expect } from "vitest";

import { appRouter } from "../../src/server/index.js";
import { SQLiteTaskStore } from "../../src/storage/index.js";

describe("health", () => {
  it("reports a ready store", async () => {
    const store = new SQLiteTaskStore({ type: "sqlite", path: ":memory:" });
    await store.initialize();
    const caller = appRouter.createCaller({ store, mode: "polling", timezone: "Europe/Vienna" });

    expect(await caller.health()).toEqual({
      status: "ok",
      storageReady: true,
      mode: "polling",
      timezone: "Europe/Vienna",
    });

    await store.close();
  });

  it("reports a store that is not ready as degraded", async () => {
    const store = new SQLiteTaskStore({ type: "sqlite", path: ":memory:" });
    const caller = appRouter.createCaller({ store, mode: "webhook", timezone: "UTC" });

    expect(await caller.health()).toEqual({
      status: "degraded",
      storageReady: false,
      mode: "webhook",
      timezone: "UTC",
    });
  });
});
