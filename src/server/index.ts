// ============================================================================
// SERVER ENTRY POINT
// ============================================================================
// HTTP server: Telegram webhook deliveries on one path, tRPC for the rest.

import http from "http";
import { AddressInfo } from "net";
import { createHTTPHandler } from "@trpc/server/adapters/standalone";

import { appRouter } from "./router.js";
import { TRPCContext, TransportMode } from "./trpc.js";
import { ITaskStore } from "../storage/index.js";
import { createLogger, Logger } from "../logger/index.js";

export { appRouter } from "./router.js";
export type { AppRouter } from "./router.js";
export type { TRPCContext, TransportMode } from "./trpc.js";

export const WEBHOOK_PATH = "/telegram/webhook";

export type RequestHandler = (req: http.IncomingMessage, res: http.ServerResponse) => unknown;

// ============================================================================
// SERVER OPTIONS
// ============================================================================

export interface ServerOptions {
  port: number;
  host?: string;
  store: ITaskStore;
  timezone: string;
  // Present in webhook mode
  webhookHandler?: RequestHandler;
  logger?: Logger;
}

// ============================================================================
// CREATE SERVER
// ============================================================================

export interface BotServer {
  start(): Promise<void>;
  stop(): Promise<void>;
  getPort(): number;
}

export function createServer(options: ServerOptions): BotServer {
  const logger = options.logger ?? createLogger("server");
  const host = options.host ?? "0.0.0.0";
  const mode: TransportMode = options.webhookHandler ? "webhook" : "polling";

  const createContext = (): TRPCContext => ({
    store: options.store,
    mode,
    timezone: options.timezone,
  });

  const trpcHandler = createHTTPHandler({
    router: appRouter,
    createContext,
  });

  const webhookHandler = options.webhookHandler;

  const server = http.createServer((req, res) => {
    const path = (req.url ?? "/").split("?")[0];

    if (webhookHandler && path === WEBHOOK_PATH) {
      if (req.method !== "POST") {
        res.writeHead(405, { Allow: "POST" }).end();
        return;
      }
      Promise.resolve(webhookHandler(req, res)).catch((error: unknown) => {
        logger.error("Webhook delivery failed", error);
        if (!res.headersSent) res.writeHead(500).end();
      });
      return;
    }

    void trpcHandler(req, res);
  });

  return {
    async start() {
      await new Promise<void>((resolve, reject) => {
        server.once("error", reject);
        server.listen(options.port, host, () => {
          server.off("error", reject);
          resolve();
        });
      });
      logger.info(`Listening on http://${host}:${getBoundPort(server)} (${mode})`);
    },

    async stop() {
      if (!server.listening) return;
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
      logger.info("Server stopped");
    },

    getPort() {
      return server.listening ? getBoundPort(server) : options.port;
    },
  };
}

function getBoundPort(server: http.Server): number {
  const address: string | AddressInfo | null = server.address();
  return address && typeof address === "object" ? address.port : 0;
}
