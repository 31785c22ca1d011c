// ============================================================================
// tRPC SETUP
// ============================================================================
// Base tRPC configuration for the operational endpoints.

import { initTRPC } from "@trpc/server";

import { ITaskStore } from "../storage/index.js";

// ---- Context ----

export type TransportMode = "webhook" | "polling";

export interface TRPCContext {
  store: ITaskStore;
  mode: TransportMode;
  timezone: string;
}

// ---- tRPC Instance ----

const t = initTRPC.context<TRPCContext>().create();

// ---- Exports ----

export const router = t.router;
export const publicProcedure = t.procedure;
