// functions/src/index.ts
import dotenv from "dotenv";
import { onRequest } from "firebase-functions/v2/https";

import { logger } from "./core/logging/logger";
import { createCoordinationHandler } from "./entry/httpHandler";

// BLACKBOARD_* limits may come from functions/.env
dotenv.config();

const coordinationHandler = createCoordinationHandler({ logger });

export const coordinate = onRequest(async (req, res) => {
  await coordinationHandler(req, res);
});

export { runCoordination, createCoordinationRun } from "./core/coordinator/runCoordination";
export { createFactStore } from "./core/facts/store";
export { defineAgent, createReactiveAgent } from "./core/agents/defineAgent";
export { createRoster } from "./core/agents/roster";
export { toRunExport } from "./core/export/runExport";
export { resolveCoordinatorConfig, loadCoordinatorConfig } from "./core/config";
export * from "./core/errors";
export type { Agent, AgentDescriptor, AgentRunContext } from "./core/agents/contract";
export type { CoordinationInput, CoordinationResult } from "./core/coordinator/types";
export type { Fact, FactProposal, FactKind } from "./core/facts/types";
