// functions/src/core/agents/contract.ts
// OFFICIAL AGENT CONTRACT (core-controlled)
//
// HARD RULES:
// - isTriggered() is pure: same snapshot → same answer, no side effects
// - run() never writes the store, it returns proposals; the coordinator commits them
// - no mutable state shared between agents
// - deterministic unless the descriptor says otherwise

import type { FactSnapshot } from "../facts/snapshot";
import type { FactProposal } from "../facts/types";

export type AgentDescriptor = {
  name: string;
  /** kinds the trigger predicate looks at */
  reads: readonly string[];
  /** kinds the agent may propose; anything else is rejected at commit */
  produces: readonly string[];
  /** false → excluded from the run digest (wall clock, randomness, ...) */
  deterministic: boolean;
};

export type AgentDescriptorInput = Omit<AgentDescriptor, "deterministic"> & {
  deterministic?: boolean;
};

export type AgentRunContext = {
  round: number;
  runId: string;
  /** aborts when the agent's time budget is used up */
  signal: AbortSignal;
};

export type AgentRunResult = readonly FactProposal[] | Promise<readonly FactProposal[]>;

export interface Agent {
  readonly descriptor: Readonly<AgentDescriptor>;
  isTriggered(snapshot: FactSnapshot): boolean;
  run(snapshot: FactSnapshot, ctx: AgentRunContext): AgentRunResult;
}

/** Producers reserved for the core itself. */
export const COORDINATOR_PRODUCER = "coordinator";
export const AGGREGATOR_PRODUCER = "verdict-aggregator";

/** Kinds no agent may declare in `produces`. */
export const CORE_ONLY_KINDS: readonly string[] = ["seed", "verdict", "agent_error"];
