// functions/src/core/coordinator/types.ts

import type { Agent } from "../agents/contract";
import type { Roster } from "../agents/roster";
import type { CoordinatorConfig, CoordinatorConfigInput } from "../config";
import type { RunCancelledError, StallError, TimeoutError } from "../errors";
import type { Clock, FactStore } from "../facts/store";
import type { CoordinationMode, Fact, SeedPayload } from "../facts/types";
import type { VerdictAggregator } from "../verdict/aggregate";
import type { RunStatistics } from "../export/statistics";
import type { CoordinatorState } from "./states";

export type RoundReport = {
  round: number;
  /** agents dispatched, roster order */
  triggered: string[];
  committed: number;
  rejected: number;
  failed: string[];
  timedOut: string[];
  /** store version after the commit */
  version: number;
  durationMs: number;
};

export type CoordinationObservers = {
  onFactCommitted?: (fact: Fact) => void;
  onRoundCommitted?: (report: RoundReport) => void;
};

export type CoordinationInput = {
  mode: CoordinationMode;
  /**
   * Appended as `seed` facts, in order. Each seed is a JSON object; wrap raw
   * text with a domain helper such as `sourceSeed()`.
   */
  seeds: readonly SeedPayload[];
  agents: readonly Agent[] | Roster;
  config?: CoordinatorConfigInput;
  /** checked between rounds; a running round still commits */
  signal?: AbortSignal;
  clock?: Clock;
  observers?: CoordinationObservers;
  aggregator?: VerdictAggregator;
  /** synthesis only */
  target?: string;
};

type ResultBase = {
  runId: string;
  mode: CoordinationMode;
  state: CoordinatorState;
  config: CoordinatorConfig;
  /** committed dispatch rounds; a run whose seeds trigger nothing has 0 */
  rounds: number;
  /** trigger passes, including the final empty one; 1 when the seeds trigger nothing */
  evaluations: number;
  facts: readonly Fact[];
  /** left out of the replay digest */
  nondeterministicAgents: readonly string[];
  verdict: Fact<"verdict">;
  roundReports: readonly RoundReport[];
  stats: RunStatistics;
  durationMs: number;
  /** closed, read-only */
  store: FactStore;
};

export type CoordinationResult =
  | (ResultBase & { ok: true; outcome: "converged" })
  | (ResultBase & { ok: false; outcome: "stalled"; error: StallError })
  | (ResultBase & { ok: false; outcome: "timed_out"; error: TimeoutError })
  | (ResultBase & { ok: false; outcome: "cancelled"; error: RunCancelledError });

export type CoordinationRunView = {
  runId: string;
  state: CoordinatorState;
  rounds: number;
  evaluations: number;
  version: number;
  history: CoordinatorState[];
};
