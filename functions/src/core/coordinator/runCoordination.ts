// functions/src/core/coordinator/runCoordination.ts
// Scheduler/Coordinator: seeds → rounds (snapshot, trigger, dispatch, commit) → verdict.
//
// A round is one consistent iteration: all triggered agents see the same frozen
// snapshot; commits go in roster order, then proposal order.

import { AGGREGATOR_PRODUCER, COORDINATOR_PRODUCER, type Agent } from "../agents/contract";
import { createRoster, isRoster, type Roster } from "../agents/roster";
import { resolveCoordinatorConfig, type CoordinatorConfig } from "../config";
import {
  ConfigError,
  RunCancelledError,
  StallError,
  TimeoutError,
  ValidationError,
  describeError,
} from "../errors";
import type { FactSnapshot } from "../facts/snapshot";
import { createFactStore, type FactStore } from "../facts/store";
import type { AgentErrorPayload, Fact, FactProposal, RunOutcome } from "../facts/types";
import { isFactOfKind } from "../facts/types";
import { isJsonValue, isPlainObject } from "../facts/validateFact";
import { logger } from "../logging/logger";
import { stableHash } from "../utils/hash";
import { computeRunStatistics } from "../export/statistics";
import { aggregateVerdict } from "../verdict/aggregate";
import { dispatchAgent, type DispatchOutcome } from "./dispatch";
import { createCoordinatorStateMachine, CoordinatorStates } from "./states";
import type {
  CoordinationInput,
  CoordinationResult,
  CoordinationRunView,
  RoundReport,
} from "./types";

type TriggerCacheEntry = { version: number; triggered: boolean };

export type CoordinationRun = {
  readonly runId: string;
  readonly store: FactStore;
  readonly config: CoordinatorConfig;
  view(): CoordinationRunView;
  /** idempotent: a second call returns the same promise */
  execute(): Promise<CoordinationResult>;
};

function validateInput(input: CoordinationInput): Roster {
  if (input.mode !== "forensic" && input.mode !== "synthesis") {
    throw new ConfigError("mode", `unknown mode '${String(input.mode)}'`);
  }
  if (!Array.isArray(input.seeds) || input.seeds.length === 0) {
    throw new ConfigError("seeds", "at least one seed payload is required");
  }
  input.seeds.forEach((seed, i) => {
    if (!isPlainObject(seed) || !isJsonValue(seed)) {
      throw new ConfigError(`seeds[${i}]`, "seed must be a JSON object");
    }
  });
  return isRoster(input.agents) ? input.agents : createRoster(input.agents);
}

export function computeRunId(input: Pick<CoordinationInput, "mode" | "seeds">, roster: Roster): string {
  return `run_${stableHash({ mode: input.mode, seeds: input.seeds, agents: roster.names }).slice(0, 16)}`;
}

/** Watch set for trigger pruning: what the agent reads plus what it writes itself. */
function watchedKinds(agent: Agent): string[] {
  return [...agent.descriptor.reads, ...agent.descriptor.produces];
}

/**
 * Builds a run. Throws ConfigError for invalid config, seeds or roster;
 * everything after construction is reported through the result.
 */
export function createCoordinationRun(input: CoordinationInput): CoordinationRun {
  const roster = validateInput(input);
  const config = resolveCoordinatorConfig(input.config);
  const clock = input.clock ?? Date.now;
  const aggregate = input.aggregator ?? aggregateVerdict;
  const observers = input.observers ?? {};
  const runId = computeRunId(input, roster);

  const store = createFactStore({ clock });
  const machine = createCoordinatorStateMachine({ clock });

  let rounds = 0;
  let evaluations = 0;
  let execution: Promise<CoordinationResult> | null = null;

  const roundReports: RoundReport[] = [];
  const triggerCache = new Map<string, TriggerCacheEntry>();

  const notify = <T>(hook: ((arg: T) => void) | undefined, arg: T, name: string) => {
    if (!hook) return;
    try {
      hook(arg);
    } catch (e) {
      logger.warn("coordinator_observer_failed", { runId, observer: name, error: describeError(e) });
    }
  };

  const commit = (fact: Fact) => {
    notify(observers.onFactCommitted, fact, "onFactCommitted");
    return fact;
  };

  const recordAgentError = (payload: AgentErrorPayload, round: number): Fact =>
    commit(store.append({ kind: "agent_error", producer: COORDINATOR_PRODUCER, payload, round }));

  function evaluateTrigger(agent: Agent, snapshot: FactSnapshot): boolean {
    const name = agent.descriptor.name;
    const cached = triggerCache.get(name);
    if (cached && agent.descriptor.deterministic) {
      const changed = store.kindsChangedSince(cached.version);
      if (!watchedKinds(agent).some((k) => changed.has(k))) return cached.triggered;
    }

    try {
      const triggered = agent.isTriggered(snapshot) === true;
      triggerCache.set(name, { version: snapshot.version, triggered });
      return triggered;
    } catch (e) {
      // not cached: evaluated again next pass
      logger.warn("coordinator_trigger_failed", { runId, agent: name, error: describeError(e) });
      recordAgentError(
        { agent: name, code: "agent_failure", message: `isTriggered: ${describeError(e)}` },
        rounds
      );
      return false;
    }
  }

  function commitProposal(agent: Agent, proposal: FactProposal, round: number): boolean {
    const name = agent.descriptor.name;
    if (!agent.descriptor.produces.includes(proposal.kind)) {
      logger.warn("coordinator_proposal_rejected", { runId, agent: name, round, kind: proposal.kind, reason: "kind_not_declared" });
      recordAgentError(
        { agent: name, code: "invalid_proposal", kind: proposal.kind, message: `kind '${proposal.kind}' not in produces` },
        round
      );
      return false;
    }

    try {
      commit(
        store.append({
          kind: proposal.kind,
          producer: name,
          payload: proposal.payload,
          confidence: proposal.confidence,
          dependsOn: proposal.dependsOn,
          round,
        })
      );
      return true;
    } catch (e) {
      if (!(e instanceof ValidationError)) throw e;
      logger.warn("coordinator_proposal_rejected", { runId, agent: name, round, kind: proposal.kind, reason: e.reason });
      recordAgentError({ agent: name, code: "invalid_proposal", kind: proposal.kind, message: e.message }, round);
      return false;
    }
  }

  function commitOutcome(agent: Agent, outcome: DispatchOutcome, round: number, report: RoundReport): void {
    const name = agent.descriptor.name;
    switch (outcome.status) {
      case "ok":
        for (const p of outcome.proposals) {
          if (commitProposal(agent, p, round)) report.committed++;
          else report.rejected++;
        }
        return;
      case "failed":
        logger.warn("coordinator_agent_failed", { runId, agent: name, round, error: outcome.error.message });
        report.failed.push(name);
        recordAgentError({ agent: name, code: "agent_failure", message: describeError(outcome.error.cause) }, round);
        return;
      case "timed_out":
        logger.warn("coordinator_agent_timeout", { runId, agent: name, round, budgetMs: outcome.budgetMs });
        report.timedOut.push(name);
        recordAgentError(
          { agent: name, code: "agent_timeout", message: `no result within ${outcome.budgetMs}ms`, budgetMs: outcome.budgetMs },
          round
        );
        return;
      case "invalid_output":
        logger.warn("coordinator_agent_invalid_output", { runId, agent: name, round, message: outcome.message });
        report.failed.push(name);
        recordAgentError({ agent: name, code: "invalid_output", message: outcome.message }, round);
        return;
    }
  }

  function finish(outcome: RunOutcome, startedAt: number, triggeredAgents: string[]): CoordinationResult {
    const snapshot = store.snapshot();
    const draft = aggregate(snapshot, { mode: input.mode, outcome, config, target: input.target });

    const appendVerdict = (): Fact => {
      try {
        return commit(
          store.append({
            kind: "verdict",
            producer: AGGREGATOR_PRODUCER,
            payload: draft.payload,
            dependsOn: draft.dependsOn,
            round: rounds,
          })
        );
      } finally {
        // exactly one verdict, then read-only
        store.close();
      }
    };
    const verdict = appendVerdict();
    if (!isFactOfKind(verdict, "verdict")) throw new Error("verdict append returned a different kind");

    const facts = store.log();
    const durationMs = clock() - startedAt;
    const base = {
      runId,
      mode: input.mode,
      state: machine.view().state,
      config,
      rounds,
      evaluations,
      facts,
      nondeterministicAgents: roster.agents.filter((a) => !a.descriptor.deterministic).map((a) => a.descriptor.name),
      verdict,
      roundReports: [...roundReports],
      stats: computeRunStatistics(facts, roundReports),
      durationMs,
      store,
    };

    logger.info("coordinator_run_end", {
      runId,
      outcome,
      rounds,
      evaluations,
      facts: facts.length,
      label: verdict.payload.label,
      score: verdict.payload.score,
      durationMs,
    });

    switch (outcome) {
      case "converged":
        return { ...base, ok: true, outcome };
      case "stalled":
        return {
          ...base,
          ok: false,
          outcome,
          // fact count of the last evaluated snapshot (before the partial verdict)
          error: new StallError({ rounds, factCount: facts.length - 1, triggeredAgents }),
        };
      case "timed_out":
        return {
          ...base,
          ok: false,
          outcome,
          error: new TimeoutError({ budgetMs: config.runTimeoutMs, elapsedMs: durationMs, factCount: facts.length - 1 }),
        };
      case "cancelled":
        return {
          ...base,
          ok: false,
          outcome,
          error: new RunCancelledError({ rounds, reason: describeAbortReason(input.signal) }),
        };
    }
  }

  async function loop(): Promise<CoordinationResult> {
    const startedAt = clock();

    logger.info("coordinator_run_start", {
      runId,
      mode: input.mode,
      agents: roster.names,
      seeds: input.seeds.length,
      maxRounds: config.maxRounds,
      runTimeoutMs: config.runTimeoutMs,
      agentTimeoutMs: config.agentTimeoutMs,
    });

    // INIT
    for (const payload of input.seeds) {
      commit(store.append({ kind: "seed", producer: COORDINATOR_PRODUCER, payload, round: 0 }));
    }
    machine.advance("seeded");

    for (;;) {
      // ROUND_PENDING
      if (input.signal?.aborted) {
        machine.advance("cancel");
        return finish("cancelled", startedAt, []);
      }

      const elapsed = clock() - startedAt;
      if (elapsed >= config.runTimeoutMs) {
        machine.advance("time_out");
        return finish("timed_out", startedAt, []);
      }

      const snapshot = store.snapshot();
      evaluations++;
      const triggered = roster.agents.filter((a) => evaluateTrigger(a, snapshot));

      if (!triggered.length) {
        machine.advance("converge");
        return finish("converged", startedAt, []);
      }

      if (rounds >= config.maxRounds) {
        machine.advance("stall");
        return finish(
          "stalled",
          startedAt,
          triggered.map((a) => a.descriptor.name)
        );
      }

      // DISPATCHING
      machine.advance("dispatch");
      const round = rounds + 1;
      const remaining = config.runTimeoutMs - elapsed;
      const budgetMs = Math.min(config.agentTimeoutMs ?? Infinity, remaining);
      const roundStartedAt = clock();

      const outcomes = await Promise.all(
        triggered.map((agent) => dispatchAgent(agent, snapshot, { round, runId, budgetMs }))
      );

      // COMMITTING
      machine.advance("commit");
      const report: RoundReport = {
        round,
        triggered: triggered.map((a) => a.descriptor.name),
        committed: 0,
        rejected: 0,
        failed: [],
        timedOut: [],
        version: 0,
        durationMs: 0,
      };
      triggered.forEach((agent, i) => commitOutcome(agent, outcomes[i], round, report));
      rounds = round;
      report.version = store.version;
      report.durationMs = clock() - roundStartedAt;
      roundReports.push(report);

      logger.info("coordinator_round_committed", {
        runId,
        round,
        triggered: report.triggered,
        committed: report.committed,
        rejected: report.rejected,
        version: report.version,
      });
      notify(observers.onRoundCommitted, report, "onRoundCommitted");

      machine.advance("next_round");
    }
  }

  return {
    runId,
    store,
    config,

    view() {
      const v = machine.view();
      return {
        runId,
        state: v.state,
        rounds,
        evaluations,
        version: store.version,
        history: v.context.history,
      };
    },

    execute() {
      if (!execution) {
        if (machine.view().state !== CoordinatorStates.INIT) {
          throw new Error(`run ${runId} already started`);
        }
        execution = loop();
      }
      return execution;
    },
  };
}

function describeAbortReason(signal: AbortSignal | undefined): string | undefined {
  if (!signal?.aborted) return undefined;
  const reason: unknown = signal.reason;
  if (reason === undefined) return undefined;
  return describeError(reason);
}

/** Convenience: construct + execute. ConfigError is thrown, every other outcome returned. */
export async function runCoordination(input: CoordinationInput): Promise<CoordinationResult> {
  return createCoordinationRun(input).execute();
}
