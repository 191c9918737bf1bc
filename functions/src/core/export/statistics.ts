// functions/src/core/export/statistics.ts
// Pure helpers to summarize a run's fact log and round history.

import type { RoundReport } from "../coordinator/types";
import type { Fact } from "../facts/types";
import { isFactOfKind } from "../facts/types";
import { round6 } from "../verdict/forensic";

export type RunStatistics = {
  totalFacts: number;
  byKind: Record<string, number>;
  byProducer: Record<string, number>;
  agentErrors: { total: number; byCode: Record<string, number>; byAgent: Record<string, number> };
  risk: { contributions: number; maxWeight: number; avgWeight: number };
  rounds: {
    count: number;
    dispatched: number;
    committed: number;
    rejected: number;
    /** rounds each agent was dispatched in */
    perAgent: Record<string, number>;
  };
};

function countBy<T>(items: readonly T[], key: (item: T) => string): Record<string, number> {
  return items.reduce<Record<string, number>>((acc, item) => {
    const k = key(item);
    acc[k] = (acc[k] || 0) + 1;
    return acc;
  }, {});
}

function summarizeRounds(reports: readonly RoundReport[]): RunStatistics["rounds"] {
  const perAgent: Record<string, number> = {};
  for (const r of reports) {
    for (const name of r.triggered) perAgent[name] = (perAgent[name] || 0) + 1;
  }
  return {
    count: reports.length,
    dispatched: reports.reduce((sum, r) => sum + r.triggered.length, 0),
    committed: reports.reduce((sum, r) => sum + r.committed, 0),
    rejected: reports.reduce((sum, r) => sum + r.rejected, 0),
    perAgent,
  };
}

export function computeRunStatistics(facts: readonly Fact[], reports: readonly RoundReport[] = []): RunStatistics {
  const errors = facts.filter((f): f is Fact<"agent_error"> => isFactOfKind(f, "agent_error"));
  const weights = facts
    .filter((f): f is Fact<"risk_contribution"> => isFactOfKind(f, "risk_contribution"))
    .map((f) => f.payload.weight);

  return {
    totalFacts: facts.length,
    byKind: countBy(facts, (f) => f.kind),
    byProducer: countBy(facts, (f) => f.producer),
    agentErrors: {
      total: errors.length,
      byCode: countBy(errors, (f) => f.payload.code),
      byAgent: countBy(errors, (f) => f.payload.agent),
    },
    risk: {
      contributions: weights.length,
      maxWeight: weights.length ? Math.max(...weights) : 0,
      avgWeight: weights.length ? round6(weights.reduce((a, b) => a + b, 0) / weights.length) : 0,
    },
    rounds: summarizeRounds(reports),
  };
}
