// functions/src/core/verdict/aggregate.ts
// Verdict Aggregator: terminal, pure reduction of a snapshot. Never triggers agents.

import type { CoordinatorConfig } from "../config";
import type { FactSnapshot } from "../facts/snapshot";
import type { CoordinationMode, RunOutcome, VerdictPayload } from "../facts/types";
import { aggregateForensic } from "./forensic";
import { aggregateSynthesis } from "./synthesis";

export type AggregateOptions = {
  mode: CoordinationMode;
  outcome: RunOutcome;
  config: Pick<CoordinatorConfig, "riskPrior" | "riskBands">;
  /** synthesis only: artifact target; default from the seeds */
  target?: string;
};

export type VerdictDraft = {
  payload: VerdictPayload;
  /** seeds + every contributing fact */
  dependsOn: number[];
};

export type VerdictAggregator = (snapshot: FactSnapshot, opts: AggregateOptions) => VerdictDraft;

export const aggregateVerdict: VerdictAggregator = (snapshot, opts) => {
  const seeds = snapshot.query("seed").map((f) => f.id);
  const final = opts.outcome === "converged";

  if (opts.mode === "forensic") {
    const r = aggregateForensic(snapshot, { prior: opts.config.riskPrior, bands: opts.config.riskBands });
    return {
      payload: {
        mode: "forensic",
        outcome: opts.outcome,
        final,
        label: r.label,
        score: r.probability,
        probability: r.probability,
        breakdown: r.breakdown,
      },
      dependsOn: uniqueSorted([...seeds, ...r.contributors]),
    };
  }

  const r = aggregateSynthesis(snapshot, { target: opts.target });
  return {
    payload: {
      mode: "synthesis",
      outcome: opts.outcome,
      final,
      label: r.label,
      score: r.compliance,
      compliance: r.compliance,
      assembly: r.assembly,
    },
    dependsOn: uniqueSorted([...seeds, ...r.contributors]),
  };
};

function uniqueSorted(ids: readonly number[]): number[] {
  return [...new Set(ids)].sort((a, b) => a - b);
}
