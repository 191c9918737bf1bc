// functions/src/core/export/runExport.ts
// Read-only projection of a finished run (report / HTTP response). Never computes facts.

import type { CoordinationResult } from "../coordinator/types";
import type { Fact, VerdictPayload } from "../facts/types";
import { stableHash } from "../utils/hash";
import type { RunStatistics } from "./statistics";

export const RUN_EXPORT_VERSION = 1;

export type ExportedFact = {
  id: number;
  kind: string;
  producer: string;
  payload: unknown;
  confidence: number;
  createdAt: number;
  dependsOn: number[];
  round: number;
};

export type RunExport = {
  version: typeof RUN_EXPORT_VERSION;
  runId: string;
  mode: CoordinationResult["mode"];
  outcome: CoordinationResult["outcome"];
  ok: boolean;
  rounds: number;
  evaluations: number;
  durationMs: number;
  verdict: { id: number; payload: VerdictPayload; dependsOn: number[] };
  statistics: RunStatistics;
  /** sha256 over the deterministic part of the log (no timestamps, no nondeterministic producers) */
  digest: string;
  error: Record<string, unknown> | null;
  facts?: ExportedFact[];
};

function exportFact(f: Fact): ExportedFact {
  return {
    id: f.id,
    kind: f.kind,
    producer: f.producer,
    payload: f.payload,
    confidence: f.confidence,
    createdAt: f.createdAt,
    dependsOn: [...f.dependsOn],
    round: f.round,
  };
}

/**
 * Replay digest. Two runs with identical seeds and a deterministic roster
 * produce the same digest; producers listed in `exclude` are left out.
 */
export function computeRunDigest(facts: readonly Fact[], exclude: ReadonlySet<string> = new Set()): string {
  const core = facts
    .filter((f) => !exclude.has(f.producer))
    .map((f) => ({
      kind: f.kind,
      producer: f.producer,
      payload: f.payload,
      confidence: f.confidence,
      dependsOn: f.dependsOn,
      round: f.round,
    }));
  return stableHash(core);
}

export function toRunExport(
  result: CoordinationResult,
  opts: { includeFacts?: boolean } = {}
): RunExport {
  const includeFacts = opts.includeFacts ?? true;
  return {
    version: RUN_EXPORT_VERSION,
    runId: result.runId,
    mode: result.mode,
    outcome: result.outcome,
    ok: result.ok,
    rounds: result.rounds,
    evaluations: result.evaluations,
    durationMs: result.durationMs,
    verdict: {
      id: result.verdict.id,
      payload: result.verdict.payload,
      dependsOn: [...result.verdict.dependsOn],
    },
    statistics: result.stats,
    digest: computeRunDigest(result.facts, new Set(result.nondeterministicAgents)),
    error: result.ok ? null : result.error.toJSON(),
    ...(includeFacts ? { facts: result.facts.map(exportFact) } : {}),
  };
}
