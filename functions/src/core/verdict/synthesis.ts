// functions/src/core/verdict/synthesis.ts
// Synthesis reduction: artifact_fragment facts → one ordered artifact + compliance score.

import type { FactSnapshot } from "../facts/snapshot";
import type { ComplianceLabel, Fact, SynthesisAssembly } from "../facts/types";
import { round6 } from "./forensic";

function pickString(v: unknown): string | null {
  return typeof v === "string" && v.trim() ? v.trim() : null;
}

/** Target named by the seeds (`target` or `name`), else the first fragment's target. */
export function resolveSynthesisTarget(snapshot: FactSnapshot, explicit?: string): string | null {
  const fromOption = pickString(explicit);
  if (fromOption) return fromOption;

  for (const seed of snapshot.query("seed")) {
    const t = pickString(seed.payload.target) ?? pickString(seed.payload.name);
    if (t) return t;
  }

  const first = snapshot.query("artifact_fragment")[0];
  return first ? first.payload.target : null;
}

/**
 * One fragment per ordering key. Competing candidates are all kept in the log;
 * here the higher confidence wins, then the older fact.
 */
export function chooseFragments(fragments: ReadonlyArray<Fact<"artifact_fragment">>): {
  chosen: Array<Fact<"artifact_fragment">>;
  conflicts: SynthesisAssembly["conflicts"];
} {
  const byOrder = new Map<number, Array<Fact<"artifact_fragment">>>();
  for (const f of fragments) {
    const list = byOrder.get(f.payload.order) ?? [];
    list.push(f);
    byOrder.set(f.payload.order, list);
  }

  const chosen: Array<Fact<"artifact_fragment">> = [];
  const conflicts: SynthesisAssembly["conflicts"] = [];

  for (const order of [...byOrder.keys()].sort((a, b) => a - b)) {
    const candidates = [...(byOrder.get(order) ?? [])].sort((a, b) => b.confidence - a.confidence || a.id - b.id);
    if (!candidates.length) continue;
    chosen.push(candidates[0]);
    if (candidates.length > 1) {
      conflicts.push({
        order,
        candidates: candidates.map((c) => c.id).sort((a, b) => a - b),
        chosen: candidates[0].id,
      });
    }
  }

  return { chosen, conflicts };
}

/** Checks for the target that no later check supersedes via dependsOn. */
export function currentChecks(snapshot: FactSnapshot, target: string): Array<Fact<"axiom_check">> {
  const all = snapshot.query("axiom_check").filter((c) => c.payload.target === target);
  const superseded = new Set<number>();
  for (const c of all) for (const dep of c.dependsOn) superseded.add(dep);
  return all.filter((c) => !superseded.has(c.id));
}

export function complianceLabel(hasArtifact: boolean, compliance: number): ComplianceLabel {
  if (!hasArtifact) return "NO_ARTIFACT";
  if (compliance >= 1) return "COMPLIANT";
  if (compliance > 0) return "PARTIAL";
  return "NON_COMPLIANT";
}

export function aggregateSynthesis(
  snapshot: FactSnapshot,
  opts: { target?: string } = {}
): { compliance: number; label: ComplianceLabel; assembly: SynthesisAssembly; contributors: number[] } {
  const target = resolveSynthesisTarget(snapshot, opts.target) ?? "";

  const fragments = snapshot.query("artifact_fragment").filter((f) => f.payload.target === target);
  const { chosen, conflicts } = chooseFragments(fragments);

  const checks = currentChecks(snapshot, target);
  const applicable = checks.filter((c) => c.payload.applicable);
  const satisfied = applicable.filter((c) => c.payload.satisfied);

  const compliance = applicable.length ? round6(satisfied.length / applicable.length) : 0;

  return {
    compliance,
    label: complianceLabel(chosen.length > 0, compliance),
    assembly: {
      target,
      artifact: chosen.map((f) => f.payload.text).join("\n"),
      fragmentIds: chosen.map((f) => f.id),
      conflicts,
      satisfied: satisfied.length,
      applicable: applicable.length,
      failedAxioms: applicable
        .filter((c) => !c.payload.satisfied)
        .map((c) => c.payload.axiomId)
        .sort(),
    },
    contributors: [...chosen.map((f) => f.id), ...checks.map((c) => c.id)],
  };
}
