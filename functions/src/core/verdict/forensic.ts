// functions/src/core/verdict/forensic.ts
// Forensic reduction: risk_contribution facts → one failure probability.
//
// Noisy-OR: p = 1 - (1 - prior) * Π (1 - weight_i * confidence_i)
// Bounded in [0,1]; every factor > 0 strictly raises p (monotonic).

import type { RiskBands } from "../config";
import type { FactSnapshot } from "../facts/snapshot";
import type { ForensicBreakdown, RiskFactor, RiskLabel } from "../facts/types";

const CRITICAL_FACTORS = 5;
const DEFAULT_COMPONENT = "general";

export function round6(n: number): number {
  return Math.round(n * 1e6) / 1e6;
}

function clamp01(n: number): number {
  if (!Number.isFinite(n)) return 0;
  return Math.min(1, Math.max(0, n));
}

/** OR-gate over independent probabilities. */
export function combineRisk(contributions: readonly number[], prior = 0): number {
  let survive = 1 - clamp01(prior);
  for (const c of contributions) survive *= 1 - clamp01(c);
  return clamp01(round6(1 - survive));
}

export function riskLabel(probability: number, bands: RiskBands): RiskLabel {
  if (probability < bands.low) return "LOW";
  if (probability < bands.moderate) return "MODERATE";
  return "HIGH";
}

export function collectRiskFactors(snapshot: FactSnapshot): RiskFactor[] {
  return snapshot.query("risk_contribution").map((f) => ({
    factId: f.id,
    producer: f.producer,
    item: f.payload.item,
    weight: f.payload.weight,
    confidence: f.confidence,
    contribution: round6(clamp01(f.payload.weight * f.confidence)),
    component: f.payload.component?.trim() || DEFAULT_COMPONENT,
  }));
}

export function aggregateForensic(
  snapshot: FactSnapshot,
  opts: { prior: number; bands: RiskBands }
): { probability: number; label: RiskLabel; breakdown: ForensicBreakdown; contributors: number[] } {
  const factors = collectRiskFactors(snapshot);

  const probability = combineRisk(
    factors.map((f) => f.contribution),
    opts.prior
  );

  // fault tree: OR-gate per component
  const grouped = new Map<string, number[]>();
  for (const f of factors) {
    const list = grouped.get(f.component) ?? [];
    list.push(f.contribution);
    grouped.set(f.component, list);
  }
  const components: Record<string, number> = {};
  for (const name of [...grouped.keys()].sort()) {
    components[name] = combineRisk(grouped.get(name) ?? []);
  }

  const critical = [...factors]
    .sort((a, b) => b.contribution - a.contribution || a.factId - b.factId)
    .slice(0, CRITICAL_FACTORS);

  return {
    probability,
    label: riskLabel(probability, opts.bands),
    breakdown: { prior: opts.prior, factors, components, critical },
    contributors: factors.map((f) => f.factId),
  };
}
