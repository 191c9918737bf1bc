// functions/src/domains/forensic/agents/risk-assessor.v1.ts
// Probabilistic reasoning: turns violations (binary) and matches (counts) into
// weighted risk_contribution facts. The combination itself is the aggregator's job.

import { createReactiveAgent } from "../../../core/agents/defineAgent";
import type { Fact, FactProposal, MatchPayload, RiskContributionPayload } from "../../../core/facts/types";
import { isFactOfKind, propose } from "../../../core/facts/types";
import { round6 } from "../../../core/verdict/forensic";
import {
  AXIOMS,
  CATEGORY_WEIGHTS,
  CONFIG_SIGNATURES,
  SEVERITY_WEIGHTS,
  SIGNATURES,
  type AxiomId,
  type SignatureCategory,
} from "../signatures";

export const RISK_ASSESSOR_ID = "risk-assessor.v1";

/** upper bound for a single contribution, several occurrences never mean certainty */
const MAX_WEIGHT = 0.95;

function isAxiomId(v: string): v is AxiomId {
  return Object.prototype.hasOwnProperty.call(AXIOMS, v);
}

export function categoryOf(signature: string): SignatureCategory {
  const known = SIGNATURES.find((s) => s.id === signature);
  if (known) return known.category;
  if (Object.values(CONFIG_SIGNATURES).some((s) => s.id === signature)) return "config";
  return "general";
}

/** Category weight (or severity weight), scaled by ln(occurrences + 1): diminishing returns. */
export function matchWeight(match: MatchPayload): number {
  const category = categoryOf(match.signature);
  const base = category === "general" ? SEVERITY_WEIGHTS[match.severity] : CATEGORY_WEIGHTS[category];
  return round6(Math.min(MAX_WEIGHT, base * Math.log(match.occurrences + 1)));
}

export function assessFinding(fact: Fact): RiskContributionPayload | null {
  if (isFactOfKind(fact, "violation")) {
    const axiom = fact.payload.axiom;
    return {
      weight: SEVERITY_WEIGHTS[fact.payload.severity],
      source: "axiom",
      item: axiom,
      component: isAxiomId(axiom) ? AXIOMS[axiom].component : "general",
    };
  }
  if (isFactOfKind(fact, "match")) {
    return {
      weight: matchWeight(fact.payload),
      source: "pattern",
      item: fact.payload.signature,
      component: categoryOf(fact.payload.signature),
    };
  }
  return null;
}

export const riskAssessorAgent = createReactiveAgent(
  { name: RISK_ASSESSOR_ID, reads: ["violation", "match"], produces: ["risk_contribution"] },
  {
    process(input): FactProposal[] {
      const payload = assessFinding(input);
      if (!payload || payload.weight <= 0) return [];
      // evidence strength carries over from the finding
      return [propose("risk_contribution", payload, { confidence: input.confidence })];
    },
  }
);
