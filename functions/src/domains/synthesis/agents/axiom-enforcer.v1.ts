// functions/src/domains/synthesis/agents/axiom-enforcer.v1.ts
// Checks every generated fragment against the axiom it claims to satisfy.

import { createReactiveAgent } from "../../../core/agents/defineAgent";
import { isFactOfKind, propose, type AxiomCheckPayload, type FactProposal } from "../../../core/facts/types";
import { getAxiom } from "../axioms";

export const AXIOM_ENFORCER_ID = "axiom-enforcer.v1";

export function checkFragment(target: string, axiomId: string, text: string): AxiomCheckPayload {
  const axiom = getAxiom(axiomId);
  if (!axiom) {
    return { target, axiomId, applicable: false, satisfied: false, reason: "Unknown axiom" };
  }
  return { target, axiomId, ...axiom.check(text) };
}

export const axiomEnforcerAgent = createReactiveAgent(
  { name: AXIOM_ENFORCER_ID, reads: ["artifact_fragment"], produces: ["axiom_check"] },
  {
    process(input): FactProposal[] {
      if (!isFactOfKind(input, "artifact_fragment")) return [];
      const { target, axiomId, text } = input.payload;
      if (!axiomId) return [];
      return [propose("axiom_check", checkFragment(target, axiomId, text))];
    },
  }
);
