// functions/src/domains/forensic/agents/axiom-inverter.v1.ts
// Looks for contradictions, not bugs: code AND (NOT axiom) → violation.

import { createReactiveAgent } from "../../../core/agents/defineAgent";
import { isFactOfKind, propose, type FactProposal, type ViolationPayload } from "../../../core/facts/types";
import { readSourceSeed } from "../seed";
import {
  HEAVY_BODY_MARKERS,
  REFERENCE_MARKERS,
  SIDE_EFFECT_MARKERS,
  escapeRegExp,
} from "../signatures";

export const AXIOM_INVERTER_ID = "axiom-inverter.v1";

export function findAxiomViolations(code: string): ViolationPayload[] {
  const out: ViolationPayload[] = [];

  // 1) idempotent init
  for (const marker of SIDE_EFFECT_MARKERS) {
    const inInit = new RegExp(`init\\s*\\([^)]*\\)\\s*\\{[^}]*${escapeRegExp(marker)}`);
    if (inInit.test(code)) {
      out.push({
        axiom: "AXIOM_IDEMPOTENCY",
        vector: `Side-effect '${marker}' detected in init`,
        severity: "CRITICAL",
        impact: "Memory explosion under hot reload",
        remediation: `Move '${marker}' to onAppear() or Task {}`,
      });
      break;
    }
  }

  // 2) observable state
  if (code.includes("@State var") && REFERENCE_MARKERS.some((m) => code.includes(m))) {
    out.push({
      axiom: "AXIOM_OBSERVABILITY",
      vector: "Reference type used with @State (zombie state risk)",
      severity: "HIGH",
      impact: "State changes may not trigger view updates",
      remediation: "Use @StateObject for class instances",
    });
  }

  // 3) symbolic resolution
  const dlsym = /dlsym\s*\([^,]+,\s*"([^"]+)"/.exec(code);
  if (dlsym && !dlsym[1].startsWith("_$s")) {
    out.push({
      axiom: "AXIOM_SYMBOLIC",
      vector: `dlsym called with unmangled name '${dlsym[1]}'`,
      severity: "CRITICAL",
      impact: "Runtime crash, symbol not found",
      remediation: "Use the mangled name or @_cdecl for stable symbols",
    });
  }

  // 4) view purity
  for (const marker of HEAVY_BODY_MARKERS) {
    const inBody = new RegExp(`var body:\\s*some View\\s*\\{[^}]*${escapeRegExp(marker)}`);
    if (inBody.test(code)) {
      out.push({
        axiom: "AXIOM_PURITY",
        vector: `Heavy operation '${marker}' in body computation`,
        severity: "MEDIUM",
        impact: "UI stuttering and excessive recomputation",
        remediation: "Move async work to the .task {} modifier",
      });
      break;
    }
  }

  return out;
}

export const axiomInverterAgent = createReactiveAgent(
  { name: AXIOM_INVERTER_ID, reads: ["seed"], produces: ["violation"] },
  {
    process(input): FactProposal[] {
      if (!isFactOfKind(input, "seed")) return [];
      const seed = readSourceSeed(input);
      if (!seed) return [];
      return findAxiomViolations(seed.source).map((v) => propose("violation", v));
    },
  }
);
