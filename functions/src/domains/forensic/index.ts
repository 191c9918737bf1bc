// functions/src/domains/forensic/index.ts

import type { Agent } from "../../core/agents/contract";
import { axiomInverterAgent } from "./agents/axiom-inverter.v1";
import { patternRecognizerAgent } from "./agents/pattern-recognizer.v1";
import { riskAssessorAgent } from "./agents/risk-assessor.v1";

export { sourceSeed, readSourceSeed } from "./seed";
export { AXIOM_INVERTER_ID, axiomInverterAgent, findAxiomViolations } from "./agents/axiom-inverter.v1";
export { PATTERN_RECOGNIZER_ID, patternRecognizerAgent, scanSignatures, checkLinkerConfig } from "./agents/pattern-recognizer.v1";
export { RISK_ASSESSOR_ID, riskAssessorAgent, assessFinding, matchWeight } from "./agents/risk-assessor.v1";

/** Detectors first, then the assessor (commit order). */
export function forensicAgents(): Agent[] {
  return [axiomInverterAgent, patternRecognizerAgent, riskAssessorAgent];
}
