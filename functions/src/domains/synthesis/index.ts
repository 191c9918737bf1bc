// functions/src/domains/synthesis/index.ts

import type { Agent } from "../../core/agents/contract";
import { axiomEnforcerAgent } from "./agents/axiom-enforcer.v1";
import { viewGeneratorAgent } from "./agents/view-generator.v1";

export { synthesisSeed, readSynthesisRequest, type SynthesisRequest } from "./seed";
export { VIEW_GENERATOR_ID, viewGeneratorAgent } from "./agents/view-generator.v1";
export { AXIOM_ENFORCER_ID, axiomEnforcerAgent, checkFragment } from "./agents/axiom-enforcer.v1";
export { getAxiom, listAxioms } from "./axioms";
export { renderViewFragments } from "./templates";

export function synthesisAgents(): Agent[] {
  return [viewGeneratorAgent, axiomEnforcerAgent];
}
