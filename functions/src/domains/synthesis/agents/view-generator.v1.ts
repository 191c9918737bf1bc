// functions/src/domains/synthesis/agents/view-generator.v1.ts
// Constructive counterpart of the detectors: writes code that satisfies the axioms.

import { createReactiveAgent } from "../../../core/agents/defineAgent";
import { isFactOfKind, propose, type FactProposal } from "../../../core/facts/types";
import { readSynthesisRequest } from "../seed";
import { VIEW_NAME_PATTERN, renderViewFragments } from "../templates";

export const VIEW_GENERATOR_ID = "view-generator.v1";

export const viewGeneratorAgent = createReactiveAgent(
  { name: VIEW_GENERATOR_ID, reads: ["seed"], produces: ["artifact_fragment"] },
  {
    process(input): FactProposal[] {
      if (!isFactOfKind(input, "seed")) return [];
      const request = readSynthesisRequest(input);
      // only views; other request kinds are left for other generators
      if (!request || request.kind !== "view" || !VIEW_NAME_PATTERN.test(request.name)) return [];
      return renderViewFragments(request.name).map((f) => propose("artifact_fragment", f));
    },
  }
);
