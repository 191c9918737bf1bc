// functions/src/domains/index.ts
// Reference rosters per mode (pluggable; the core knows nothing about them).

import type { Agent } from "../core/agents/contract";
import { createRoster, type Roster } from "../core/agents/roster";
import type { CoordinationMode } from "../core/facts/types";
import { forensicAgents } from "./forensic";
import { synthesisAgents } from "./synthesis";

const ROSTERS: Record<CoordinationMode, () => Agent[]> = {
  forensic: forensicAgents,
  synthesis: synthesisAgents,
};

export function referenceRoster(mode: CoordinationMode): Roster {
  return createRoster(ROSTERS[mode]());
}
