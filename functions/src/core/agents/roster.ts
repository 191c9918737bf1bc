// functions/src/core/agents/roster.ts
// Ordered agent roster for one run (pure). Order = commit order.

import { ConfigError } from "../errors";
import type { Agent } from "./contract";
import { validateDescriptor } from "./defineAgent";

export type Roster = {
  readonly agents: readonly Agent[];
  readonly names: readonly string[];
  get(name: string): Agent | null;
};

export function createRoster(agents: readonly Agent[]): Roster {
  if (!Array.isArray(agents)) throw new ConfigError("roster", "agents must be an array");

  const byName = new Map<string, Agent>();
  for (const agent of agents) {
    if (!agent || typeof agent.isTriggered !== "function" || typeof agent.run !== "function") {
      throw new ConfigError("roster", "agent must implement isTriggered() and run()");
    }
    // re-check, agents may be hand-built without defineAgent()
    const d = validateDescriptor(agent.descriptor);
    if (d.name !== agent.descriptor.name) {
      throw new ConfigError("roster", `agent name '${agent.descriptor.name}' is not normalized`);
    }
    if (byName.has(d.name)) {
      // hard fail, no silent double registration
      throw new ConfigError("roster", `duplicate agent '${d.name}'`);
    }
    byName.set(d.name, agent);
  }

  const list = Object.freeze([...agents]);
  return Object.freeze({
    agents: list,
    names: Object.freeze(list.map((a) => a.descriptor.name)),
    get: (name: string) => byName.get(name) ?? null,
  });
}

export function isRoster(v: readonly Agent[] | Roster): v is Roster {
  return !Array.isArray(v);
}
