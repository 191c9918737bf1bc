// functions/src/core/agents/defineAgent.ts
// Built-in agent harness: descriptor validation, plain agents, reactive agents.

import { ConfigError } from "../errors";
import type { FactSnapshot } from "../facts/snapshot";
import type { Fact, FactProposal } from "../facts/types";
import {
  CORE_ONLY_KINDS,
  COORDINATOR_PRODUCER,
  AGGREGATOR_PRODUCER,
  type Agent,
  type AgentDescriptor,
  type AgentDescriptorInput,
  type AgentRunContext,
  type AgentRunResult,
} from "./contract";

function normalizeKinds(field: string, kinds: unknown): string[] {
  if (!Array.isArray(kinds)) throw new ConfigError(field, "must be an array of kinds");
  const out: string[] = [];
  for (const k of kinds) {
    if (typeof k !== "string" || !k.trim() || k.trim() !== k) {
      throw new ConfigError(field, `invalid kind '${String(k)}'`);
    }
    if (!out.includes(k)) out.push(k);
  }
  return out;
}

export function validateDescriptor(input: AgentDescriptorInput): Readonly<AgentDescriptor> {
  const name = typeof input?.name === "string" ? input.name.trim() : "";
  if (!name) throw new ConfigError("agent.name", "missing agent name");
  if (name === COORDINATOR_PRODUCER || name === AGGREGATOR_PRODUCER) {
    throw new ConfigError("agent.name", `'${name}' is reserved`);
  }

  const reads = normalizeKinds(`agent.${name}.reads`, input.reads);
  const produces = normalizeKinds(`agent.${name}.produces`, input.produces);

  const forbidden = produces.filter((k) => CORE_ONLY_KINDS.includes(k));
  if (forbidden.length) {
    throw new ConfigError(`agent.${name}.produces`, `core-only kinds: ${forbidden.join(", ")}`);
  }

  if (input.deterministic !== undefined && typeof input.deterministic !== "boolean") {
    throw new ConfigError(`agent.${name}.deterministic`, "must be boolean");
  }

  return Object.freeze({
    name,
    reads: Object.freeze(reads),
    produces: Object.freeze(produces),
    deterministic: input.deterministic ?? true,
  });
}

export function defineAgent(
  descriptor: AgentDescriptorInput,
  impl: {
    isTriggered(snapshot: FactSnapshot): boolean;
    run(snapshot: FactSnapshot, ctx: AgentRunContext): AgentRunResult;
  }
): Agent {
  const d = validateDescriptor(descriptor);
  return Object.freeze({
    descriptor: d,
    isTriggered: (snapshot: FactSnapshot) => impl.isTriggered(snapshot),
    run: (snapshot: FactSnapshot, ctx: AgentRunContext) => impl.run(snapshot, ctx),
  });
}

// ------------------------------
// Reactive agents
// ------------------------------

export type ReactiveProcessFn = (
  input: Fact,
  snapshot: FactSnapshot,
  ctx: AgentRunContext
) => readonly FactProposal[] | Promise<readonly FactProposal[]>;

export type ReactiveAgentSpec = {
  /** candidate inputs; default: every fact of the read kinds, in id order */
  select?: (snapshot: FactSnapshot) => readonly Fact[];
  process: ReactiveProcessFn;
};

function defaultSelect(reads: readonly string[]) {
  return (snapshot: FactSnapshot): readonly Fact[] =>
    reads.flatMap((k) => snapshot.query(k)).sort((a, b) => a.id - b.id);
}

/** Inputs none of the agent's own committed facts depend on yet. */
export function pendingInputs(
  name: string,
  snapshot: FactSnapshot,
  select: (snapshot: FactSnapshot) => readonly Fact[]
): Fact[] {
  const consumed = snapshot.consumedBy(name);
  return select(snapshot).filter((f) => f.producer !== name && !consumed.has(f.id));
}

/**
 * Agent that reacts to each new input fact once.
 * Triggered while pending inputs exist. Every proposal depends on its input;
 * an input that yields nothing is acknowledged with an `ack` fact so it
 * stops triggering.
 */
export function createReactiveAgent(descriptor: AgentDescriptorInput, spec: ReactiveAgentSpec): Agent {
  const produces = descriptor.produces.includes("ack") ? descriptor.produces : [...descriptor.produces, "ack"];
  const d = validateDescriptor({ ...descriptor, produces });
  const select = spec.select ?? defaultSelect(d.reads);

  return defineAgent(d, {
    isTriggered(snapshot) {
      return pendingInputs(d.name, snapshot, select).length > 0;
    },

    async run(snapshot, ctx) {
      const out: FactProposal[] = [];
      for (const input of pendingInputs(d.name, snapshot, select)) {
        if (ctx.signal.aborted) break;

        const proposals = await spec.process(input, snapshot, ctx);
        if (!proposals.length) {
          out.push({
            kind: "ack",
            payload: { agent: d.name, outcome: "no_output" },
            dependsOn: [input.id],
          });
          continue;
        }

        for (const p of proposals) {
          const deps = new Set(p.dependsOn ?? []);
          deps.add(input.id);
          out.push({ ...p, dependsOn: [...deps] });
        }
      }
      return out;
    },
  });
}
