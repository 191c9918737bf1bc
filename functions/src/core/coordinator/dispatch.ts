// functions/src/core/coordinator/dispatch.ts
// Runs one agent against a frozen snapshot, isolated: throws, bad output and
// budget overruns come back as outcomes, never as rejections.

import type { Agent } from "../agents/contract";
import { MAX_TIMER_MS } from "../config";
import { AgentFailure } from "../errors";
import type { FactSnapshot } from "../facts/snapshot";
import type { FactProposal } from "../facts/types";
import { isPlainObject } from "../facts/validateFact";

export type DispatchOutcome =
  | { status: "ok"; proposals: readonly FactProposal[] }
  | { status: "failed"; error: AgentFailure }
  | { status: "timed_out"; budgetMs: number }
  | { status: "invalid_output"; message: string };

export type DispatchOptions = {
  round: number;
  runId: string;
  /** remaining run budget, capped by agentTimeoutMs; clamped to MAX_TIMER_MS */
  budgetMs: number;
};

function checkOutput(value: unknown): DispatchOutcome {
  if (!Array.isArray(value)) {
    return { status: "invalid_output", message: "run() must return an array of proposals" };
  }
  const proposals: FactProposal[] = [];
  for (const [i, item] of value.entries()) {
    if (!isPlainObject(item) || typeof item.kind !== "string") {
      return { status: "invalid_output", message: `proposal #${i} is not a { kind, payload } object` };
    }
    const confidence = item.confidence;
    if (confidence !== undefined && typeof confidence !== "number") {
      return { status: "invalid_output", message: `proposal #${i} has a non-numeric confidence` };
    }
    let dependsOn: number[] | undefined;
    if (item.dependsOn !== undefined) {
      if (!Array.isArray(item.dependsOn)) {
        return { status: "invalid_output", message: `proposal #${i} has invalid dependsOn` };
      }
      dependsOn = [];
      for (const d of item.dependsOn) {
        if (typeof d !== "number") return { status: "invalid_output", message: `proposal #${i} has invalid dependsOn` };
        dependsOn.push(d);
      }
    }
    proposals.push({ kind: item.kind, payload: item.payload, confidence, dependsOn });
  }
  return { status: "ok", proposals };
}

export async function dispatchAgent(agent: Agent, snapshot: FactSnapshot, opts: DispatchOptions): Promise<DispatchOutcome> {
  const controller = new AbortController();
  const name = agent.descriptor.name;

  // async wrapper: synchronous throws inside run() become rejections
  const work = (async () => agent.run(snapshot, { round: opts.round, runId: opts.runId, signal: controller.signal }))();

  const settled = work.then(
    (value): DispatchOutcome => checkOutput(value),
    (err: unknown): DispatchOutcome => ({ status: "failed", error: new AgentFailure(name, opts.round, err) })
  );

  const budgetMs = opts.budgetMs;
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<DispatchOutcome>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve({ status: "timed_out", budgetMs });
    }, Math.min(MAX_TIMER_MS, Math.max(0, budgetMs)));
  });

  try {
    return await Promise.race([settled, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
