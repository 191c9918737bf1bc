// functions/src/scripts/runRunExportTest.ts

import assert from "assert";
import { describe, it } from "node:test";

import { defineAgent } from "../core/agents/defineAgent";
import { runCoordination } from "../core/coordinator/runCoordination";
import { computeRunStatistics } from "../core/export/statistics";
import { RUN_EXPORT_VERSION, computeRunDigest, toRunExport } from "../core/export/runExport";
import { propose } from "../core/facts/types";
import { referenceRoster } from "../domains";
import { sourceSeed } from "../domains/forensic";

function stampAgent() {
  let n = 0;
  return defineAgent(
    { name: "stamp", reads: ["stamp"], produces: ["stamp"], deterministic: false },
    { isTriggered: (s) => !s.has("stamp"), run: () => [propose("stamp", { n: n++ })] }
  );
}

describe("run export", () => {
  it("projects a converged run", async () => {
    const result = await runCoordination({
      mode: "forensic",
      seeds: [sourceSeed("let value = try! decoder.decode(User.self, from: data)")],
      agents: referenceRoster("forensic"),
    });
    const out = toRunExport(result);

    assert.equal(out.version, RUN_EXPORT_VERSION);
    assert.equal(out.ok, true);
    assert.equal(out.outcome, "converged");
    assert.equal(out.error, null);
    assert.equal(out.runId, result.runId);
    assert.equal(out.verdict.id, 5);
    assert.deepStrictEqual(
      out.facts?.map((f) => f.id),
      [1, 2, 3, 4, 5]
    );
    assert.equal(out.digest, computeRunDigest(result.facts));
    assert.deepStrictEqual(JSON.parse(JSON.stringify(out.verdict.payload)), out.verdict.payload);
  });

  it("leaves facts out on request", async () => {
    const result = await runCoordination({ mode: "forensic", seeds: [sourceSeed("let a = 1")], agents: referenceRoster("forensic") });
    const out = toRunExport(result, { includeFacts: false });

    assert.equal(out.facts, undefined);
    assert.equal("facts" in out, false);
  });

  it("carries the run error of a stalled run", async () => {
    const ticker = defineAgent(
      { name: "ticker", reads: [], produces: ["tick"] },
      { isTriggered: () => true, run: () => [propose("tick", {})] }
    );
    const result = await runCoordination({ mode: "forensic", seeds: [{ k: 1 }], agents: [ticker], config: { maxRounds: 2 } });
    const out = toRunExport(result);

    assert.equal(out.ok, false);
    assert.equal(out.outcome, "stalled");
    assert.equal(out.error?.code, "STALLED");
    assert.deepStrictEqual(out.error?.context, { rounds: 2, factCount: 3, triggeredAgents: ["ticker"] });
    assert.equal(out.verdict.payload.final, false);
  });

  it("leaves nondeterministic producers out of the digest", async () => {
    const a = await runCoordination({ mode: "forensic", seeds: [{ k: 1 }], agents: [stampAgent()] });
    const b = await runCoordination({ mode: "forensic", seeds: [{ k: 1 }], agents: [stampAgent()] });

    // same agent twice, its counter has moved on
    const c = await (async () => {
      const agent = stampAgent();
      await runCoordination({ mode: "forensic", seeds: [{ k: 2 }], agents: [agent] });
      return runCoordination({ mode: "forensic", seeds: [{ k: 1 }], agents: [agent] });
    })();

    assert.deepStrictEqual(a.nondeterministicAgents, ["stamp"]);
    assert.equal(toRunExport(a).digest, toRunExport(b).digest);
    assert.equal(toRunExport(a).digest, toRunExport(c).digest);
    assert.notEqual(computeRunDigest(a.facts), computeRunDigest(c.facts));
  });
});

describe("run statistics", () => {
  it("counts facts, errors, risk and rounds", async () => {
    const result = await runCoordination({
      mode: "forensic",
      seeds: [sourceSeed("class Feed {\n  init() { loadData() }\n}")],
      agents: referenceRoster("forensic"),
    });
    const stats = computeRunStatistics(result.facts, result.roundReports);

    assert.deepStrictEqual(stats, result.stats);
    assert.equal(stats.totalFacts, 6);
    assert.deepStrictEqual(stats.byKind, { seed: 1, violation: 1, match: 1, risk_contribution: 2, verdict: 1 });
    assert.equal(stats.agentErrors.total, 0);
    assert.equal(stats.risk.contributions, 2);
    assert.equal(stats.risk.maxWeight, 0.45);
    assert.equal(stats.risk.avgWeight, 0.380958);
    assert.deepStrictEqual(stats.rounds, {
      count: 2,
      dispatched: 3,
      committed: 4,
      rejected: 0,
      perAgent: { "axiom-inverter.v1": 1, "pattern-recognizer.v1": 1, "risk-assessor.v1": 1 },
    });
  });
});
