// functions/src/scripts/runVerdictTest.ts
// Verdict aggregation on hand-built snapshots.

import assert from "assert";
import { describe, it } from "node:test";

import { resolveCoordinatorConfig } from "../core/config";
import { createFactStore } from "../core/facts/store";
import { aggregateVerdict } from "../core/verdict/aggregate";
import { aggregateForensic, combineRisk, riskLabel } from "../core/verdict/forensic";
import { aggregateSynthesis, chooseFragments, complianceLabel, resolveSynthesisTarget } from "../core/verdict/synthesis";

const BANDS = { low: 0.3, moderate: 0.6 };

function risk(weight: number, component?: string) {
  return { weight, source: "test", item: `item-${weight}`, ...(component ? { component } : {}) };
}

describe("forensic combination", () => {
  it("is a noisy-OR over contributions and the prior", () => {
    assert.equal(combineRisk([]), 0);
    assert.equal(combineRisk([], 0.2), 0.2);
    assert.equal(combineRisk([0.5, 0.5]), 0.75);
    assert.equal(combineRisk([1, 0.3]), 1);
  });

  it("never decreases when a contribution is added", () => {
    const base = [0.1, 0.25, 0.05];
    let last = combineRisk([]);
    for (let i = 1; i <= base.length; i++) {
      const next = combineRisk(base.slice(0, i));
      assert.ok(next > last, `step ${i}`);
      last = next;
    }
    assert.ok(last <= 1);
  });

  it("labels by band, lower bound inclusive", () => {
    assert.equal(riskLabel(0.29, BANDS), "LOW");
    assert.equal(riskLabel(0.3, BANDS), "MODERATE");
    assert.equal(riskLabel(0.6, BANDS), "HIGH");
  });

  it("groups factors per component and ranks the critical ones", () => {
    const store = createFactStore();
    store.append({ kind: "seed", producer: "coordinator", payload: {} });
    store.append({ kind: "risk_contribution", producer: "a", payload: risk(0.5, "lifecycle") });
    store.append({ kind: "risk_contribution", producer: "a", payload: risk(0.5, "lifecycle") });
    store.append({ kind: "risk_contribution", producer: "b", payload: risk(0.4), confidence: 0.5 });

    const r = aggregateForensic(store.snapshot(), { prior: 0, bands: BANDS });

    assert.equal(r.probability, 0.8);
    assert.equal(r.label, "HIGH");
    assert.deepStrictEqual(r.breakdown.components, { general: 0.2, lifecycle: 0.75 });
    assert.deepStrictEqual(
      r.breakdown.critical.map((f) => f.factId),
      [2, 3, 4]
    );
    assert.equal(r.breakdown.factors[2].contribution, 0.2);
    assert.deepStrictEqual(r.contributors, [2, 3, 4]);
  });
});

describe("synthesis assembly", () => {
  function buildStore() {
    const store = createFactStore();
    store.append({ kind: "seed", producer: "coordinator", payload: { kind: "view", name: "Card" } }); // 1
    store.append({ kind: "artifact_fragment", producer: "gen", payload: { target: "Card", order: 20, text: "B" } }); // 2
    store.append({ kind: "artifact_fragment", producer: "gen", payload: { target: "Card", order: 10, text: "A" }, confidence: 0.5 }); // 3
    store.append({ kind: "artifact_fragment", producer: "alt", payload: { target: "Card", order: 10, text: "A2" }, confidence: 0.9 }); // 4
    store.append({ kind: "artifact_fragment", producer: "gen", payload: { target: "Other", order: 5, text: "Z" } }); // 5
    store.append({
      kind: "axiom_check",
      producer: "enf",
      payload: { target: "Card", axiomId: "X", applicable: true, satisfied: false, reason: "first look" },
      dependsOn: [2],
    }); // 6
    store.append({
      kind: "axiom_check",
      producer: "enf",
      payload: { target: "Card", axiomId: "X", applicable: true, satisfied: true, reason: "second look" },
      dependsOn: [6],
    }); // 7
    store.append({
      kind: "axiom_check",
      producer: "enf",
      payload: { target: "Card", axiomId: "Y", applicable: true, satisfied: false, reason: "missing" },
      dependsOn: [4],
    }); // 8
    store.append({
      kind: "axiom_check",
      producer: "enf",
      payload: { target: "Card", axiomId: "Z", applicable: false, satisfied: false, reason: "n/a" },
      dependsOn: [2],
    }); // 9
    return store;
  }

  it("orders fragments by key and resolves competing candidates", () => {
    const store = buildStore();
    const { chosen, conflicts } = chooseFragments(store.query("artifact_fragment").filter((f) => f.payload.target === "Card"));

    assert.deepStrictEqual(
      chosen.map((f) => f.id),
      [4, 2]
    );
    assert.deepStrictEqual(conflicts, [{ order: 10, candidates: [3, 4], chosen: 4 }]);
  });

  it("scores only the current, applicable checks", () => {
    const r = aggregateSynthesis(buildStore().snapshot());

    assert.equal(r.assembly.target, "Card");
    assert.equal(r.assembly.artifact, "A2\nB");
    assert.equal(r.compliance, 0.5);
    assert.equal(r.label, "PARTIAL");
    assert.equal(r.assembly.applicable, 2);
    assert.equal(r.assembly.satisfied, 1);
    assert.deepStrictEqual(r.assembly.failedAxioms, ["Y"]);
    assert.deepStrictEqual(r.contributors, [4, 2, 7, 8, 9]);
  });

  it("resolves the target from option, seed, then first fragment", () => {
    const store = buildStore();
    assert.equal(resolveSynthesisTarget(store.snapshot(), "Other"), "Other");
    assert.equal(resolveSynthesisTarget(store.snapshot()), "Card");

    const bare = createFactStore();
    bare.append({ kind: "seed", producer: "coordinator", payload: {} });
    bare.append({ kind: "artifact_fragment", producer: "gen", payload: { target: "Late", order: 1, text: "x" } });
    assert.equal(resolveSynthesisTarget(bare.snapshot()), "Late");
  });

  it("labels compliance", () => {
    assert.equal(complianceLabel(false, 1), "NO_ARTIFACT");
    assert.equal(complianceLabel(true, 1), "COMPLIANT");
    assert.equal(complianceLabel(true, 0.25), "PARTIAL");
    assert.equal(complianceLabel(true, 0), "NON_COMPLIANT");
  });
});

describe("verdict aggregator", () => {
  const config = resolveCoordinatorConfig();

  it("depends on the seeds and every contributing fact", () => {
    const draft = aggregateVerdict(
      (() => {
        const store = createFactStore();
        store.append({ kind: "seed", producer: "coordinator", payload: { kind: "view", name: "Card" } });
        store.append({ kind: "artifact_fragment", producer: "gen", payload: { target: "Card", order: 1, text: "x" } });
        store.append({
          kind: "axiom_check",
          producer: "enf",
          payload: { target: "Card", axiomId: "X", applicable: true, satisfied: true, reason: "ok" },
          dependsOn: [2],
        });
        return store.snapshot();
      })(),
      { mode: "synthesis", outcome: "converged", config }
    );

    assert.deepStrictEqual(draft.dependsOn, [1, 2, 3]);
    assert.equal(draft.payload.label, "COMPLIANT");
    assert.equal(draft.payload.score, 1);
    assert.equal(draft.payload.final, true);
  });

  it("marks a non-converged verdict as partial", () => {
    const store = createFactStore();
    store.append({ kind: "seed", producer: "coordinator", payload: {} });
    const draft = aggregateVerdict(store.snapshot(), { mode: "synthesis", outcome: "stalled", config });

    assert.equal(draft.payload.final, false);
    assert.equal(draft.payload.outcome, "stalled");
    assert.equal(draft.payload.label, "NO_ARTIFACT");
    assert.deepStrictEqual(draft.dependsOn, [1]);
  });

  it("applies the configured prior", () => {
    const store = createFactStore();
    store.append({ kind: "seed", producer: "coordinator", payload: {} });
    const draft = aggregateVerdict(store.snapshot(), {
      mode: "forensic",
      outcome: "converged",
      config: { riskPrior: 0.4, riskBands: BANDS },
    });

    assert.equal(draft.payload.score, 0.4);
    assert.equal(draft.payload.label, "MODERATE");
  });
});
