// functions/src/scripts/runForensicScenarioTest.ts
// Forensic runs: one hand-written detector, then the reference roster on small sources.

import assert from "assert";
import { describe, it } from "node:test";

import { defineAgent } from "../core/agents/defineAgent";
import { runCoordination } from "../core/coordinator/runCoordination";
import { propose } from "../core/facts/types";
import {
  checkLinkerConfig,
  findAxiomViolations,
  forensicAgents,
  matchWeight,
  scanSignatures,
  sourceSeed,
} from "../domains/forensic";

function assertClose(actual: number, expected: number) {
  assert.ok(Math.abs(actual - expected) < 1e-9, `${actual} != ${expected}`);
}

describe("forensic scenario", () => {
  it("turns a single weighted violation into its probability", async () => {
    const detector = defineAgent(
      { name: "detector", reads: ["seed", "violation"], produces: ["violation", "risk_contribution"] },
      {
        isTriggered: (s) => s.count("violation") === 0,
        run: () => [
          propose("violation", { axiom: "AXIOM_IDEMPOTENCY", vector: "network call in init", severity: "HIGH" }, { dependsOn: [1] }),
          propose("risk_contribution", { weight: 1, source: "detector", item: "AXIOM_IDEMPOTENCY" }, { confidence: 0.56, dependsOn: [1] }),
        ],
      }
    );

    const result = await runCoordination({ mode: "forensic", seeds: [sourceSeed("init() { fetch() }")], agents: [detector] });

    assert.equal(result.outcome, "converged");
    assert.equal(result.rounds, 1);
    const v = result.verdict.payload;
    assert.equal(v.mode, "forensic");
    if (v.mode !== "forensic") return;
    assert.equal(v.probability, 0.56);
    assert.equal(v.label, "MODERATE");
    assert.deepStrictEqual([...result.verdict.dependsOn], [1, 3]);
  });

  it("runs detectors, then the assessor, on a force-try", async () => {
    const result = await runCoordination({
      mode: "forensic",
      seeds: [sourceSeed("let value = try! decoder.decode(User.self, from: data)")],
      agents: forensicAgents(),
    });

    assert.equal(result.outcome, "converged");
    assert.equal(result.rounds, 2);
    assert.equal(result.evaluations, 3);
    assert.deepStrictEqual(
      result.facts.map((f) => [f.kind, f.producer, f.round]),
      [
        ["seed", "coordinator", 0],
        ["ack", "axiom-inverter.v1", 1],
        ["match", "pattern-recognizer.v1", 1],
        ["risk_contribution", "risk-assessor.v1", 2],
        ["verdict", "verdict-aggregator", 2],
      ]
    );
    assert.deepStrictEqual([...result.facts[3].dependsOn], [3]);

    const v = result.verdict.payload;
    if (v.mode !== "forensic") return assert.fail("expected a forensic verdict");
    assertClose(v.probability, 0.207944);
    assert.equal(v.label, "LOW");
    assert.deepStrictEqual([...result.verdict.dependsOn], [1, 4]);
  });

  it("combines an axiom violation and a signature match", async () => {
    const result = await runCoordination({
      mode: "forensic",
      seeds: [sourceSeed("class Feed {\n  init() { loadData() }\n}")],
      agents: forensicAgents(),
    });

    assert.equal(result.outcome, "converged");
    const v = result.verdict.payload;
    if (v.mode !== "forensic") return assert.fail("expected a forensic verdict");
    assertClose(v.probability, 0.621554);
    assert.equal(v.label, "HIGH");
    assert.deepStrictEqual(v.breakdown.components, { general: 0.311916, lifecycle: 0.45 });
    assert.deepStrictEqual(
      v.breakdown.critical.map((f) => [f.factId, f.item]),
      [
        [4, "AXIOM_IDEMPOTENCY"],
        [5, "INIT_SIDE_EFFECT"],
      ]
    );
  });
});

describe("forensic reference agents", () => {
  it("finds the axiom contradictions", () => {
    const found = findAxiomViolations(
      [
        "struct Box: View {",
        "  @State var model = Model()",
        "  var body: some View { Text(try await load()) }",
        "}",
        "class Model {}",
        'let f = dlsym(handle, "doWork")',
      ].join("\n")
    );
    assert.deepStrictEqual(
      found.map((v) => [v.axiom, v.severity]),
      [
        ["AXIOM_OBSERVABILITY", "HIGH"],
        ["AXIOM_SYMBOLIC", "CRITICAL"],
        ["AXIOM_PURITY", "MEDIUM"],
      ]
    );
  });

  it("accepts mangled dlsym names", () => {
    assert.deepStrictEqual(findAxiomViolations('dlsym(h, "_$s4main3fooyyF")'), []);
  });

  it("counts signature occurrences and caps samples", () => {
    const matches = scanSignatures("a as! B\nc as! D\ne as! F\ng as! H");
    assert.deepStrictEqual(matches, [
      {
        signature: "FORCE_CAST",
        description: "Force cast can crash at runtime",
        severity: "HIGH",
        occurrences: 4,
        samples: ["as!", "as!", "as!"],
      },
    ]);
  });

  it("checks linker flags only when given", () => {
    assert.equal(checkLinkerConfig(undefined), null);
    assert.equal(checkLinkerConfig("-Xlinker -interposable"), null);
    assert.equal(checkLinkerConfig("")?.signature, "NO_CONFIG");
    assert.deepStrictEqual(checkLinkerConfig("-O"), {
      signature: "MISSING_INTERPOSABLE",
      description: "Missing -Xlinker -interposable flag",
      severity: "CRITICAL",
      occurrences: 1,
      samples: ["Current flags: '-O'"],
    });
  });

  it("weights matches by category with diminishing returns", () => {
    const match = { description: "", samples: [], severity: "HIGH" as const };
    assert.equal(matchWeight({ ...match, signature: "DOTNET_HALLUCINATION", occurrences: 1 }), 0.346574);
    assert.equal(matchWeight({ ...match, signature: "MISSING_INTERPOSABLE", occurrences: 1 }), 0.207944);
    assert.equal(matchWeight({ ...match, signature: "DOTNET_HALLUCINATION", occurrences: 100 }), 0.95);
  });
});
