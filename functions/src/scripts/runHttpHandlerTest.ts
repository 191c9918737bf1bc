// functions/src/scripts/runHttpHandlerTest.ts
// coordinationHandler with fake req/res, no emulator.

import assert from "assert";
import { describe, it } from "node:test";

import { createRoster } from "../core/agents/roster";
import { isPlainObject } from "../core/facts/validateFact";
import { createCoordinationHandler, parseCoordinationBody, type HttpResponseLike } from "../entry/httpHandler";

type Captured = { status: number; body: unknown };

function fakeRes(): { res: HttpResponseLike; out: Captured } {
  const out: Captured = { status: 0, body: null };
  const res: HttpResponseLike = {
    status(code) {
      out.status = code;
      return res;
    },
    json(body) {
      out.body = body;
      return res;
    },
  };
  return { res, out };
}

function field(value: unknown, ...path: string[]): unknown {
  let cur = value;
  for (const key of path) {
    if (!isPlainObject(cur)) return undefined;
    cur = cur[key];
  }
  return cur;
}

function testLogger() {
  const errors: string[] = [];
  return { errors, logger: { error: (message: string) => errors.push(message), info: () => undefined } };
}

async function call(body: unknown, method = "POST") {
  const { logger, errors } = testLogger();
  const handler = createCoordinationHandler({ logger, env: {} });
  const { res, out } = fakeRes();
  await handler({ method, body }, res);
  return { ...out, errors };
}

describe("coordination handler", () => {
  it("only accepts POST", async () => {
    const r = await call(undefined, "GET");
    assert.equal(r.status, 405);
    assert.deepStrictEqual(r.body, { ok: false, error: "Only POST allowed" });
  });

  it("runs a forensic coordination", async () => {
    const r = await call({ mode: "forensic", source: "let value = try! decoder.decode(User.self, from: data)" });

    assert.equal(r.status, 200);
    assert.equal(field(r.body, "ok"), true);
    assert.equal(field(r.body, "outcome"), "converged");
    assert.equal(field(r.body, "verdict", "payload", "label"), "LOW");
    assert.equal(field(r.body, "verdict", "payload", "probability"), 0.207944);
    const facts = field(r.body, "facts");
    assert.ok(Array.isArray(facts));
    assert.equal(facts.length, 5);
  });

  it("runs a synthesis coordination from a JSON string body", async () => {
    const r = await call(JSON.stringify({ mode: "synthesis", request: { kind: "view", name: "HomeView" }, includeFacts: false }));

    assert.equal(r.status, 200);
    assert.equal(field(r.body, "verdict", "payload", "label"), "COMPLIANT");
    assert.equal(field(r.body, "facts"), undefined);
  });

  it("returns 200 with the run error when the run stalls", async () => {
    const r = await call({ mode: "synthesis", request: { kind: "view", name: "HomeView" }, config: { maxRounds: 1 } });

    assert.equal(r.status, 200);
    assert.equal(field(r.body, "ok"), false);
    assert.equal(field(r.body, "outcome"), "stalled");
    assert.equal(field(r.body, "error", "code"), "STALLED");
    assert.equal(field(r.body, "verdict", "payload", "final"), false);
    assert.equal(field(r.body, "verdict", "payload", "label"), "NON_COMPLIANT");
  });

  it("rejects malformed bodies with 400", async () => {
    const cases: Array<[unknown, string]> = [
      ["{oops", "Invalid JSON body"],
      [[1, 2], "Body must be a JSON object"],
      [{ mode: "poetry" }, "'mode' must be 'forensic' or 'synthesis'"],
      [{ mode: "forensic", source: "  " }, "forensic: 'source' must be a non-empty string"],
      [{ mode: "forensic", source: "x", linkerFlags: 3 }, "forensic: 'linkerFlags' must be a string"],
      [{ mode: "synthesis", request: { kind: "view" } }, "synthesis: 'request.kind' and 'request.name' are required"],
    ];
    for (const [body, error] of cases) {
      const r = await call(body);
      assert.equal(r.status, 400, error);
      assert.deepStrictEqual(r.body, { ok: false, error });
    }
  });

  it("rejects invalid config with 400 and the error code", async () => {
    const r = await call({ mode: "forensic", source: "x", config: { maxRounds: 0 } });

    assert.equal(r.status, 400);
    assert.equal(field(r.body, "error", "code"), "CONFIG_INVALID");
    assert.equal(field(r.body, "error", "context", "field"), "maxRounds");
  });

  it("answers 500 and logs when something unexpected breaks", async () => {
    const { logger, errors } = testLogger();
    const handler = createCoordinationHandler({
      logger,
      env: {},
      rosterFor: () => {
        throw new Error("roster unavailable");
      },
    });
    const { res, out } = fakeRes();
    await handler({ method: "POST", body: { mode: "forensic", source: "x" } }, res);

    assert.equal(out.status, 500);
    assert.deepStrictEqual(out.body, { ok: false, error: "Internal error" });
    assert.deepStrictEqual(errors, ["http_coordination_failed"]);
  });

  it("uses a custom roster when given", async () => {
    const { logger } = testLogger();
    const handler = createCoordinationHandler({ logger, env: {}, rosterFor: () => createRoster([]) });
    const { res, out } = fakeRes();
    await handler({ method: "POST", body: { mode: "forensic", source: "let a = try! b()" } }, res);

    assert.equal(out.status, 200);
    assert.equal(field(out.body, "rounds"), 0);
    assert.equal(field(out.body, "verdict", "payload", "probability"), 0);
  });
});

describe("parseCoordinationBody", () => {
  it("builds the seed from the body fields", () => {
    assert.deepStrictEqual(parseCoordinationBody({ mode: "forensic", source: "x", linkerFlags: "-O", name: "A.swift" }), {
      mode: "forensic",
      seed: { kind: "source", source: "x", config: "-O", name: "A.swift" },
      config: undefined,
      includeFacts: true,
    });
  });
});
