// functions/src/core/facts/validateFact.ts
// Strict shape checks (reject instead of guessing). Structure only, no semantics.

import { ValidationError } from "../errors";
import type { BuiltinKind, FactInput } from "./types";

type Check = { ok: true } | { ok: false; reason: string };

const OK: Check = { ok: true };

const SEVERITIES: readonly string[] = ["CRITICAL", "HIGH", "MEDIUM", "LOW"];
const AGENT_ERROR_CODES: readonly string[] = ["agent_failure", "agent_timeout", "invalid_proposal", "invalid_output"];
const OUTCOMES: readonly string[] = ["converged", "stalled", "timed_out", "cancelled"];

function fail(reason: string): Check {
  return { ok: false, reason };
}

export function isPlainObject(v: unknown): v is Record<string, unknown> {
  if (!v || typeof v !== "object" || Array.isArray(v)) return false;
  const proto: unknown = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
}

function nonEmptyString(v: unknown): v is string {
  return typeof v === "string" && v.trim().length > 0;
}

function optionalString(v: unknown): boolean {
  return v === undefined || typeof v === "string";
}

function unitInterval(v: unknown): v is number {
  return typeof v === "number" && Number.isFinite(v) && v >= 0 && v <= 1;
}

/** JSON-serializable without loss: plain objects, arrays, finite numbers, strings, booleans, null. */
export function isJsonValue(v: unknown, depth = 0): boolean {
  if (depth > 64) return false;
  if (v === null) return true;
  if (typeof v === "string" || typeof v === "boolean") return true;
  if (typeof v === "number") return Number.isFinite(v);
  if (Array.isArray(v)) return v.every((x) => isJsonValue(x, depth + 1));
  if (isPlainObject(v)) {
    return Object.values(v).every((x) => x === undefined || isJsonValue(x, depth + 1));
  }
  return false;
}

// ------------------------------
// Built-in payload checks
// ------------------------------

const PAYLOAD_CHECKS: { [K in BuiltinKind]: (p: Record<string, unknown>) => Check } = {
  seed: () => OK,

  violation: (p) => {
    if (!nonEmptyString(p.axiom)) return fail("violation_missing_axiom");
    if (!nonEmptyString(p.vector)) return fail("violation_missing_vector");
    if (typeof p.severity !== "string" || !SEVERITIES.includes(p.severity)) return fail("violation_invalid_severity");
    if (!optionalString(p.impact) || !optionalString(p.remediation)) return fail("violation_invalid_text");
    return OK;
  },

  match: (p) => {
    if (!nonEmptyString(p.signature)) return fail("match_missing_signature");
    if (typeof p.description !== "string") return fail("match_missing_description");
    if (typeof p.severity !== "string" || !SEVERITIES.includes(p.severity)) return fail("match_invalid_severity");
    if (typeof p.occurrences !== "number" || !Number.isInteger(p.occurrences) || p.occurrences < 1) {
      return fail("match_invalid_occurrences");
    }
    if (!Array.isArray(p.samples) || !p.samples.every((s) => typeof s === "string")) return fail("match_invalid_samples");
    return OK;
  },

  risk_contribution: (p) => {
    if (!unitInterval(p.weight)) return fail("risk_invalid_weight");
    if (!nonEmptyString(p.source)) return fail("risk_missing_source");
    if (!nonEmptyString(p.item)) return fail("risk_missing_item");
    if (!optionalString(p.component)) return fail("risk_invalid_component");
    return OK;
  },

  artifact_fragment: (p) => {
    if (!nonEmptyString(p.target)) return fail("fragment_missing_target");
    if (typeof p.order !== "number" || !Number.isFinite(p.order)) return fail("fragment_invalid_order");
    if (typeof p.text !== "string") return fail("fragment_missing_text");
    if (!optionalString(p.section) || !optionalString(p.axiomId)) return fail("fragment_invalid_labels");
    return OK;
  },

  axiom_check: (p) => {
    if (!nonEmptyString(p.target)) return fail("check_missing_target");
    if (!nonEmptyString(p.axiomId)) return fail("check_missing_axiom");
    if (typeof p.applicable !== "boolean" || typeof p.satisfied !== "boolean") return fail("check_invalid_flags");
    if (typeof p.reason !== "string") return fail("check_missing_reason");
    return OK;
  },

  agent_error: (p) => {
    if (!nonEmptyString(p.agent)) return fail("agent_error_missing_agent");
    if (typeof p.code !== "string" || !AGENT_ERROR_CODES.includes(p.code)) return fail("agent_error_invalid_code");
    if (typeof p.message !== "string") return fail("agent_error_missing_message");
    return OK;
  },

  ack: (p) => {
    if (!nonEmptyString(p.agent)) return fail("ack_missing_agent");
    if (p.outcome !== "no_output") return fail("ack_invalid_outcome");
    return OK;
  },

  verdict: (p) => {
    if (p.mode !== "forensic" && p.mode !== "synthesis") return fail("verdict_invalid_mode");
    if (typeof p.outcome !== "string" || !OUTCOMES.includes(p.outcome)) return fail("verdict_invalid_outcome");
    if (typeof p.final !== "boolean") return fail("verdict_missing_final");
    if (!nonEmptyString(p.label)) return fail("verdict_missing_label");
    if (!unitInterval(p.score)) return fail("verdict_invalid_score");
    if (p.mode === "forensic" && !isPlainObject(p.breakdown)) return fail("verdict_missing_breakdown");
    if (p.mode === "synthesis" && !isPlainObject(p.assembly)) return fail("verdict_missing_assembly");
    return OK;
  },
};

function isBuiltinKind(kind: string): kind is BuiltinKind {
  return Object.prototype.hasOwnProperty.call(PAYLOAD_CHECKS, kind);
}

export function checkPayload(kind: string, payload: unknown): Check {
  if (!isJsonValue(payload)) return fail("payload_not_json");
  if (!isBuiltinKind(kind)) return OK;
  if (!isPlainObject(payload)) return fail(`${kind}_payload_not_object`);
  return PAYLOAD_CHECKS[kind](payload);
}

/**
 * Validates a fact input against the current store version.
 * Throws ValidationError; nothing is recorded by the caller in that case.
 */
export function validateFactInput(input: FactInput, version: number): void {
  const kind = typeof input.kind === "string" ? input.kind.trim() : "";
  if (!kind || kind !== input.kind) throw new ValidationError("invalid_kind", { kind: String(input.kind) });

  if (!nonEmptyString(input.producer)) throw new ValidationError("missing_producer", { kind });

  if (input.confidence !== undefined && !unitInterval(input.confidence)) {
    throw new ValidationError("invalid_confidence", { kind, producer: input.producer });
  }

  const deps = input.dependsOn ?? [];
  for (const id of deps) {
    // only already committed facts can be referenced
    if (!Number.isInteger(id) || id < 1 || id > version) {
      throw new ValidationError("invalid_dependency", { kind, producer: input.producer, dependency: id });
    }
  }

  if (input.round !== undefined && (!Number.isInteger(input.round) || input.round < 0)) {
    throw new ValidationError("invalid_round", { kind, producer: input.producer });
  }

  const res = checkPayload(kind, input.payload);
  if (!res.ok) {
    throw new ValidationError(res.reason, { kind, producer: input.producer });
  }
}
