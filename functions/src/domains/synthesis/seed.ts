// functions/src/domains/synthesis/seed.ts

import type { Fact, SeedPayload } from "../../core/facts/types";

export type SynthesisRequest = { kind: string; name: string };

export function synthesisSeed(request: SynthesisRequest): SeedPayload {
  return { kind: request.kind, name: request.name };
}

export function readSynthesisRequest(fact: Fact<"seed">): SynthesisRequest | null {
  const p = fact.payload;
  if (typeof p.kind !== "string" || typeof p.name !== "string") return null;
  return { kind: p.kind, name: p.name.trim() };
}
