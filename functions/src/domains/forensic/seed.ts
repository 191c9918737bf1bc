// functions/src/domains/forensic/seed.ts

import type { Fact, SeedPayload } from "../../core/facts/types";

export type SourceSeed = {
  source: string;
  /** linker flags; undefined = not part of the input */
  config?: string;
  name?: string;
};

export function sourceSeed(source: string, opts: { config?: string; name?: string } = {}): SeedPayload {
  const out: SeedPayload = { kind: "source", source };
  if (opts.config !== undefined) out.config = opts.config;
  if (opts.name !== undefined) out.name = opts.name;
  return out;
}

export function readSourceSeed(fact: Fact<"seed">): SourceSeed | null {
  const p = fact.payload;
  if (typeof p.source !== "string") return null;
  return {
    source: p.source,
    config: typeof p.config === "string" ? p.config : undefined,
    name: typeof p.name === "string" ? p.name : undefined,
  };
}
