// functions/src/domains/forensic/agents/pattern-recognizer.v1.ts
// Greps for known failure signatures (regex library) + linker config check.

import { createReactiveAgent } from "../../../core/agents/defineAgent";
import { isFactOfKind, propose, type FactProposal, type MatchPayload } from "../../../core/facts/types";
import { readSourceSeed } from "../seed";
import { CONFIG_SIGNATURES, SIGNATURES } from "../signatures";

export const PATTERN_RECOGNIZER_ID = "pattern-recognizer.v1";

const MAX_SAMPLES = 3;
const MAX_SAMPLE_CHARS = 120;

function sample(s: string): string {
  const oneLine = s.replace(/\s+/g, " ").trim();
  return oneLine.length > MAX_SAMPLE_CHARS ? oneLine.slice(0, MAX_SAMPLE_CHARS) : oneLine;
}

export function scanSignatures(code: string): MatchPayload[] {
  const out: MatchPayload[] = [];
  for (const sig of SIGNATURES) {
    const matches = code.match(sig.pattern);
    if (!matches || matches.length === 0) continue;
    out.push({
      signature: sig.id,
      description: sig.description,
      severity: sig.severity,
      occurrences: matches.length,
      samples: matches.slice(0, MAX_SAMPLES).map(sample),
    });
  }
  return out;
}

/** Only runs when the seed carries a config string at all. */
export function checkLinkerConfig(config: string | undefined): MatchPayload | null {
  if (config === undefined) return null;

  if (!config.trim()) {
    const s = CONFIG_SIGNATURES.noConfig;
    return { signature: s.id, description: s.description, severity: s.severity, occurrences: 1, samples: ["Empty config context"] };
  }
  if (!config.includes("-interposable")) {
    const s = CONFIG_SIGNATURES.missingInterposable;
    return {
      signature: s.id,
      description: s.description,
      severity: s.severity,
      occurrences: 1,
      samples: [sample(`Current flags: '${config}'`)],
    };
  }
  return null;
}

export const patternRecognizerAgent = createReactiveAgent(
  { name: PATTERN_RECOGNIZER_ID, reads: ["seed"], produces: ["match"] },
  {
    process(input): FactProposal[] {
      if (!isFactOfKind(input, "seed")) return [];
      const seed = readSourceSeed(input);
      if (!seed) return [];

      const findings = scanSignatures(seed.source);
      const config = checkLinkerConfig(seed.config);
      if (config) findings.push(config);

      return findings.map((m) => propose("match", m));
    },
  }
);
