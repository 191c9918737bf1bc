// functions/src/domains/forensic/signatures.ts
// Failure signature library + code axioms for the forensic reference agents.

import type { Severity } from "../../core/facts/types";

export type SignatureCategory = "hallucination" | "symbol" | "memory" | "config" | "general";

export type Signature = {
  id: string;
  pattern: RegExp;
  description: string;
  severity: Severity;
  category: SignatureCategory;
};

// g: every occurrence counts (occurrences feed the risk weight)
export const SIGNATURES: readonly Signature[] = [
  {
    id: "UNMANGLED_SYMBOL",
    pattern: /dlsym\s*\([^,]+,\s*"[a-zA-Z][a-zA-Z0-9_]*"/gims,
    description: "dlsym with unmangled Swift symbol",
    severity: "CRITICAL",
    category: "symbol",
  },
  {
    id: "GIANT_TEST",
    pattern: /XCTAssertEqual\s*\([^)]*analytics/gims,
    description: "Assertion roulette: analytics asserted in a feature test",
    severity: "MEDIUM",
    category: "general",
  },
  {
    id: "DOTNET_HALLUCINATION",
    pattern: /Aspnet_regiis/gims,
    description: "Windows IIS command in Swift code",
    severity: "HIGH",
    category: "hallucination",
  },
  {
    id: "GOLANG_HALLUCINATION",
    pattern: /GOPATH|GOROOT|go\s+build/gims,
    description: "Go environment/command in Swift code",
    severity: "HIGH",
    category: "hallucination",
  },
  {
    id: "INIT_LEAK",
    pattern: /@StateObject\s+var\s+\w+\s*=\s*\w+\(\)/gims,
    description: "StateObject initialized inline in declaration",
    severity: "HIGH",
    category: "memory",
  },
  {
    id: "STATE_INIT",
    pattern: /@State\s+var\s+\w+\s*:\s*\w+\s*=\s*\w+\(\)/gims,
    description: "@State with inline class initialization",
    severity: "MEDIUM",
    category: "memory",
  },
  {
    id: "INIT_SIDE_EFFECT",
    pattern: /init\s*\([^)]*\)\s*\{[^}]*(fetch|load|start|request)/gims,
    description: "Side-effect detected in initializer",
    severity: "CRITICAL",
    category: "general",
  },
  {
    id: "FORCE_CAST",
    pattern: /force_cast|as!/gims,
    description: "Force cast can crash at runtime",
    severity: "HIGH",
    category: "general",
  },
  {
    id: "FORCE_TRY",
    pattern: /try!/gims,
    description: "Force try can crash at runtime",
    severity: "HIGH",
    category: "general",
  },
  {
    id: "STRONG_SELF_CLOSURE",
    pattern: /\{\s*self\./gims,
    description: "Strong self capture in closure, potential leak",
    severity: "MEDIUM",
    category: "memory",
  },
  {
    id: "MAIN_QUEUE_SELF",
    pattern: /DispatchQueue\.main\.async\s*\{[^}]*self\./gims,
    description: "Main queue async with strong self",
    severity: "MEDIUM",
    category: "memory",
  },
  {
    id: "TIMER_SELECTOR",
    pattern: /Timer\.scheduledTimer.*selector/gims,
    description: "Timer with selector, potential retain cycle",
    severity: "MEDIUM",
    category: "memory",
  },
];

export const CONFIG_SIGNATURES = {
  missingInterposable: {
    id: "MISSING_INTERPOSABLE",
    description: "Missing -Xlinker -interposable flag",
    severity: "CRITICAL",
    category: "config",
  },
  noConfig: {
    id: "NO_CONFIG",
    description: "No linker configuration provided",
    severity: "HIGH",
    category: "config",
  },
} as const satisfies Record<string, Omit<Signature, "pattern">>;

export type AxiomId = "AXIOM_IDEMPOTENCY" | "AXIOM_OBSERVABILITY" | "AXIOM_SYMBOLIC" | "AXIOM_PURITY";

export const AXIOMS: Readonly<Record<AxiomId, { statement: string; component: string }>> = {
  AXIOM_IDEMPOTENCY: { statement: "Initialization must be side-effect free (O(1))", component: "lifecycle" },
  AXIOM_OBSERVABILITY: { statement: "State mutation must trigger view invalidation", component: "state" },
  AXIOM_SYMBOLIC: { statement: "Symbols must be resolvable via dlsym", component: "symbol" },
  AXIOM_PURITY: { statement: "View structs must be ephemeral and lightweight", component: "rendering" },
};

export const SIDE_EFFECT_MARKERS: readonly string[] = [
  "fetchData",
  "loadData",
  "startTimer",
  "beginRequest",
  "URLSession",
  "network",
  "download",
  "upload",
  "Timer.scheduledTimer",
  "DispatchQueue.main.async",
  "NotificationCenter.default.post",
  "UserDefaults.standard.set",
  "FileManager",
  "write(",
  "save(",
];

export const REFERENCE_MARKERS: readonly string[] = ["class ", "AnyObject", "NSObject", "UIViewController"];

export const HEAVY_BODY_MARKERS: readonly string[] = ["URLSession.shared", "try await", "Actor", "MainActor"];

export const SEVERITY_WEIGHTS: Readonly<Record<Severity, number>> = {
  CRITICAL: 0.45,
  HIGH: 0.3,
  MEDIUM: 0.15,
  LOW: 0.05,
};

export const CATEGORY_WEIGHTS: Readonly<Record<Exclude<SignatureCategory, "general">, number>> = {
  hallucination: 0.5,
  symbol: 0.4,
  memory: 0.35,
  config: 0.3,
};

export function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
