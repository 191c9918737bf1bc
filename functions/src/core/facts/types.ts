// functions/src/core/facts/types.ts
// Blackboard fact types (domain-agnostisch)

export type Severity = "CRITICAL" | "HIGH" | "MEDIUM" | "LOW";

export type CoordinationMode = "forensic" | "synthesis";

export type RunOutcome = "converged" | "stalled" | "timed_out" | "cancelled";

// ------------------------------
// Payloads of the built-in kinds
// ------------------------------

/** Opaque seed bundle (source text, synthesis request, ...). */
export type SeedPayload = Record<string, unknown>;

export type ViolationPayload = {
  axiom: string;
  vector: string;
  severity: Severity;
  impact?: string;
  remediation?: string;
};

export type MatchPayload = {
  signature: string;
  description: string;
  severity: Severity;
  occurrences: number;
  samples: string[];
};

export type RiskContributionPayload = {
  /** 0..1, combined with the fact's confidence by the forensic aggregator */
  weight: number;
  source: string;
  item: string;
  component?: string;
};

export type ArtifactFragmentPayload = {
  target: string;
  /** explicit ordering key inside the target */
  order: number;
  text: string;
  section?: string;
  axiomId?: string;
};

export type AxiomCheckPayload = {
  target: string;
  axiomId: string;
  applicable: boolean;
  satisfied: boolean;
  reason: string;
};

export type AgentErrorCode = "agent_failure" | "agent_timeout" | "invalid_proposal" | "invalid_output";

export type AgentErrorPayload = {
  agent: string;
  code: AgentErrorCode;
  message: string;
  kind?: string;
  budgetMs?: number;
};

/** Receipt written by the reactive harness when an input produced nothing. */
export type AckPayload = {
  agent: string;
  outcome: "no_output";
};

export type RiskLabel = "LOW" | "MODERATE" | "HIGH";

export type ComplianceLabel = "COMPLIANT" | "PARTIAL" | "NON_COMPLIANT" | "NO_ARTIFACT";

export type RiskFactor = {
  factId: number;
  producer: string;
  item: string;
  weight: number;
  confidence: number;
  contribution: number;
  component: string;
};

export type ForensicBreakdown = {
  prior: number;
  factors: RiskFactor[];
  components: Record<string, number>;
  critical: RiskFactor[];
};

export type SynthesisAssembly = {
  target: string;
  artifact: string;
  fragmentIds: number[];
  /** order keys that had more than one candidate fragment */
  conflicts: Array<{ order: number; candidates: number[]; chosen: number }>;
  satisfied: number;
  applicable: number;
  failedAxioms: string[];
};

type VerdictBase = {
  outcome: RunOutcome;
  /** false when the run ended without convergence (partial verdict) */
  final: boolean;
  score: number;
};

export type ForensicVerdictPayload = VerdictBase & {
  mode: "forensic";
  label: RiskLabel;
  probability: number;
  breakdown: ForensicBreakdown;
};

export type SynthesisVerdictPayload = VerdictBase & {
  mode: "synthesis";
  label: ComplianceLabel;
  compliance: number;
  assembly: SynthesisAssembly;
};

export type VerdictPayload = ForensicVerdictPayload | SynthesisVerdictPayload;

export type BuiltinPayloads = {
  seed: SeedPayload;
  violation: ViolationPayload;
  match: MatchPayload;
  risk_contribution: RiskContributionPayload;
  artifact_fragment: ArtifactFragmentPayload;
  axiom_check: AxiomCheckPayload;
  agent_error: AgentErrorPayload;
  ack: AckPayload;
  verdict: VerdictPayload;
};

export type BuiltinKind = keyof BuiltinPayloads;

/** Built-in kinds plus any custom kind an agent declares. */
export type FactKind = BuiltinKind | (string & {});

export type PayloadOf<K extends string> = K extends BuiltinKind ? BuiltinPayloads[K] : unknown;

// ------------------------------
// Facts
// ------------------------------

export type Fact<K extends string = string> = {
  readonly id: number;
  readonly kind: K;
  readonly producer: string;
  readonly payload: PayloadOf<K>;
  readonly confidence: number;
  readonly createdAt: number;
  readonly dependsOn: readonly number[];
  /** round that committed the fact; 0 for seeds */
  readonly round: number;
};

/** What append() takes. id and createdAt are assigned by the store. */
export type FactInput = {
  kind: string;
  producer: string;
  payload: unknown;
  confidence?: number;
  dependsOn?: readonly number[];
  round?: number;
};

/** What an agent returns from run(); producer and round are filled in at commit. */
export type FactProposal = {
  kind: string;
  payload: unknown;
  confidence?: number;
  dependsOn?: readonly number[];
};

export function propose<K extends FactKind>(
  kind: K,
  payload: PayloadOf<K>,
  opts: { confidence?: number; dependsOn?: readonly number[] } = {}
): FactProposal {
  return { kind, payload, ...opts };
}

/**
 * Narrowing helper. Payloads of built-in kinds are validated on append,
 * so a matching kind implies a matching payload shape.
 */
export function isFactOfKind<K extends FactKind>(fact: Fact, kind: K): fact is Fact<K> {
  return fact.kind === kind;
}
