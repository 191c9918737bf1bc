// functions/src/core/errors.ts
// Error taxonomy of the coordinator. Run-level errors are returned as outcomes,
// never thrown out of runCoordination (only ConfigError is thrown, at construction).

export type CoordinatorErrorCode =
  | "VALIDATION_FAILED"
  | "STALLED"
  | "TIMEOUT"
  | "CANCELLED"
  | "AGENT_FAILURE"
  | "CONFIG_INVALID"
  | "STORE_CLOSED";

export class CoordinatorError extends Error {
  readonly code: CoordinatorErrorCode;
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    code: CoordinatorErrorCode,
    context: Record<string, unknown> = {},
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "CoordinatorError";
    this.code = code;
    this.context = context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/** Malformed fact input. The fact is not recorded. */
export class ValidationError extends CoordinatorError {
  readonly reason: string;

  constructor(reason: string, context: Record<string, unknown> = {}) {
    super(`fact_rejected:${reason}`, "VALIDATION_FAILED", { reason, ...context });
    this.name = "ValidationError";
    this.reason = reason;
  }
}

export class StallError extends CoordinatorError {
  readonly rounds: number;
  readonly factCount: number;
  readonly triggeredAgents: readonly string[];

  constructor(params: { rounds: number; factCount: number; triggeredAgents: readonly string[] }) {
    super(
      `no convergence after ${params.rounds} rounds (${params.factCount} facts, still triggered: ${params.triggeredAgents.join(", ") || "none"})`,
      "STALLED",
      { ...params, triggeredAgents: [...params.triggeredAgents] }
    );
    this.name = "StallError";
    this.rounds = params.rounds;
    this.factCount = params.factCount;
    this.triggeredAgents = [...params.triggeredAgents];
  }
}

export class TimeoutError extends CoordinatorError {
  readonly budgetMs: number;
  readonly elapsedMs: number;
  readonly factCount: number;

  constructor(params: { budgetMs: number; elapsedMs: number; factCount: number }) {
    super(`run budget of ${params.budgetMs}ms exhausted after ${params.elapsedMs}ms`, "TIMEOUT", { ...params });
    this.name = "TimeoutError";
    this.budgetMs = params.budgetMs;
    this.elapsedMs = params.elapsedMs;
    this.factCount = params.factCount;
  }
}

export class RunCancelledError extends CoordinatorError {
  readonly rounds: number;

  constructor(params: { rounds: number; reason?: string }) {
    super(`run cancelled after ${params.rounds} rounds`, "CANCELLED", { ...params });
    this.name = "RunCancelledError";
    this.rounds = params.rounds;
  }
}

/** An agent's run() threw or returned garbage. Contained per agent and round. */
export class AgentFailure extends CoordinatorError {
  readonly agent: string;
  readonly round: number;

  constructor(agent: string, round: number, cause: unknown) {
    super(`agent '${agent}' failed in round ${round}: ${describeError(cause)}`, "AGENT_FAILURE", { agent, round }, { cause });
    this.name = "AgentFailure";
    this.agent = agent;
    this.round = round;
  }
}

export class ConfigError extends CoordinatorError {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`config_invalid:${field}: ${message}`, "CONFIG_INVALID", { field });
    this.name = "ConfigError";
    this.field = field;
  }
}

export class StoreClosedError extends CoordinatorError {
  constructor(version: number) {
    super("fact store is closed (read-only)", "STORE_CLOSED", { version });
    this.name = "StoreClosedError";
  }
}

export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message || e.name;
  return String(e);
}
