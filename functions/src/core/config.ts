// functions/src/core/config.ts
// Run configuration: defaults ← env (BLACKBOARD_*) ← explicit overrides.
// Invalid values are rejected before a run is constructed (ConfigError).

import { ConfigError } from "./errors";
import { isPlainObject } from "./facts/validateFact";

export type RiskBands = {
  /** probability below → LOW */
  low: number;
  /** probability below → MODERATE, else HIGH */
  moderate: number;
};

export type CoordinatorConfig = {
  maxRounds: number;
  runTimeoutMs: number;
  /** per agent and round; null = only the run budget applies */
  agentTimeoutMs: number | null;
  riskPrior: number;
  riskBands: RiskBands;
};

export type CoordinatorConfigInput = Partial<Omit<CoordinatorConfig, "riskBands">> & {
  riskBands?: Partial<RiskBands>;
};

export const DEFAULT_CONFIG: Readonly<CoordinatorConfig> = Object.freeze({
  maxRounds: 50,
  runTimeoutMs: 30_000,
  agentTimeoutMs: null,
  riskPrior: 0,
  riskBands: Object.freeze({ low: 0.3, moderate: 0.6 }),
});

export const ENV_KEYS = {
  maxRounds: "BLACKBOARD_MAX_ROUNDS",
  runTimeoutMs: "BLACKBOARD_RUN_TIMEOUT_MS",
  agentTimeoutMs: "BLACKBOARD_AGENT_TIMEOUT_MS",
} as const;

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string): number | undefined {
  const raw = String(env[key] ?? "").trim();
  if (!raw) return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new ConfigError(key, `not a number: '${raw}'`);
  return n;
}

export function readCoordinatorConfigFromEnv(env: Env = process.env): CoordinatorConfigInput {
  const out: CoordinatorConfigInput = {};
  const maxRounds = readNumber(env, ENV_KEYS.maxRounds);
  const runTimeoutMs = readNumber(env, ENV_KEYS.runTimeoutMs);
  const agentTimeoutMs = readNumber(env, ENV_KEYS.agentTimeoutMs);
  if (maxRounds !== undefined) out.maxRounds = maxRounds;
  if (runTimeoutMs !== undefined) out.runTimeoutMs = runTimeoutMs;
  if (agentTimeoutMs !== undefined) out.agentTimeoutMs = agentTimeoutMs;
  return out;
}

/** Largest delay setTimeout keeps; anything above fires after 1ms. */
export const MAX_TIMER_MS = 2_147_483_647;

function positive(field: string, v: number): number {
  if (typeof v !== "number" || !Number.isFinite(v) || v <= 0) {
    throw new ConfigError(field, `must be a positive number, got ${String(v)}`);
  }
  return v;
}

function duration(field: string, v: number): number {
  const ms = positive(field, v);
  if (ms > MAX_TIMER_MS) throw new ConfigError(field, `must be at most ${MAX_TIMER_MS}ms, got ${ms}`);
  return ms;
}

export function resolveCoordinatorConfig(overrides: CoordinatorConfigInput = {}): CoordinatorConfig {
  const maxRounds = positive("maxRounds", overrides.maxRounds ?? DEFAULT_CONFIG.maxRounds);
  if (!Number.isInteger(maxRounds)) throw new ConfigError("maxRounds", "must be an integer");

  const runTimeoutMs = duration("runTimeoutMs", overrides.runTimeoutMs ?? DEFAULT_CONFIG.runTimeoutMs);

  const agentTimeoutRaw = overrides.agentTimeoutMs ?? DEFAULT_CONFIG.agentTimeoutMs;
  const agentTimeoutMs = agentTimeoutRaw === null ? null : duration("agentTimeoutMs", agentTimeoutRaw);

  const riskPrior = overrides.riskPrior ?? DEFAULT_CONFIG.riskPrior;
  if (typeof riskPrior !== "number" || !(riskPrior >= 0 && riskPrior < 1)) {
    throw new ConfigError("riskPrior", "must be in [0, 1)");
  }

  const low = overrides.riskBands?.low ?? DEFAULT_CONFIG.riskBands.low;
  const moderate = overrides.riskBands?.moderate ?? DEFAULT_CONFIG.riskBands.moderate;
  if (!(low > 0 && low <= moderate && moderate <= 1)) {
    throw new ConfigError("riskBands", "expected 0 < low <= moderate <= 1");
  }

  return { maxRounds, runTimeoutMs, agentTimeoutMs, riskPrior, riskBands: { low, moderate } };
}

/** Env first, explicit overrides win. */
export function loadCoordinatorConfig(overrides: CoordinatorConfigInput = {}, env: Env = process.env): CoordinatorConfig {
  const fromEnv = readCoordinatorConfigFromEnv(env);
  return resolveCoordinatorConfig({
    ...fromEnv,
    ...overrides,
    riskBands: { ...overrides.riskBands },
  });
}

/** Untrusted JSON (request body) → config input. Unknown keys are rejected. */
export function configInputFromJson(raw: unknown): CoordinatorConfigInput {
  if (raw === undefined || raw === null) return {};
  if (!isPlainObject(raw)) throw new ConfigError("config", "must be an object");

  const out: CoordinatorConfigInput = {};
  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case "maxRounds":
      case "runTimeoutMs":
      case "riskPrior":
        if (typeof value !== "number") throw new ConfigError(key, "must be a number");
        out[key] = value;
        break;
      case "agentTimeoutMs":
        if (value !== null && typeof value !== "number") throw new ConfigError(key, "must be a number or null");
        out.agentTimeoutMs = value;
        break;
      case "riskBands": {
        if (!isPlainObject(value)) throw new ConfigError(key, "must be an object");
        const bands: Partial<RiskBands> = {};
        if (value.low !== undefined) {
          if (typeof value.low !== "number") throw new ConfigError("riskBands.low", "must be a number");
          bands.low = value.low;
        }
        if (value.moderate !== undefined) {
          if (typeof value.moderate !== "number") throw new ConfigError("riskBands.moderate", "must be a number");
          bands.moderate = value.moderate;
        }
        out.riskBands = bands;
        break;
      }
      default:
        throw new ConfigError(key, "unknown option");
    }
  }
  return out;
}
