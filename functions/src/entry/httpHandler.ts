// functions/src/entry/httpHandler.ts
// HTTP surface: one POST runs one coordination with the reference roster.

import type { Request } from "express";

import type { Roster } from "../core/agents/roster";
import { configInputFromJson, loadCoordinatorConfig } from "../core/config";
import { runCoordination } from "../core/coordinator/runCoordination";
import { ConfigError, CoordinatorError, describeError } from "../core/errors";
import { toRunExport } from "../core/export/runExport";
import type { CoordinationMode, SeedPayload } from "../core/facts/types";
import { isPlainObject } from "../core/facts/validateFact";
import { referenceRoster } from "../domains";
import { sourceSeed } from "../domains/forensic";
import { synthesisSeed } from "../domains/synthesis";

type LoggerLike = {
  error: (message: string, meta?: Record<string, unknown>) => void;
  info?: (message: string, meta?: Record<string, unknown>) => void;
  warn?: (message: string, meta?: Record<string, unknown>) => void;
};

export type HttpRequestLike = Pick<Request, "method" | "body">;

export type HttpResponseLike = {
  status(code: number): HttpResponseLike;
  json(body: unknown): unknown;
};

type ParsedBody = {
  mode: CoordinationMode;
  seed: SeedPayload;
  config: unknown;
  includeFacts: boolean;
};

class BadRequest extends Error {}

function asString(v: unknown): string {
  return typeof v === "string" ? v : "";
}

export function parseCoordinationBody(raw: unknown): ParsedBody {
  let body: unknown = raw;
  if (typeof body === "string") {
    try {
      body = JSON.parse(body);
    } catch {
      throw new BadRequest("Invalid JSON body");
    }
  }
  if (!isPlainObject(body)) throw new BadRequest("Body must be a JSON object");

  const includeFacts = body.includeFacts === undefined ? true : body.includeFacts === true;

  if (body.mode === "forensic") {
    const source = asString(body.source);
    if (!source.trim()) throw new BadRequest("forensic: 'source' must be a non-empty string");
    if (body.linkerFlags !== undefined && typeof body.linkerFlags !== "string") {
      throw new BadRequest("forensic: 'linkerFlags' must be a string");
    }
    const config = typeof body.linkerFlags === "string" ? body.linkerFlags : undefined;
    const name = typeof body.name === "string" ? body.name : undefined;
    return { mode: "forensic", seed: sourceSeed(source, { config, name }), config: body.config, includeFacts };
  }

  if (body.mode === "synthesis") {
    const request = body.request;
    if (!isPlainObject(request)) throw new BadRequest("synthesis: 'request' must be an object");
    const kind = asString(request.kind).trim();
    const name = asString(request.name).trim();
    if (!kind || !name) throw new BadRequest("synthesis: 'request.kind' and 'request.name' are required");
    return { mode: "synthesis", seed: synthesisSeed({ kind, name }), config: body.config, includeFacts };
  }

  throw new BadRequest("'mode' must be 'forensic' or 'synthesis'");
}

export function createCoordinationHandler(deps: {
  logger: LoggerLike;
  env?: Record<string, string | undefined>;
  rosterFor?: (mode: CoordinationMode) => Roster;
}) {
  const { logger } = deps;
  const rosterFor = deps.rosterFor ?? referenceRoster;

  return async function coordinationHandler(req: HttpRequestLike, res: HttpResponseLike): Promise<void> {
    try {
      if (req.method !== "POST") {
        res.status(405).json({ ok: false, error: "Only POST allowed" });
        return;
      }

      const parsed = parseCoordinationBody(req.body);
      const config = loadCoordinatorConfig(configInputFromJson(parsed.config), deps.env ?? process.env);

      const result = await runCoordination({
        mode: parsed.mode,
        seeds: [parsed.seed],
        agents: rosterFor(parsed.mode),
        config,
      });

      logger.info?.("http_coordination_done", { runId: result.runId, outcome: result.outcome, rounds: result.rounds });
      res.status(200).json(toRunExport(result, { includeFacts: parsed.includeFacts }));
    } catch (e) {
      if (e instanceof BadRequest) {
        res.status(400).json({ ok: false, error: e.message });
        return;
      }
      if (e instanceof ConfigError) {
        res.status(400).json({ ok: false, error: e.toJSON() });
        return;
      }
      logger.error("http_coordination_failed", {
        error: describeError(e),
        code: e instanceof CoordinatorError ? e.code : undefined,
      });
      res.status(500).json({ ok: false, error: "Internal error" });
    }
  };
}
