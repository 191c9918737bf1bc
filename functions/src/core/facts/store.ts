// functions/src/core/facts/store.ts
// FactStore: in-memory blackboard for exactly one run. Append-only log + kind/producer index.
//
// append() is synchronous: validate → id → insert → index runs without an await in
// between, so async callers can never overtake each other in id assignment.

import { StoreClosedError } from "../errors";
import { frozenCopy } from "../utils/deepFreeze";
import { createSnapshot, type FactSnapshot } from "./snapshot";
import type { Fact, FactInput, FactKind } from "./types";
import { validateFactInput } from "./validateFact";

export type Clock = () => number;

export interface FactStore {
  /** id of the last committed fact (0 = empty) */
  readonly version: number;
  readonly size: number;
  readonly isClosed: boolean;
  append(input: FactInput): Fact;
  snapshot(): FactSnapshot;
  query<K extends FactKind>(kind: K): ReadonlyArray<Fact<K>>;
  get(id: number): Fact | null;
  /** frozen copy of the full log in id order */
  log(): readonly Fact[];
  kindsChangedSince(version: number): ReadonlySet<string>;
  /** read-only from now on; append() throws StoreClosedError */
  close(): void;
}

export function createFactStore(opts: { clock?: Clock } = {}): FactStore {
  const clock = opts.clock ?? Date.now;

  const facts: Fact[] = [];
  const byKind = new Map<string, number[]>();
  const byProducer = new Map<string, number[]>();
  let closed = false;

  // snapshots are cached per version, identical versions share one view
  let current: FactSnapshot | null = null;

  const indexInto = (index: Map<string, number[]>, key: string, id: number) => {
    const ids = index.get(key);
    if (ids) ids.push(id);
    else index.set(key, [id]);
  };

  function snapshot(): FactSnapshot {
    if (!current || current.version !== facts.length) {
      current = createSnapshot({ facts, byKind, byProducer }, facts.length);
    }
    return current;
  }

  return {
    get version() {
      return facts.length;
    },

    get size() {
      return facts.length;
    },

    get isClosed() {
      return closed;
    },

    append(input: FactInput): Fact {
      if (closed) throw new StoreClosedError(facts.length);

      validateFactInput(input, facts.length);

      const id = facts.length + 1;
      const fact: Fact = Object.freeze({
        id,
        kind: input.kind,
        producer: input.producer.trim(),
        payload: frozenCopy(input.payload),
        confidence: input.confidence ?? 1,
        createdAt: clock(),
        dependsOn: Object.freeze(Array.from(new Set(input.dependsOn ?? [])).sort((a, b) => a - b)),
        round: input.round ?? 0,
      });

      facts.push(fact);
      indexInto(byKind, fact.kind, id);
      indexInto(byProducer, fact.producer, id);
      return fact;
    },

    snapshot,

    query<K extends FactKind>(kind: K) {
      return snapshot().query(kind);
    },

    get(id: number) {
      return snapshot().get(id);
    },

    log() {
      return snapshot().all();
    },

    kindsChangedSince(version: number) {
      const out = new Set<string>();
      for (const [kind, ids] of byKind) {
        if (ids[ids.length - 1] > version) out.add(kind);
      }
      return out;
    },

    close() {
      closed = true;
    },
  };
}
