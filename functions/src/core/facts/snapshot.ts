// functions/src/core/facts/snapshot.ts
// Point-in-time view on the fact log. Shares the store's append-only arrays,
// bounded by the version it was taken at, so no lock and no copy on creation.

import type { Fact, FactKind } from "./types";

export interface FactSnapshot {
  /** highest fact id visible in this view (0 = empty) */
  readonly version: number;
  readonly size: number;
  all(): readonly Fact[];
  get(id: number): Fact | null;
  has(kind: string): boolean;
  count(kind: string): number;
  query<K extends FactKind>(kind: K): ReadonlyArray<Fact<K>>;
  latest<K extends FactKind>(kind: K): Fact<K> | null;
  producedBy(producer: string): readonly Fact[];
  /** every id the producer's facts depend on */
  consumedBy(producer: string): ReadonlySet<number>;
}

export type SnapshotSource = {
  readonly facts: readonly Fact[];
  readonly byKind: ReadonlyMap<string, readonly number[]>;
  readonly byProducer: ReadonlyMap<string, readonly number[]>;
};

// ids in the index arrays are ascending → count of ids <= version
function upperBound(ids: readonly number[], version: number): number {
  let lo = 0;
  let hi = ids.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (ids[mid] <= version) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

export function createSnapshot(source: SnapshotSource, version: number): FactSnapshot {
  let allCache: readonly Fact[] | null = null;
  const kindCache = new Map<string, readonly Fact[]>();
  const producerCache = new Map<string, readonly Fact[]>();

  const factAt = (id: number): Fact | null => (id >= 1 && id <= version ? source.facts[id - 1] ?? null : null);

  const resolve = (ids: readonly number[] | undefined): readonly Fact[] => {
    if (!ids) return Object.freeze([]);
    const n = upperBound(ids, version);
    const out: Fact[] = [];
    for (let i = 0; i < n; i++) {
      const f = factAt(ids[i]);
      if (f) out.push(f);
    }
    return Object.freeze(out);
  };

  const ofKind = (kind: string): readonly Fact[] => {
    let hit = kindCache.get(kind);
    if (!hit) {
      hit = resolve(source.byKind.get(kind));
      kindCache.set(kind, hit);
    }
    return hit;
  };

  function query<K extends FactKind>(kind: K): ReadonlyArray<Fact<K>> {
    return ofKind(kind).filter((f): f is Fact<K> => f.kind === kind);
  }

  function producedBy(producer: string): readonly Fact[] {
    let hit = producerCache.get(producer);
    if (!hit) {
      hit = resolve(source.byProducer.get(producer));
      producerCache.set(producer, hit);
    }
    return hit;
  }

  return Object.freeze({
    version,
    size: version,

    all() {
      if (!allCache) allCache = Object.freeze(source.facts.slice(0, version));
      return allCache;
    },

    get: factAt,

    has(kind: string) {
      return ofKind(kind).length > 0;
    },

    count(kind: string) {
      return ofKind(kind).length;
    },

    query,

    latest<K extends FactKind>(kind: K): Fact<K> | null {
      const list = query(kind);
      return list.length ? list[list.length - 1] : null;
    },

    producedBy,

    consumedBy(producer: string) {
      const out = new Set<number>();
      for (const f of producedBy(producer)) {
        for (const dep of f.dependsOn) out.add(dep);
      }
      return out;
    },
  });
}
