// functions/src/core/utils/stableStringify.ts
// stable serialization (key-sorted) for deterministic hashes

type Normalized = null | boolean | number | string | Normalized[] | { [key: string]: Normalized };

export function stableStringify(value: unknown): string {
  return JSON.stringify(normalize(value));
}

function normalize(v: unknown): Normalized {
  if (v === null || v === undefined) return null;

  if (typeof v === "number") {
    if (!Number.isFinite(v)) return null;
    // harte Normalisierung: z.B. 0.5600000000000001 vermeiden
    return Math.round(v * 1e6) / 1e6;
  }

  if (typeof v === "string") {
    return v;
  }

  if (typeof v === "boolean") {
    return v;
  }

  if (Array.isArray(v)) {
    return v.map(normalize);
  }

  if (typeof v === "object") {
    const record: Record<string, unknown> = { ...v };
    const out: { [key: string]: Normalized } = {};
    for (const k of Object.keys(record).sort()) {
      // skip undefined
      if (record[k] === undefined) continue;
      out[k] = normalize(record[k]);
    }
    return out;
  }

  // fallback (functions, symbols, bigint): null
  return null;
}
