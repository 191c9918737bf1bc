// functions/src/core/utils/hash.ts
import crypto from "crypto";

import { stableStringify } from "./stableStringify";

export function sha256Hex(input: string): string {
  return crypto.createHash("sha256").update(input, "utf8").digest("hex");
}

/** Hash over the stable serialization of any JSON-like value. */
export function stableHash(value: unknown): string {
  return sha256Hex(stableStringify(value));
}
