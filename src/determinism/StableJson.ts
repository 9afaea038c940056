/**
 * Deterministic JSON stringification with binary key ordering.
 * Array order is preserved (caller must canonicalize before if needed).
 */

import type { Resolution } from "../order/types.js";
import { stringCompareBinary } from "./CanonicalOrder.js";

export function stableStringify(value: unknown): string {
  if (value === null || value === undefined) return "null";
  if (typeof value === "boolean" || typeof value === "number") return String(value);
  if (typeof value === "string") return JSON.stringify(value);

  if (Array.isArray(value)) {
    return "[" + value.map((v: unknown) => stableStringify(v)).join(",") + "]";
  }

  if (typeof value === "object") {
    const parts = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => stringCompareBinary(a, b))
      .map(([k, v]) => JSON.stringify(k) + ":" + stableStringify(v));
    return "{" + parts.join(",") + "}";
  }

  return "null";
}

/** Resolution as indented JSON with keys in binary order. */
export function serializeResolution(resolution: Resolution): string {
  // re-parsing keeps the sorted insertion order; no key here is integer-like
  return JSON.stringify(JSON.parse(stableStringify(resolution)), null, 2);
}
