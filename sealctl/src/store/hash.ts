import { createHash } from "node:crypto";

export const GENESIS_HASH = "0".repeat(64);

/** Compute SHA256 hash of a string/buffer. */
export function sha256(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

/**
 * Deterministic JSON: object keys sorted, no whitespace, undefined members dropped.
 * Two structurally equal values always serialize to the same string.
 */
export function canonicalJson(value: unknown): string {
  if (value === null || typeof value !== "object") {
    return value === undefined ? "null" : JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map((v: unknown) => canonicalJson(v)).join(",")}]`;
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(",")}}`;
}

export function hashCanonical(value: unknown): string {
  return sha256(canonicalJson(value));
}
