import { createHash } from "crypto";
import type { JsonValue } from "./json.js";

export type Sha256Digest = `sha256:${string}`;

function isRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Copies parsed config or request data into plain JSON with object keys in
 * sorted order. Missing object members are dropped and missing list entries
 * become null. `where` names the offending member in errors.
 */
export function canonicalizeJson(value: unknown, where = "$"): JsonValue | undefined {
  if (value === undefined) return undefined;
  if (value === null || typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") {
    if (!Number.isFinite(value)) throw new Error(`${where}: ${value} has no JSON form`);
    return Object.is(value, -0) ? 0 : value;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown, i) => canonicalizeJson(item, `${where}[${i}]`) ?? null);
  }
  if (isRecord(value)) {
    const out: { [key: string]: JsonValue } = {};
    for (const key of Object.keys(value).sort()) {
      const member = canonicalizeJson(value[key], `${where}.${key}`);
      if (member !== undefined) out[key] = member;
    }
    return out;
  }
  throw new Error(`${where}: ${Object.prototype.toString.call(value)} is not plain data`);
}

/** Digest of the canonical form; interface hashes, registry digests and params hashes all use it. */
export function canonicalDigest(value: unknown): Sha256Digest {
  const text = JSON.stringify(canonicalizeJson(value) ?? null);
  return `sha256:${createHash("sha256").update(text).digest("hex")}`;
}
