import * as z from "zod/v4";
import type { JsonObject } from "../core/json.js";

export type SampleValue = string | boolean | readonly string[];

/** One unit of input data plus its declared processing attributes. */
export type Sample = Readonly<Record<string, SampleValue>>;

// Raw attribute values as they arrive from YAML, JSON or an MCP request.
export const zRawSampleValue = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.array(z.union([z.string(), z.number()]))
]);

export const zRawSample = z.record(z.string().min(1), zRawSampleValue);

export type RawSample = z.infer<typeof zRawSample>;
export type RawSampleValue = z.infer<typeof zRawSampleValue>;

function normalizeValue(value: RawSampleValue): SampleValue {
  if (typeof value === "number") return String(value);
  if (Array.isArray(value)) return value.map((v) => String(v));
  return value;
}

export function toSample(raw: RawSample): Sample {
  const out: Record<string, SampleValue> = {};
  for (const key of Object.keys(raw)) {
    const v = raw[key];
    if (v === undefined) continue;
    out[key] = normalizeValue(v);
  }
  return Object.freeze(out);
}

/** Validates an untyped record (parsed YAML, JSON) into a sample. */
export function parseSample(value: unknown, context: string): Sample {
  const parsed = zRawSample.safeParse(value);
  if (!parsed.success) {
    throw new Error(`${context}: invalid sample: ${z.prettifyError(parsed.error)}`);
  }
  return toSample(parsed.data);
}

export function hasAttribute(sample: Sample, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(sample, key);
}

/** The attribute as a single non-empty string, or null. */
export function scalarAttribute(sample: Sample, key: string): string | null {
  if (!hasAttribute(sample, key)) return null;
  const v = sample[key];
  return typeof v === "string" && v.length > 0 ? v : null;
}

/** The attribute as value tokens; booleans and empty strings yield none. */
export function attributeTokens(sample: Sample, key: string): string[] {
  if (!hasAttribute(sample, key)) return [];
  const v = sample[key];
  if (typeof v === "string") return v.length > 0 ? [v] : [];
  if (typeof v === "boolean" || v === undefined) return [];
  return v.filter((s) => s.length > 0);
}

export function sampleName(sample: Sample): string | null {
  return scalarAttribute(sample, "sample_name");
}

export function sampleToJson(sample: Sample): JsonObject {
  const out: JsonObject = {};
  for (const key of Object.keys(sample)) {
    const v = sample[key];
    if (v === undefined) continue;
    out[key] = typeof v === "string" || typeof v === "boolean" ? v : [...v];
  }
  return out;
}
