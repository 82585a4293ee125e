import { attributeTokens, type Sample } from "../samples/sample.js";
import { measureInputSizeGb, type ComputeConfig, type ResourcePackages } from "./resources.js";

const INPUT_ATTRIBUTES = ["read1", "read2"] as const;

export interface ComputeOverride {
  cores?: number;
  mem?: string;
  time?: string;
}

function applyOverride(base: ComputeConfig, override: ComputeOverride | undefined): ComputeConfig {
  const out: ComputeConfig = { ...base };
  if (override?.cores !== undefined) out.cores = override.cores;
  if (override?.mem !== undefined) out.mem = override.mem;
  if (override?.time !== undefined) out.time = override.time;
  return out;
}

/**
 * Picks compute resources for one sample: the resource package sized by its
 * read files when a table is configured, otherwise the fallback. Explicit
 * overrides win field by field.
 */
export async function selectCompute(input: {
  sample: Sample;
  packages: ResourcePackages | null;
  fallback: ComputeConfig;
  override?: ComputeOverride;
}): Promise<{ compute: ComputeConfig; inputSizeGb: number | null; warnings: string[] }> {
  const { override } = input;
  const fullyOverridden = override?.cores !== undefined && override.mem !== undefined;
  if (!input.packages || fullyOverridden) {
    return { compute: applyOverride(input.fallback, override), inputSizeGb: null, warnings: [] };
  }

  const files = INPUT_ATTRIBUTES.flatMap((key) => attributeTokens(input.sample, key));
  const { sizeGb, warnings } = await measureInputSizeGb(files);
  return { compute: applyOverride(input.packages.select(sizeGb), override), inputSizeGb: sizeGb, warnings };
}
