import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import { expandEnvVars, hasUnexpandedEnvRef, type Env } from "../core/env.js";
import { toSample, zRawSampleValue, type RawSampleValue, type Sample } from "./sample.js";
import { parseSampleTable } from "./sampleTable.js";

export class ProjectConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProjectConfigError";
  }
}

const zScalar = z.union([z.string(), z.number(), z.boolean()]);

const zImplication = z.object({
  if: z.record(z.string(), z.union([zScalar, z.array(zScalar)])),
  then: z.record(z.string(), zRawSampleValue)
});

const zDerivation = z.object({
  attributes: z.array(z.string().min(1)).min(1),
  sources: z.record(z.string(), z.string())
});

const zSampleModifiers = z.object({
  append: z.record(z.string(), zRawSampleValue).optional(),
  imply: z.array(zImplication).optional(),
  derive: zDerivation.optional()
});

const zProjectConfig = z.looseObject({
  name: z.string().min(1).optional(),
  pep_version: z.string().optional(),
  sample_table: z.string().min(1),
  looper: z.looseObject({ output_dir: z.string().min(1) }).optional(),
  sample_modifiers: zSampleModifiers.optional()
});

export type ProjectConfig = z.infer<typeof zProjectConfig>;
export type SampleModifiers = z.infer<typeof zSampleModifiers>;
type Implication = z.infer<typeof zImplication>;
type Derivation = z.infer<typeof zDerivation>;
type MutableRecord = Record<string, RawSampleValue>;

export interface Project {
  name: string;
  configPath: string;
  outputDir: string | null;
  samples: Sample[];
  warnings: string[];
}

// `{attr}` placeholders; `${VAR}` is an env reference and is left for expandEnvVars.
const PLACEHOLDER_RE = /(?<!\$)\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

function matchesCondition(actual: RawSampleValue | undefined, expected: z.infer<typeof zScalar> | Array<z.infer<typeof zScalar>>): boolean {
  if (actual === undefined || Array.isArray(actual)) return false;
  const accepted = (Array.isArray(expected) ? expected : [expected]).map((v) => String(v));
  return accepted.includes(String(actual));
}

function applyImply(attrs: MutableRecord, rules: readonly Implication[]): void {
  for (const rule of rules) {
    const matched = Object.entries(rule.if).every(([key, expected]) => matchesCondition(attrs[key], expected));
    if (!matched) continue;
    for (const [key, value] of Object.entries(rule.then)) attrs[key] = value;
  }
}

function applyDerive(attrs: MutableRecord, derive: Derivation, env: Env, warnings: string[]): void {
  const name = String(attrs["sample_name"] ?? "<unnamed>");
  for (const attr of derive.attributes) {
    const sourceKey = attrs[attr];
    if (typeof sourceKey !== "string" || !Object.prototype.hasOwnProperty.call(derive.sources, sourceKey)) continue;
    const template = derive.sources[sourceKey] ?? "";

    const unresolved: string[] = [];
    const filled = template.replace(PLACEHOLDER_RE, (match: string, key: string) => {
      const v = attrs[key];
      if (typeof v === "string" || typeof v === "number") return String(v);
      unresolved.push(key);
      return match;
    });

    if (unresolved.length > 0) {
      warnings.push(`sample ${name}: cannot derive ${attr} from ${sourceKey}, missing ${unresolved.join(", ")}`);
      delete attrs[attr];
      continue;
    }
    attrs[attr] = expandEnvVars(filled, env);
  }
}

/** Applies append, imply and derive, in that order, to one sample-table row. */
export function applySampleModifiers(
  row: Readonly<Record<string, string>>,
  modifiers: SampleModifiers | undefined,
  env: Env,
  warnings: string[]
): Sample {
  const attrs: MutableRecord = { ...row };
  for (const [key, value] of Object.entries(modifiers?.append ?? {})) {
    if (!Object.prototype.hasOwnProperty.call(attrs, key)) attrs[key] = value;
  }
  applyImply(attrs, modifiers?.imply ?? []);
  if (modifiers?.derive) applyDerive(attrs, modifiers.derive, env, warnings);
  return toSample(attrs);
}

function resolveConfigPath(baseDir: string, raw: string, env: Env, field: string, warnings: string[]): string {
  const expanded = expandEnvVars(raw, env);
  if (hasUnexpandedEnvRef(expanded)) warnings.push(`${field} references an unset variable: ${raw}`);
  return path.resolve(baseDir, expanded);
}

export async function loadProject(configPath: string, env: Env): Promise<Project> {
  const absConfig = path.resolve(configPath);
  const baseDir = path.dirname(absConfig);
  const parsed = zProjectConfig.safeParse(YAML.parse(await fs.readFile(absConfig, "utf8")));
  if (!parsed.success) {
    throw new ProjectConfigError(`invalid project config at ${configPath}: ${z.prettifyError(parsed.error)}`);
  }
  const config = parsed.data;
  const warnings: string[] = [];

  const tablePath = resolveConfigPath(baseDir, config.sample_table, env, "sample_table", warnings);
  let tableText: string;
  try {
    tableText = await fs.readFile(tablePath, "utf8");
  } catch (err) {
    throw new ProjectConfigError(`cannot read sample table ${tablePath}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const samples = parseSampleTable(tableText).map((row) =>
    applySampleModifiers(row.attributes, config.sample_modifiers, env, warnings)
  );

  const outputDir = config.looper
    ? resolveConfigPath(baseDir, config.looper.output_dir, env, "looper.output_dir", warnings)
    : null;

  return {
    name: config.name ?? path.basename(absConfig, path.extname(absConfig)),
    configPath: absConfig,
    outputDir,
    samples,
    warnings
  };
}
