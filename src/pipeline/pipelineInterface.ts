import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import { canonicalDigest, type Sha256Digest } from "../core/canonicalJson.js";
import type { ComputeConfig } from "../compute/resources.js";
import { PipelineInterfaceError } from "./errors.js";

const zIdentifier = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "must be an identifier");
const zFlag = z.string().regex(/^--?[A-Za-z][A-Za-z0-9-]*$/, "must look like -X or --long-flag");

const zGate = z.strictObject({
  present: z.array(zIdentifier).default([]),
  bound: z.array(zIdentifier).default([])
});

const zAssetRef = z.strictObject({
  asset: z.string().min(1),
  seek_key: z.string().min(1)
});

const zSampleSource = z.strictObject({ sample: zIdentifier, when: zGate.optional() });
const zRegistrySource = z.strictObject({ registry: zAssetRef, when: zGate.optional() });
const zExpandSource = z.strictObject({
  expand: z.strictObject({ sample: zIdentifier, asset: z.string().min(1), seek_key: z.string().min(1) }),
  when: zGate.optional()
});
const zComputeSource = z.strictObject({ compute: z.enum(["cores", "mem", "time"]) });
const zLooperSource = z.strictObject({ looper: z.enum(["output_dir", "results_subdir"]) });

const zValueSource = z.union([zSampleSource, zRegistrySource, zExpandSource, zComputeSource, zLooperSource]);

const zValueArgument = z.strictObject({
  id: zIdentifier,
  flag: zFlag,
  required: z.boolean().default(false),
  from: z.array(zValueSource).min(1)
});

const zSwitchArgument = z.strictObject({
  id: zIdentifier,
  flag: zFlag,
  switch: zIdentifier
});

const zArgument = z.union([zSwitchArgument, zValueArgument]);

export const zPipelineInterfaceSpec = z.strictObject({
  pipeline_name: z.string().min(1),
  pipeline_type: z.literal("sample").default("sample"),
  path: z.string().min(1),
  command: z.array(zArgument).min(1),
  compute: z
    .strictObject({
      size_dependent_variables: z.string().min(1).optional(),
      default: z
        .strictObject({
          cores: z.number().int().min(1),
          mem: z.union([z.string().regex(/^[0-9]+$/), z.number().int().min(1)]),
          time: z.string().min(1).optional()
        })
        .optional()
    })
    .default({})
});

export type PipelineInterfaceSpec = z.infer<typeof zPipelineInterfaceSpec>;
export type ArgumentRule = PipelineInterfaceSpec["command"][number];
export type SwitchArgument = z.infer<typeof zSwitchArgument>;
export type ValueArgument = z.infer<typeof zValueArgument>;
export type ValueSource = z.infer<typeof zValueSource>;
export type SourceGate = z.infer<typeof zGate>;

export const FALLBACK_COMPUTE: Readonly<ComputeConfig> = Object.freeze({ cores: 1, mem: "8000" });

export function isSwitchArgument(rule: ArgumentRule): rule is SwitchArgument {
  return "switch" in rule;
}

function sourceGate(source: ValueSource): SourceGate | undefined {
  return "when" in source ? source.when : undefined;
}

function validateRules(spec: PipelineInterfaceSpec): void {
  const ids = new Set<string>();
  const flags = new Set<string>();

  for (const rule of spec.command) {
    if (ids.has(rule.id)) throw new PipelineInterfaceError(`duplicate argument id: ${rule.id}`);
    if (flags.has(rule.flag)) throw new PipelineInterfaceError(`duplicate flag: ${rule.flag} (${rule.id})`);

    if (!isSwitchArgument(rule)) {
      for (const source of rule.from) {
        const gate = sourceGate(source);
        if (!gate) continue;
        if (rule.required) {
          throw new PipelineInterfaceError(`${rule.id}: required arguments cannot have gated sources`);
        }
        for (const dep of gate.bound) {
          if (!ids.has(dep)) {
            throw new PipelineInterfaceError(`${rule.id}: gate depends on ${dep}, which is not declared before it`);
          }
        }
      }
    }

    ids.add(rule.id);
    flags.add(rule.flag);
  }
}

/**
 * A pipeline's command template as an ordered list of argument rules, plus
 * where the executable and its resource table live.
 */
export class PipelineInterface {
  readonly interfaceHash: Sha256Digest;

  constructor(
    readonly spec: PipelineInterfaceSpec,
    private readonly baseDir: string | null = null
  ) {
    validateRules(spec);
    this.interfaceHash = canonicalDigest(spec);
  }

  static fromObject(value: unknown, baseDir: string | null = null): PipelineInterface {
    const parsed = zPipelineInterfaceSpec.safeParse(value);
    if (!parsed.success) {
      throw new PipelineInterfaceError(`invalid pipeline interface: ${z.prettifyError(parsed.error)}`);
    }
    return new PipelineInterface(parsed.data, baseDir);
  }

  static async loadFromFile(filePath: string): Promise<PipelineInterface> {
    const raw = await fs.readFile(filePath, "utf8");
    try {
      return PipelineInterface.fromObject(YAML.parse(raw), path.dirname(path.resolve(filePath)));
    } catch (err) {
      if (err instanceof PipelineInterfaceError) {
        throw new PipelineInterfaceError(`${filePath}: ${err.message}`);
      }
      throw err;
    }
  }

  get pipelineName(): string {
    return this.spec.pipeline_name;
  }

  get rules(): readonly ArgumentRule[] {
    return this.spec.command;
  }

  executablePath(): string {
    const p = this.spec.path;
    if (this.baseDir === null || path.isAbsolute(p)) return p;
    return path.resolve(this.baseDir, p);
  }

  resourcesPath(): string | null {
    const rel = this.spec.compute.size_dependent_variables;
    if (!rel) return null;
    if (this.baseDir === null || path.isAbsolute(rel)) return rel;
    return path.resolve(this.baseDir, rel);
  }

  defaultCompute(): ComputeConfig {
    const d = this.spec.compute.default;
    if (!d) return { ...FALLBACK_COMPUTE };
    const compute: ComputeConfig = { cores: d.cores, mem: String(d.mem) };
    if (d.time !== undefined) compute.time = d.time;
    return compute;
  }

  /** Sample keys read by the required arguments. */
  requiredSampleKeys(): string[] {
    const keys: string[] = [];
    for (const rule of this.spec.command) {
      if (isSwitchArgument(rule) || !rule.required) continue;
      for (const source of rule.from) {
        if ("sample" in source) keys.push(source.sample);
      }
    }
    return keys;
  }
}
