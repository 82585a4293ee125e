import type { ComputeConfig } from "../compute/resources.js";
import type { AssetRegistry } from "../registry/assetRegistry.js";
import { attributeTokens, hasAttribute, sampleName, scalarAttribute, type Sample } from "../samples/sample.js";
import {
  InvalidListExpansionError,
  MissingRequiredAttributeError,
  UnresolvedReferenceError,
  type ResolutionDiagnostic
} from "./errors.js";
import {
  isSwitchArgument,
  type ArgumentRule,
  type PipelineInterface,
  type SourceGate,
  type ValueArgument,
  type ValueSource
} from "./pipelineInterface.js";
import { renderCommandLine } from "./shell.js";

export interface LooperContext {
  outputDir: string;
  resultsSubdir: string;
}

export interface ResolveInput {
  sample: Sample;
  registry: AssetRegistry;
  compute: ComputeConfig;
  looper: LooperContext;
}

export interface ResolvedCommand {
  readonly sampleName: string;
  readonly argv: readonly string[];
  readonly command: string;
  readonly diagnostics: readonly ResolutionDiagnostic[];
}

interface SourceOutcome {
  values: string[];
  diagnostics: ResolutionDiagnostic[];
}

const NOTHING: SourceOutcome = { values: [], diagnostics: [] };

function nonEmpty(value: string | null): string[] {
  return value !== null && value.length > 0 ? [value] : [];
}

function splitNames(sample: Sample, key: string): string[] {
  return attributeTokens(sample, key).flatMap((v) => v.split(/\s+/).filter((s) => s.length > 0));
}

/**
 * Evaluates a pipeline interface's argument rules against one sample.
 * Pure: the same input always yields the same tokens, and inputs are never mutated.
 */
export class CommandTemplateResolver {
  constructor(private readonly pipeline: PipelineInterface) {}

  resolve(input: ResolveInput): ResolvedCommand {
    const { sample } = input;
    const bound = new Map<string, string[]>();
    const rules = this.pipeline.rules;
    const required = rules.filter((r) => !isSwitchArgument(r) && r.required);
    const optional = rules.filter((r) => isSwitchArgument(r) || !r.required);

    const missing: string[] = [];
    let firstMissingFlag: string | null = null;
    for (const rule of required) {
      if (isSwitchArgument(rule)) continue;
      const values = this.bindValue(rule, input, bound).values;
      if (values.length > 0) {
        bound.set(rule.id, values);
        continue;
      }
      firstMissingFlag ??= rule.flag;
      const keys = rule.from.flatMap((source) => ("sample" in source ? [source.sample] : []));
      for (const key of keys.length > 0 ? keys : [rule.id]) {
        if (!missing.includes(key)) missing.push(key);
      }
    }
    if (firstMissingFlag !== null) {
      throw new MissingRequiredAttributeError(sampleName(sample), missing, firstMissingFlag);
    }

    const diagnostics: ResolutionDiagnostic[] = [];
    for (const rule of optional) {
      if (isSwitchArgument(rule)) {
        if (hasAttribute(sample, rule.switch)) bound.set(rule.id, []);
        continue;
      }
      const outcome = this.bindValue(rule, input, bound);
      diagnostics.push(...outcome.diagnostics);
      if (outcome.values.length > 0) bound.set(rule.id, outcome.values);
    }

    const argv: string[] = [this.pipeline.executablePath()];
    for (const rule of [...required, ...optional]) {
      const values = bound.get(rule.id);
      if (values === undefined) continue;
      argv.push(rule.flag, ...values);
    }

    return Object.freeze({
      sampleName: sampleName(sample) ?? "",
      argv: Object.freeze(argv),
      command: renderCommandLine(argv),
      diagnostics: Object.freeze(diagnostics)
    });
  }

  private bindValue(rule: ValueArgument, input: ResolveInput, bound: ReadonlyMap<string, string[]>): SourceOutcome {
    const diagnostics: ResolutionDiagnostic[] = [];
    for (const source of rule.from) {
      if ("when" in source && !gateOpen(source.when, input.sample, bound)) continue;
      const outcome = this.evaluate(rule, source, input);
      if (outcome.values.length > 0) {
        // Skipped list entries are reported even when the expansion binds.
        return { values: outcome.values, diagnostics: outcome.diagnostics };
      }
      diagnostics.push(...outcome.diagnostics);
    }
    return { values: [], diagnostics };
  }

  private evaluate(rule: ArgumentRule, source: ValueSource, input: ResolveInput): SourceOutcome {
    const { sample, registry, compute, looper } = input;

    if ("sample" in source) {
      return { values: attributeTokens(sample, source.sample), diagnostics: [] };
    }

    if ("registry" in source) {
      const { asset, seek_key: seekKey } = source.registry;
      const genome = scalarAttribute(sample, "genome");
      const values = genome === null ? [] : nonEmpty(registry.seek(genome, asset, seekKey));
      if (values.length > 0) return { values, diagnostics: [] };
      return { values: [], diagnostics: [new UnresolvedReferenceError(rule.flag, genome, asset, seekKey)] };
    }

    if ("expand" in source) {
      const { sample: key, asset, seek_key: seekKey } = source.expand;
      const values: string[] = [];
      const diagnostics: ResolutionDiagnostic[] = [];
      for (const name of splitNames(sample, key)) {
        const target = registry.seek(name, asset, seekKey);
        if (target === null || target.length === 0) {
          diagnostics.push(new InvalidListExpansionError(rule.flag, name, asset, seekKey));
          continue;
        }
        values.push(`${name}=${target}`);
      }
      return { values, diagnostics };
    }

    if ("compute" in source) {
      if (source.compute === "cores") return { values: [String(compute.cores)], diagnostics: [] };
      if (source.compute === "mem") return { values: nonEmpty(compute.mem), diagnostics: [] };
      return { values: nonEmpty(compute.time ?? null), diagnostics: [] };
    }

    if ("looper" in source) {
      const value = source.looper === "output_dir" ? looper.outputDir : looper.resultsSubdir;
      return { values: nonEmpty(value), diagnostics: [] };
    }

    return NOTHING;
  }
}

function gateOpen(gate: SourceGate | undefined, sample: Sample, bound: ReadonlyMap<string, string[]>): boolean {
  if (!gate) return true;
  return gate.present.every((key) => hasAttribute(sample, key)) && gate.bound.every((id) => bound.has(id));
}

export function resolveCommand(pipeline: PipelineInterface, input: ResolveInput): ResolvedCommand {
  return new CommandTemplateResolver(pipeline).resolve(input);
}
