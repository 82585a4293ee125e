import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import { selectCompute, type ComputeOverride } from "../src/compute/selectCompute.js";
import { loadPipelineRuntime } from "../src/config/loadRuntime.js";
import { resultsSubdirFor, runtimeConfigFromEnv } from "../src/config/runtimeConfig.js";
import { MissingRequiredAttributeError } from "../src/pipeline/errors.js";
import { resolveCommand, type ResolvedCommand } from "../src/pipeline/resolver.js";
import {
  renderSubmissionScript,
  SubmissionFileNames,
  SubmissionScriptError,
  type SubmissionTemplate
} from "../src/pipeline/submissionScript.js";
import { parseSample, sampleName, type Sample } from "../src/samples/sample.js";

function usage(): string {
  return [
    "usage:",
    "  tsx scripts/resolve_commands.ts --project <project_config.yaml> [options]",
    "  tsx scripts/resolve_commands.ts --sample <sample.json|sample.yaml> [options]",
    "",
    "options:",
    "  --interface <pipeline_interface.yaml>   (default: $PIPELINE_INTERFACE_PATH or pipelines/peppro/pipeline_interface.yaml)",
    "  --genomes <genome_config.yaml>          (default: $GENOME_CONFIG_PATH, then $REFGENIE)",
    "  --output-dir <dir>                      (default: project looper.output_dir, then $OUTPUT_DIR)",
    "  --cores <n> --mem <MB>                  override the selected compute package",
    "  --write-scripts [local|slurm]           write <output_dir>/submission/<pipeline>_<sample>.sub",
    ""
  ].join("\n");
}

const SWITCHES = new Set(["help"]);
const OPTIONAL_VALUE: Record<string, string> = { "write-scripts": "local" };

function parseArgs(argv: string[]): Record<string, string | boolean> {
  const out: Record<string, string | boolean> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a) continue;
    if (!a.startsWith("--")) throw new Error(`unexpected arg: ${a}`);
    const key = a.slice(2);
    if (SWITCHES.has(key)) {
      out[key] = true;
      continue;
    }
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) {
      const fallback = OPTIONAL_VALUE[key];
      if (fallback === undefined) throw new Error(`missing value for --${key}`);
      out[key] = fallback;
      continue;
    }
    out[key] = next;
    i++;
  }
  return out;
}

function stringArg(args: Record<string, string | boolean>, key: string): string | null {
  const v = args[key];
  return typeof v === "string" ? v : null;
}

function parseTemplate(value: string): SubmissionTemplate {
  if (value === "local" || value === "slurm") return value;
  throw new Error(`--write-scripts must be local or slurm (got ${value})`);
}

function parseOverride(args: Record<string, string | boolean>): ComputeOverride {
  const override: ComputeOverride = {};
  const cores = stringArg(args, "cores");
  if (cores !== null) {
    const n = Number(cores);
    if (!Number.isInteger(n) || n < 1) throw new Error(`--cores must be an integer >= 1 (got ${cores})`);
    override.cores = n;
  }
  const mem = stringArg(args, "mem");
  if (mem !== null) {
    if (!/^[0-9]+$/.test(mem)) throw new Error(`--mem must be an integer number of MB (got ${mem})`);
    override.mem = mem;
  }
  return override;
}

async function readSamplesFile(filePath: string): Promise<Sample[]> {
  const doc: unknown = YAML.parse(await fs.readFile(filePath, "utf8"));
  const items: unknown[] = Array.isArray(doc) ? doc : [doc];
  return items.map((item, i) => parseSample(item, `${filePath}[${i}]`));
}

function warn(message: string): void {
  process.stderr.write(`warning: ${message}\n`);
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(usage());
    return;
  }

  const projectPath = stringArg(args, "project");
  const samplePath = stringArg(args, "sample");
  if ((projectPath === null) === (samplePath === null)) {
    throw new Error(`exactly one of --project or --sample is required\n\n${usage()}`);
  }
  const writeScripts = stringArg(args, "write-scripts");
  const template = writeScripts === null ? null : parseTemplate(writeScripts);
  const override = parseOverride(args);

  const config = runtimeConfigFromEnv(process.env);
  const runtime = await loadPipelineRuntime(
    {
      pipelineInterfacePath: stringArg(args, "interface") ?? config.pipelineInterfacePath,
      genomeConfigPath: stringArg(args, "genomes") ?? config.genomeConfigPath,
      projectConfigPath: projectPath
    },
    process.env
  );
  const { pipeline, registry, resources, project } = runtime;
  if (!stringArg(args, "genomes") && !config.genomeConfigPath) {
    warn("no genome config (set --genomes, GENOME_CONFIG_PATH or REFGENIE); registry defaults are disabled");
  }
  for (const w of project?.warnings ?? []) warn(w);

  const samples = project ? project.samples : samplePath ? await readSamplesFile(samplePath) : [];
  const outputDir = path.resolve(stringArg(args, "output-dir") ?? project?.outputDir ?? config.outputDir);
  const looper = { outputDir, resultsSubdir: resultsSubdirFor(outputDir) };
  const submissionDir = path.join(outputDir, "submission");

  const fileNames = new SubmissionFileNames(pipeline.pipelineName);
  let failed = 0;
  for (const sample of samples) {
    const name = sampleName(sample) ?? "<unnamed>";
    const selected = await selectCompute({ sample, packages: resources, fallback: pipeline.defaultCompute(), override });
    for (const w of selected.warnings) warn(`${name}: ${w}`);

    let resolved: ResolvedCommand;
    try {
      resolved = resolveCommand(pipeline, { sample, registry, compute: selected.compute, looper });
    } catch (err) {
      if (!(err instanceof MissingRequiredAttributeError)) throw err;
      process.stderr.write(`error: ${err.message}\n`);
      failed++;
      continue;
    }
    for (const d of resolved.diagnostics) warn(`${name}: ${d.message}`);
    process.stdout.write(`${resolved.command}\n`);

    if (template) {
      let fileName: string;
      try {
        fileName = fileNames.claim(resolved.sampleName);
      } catch (err) {
        if (!(err instanceof SubmissionScriptError)) throw err;
        process.stderr.write(`error: ${err.message}\n`);
        failed++;
        continue;
      }
      const script = renderSubmissionScript({
        template,
        jobName: `${pipeline.pipelineName}_${resolved.sampleName}`,
        argv: resolved.argv,
        compute: selected.compute,
        logFile: path.join(submissionDir, fileName.replace(/\.sub$/, ".log"))
      });
      await fs.mkdir(submissionDir, { recursive: true });
      await fs.writeFile(path.join(submissionDir, fileName), script, { encoding: "utf8", mode: 0o755 });
    }
  }

  if (failed > 0) {
    process.stderr.write(`${failed}/${samples.length} samples failed\n`);
    process.exitCode = 1;
  }
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
