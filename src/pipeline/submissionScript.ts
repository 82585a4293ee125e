import path from "path";
import type { ComputeConfig } from "../compute/resources.js";
import { bashSingleQuote, renderCommandLine } from "./shell.js";

export type SubmissionTemplate = "local" | "slurm";

export interface SubmissionScriptInput {
  template: SubmissionTemplate;
  jobName: string;
  argv: readonly string[];
  compute: ComputeConfig;
  logFile: string;
}

const JOB_NAME_MAX = 128;

function sanitizeJobName(name: string): string {
  const cleaned = name.replace(/[^A-Za-z0-9_.-]/g, "_").slice(0, JOB_NAME_MAX);
  return cleaned.length > 0 ? cleaned : "job";
}

export function submissionFileName(pipelineName: string, sampleName: string): string {
  return `${sanitizeJobName(`${pipelineName}_${sampleName}`)}.sub`;
}

export class SubmissionScriptError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SubmissionScriptError";
  }
}

/** Hands out `.sub` file names for one output directory; two samples may not share one. */
export class SubmissionFileNames {
  private readonly owners = new Map<string, string>();

  constructor(private readonly pipelineName: string) {}

  claim(sampleName: string): string {
    const fileName = submissionFileName(this.pipelineName, sampleName);
    const owner = this.owners.get(fileName);
    if (owner !== undefined && owner !== sampleName) {
      throw new SubmissionScriptError(`samples ${owner} and ${sampleName} both map to submission file ${fileName}`);
    }
    this.owners.set(fileName, sampleName);
    return fileName;
  }
}

export function renderSubmissionScript(input: SubmissionScriptInput): string {
  if (input.argv.length < 1) throw new Error("argv must be non-empty");
  const jobName = sanitizeJobName(input.jobName);
  const logFile = path.resolve(input.logFile);

  const lines: string[] = ["#!/usr/bin/env bash"];
  if (input.template === "slurm") {
    lines.push(`#SBATCH --job-name=${jobName}`);
    lines.push(`#SBATCH --output=${logFile}`);
    lines.push(`#SBATCH --cpus-per-task=${input.compute.cores}`);
    lines.push(`#SBATCH --mem=${input.compute.mem}M`);
    if (input.compute.time) lines.push(`#SBATCH --time=${input.compute.time}`);
    lines.push("");
    lines.push("set -euo pipefail");
    lines.push("");
    lines.push(renderCommandLine(input.argv));
  } else {
    lines.push("");
    lines.push("set -euo pipefail");
    lines.push("");
    lines.push(`LOG_FILE=${bashSingleQuote(logFile)}`);
    lines.push(`mkdir -p "$(dirname "$LOG_FILE")"`);
    lines.push(`${renderCommandLine(input.argv)} >"$LOG_FILE" 2>&1`);
  }
  lines.push("");
  return lines.join("\n");
}
