import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import * as z from "zod/v4";
import { isSubmissionId } from "../core/ids.js";
import type { SubmissionRecord } from "../core/submission.js";
import type { PipelineRuntime } from "../config/loadRuntime.js";
import { resultsSubdirFor } from "../config/runtimeConfig.js";
import { selectCompute } from "../compute/selectCompute.js";
import type { LooperContext } from "../pipeline/resolver.js";
import { sampleName, toSample, type Sample } from "../samples/sample.js";
import type { PostgresStore } from "../store/postgresStore.js";
import { SubmissionRecorder, type SubmissionInput } from "../submissions/submissionRecorder.js";
import {
  zDiagnostic,
  zPipelineCommandResolveInput,
  zPipelineCommandResolveOutput,
  zProjectCommandsResolveInput,
  zProjectCommandsResolveOutput,
  zSubmissionGetInput,
  zSubmissionGetOutput
} from "./toolSchemas.js";

export interface GatewayDeps {
  store: PostgresStore;
  runtime: PipelineRuntime;
  outputDir: string;
}

const zStoredResolution = z.object({
  argv: z.array(z.string()),
  command: z.string(),
  diagnostics: z.array(zDiagnostic)
});

type StoredResolution = z.infer<typeof zStoredResolution>;

function storedResolution(record: SubmissionRecord): StoredResolution | null {
  if (!record.resolved) return null;
  const parsed = zStoredResolution.safeParse(record.resolved);
  if (!parsed.success) throw new Error(`submission ${record.submissionId} has a corrupt resolution`);
  return parsed.data;
}

function toSubmissionSummary(record: SubmissionRecord) {
  const resolution = storedResolution(record);
  return {
    submission_id: record.submissionId,
    sample_name: record.sampleName,
    status: record.status,
    argv: resolution?.argv ?? null,
    command: resolution?.command ?? null,
    diagnostics: resolution?.diagnostics ?? [],
    error: record.error
  };
}

function looperContext(outputDir: string): LooperContext {
  return { outputDir, resultsSubdir: resultsSubdirFor(outputDir) };
}

export function createGatewayServer(deps: GatewayDeps): McpServer {
  const mcp = new McpServer({
    name: "peprun-gateway",
    version: "0.1.0"
  });

  const { pipeline, registry, resources, project } = deps.runtime;
  const recorder = new SubmissionRecorder({ store: deps.store, pipeline, registry });

  async function submissionInput(
    sample: Sample,
    outputDir: string,
    override?: { cores?: number; mem?: string; time?: string }
  ): Promise<{ input: SubmissionInput; warnings: string[] }> {
    const selected = await selectCompute({ sample, packages: resources, fallback: pipeline.defaultCompute(), override });
    return {
      input: { sample, compute: selected.compute, looper: looperContext(outputDir), computeWarnings: selected.warnings },
      warnings: selected.warnings
    };
  }

  mcp.registerTool(
    "pipeline_command_resolve",
    {
      description: `Resolve the ${pipeline.pipelineName} command line for one sample (registry defaults, sample overrides win).`,
      inputSchema: zPipelineCommandResolveInput,
      outputSchema: zPipelineCommandResolveOutput
    },
    async (args) => {
      const sample = toSample(args.sample);
      const { input, warnings } = await submissionInput(sample, args.output_dir ?? deps.outputDir, args.compute);
      const outcome = await recorder.record(input);
      const summary = toSubmissionSummary(outcome.record);

      if (summary.status === "failed" || summary.argv === null || summary.command === null) {
        throw new McpError(ErrorCode.InvalidParams, outcome.record.error ?? `resolution failed for ${summary.sample_name}`);
      }

      const structured = {
        submission_id: summary.submission_id,
        sample_name: summary.sample_name,
        argv: summary.argv,
        command: summary.command,
        diagnostics: summary.diagnostics,
        replayed: outcome.replayed,
        warnings
      };
      return {
        content: [{ type: "text", text: summary.command }],
        structuredContent: structured
      };
    }
  );

  mcp.registerTool(
    "project_commands_resolve",
    {
      description: "Resolve command lines for every sample of the configured PEP project as one batch.",
      inputSchema: zProjectCommandsResolveInput,
      outputSchema: zProjectCommandsResolveOutput
    },
    async (args) => {
      if (!project) {
        throw new McpError(ErrorCode.InvalidRequest, "no project configured (set PROJECT_CONFIG_PATH)");
      }
      const outputDir = project.outputDir ?? deps.outputDir;
      const warnings = [...project.warnings];
      const inputs: SubmissionInput[] = [];
      for (const sample of project.samples.slice(0, args.limit)) {
        const prepared = await submissionInput(sample, outputDir);
        warnings.push(...prepared.warnings.map((w) => `${sampleName(sample) ?? "<unnamed>"}: ${w}`));
        inputs.push(prepared.input);
      }

      const { batchId, outcomes } = await recorder.recordBatch(inputs);
      const submissions = outcomes.map((o) => ({ ...toSubmissionSummary(o.record), replayed: o.replayed }));
      const failed = submissions.filter((s) => s.status === "failed").length;

      return {
        content: [{ type: "text", text: `Resolved ${submissions.length - failed}/${submissions.length} samples (${batchId})` }],
        structuredContent: {
          batch_id: batchId,
          project_name: project.name,
          resolved_count: submissions.length - failed,
          failed_count: failed,
          submissions,
          warnings
        }
      };
    }
  );

  mcp.registerTool(
    "submission_get",
    {
      description: "Fetch a recorded submission and its event log.",
      inputSchema: zSubmissionGetInput,
      outputSchema: zSubmissionGetOutput
    },
    async (args) => {
      if (!isSubmissionId(args.submission_id)) {
        throw new McpError(ErrorCode.InvalidParams, `invalid submission_id: ${args.submission_id}`);
      }
      const record = await deps.store.getSubmission(args.submission_id);
      if (!record) {
        throw new McpError(ErrorCode.InvalidParams, `unknown submission_id: ${args.submission_id}`);
      }
      const events = await deps.store.listEvents(record.submissionId);
      const summary = toSubmissionSummary(record);

      return {
        content: [{ type: "text", text: `${record.submissionId} ${record.status}` }],
        structuredContent: {
          submission: {
            ...summary,
            batch_id: record.batchId,
            pipeline_name: record.pipelineName,
            params_hash: record.paramsHash,
            interface_hash: record.interfaceHash,
            registry_digest: record.registryDigest,
            created_at: record.createdAt
          },
          events: events.map((e) => ({ ts: e.ts, kind: e.kind, message: e.message }))
        }
      };
    }
  );

  return mcp;
}
