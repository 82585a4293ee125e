import type { ComputeConfig } from "../compute/resources.js";
import { newBatchId, type BatchId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { SubmissionEvent, SubmissionRecord, SubmissionStatus } from "../core/submission.js";
import { MissingRequiredAttributeError } from "../pipeline/errors.js";
import type { PipelineInterface } from "../pipeline/pipelineInterface.js";
import { CommandTemplateResolver, type LooperContext, type ResolvedCommand } from "../pipeline/resolver.js";
import type { AssetRegistry } from "../registry/assetRegistry.js";
import { sampleName, sampleToJson, type Sample } from "../samples/sample.js";
import type { PostgresStore } from "../store/postgresStore.js";
import { deriveSubmissionIdentity } from "./submissionIdentity.js";

export interface SubmissionInput {
  sample: Sample;
  compute: ComputeConfig;
  looper: LooperContext;
  /** Compute selection warnings; logged with the submission but not part of its identity. */
  computeWarnings?: readonly string[];
}

export interface SubmissionOutcome {
  record: SubmissionRecord;
  replayed: boolean;
}

/** Buffers a submission's events; they are persisted together with the submission row. */
class SubmissionLog {
  readonly events: SubmissionEvent[] = [];
  private readonly lines: string[] = [];

  event(kind: string, message: string, data: JsonObject | null): void {
    const ts = new Date().toISOString();
    this.events.push({ kind, message, data, ts });
    this.lines.push(JSON.stringify({ ts, kind, message, data }));
  }

  text(): string {
    return this.lines.join("\n") + "\n";
  }
}

export function computeToJson(compute: ComputeConfig): JsonObject {
  const out: JsonObject = { cores: compute.cores, mem: compute.mem };
  if (compute.time !== undefined) out.time = compute.time;
  return out;
}

export function resolvedToJson(resolved: ResolvedCommand): JsonObject {
  return {
    argv: [...resolved.argv],
    command: resolved.command,
    diagnostics: resolved.diagnostics.map((d) => ({ code: d.code, flag: d.flag, message: d.message }))
  };
}

export class SubmissionRecorder {
  private readonly resolver: CommandTemplateResolver;

  constructor(
    private readonly deps: {
      store: PostgresStore;
      pipeline: PipelineInterface;
      registry: AssetRegistry;
    }
  ) {
    this.resolver = new CommandTemplateResolver(deps.pipeline);
  }

  async record(input: SubmissionInput, batchId: BatchId | null = null): Promise<SubmissionOutcome> {
    const { store, pipeline, registry } = this.deps;
    const params: JsonObject = {
      sample: sampleToJson(input.sample),
      compute: computeToJson(input.compute),
      looper: { output_dir: input.looper.outputDir, results_subdir: input.looper.resultsSubdir }
    };
    const { submissionId, paramsHash } = deriveSubmissionIdentity({
      pipelineName: pipeline.pipelineName,
      interfaceHash: pipeline.interfaceHash,
      registryDigest: registry.digest,
      params
    });

    const existing = await store.getSubmission(submissionId);
    if (existing) return { record: existing, replayed: true };

    const log = new SubmissionLog();
    log.event("submission.started", `pipeline=${pipeline.pipelineName}`, {
      params_hash: paramsHash,
      interface_hash: pipeline.interfaceHash,
      registry_digest: registry.digest
    });
    for (const w of input.computeWarnings ?? []) {
      log.event("compute.warning", w, null);
    }

    let status: SubmissionStatus;
    let resolved: JsonObject | null = null;
    let error: string | null = null;
    try {
      const command = this.resolver.resolve({ registry, sample: input.sample, compute: input.compute, looper: input.looper });
      for (const d of command.diagnostics) {
        log.event("resolve.diagnostic", d.message, { code: d.code, flag: d.flag });
      }
      log.event("submission.resolved", `argv has ${command.argv.length} tokens`, null);
      resolved = resolvedToJson(command);
      status = "resolved";
    } catch (err) {
      if (!(err instanceof MissingRequiredAttributeError)) throw err;
      log.event("submission.failed", err.message, { code: err.code, missing: [...err.missing] });
      error = err.message;
      status = "failed";
    }

    const { record, inserted } = await store.createSubmission(
      {
        submissionId,
        batchId,
        pipelineName: pipeline.pipelineName,
        interfaceHash: pipeline.interfaceHash,
        registryDigest: registry.digest,
        paramsHash,
        sampleName: sampleName(input.sample) ?? "",
        status,
        params,
        resolved,
        error,
        logText: log.text()
      },
      log.events
    );
    return { record, replayed: !inserted };
  }

  /** Records every input under one batch id; a failed sample does not stop the rest. */
  async recordBatch(inputs: readonly SubmissionInput[]): Promise<{ batchId: BatchId; outcomes: SubmissionOutcome[] }> {
    const batchId = newBatchId();
    const outcomes: SubmissionOutcome[] = [];
    for (const input of inputs) {
      outcomes.push(await this.record(input, batchId));
    }
    return { batchId, outcomes };
  }
}
