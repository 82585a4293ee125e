import type { Kysely, Selectable } from "kysely";
import type { Sha256Digest } from "../core/canonicalJson.js";
import { isBatchId, isSubmissionId, type BatchId, type SubmissionId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { SubmissionEvent, SubmissionRecord, SubmissionStatus } from "../core/submission.js";
import type { DB } from "../db/types.js";

function toIso(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string") return value;
  return new Date(String(value)).toISOString();
}

function asDigest(value: string, column: string): Sha256Digest {
  if (!/^sha256:[a-f0-9]{64}$/.test(value)) throw new Error(`corrupt ${column}: ${value}`);
  return `sha256:${value.slice("sha256:".length)}`;
}

function asStatus(value: string): SubmissionStatus {
  if (value === "resolved" || value === "failed") return value;
  throw new Error(`corrupt submission status: ${value}`);
}

export interface NewSubmission {
  submissionId: SubmissionId;
  batchId: BatchId | null;
  pipelineName: string;
  interfaceHash: Sha256Digest;
  registryDigest: Sha256Digest;
  paramsHash: Sha256Digest;
  sampleName: string;
  status: SubmissionStatus;
  params: JsonObject;
  resolved: JsonObject | null;
  error: string | null;
  logText: string;
}

export class PostgresStore {
  constructor(private readonly db: Kysely<DB>) {}

  /**
   * Inserts a submission and its events. When a submission with the same id
   * already exists, nothing is written and the stored record is returned with
   * `inserted: false`.
   */
  async createSubmission(
    input: NewSubmission,
    events: readonly SubmissionEvent[]
  ): Promise<{ record: SubmissionRecord; inserted: boolean }> {
    const written = await this.db
      .insertInto("submissions")
      .values({
        submission_id: input.submissionId,
        batch_id: input.batchId,
        pipeline_name: input.pipelineName,
        interface_hash: input.interfaceHash,
        registry_digest: input.registryDigest,
        params_hash: input.paramsHash,
        sample_name: input.sampleName,
        status: input.status,
        params: input.params,
        resolved: input.resolved,
        error: input.error,
        log_text: input.logText
      })
      .onConflict((oc) => oc.column("submission_id").doNothing())
      .returning("submission_id")
      .executeTakeFirst();

    if (written) {
      for (const e of events) {
        await this.addSubmissionEvent(input.submissionId, e);
      }
    }

    const row = await this.db
      .selectFrom("submissions")
      .selectAll()
      .where("submission_id", "=", input.submissionId)
      .executeTakeFirstOrThrow();
    return { record: this.mapSubmission(row), inserted: written !== undefined };
  }

  async addSubmissionEvent(submissionId: SubmissionId, event: SubmissionEvent): Promise<void> {
    await this.db
      .insertInto("submission_events")
      .values({
        submission_id: submissionId,
        ts: event.ts,
        kind: event.kind,
        message: event.message,
        data: event.data
      })
      .execute();
  }

  async getSubmission(submissionId: SubmissionId): Promise<SubmissionRecord | null> {
    const row = await this.db
      .selectFrom("submissions")
      .selectAll()
      .where("submission_id", "=", submissionId)
      .executeTakeFirst();
    return row ? this.mapSubmission(row) : null;
  }

  async listBatch(batchId: BatchId): Promise<SubmissionRecord[]> {
    const rows = await this.db
      .selectFrom("submissions")
      .selectAll()
      .where("batch_id", "=", batchId)
      .orderBy("sample_name", "asc")
      .execute();
    return rows.map((r) => this.mapSubmission(r));
  }

  async listEvents(submissionId: SubmissionId): Promise<SubmissionEvent[]> {
    const rows = await this.db
      .selectFrom("submission_events")
      .selectAll()
      .where("submission_id", "=", submissionId)
      .orderBy("event_id", "asc")
      .execute();
    return rows.map((r) => ({
      kind: r.kind,
      message: r.message,
      data: r.data,
      ts: toIso(r.ts)
    }));
  }

  private mapSubmission(row: Selectable<DB["submissions"]>): SubmissionRecord {
    if (!isSubmissionId(row.submission_id)) throw new Error(`corrupt submission_id: ${row.submission_id}`);
    const batchId = row.batch_id;
    if (batchId !== null && !isBatchId(batchId)) throw new Error(`corrupt batch_id: ${batchId}`);

    return {
      submissionId: row.submission_id,
      batchId,
      pipelineName: row.pipeline_name,
      interfaceHash: asDigest(row.interface_hash, "interface_hash"),
      registryDigest: asDigest(row.registry_digest, "registry_digest"),
      paramsHash: asDigest(row.params_hash, "params_hash"),
      sampleName: row.sample_name,
      status: asStatus(row.status),
      params: row.params,
      resolved: row.resolved,
      error: row.error,
      logText: row.log_text,
      createdAt: toIso(row.created_at)
    };
  }
}
