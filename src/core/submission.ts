import type { Sha256Digest } from "./canonicalJson.js";
import type { BatchId, SubmissionId } from "./ids.js";
import type { JsonObject } from "./json.js";

export type SubmissionStatus = "resolved" | "failed";

export interface SubmissionRecord {
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
  logText: string | null;
  createdAt: string;
}

export interface SubmissionEvent {
  kind: string;
  message: string | null;
  data: JsonObject | null;
  ts: string;
}
