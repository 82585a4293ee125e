import { canonicalDigest, type Sha256Digest } from "../core/canonicalJson.js";
import { deriveSubmissionIdFromParts, type SubmissionId } from "../core/ids.js";

export interface SubmissionIdentityInput {
  pipelineName: string;
  interfaceHash: Sha256Digest;
  registryDigest: Sha256Digest;
  params: unknown;
}

export function deriveSubmissionIdentity(input: SubmissionIdentityInput): {
  submissionId: SubmissionId;
  paramsHash: Sha256Digest;
} {
  const paramsHash = canonicalDigest(input.params);
  const submissionId = deriveSubmissionIdFromParts([
    `pipeline=${input.pipelineName}`,
    `interface=${input.interfaceHash}`,
    `registry=${input.registryDigest}`,
    `params=${paramsHash}`
  ]);
  return { submissionId, paramsHash };
}
