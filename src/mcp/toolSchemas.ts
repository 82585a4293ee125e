import * as z from "zod/v4";
import { zRawSample } from "../samples/sample.js";

const ulid26 = "[0-9A-HJKMNP-TV-Z]{26}";

export const zSubmissionId = z.string().regex(new RegExp(`^sub_${ulid26}$`), "invalid submission_id");
export const zBatchId = z.string().regex(new RegExp(`^batch_${ulid26}$`), "invalid batch_id");
export const zSha256 = z.string().regex(/^sha256:[a-f0-9]{64}$/);

export const zComputeInput = z.object({
  cores: z.number().int().min(1).max(1024).optional(),
  mem: z.string().regex(/^[0-9]+$/, "mem must be megabytes").optional(),
  time: z.string().min(1).max(64).optional()
});

export const zDiagnostic = z.object({
  code: z.enum(["unresolved_reference", "invalid_list_expansion"]),
  flag: z.string(),
  message: z.string()
});

export const zSubmissionSummary = z.object({
  submission_id: zSubmissionId,
  sample_name: z.string(),
  status: z.enum(["resolved", "failed"]),
  argv: z.array(z.string()).nullable(),
  command: z.string().nullable(),
  diagnostics: z.array(zDiagnostic),
  error: z.string().nullable(),
  replayed: z.boolean()
});

export const zPipelineCommandResolveInput = z.object({
  sample: zRawSample,
  compute: zComputeInput.optional(),
  output_dir: z.string().min(1).max(4096).optional()
});

export const zPipelineCommandResolveOutput = z.object({
  submission_id: zSubmissionId,
  sample_name: z.string(),
  argv: z.array(z.string()),
  command: z.string(),
  diagnostics: z.array(zDiagnostic),
  replayed: z.boolean(),
  warnings: z.array(z.string())
});

export const zProjectCommandsResolveInput = z.object({
  limit: z.number().int().min(1).max(10000).default(1000)
});

export const zProjectCommandsResolveOutput = z.object({
  batch_id: zBatchId,
  project_name: z.string(),
  resolved_count: z.number().int(),
  failed_count: z.number().int(),
  submissions: z.array(zSubmissionSummary),
  warnings: z.array(z.string())
});

export const zSubmissionGetInput = z.object({
  submission_id: zSubmissionId
});

export const zSubmissionGetOutput = z.object({
  submission: zSubmissionSummary.omit({ replayed: true }).extend({
    batch_id: zBatchId.nullable(),
    pipeline_name: z.string(),
    params_hash: zSha256,
    interface_hash: zSha256,
    registry_digest: zSha256,
    created_at: z.string()
  }),
  events: z.array(
    z.object({
      ts: z.string(),
      kind: z.string(),
      message: z.string().nullable()
    })
  )
});
