import type { ColumnType, Generated, JSONColumnType } from "kysely";
import type { JsonObject } from "../core/json.js";

type OptionalNullable<T> = ColumnType<T | null, T | null | undefined, T | null>;
type Json = JSONColumnType<JsonObject, JsonObject, JsonObject>;
type JsonNullable = JSONColumnType<JsonObject | null, JsonObject | null | undefined, JsonObject | null>;

export interface SubmissionsTable {
  submission_id: string;
  batch_id: OptionalNullable<string>;
  pipeline_name: string;
  interface_hash: string;
  registry_digest: string;
  params_hash: string;
  sample_name: string;
  status: string;
  params: Json;
  resolved: JsonNullable;
  error: OptionalNullable<string>;
  log_text: OptionalNullable<string>;
  created_at: Generated<string>;
}

export interface SubmissionEventsTable {
  event_id: Generated<string>;
  submission_id: string;
  ts: Generated<string>;
  kind: string;
  message: OptionalNullable<string>;
  data: JsonNullable;
}

export interface DB {
  submissions: SubmissionsTable;
  submission_events: SubmissionEventsTable;
}
