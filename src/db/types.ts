import type { ColumnType, Generated, JSONColumnType } from "kysely";

type OptionalNullable<T> = ColumnType<T | null, T | null | undefined, T | null>;
type JsonObject = Record<string, unknown>;
type Json = JSONColumnType<JsonObject, JsonObject, JsonObject>;
type JsonNullable = JSONColumnType<JsonObject | null, JsonObject | null | undefined, JsonObject | null>;

export interface BatchesTable {
  batch_id: string;
  command: string;
  params_hash: string;
  policy_hash: string;
  params: Json;
  status: string;
  created_at: Generated<string>;
  finished_at: OptionalNullable<string>;
  report: JsonNullable;
}

export interface RunOutcomesTable {
  batch_id: string;
  run_accession: string;
  state: string;
  method: OptionalNullable<string>;
  // { paths: string[], skipped: string[] }; a bare array would be sent as a pg array literal
  outputs: Json;
  error: OptionalNullable<string>;
  updated_at: Generated<string>;
}

export interface RunAttemptsTable {
  attempt_id: Generated<number>;
  batch_id: string;
  run_accession: string;
  method: string;
  ok: boolean;
  reused: boolean;
  reason: OptionalNullable<string>;
  started_at: string;
  finished_at: string;
}

export interface RunEventsTable {
  event_id: Generated<number>;
  batch_id: string;
  run_accession: OptionalNullable<string>;
  ts: Generated<string>;
  kind: string;
  message: OptionalNullable<string>;
  data: JsonNullable;
}

export interface DB {
  batches: BatchesTable;
  run_outcomes: RunOutcomesTable;
  run_attempts: RunAttemptsTable;
  run_events: RunEventsTable;
}
