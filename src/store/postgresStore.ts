import type { Kysely, Selectable } from "kysely";
import type { BatchId, RunAccession } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import { isRunState, type AttemptRecord, type BatchReport, type RunState } from "../core/outcome.js";
import type { DB, RunEventsTable } from "../db/types.js";
import { batchReportFromJson, batchReportToJson } from "../runs/reportJson.js";

function toIso(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string") return value;
  return new Date(String(value)).toISOString();
}

function toIsoOrNull(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return toIso(value);
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];
}

export type BatchStatus = "running" | "succeeded" | "failed";

export interface BatchRecord {
  batchId: BatchId;
  command: string;
  paramsHash: string;
  policyHash: string;
  params: Record<string, unknown>;
  status: BatchStatus;
  createdAt: string;
  finishedAt: string | null;
  report: BatchReport | null;
}

export interface RunOutcomeRow {
  runId: RunAccession;
  state: RunState;
  method: string | null;
  outputs: string[];
  skipped: string[];
  error: string | null;
  updatedAt: string;
}

export interface RunEventRecord {
  eventId: number;
  runId: RunAccession | null;
  ts: string;
  kind: string;
  message: string | null;
  data: Record<string, unknown> | null;
}

export class PostgresStore {
  constructor(private readonly db: Kysely<DB>) {}

  async createBatch(input: {
    batchId: BatchId;
    command: string;
    paramsHash: `sha256:${string}`;
    policyHash: `sha256:${string}`;
    params: JsonObject;
  }): Promise<void> {
    await this.db
      .insertInto("batches")
      .values({
        batch_id: input.batchId,
        command: input.command,
        params_hash: input.paramsHash,
        policy_hash: input.policyHash,
        params: input.params,
        status: "running"
      })
      .onConflict((oc) => oc.column("batch_id").doNothing())
      .execute();
  }

  async finishBatch(batchId: BatchId, status: Exclude<BatchStatus, "running">, report: BatchReport): Promise<void> {
    await this.db
      .updateTable("batches")
      .set({ status, finished_at: report.finishedAt, report: batchReportToJson(report) })
      .where("batch_id", "=", batchId)
      .execute();
  }

  async getBatch(batchId: BatchId): Promise<BatchRecord | null> {
    const row = await this.db.selectFrom("batches").selectAll().where("batch_id", "=", batchId).executeTakeFirst();
    if (!row) return null;
    const status = row.status === "succeeded" || row.status === "failed" ? row.status : "running";
    return {
      batchId,
      command: row.command,
      paramsHash: row.params_hash,
      policyHash: row.policy_hash,
      params: row.params,
      status,
      createdAt: toIso(row.created_at),
      finishedAt: toIsoOrNull(row.finished_at),
      report: row.report ? batchReportFromJson(row.report) : null
    };
  }

  /** One row per run and batch; later states overwrite earlier ones. */
  async saveRunOutcome(
    batchId: BatchId,
    outcome: { runId: RunAccession; state: RunState; method: string | null; outputs: string[]; skipped: string[]; error: string | null }
  ): Promise<void> {
    const values = {
      state: outcome.state,
      method: outcome.method,
      outputs: { paths: outcome.outputs, skipped: outcome.skipped },
      error: outcome.error,
      updated_at: new Date().toISOString()
    };
    const existing = await this.db
      .selectFrom("run_outcomes")
      .select("run_accession")
      .where("batch_id", "=", batchId)
      .where("run_accession", "=", outcome.runId)
      .executeTakeFirst();

    if (existing) {
      await this.db
        .updateTable("run_outcomes")
        .set(values)
        .where("batch_id", "=", batchId)
        .where("run_accession", "=", outcome.runId)
        .execute();
      return;
    }
    await this.db
      .insertInto("run_outcomes")
      .values({ batch_id: batchId, run_accession: outcome.runId, ...values })
      .execute();
  }

  async listRunOutcomes(batchId: BatchId): Promise<RunOutcomeRow[]> {
    const rows = await this.db
      .selectFrom("run_outcomes")
      .selectAll()
      .where("batch_id", "=", batchId)
      .orderBy("run_accession", "asc")
      .execute();
    return rows.map((row) => {
      const state = row.state;
      if (!isRunState(state)) throw new Error(`unknown run state in ledger: ${state}`);
      return {
        runId: row.run_accession,
        state,
        method: row.method,
        outputs: stringList(row.outputs["paths"]),
        skipped: stringList(row.outputs["skipped"]),
        error: row.error,
        updatedAt: toIso(row.updated_at)
      };
    });
  }

  async addRunAttempt(batchId: BatchId, runId: RunAccession, attempt: AttemptRecord): Promise<void> {
    await this.db
      .insertInto("run_attempts")
      .values({
        batch_id: batchId,
        run_accession: runId,
        method: attempt.method,
        ok: attempt.ok,
        reused: attempt.reused,
        reason: attempt.reason,
        started_at: attempt.startedAt,
        finished_at: attempt.finishedAt
      })
      .execute();
  }

  async listRunAttempts(batchId: BatchId, runId: RunAccession): Promise<Array<{ method: string; ok: boolean; reason: string | null }>> {
    const rows = await this.db
      .selectFrom("run_attempts")
      .select(["method", "ok", "reason"])
      .where("batch_id", "=", batchId)
      .where("run_accession", "=", runId)
      .orderBy("attempt_id", "asc")
      .execute();
    return rows;
  }

  async addRunEvent(
    batchId: BatchId,
    runId: RunAccession | null,
    kind: string,
    message: string | null,
    data: JsonObject | null
  ): Promise<void> {
    await this.db
      .insertInto("run_events")
      .values({
        batch_id: batchId,
        run_accession: runId,
        kind,
        message,
        data: data ?? null
      })
      .execute();
  }

  async listRunEvents(batchId: BatchId, runId?: RunAccession): Promise<RunEventRecord[]> {
    let q = this.db.selectFrom("run_events").selectAll().where("batch_id", "=", batchId);
    if (runId !== undefined) q = q.where("run_accession", "=", runId);
    const rows = await q.orderBy("event_id", "asc").execute();
    return rows.map(mapEvent);
  }
}

function mapEvent(row: Selectable<RunEventsTable>): RunEventRecord {
  return {
    eventId: Number(row.event_id),
    runId: row.run_accession,
    ts: toIso(row.ts),
    kind: row.kind,
    message: row.message,
    data: row.data
  };
}
