import * as z from "zod/v4";
import { isBatchId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import { RUN_STATES, type BatchReport, type RunOutcome } from "../core/outcome.js";
import { DOWNLOAD_METHODS } from "../download/methods.js";

export const zBatchIdString = z.string().regex(/^batch_[0-9A-HJKMNP-TV-Z]{26}$/, "invalid batch_id");

export const zAttemptJson = z.object({
  method: z.enum(DOWNLOAD_METHODS),
  ok: z.boolean(),
  reused: z.boolean(),
  reason: z.string().nullable(),
  started_at: z.string(),
  finished_at: z.string()
});

export const zRunOutcomeJson = z.object({
  run: z.string(),
  state: z.enum(RUN_STATES),
  method: z.enum(DOWNLOAD_METHODS).nullable(),
  outputs: z.array(z.string()),
  skipped: z.array(z.string()),
  attempts: z.array(zAttemptJson),
  error: z.string().nullable()
});

export const zBatchReportJson = z.object({
  batch_id: zBatchIdString,
  command: z.enum(["get", "extract"]),
  started_at: z.string(),
  finished_at: z.string(),
  succeeded: z.number().int(),
  failed: z.number().int(),
  outcomes: z.array(zRunOutcomeJson)
});

function outcomeToJson(o: RunOutcome): JsonObject {
  return {
    run: o.runId,
    state: o.state,
    method: o.method,
    outputs: o.outputs,
    skipped: o.skipped,
    attempts: o.attempts.map((a) => ({
      method: a.method,
      ok: a.ok,
      reused: a.reused,
      reason: a.reason,
      started_at: a.startedAt,
      finished_at: a.finishedAt
    })),
    error: o.error
  };
}

export function batchReportToJson(report: BatchReport): JsonObject {
  return {
    batch_id: report.batchId,
    command: report.command,
    started_at: report.startedAt,
    finished_at: report.finishedAt,
    succeeded: report.succeeded,
    failed: report.failed,
    outcomes: report.outcomes.map(outcomeToJson)
  };
}

export function batchReportFromJson(value: unknown): BatchReport {
  const r = zBatchReportJson.parse(value);
  const batchId = r.batch_id;
  if (!isBatchId(batchId)) throw new Error(`invalid batch_id in stored report: ${batchId}`);
  return {
    batchId,
    command: r.command,
    startedAt: r.started_at,
    finishedAt: r.finished_at,
    succeeded: r.succeeded,
    failed: r.failed,
    outcomes: r.outcomes.map((o) => ({
      runId: o.run,
      state: o.state,
      method: o.method,
      outputs: o.outputs,
      skipped: o.skipped,
      error: o.error,
      attempts: o.attempts.map((a) => ({
        method: a.method,
        ok: a.ok,
        reused: a.reused,
        reason: a.reason,
        startedAt: a.started_at,
        finishedAt: a.finished_at
      }))
    }))
  };
}
