import { describe, it, expect } from "vitest";
import { newBatchId } from "../src/core/ids.js";
import type { BatchReport, RunOutcome } from "../src/core/outcome.js";
import { assertTransition, isTerminalState } from "../src/core/outcome.js";
import { BatchLedger } from "../src/runs/batchLedger.js";
import { batchReportFromJson, batchReportToJson } from "../src/runs/reportJson.js";
import { openStore } from "../src/services.js";
import { quietContext } from "./helpers/fakes.js";

const HASH = "sha256:0000000000000000000000000000000000000000000000000000000000000000" as const;

function outcome(overrides: Partial<RunOutcome> = {}): RunOutcome {
  return { runId: "SRR000001", state: "pending", outputs: [], skipped: [], attempts: [], method: null, error: null, ...overrides };
}

describe("run states", () => {
  it("allows only forward transitions", () => {
    expect(() => assertTransition("pending", "downloading")).not.toThrow();
    expect(() => assertTransition("pending", "complete")).not.toThrow();
    expect(() => assertTransition("downloaded", "complete")).toThrow("illegal run state transition: downloaded -> complete");
    expect(() => assertTransition("complete", "extracting")).toThrow();
    expect(isTerminalState("download_failed")).toBe(true);
    expect(isTerminalState("extracting")).toBe(false);
  });
});

describe("BatchLedger", () => {
  it("records a batch, its runs and its final report", async () => {
    const { store, db } = await openStore({});
    try {
      const lines: string[] = [];
      const batchId = newBatchId();
      const ledger = new BatchLedger(
        { store, ctx: quietContext(lines) },
        { batchId, command: "get", paramsHash: HASH, canonicalParams: { runs: ["SRR000001", "SRR000002"] }, policyHash: HASH }
      );
      await ledger.start(2);
      expect((await store.getBatch(batchId))?.status).toBe("running");

      await ledger.outcome(outcome({ runId: "SRR000002" }));
      await ledger.outcome(outcome());
      await ledger.event("SRR000001", "info", "run.downloading", "pending -> downloading", { from: "pending", to: "downloading" });
      const attempt = {
        method: "aws-http" as const,
        ok: true,
        reused: false,
        reason: null,
        startedAt: "2026-01-01T00:00:00.000Z",
        finishedAt: "2026-01-01T00:00:01.000Z"
      };
      await ledger.attempt("SRR000001", attempt);
      const done = outcome({ state: "complete", method: "aws-http", outputs: ["/out/SRR000001.fastq"], attempts: [attempt] });
      await ledger.outcome(done);

      const rows = await store.listRunOutcomes(batchId);
      expect(rows.map((r) => [r.runId, r.state])).toEqual([
        ["SRR000001", "complete"],
        ["SRR000002", "pending"]
      ]);
      expect(rows[0]?.outputs).toEqual(["/out/SRR000001.fastq"]);

      const report: BatchReport = {
        batchId,
        command: "get",
        startedAt: "2026-01-01T00:00:00.000Z",
        finishedAt: "2026-01-01T00:00:02.000Z",
        outcomes: [done, outcome({ runId: "SRR000002", state: "download_failed", error: "all download methods failed" })],
        succeeded: 1,
        failed: 1
      };
      await ledger.finish(report);

      const batch = await store.getBatch(batchId);
      expect(batch?.status).toBe("failed");
      expect(batch?.params).toEqual({ runs: ["SRR000001", "SRR000002"] });
      expect(batch?.report).toEqual(report);

      const events = await store.listRunEvents(batchId);
      expect(events.map((e) => [e.runId, e.kind])).toEqual([
        [null, "batch.started"],
        ["SRR000001", "run.downloading"],
        [null, "batch.failed"]
      ]);
      expect((await store.listRunEvents(batchId, "SRR000001")).map((e) => e.data)).toEqual([{ from: "pending", to: "downloading" }]);
      expect(lines.map((l) => JSON.parse(l).kind)).toEqual(["batch.started", "run.downloading", "batch.failed"]);
      expect(await store.getBatch(newBatchId())).toBeNull();
    } finally {
      await db.destroy();
    }
  });

  it("works without a store", async () => {
    const lines: string[] = [];
    const ledger = new BatchLedger(
      { store: null, ctx: quietContext(lines) },
      { batchId: newBatchId(), command: "extract", paramsHash: HASH, canonicalParams: {}, policyHash: HASH }
    );
    await ledger.start(0);
    await ledger.outcome(outcome());
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({ level: "info", kind: "batch.started", message: "extract: 0 run(s)" });
  });
});

describe("report json", () => {
  it("reads back what it writes", () => {
    const report: BatchReport = {
      batchId: newBatchId(),
      command: "extract",
      startedAt: "2026-01-01T00:00:00.000Z",
      finishedAt: "2026-01-01T00:00:01.000Z",
      outcomes: [outcome({ state: "complete", skipped: ["/out/SRR000001.fasta"] })],
      succeeded: 1,
      failed: 0
    };
    const json = batchReportToJson(report);
    expect(json["outcomes"]).toEqual([
      { run: "SRR000001", state: "complete", method: null, outputs: [], skipped: ["/out/SRR000001.fasta"], attempts: [], error: null }
    ]);
    expect(batchReportFromJson(json)).toEqual(report);
    expect(() => batchReportFromJson({ ...json, batch_id: "batch_x" })).toThrow();
  });
});
