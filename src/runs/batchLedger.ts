import type { BatchId, RunAccession } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { AttemptRecord, BatchReport, RunOutcome } from "../core/outcome.js";
import type { PostgresStore } from "../store/postgresStore.js";
import type { InvocationContext, Verbosity } from "./invocationContext.js";

/**
 * Records one batch: its parameters, every run transition and attempt, and
 * the final report. Every event also goes to the invocation log; the store is
 * optional so a batch can run without persistence.
 */
export class BatchLedger {
  readonly batchId: BatchId;

  constructor(
    private readonly deps: {
      store: PostgresStore | null;
      ctx: InvocationContext;
    },
    private readonly info: {
      batchId: BatchId;
      command: BatchReport["command"];
      paramsHash: `sha256:${string}`;
      canonicalParams: JsonObject;
      policyHash: `sha256:${string}`;
    }
  ) {
    this.batchId = info.batchId;
  }

  async start(runCount: number): Promise<void> {
    await this.deps.store?.createBatch({
      batchId: this.batchId,
      command: this.info.command,
      paramsHash: this.info.paramsHash,
      policyHash: this.info.policyHash,
      params: this.info.canonicalParams
    });
    await this.event(null, "info", "batch.started", `${this.info.command}: ${runCount} run(s)`, {
      batch_id: this.batchId,
      params_hash: this.info.paramsHash,
      policy_hash: this.info.policyHash
    });
  }

  async event(
    runId: RunAccession | null,
    level: Verbosity,
    kind: string,
    message: string,
    data: JsonObject | null = null
  ): Promise<void> {
    this.deps.ctx.log(level, kind, message, runId ? { run: runId, ...data } : data);
    await this.deps.store?.addRunEvent(this.batchId, runId, kind, message, data);
  }

  async attempt(runId: RunAccession, attempt: AttemptRecord): Promise<void> {
    await this.deps.store?.addRunAttempt(this.batchId, runId, attempt);
  }

  async outcome(outcome: RunOutcome): Promise<void> {
    await this.deps.store?.saveRunOutcome(this.batchId, outcome);
  }

  async finish(report: BatchReport): Promise<void> {
    const status = report.failed > 0 ? "failed" : "succeeded";
    await this.event(null, report.failed > 0 ? "warn" : "info", `batch.${status}`, `${report.succeeded} succeeded, ${report.failed} failed`, {
      batch_id: this.batchId
    });
    await this.deps.store?.finishBatch(this.batchId, status, report);
  }
}
