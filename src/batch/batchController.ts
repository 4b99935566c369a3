import pLimit from "p-limit";
import { errorMessage } from "../core/errors.js";
import { sha256Prefixed, stableJsonStringify } from "../core/hashing.js";
import { newBatchId, type RunAccession } from "../core/ids.js";
import {
  assertTransition,
  isFailureState,
  isTerminalState,
  type AttemptRecord,
  type BatchReport,
  type RunOutcome,
  type RunState
} from "../core/outcome.js";
import type { DownloadMethod } from "../download/methods.js";
import type { FallbackChain } from "../download/fallbackChain.js";
import type { Artifact } from "../download/types.js";
import { createRunWorkspace, existingTargets } from "../execution/workspace.js";
import { canSatisfy } from "../extraction/negotiator.js";
import type { ExtractionPipeline } from "../extraction/pipeline.js";
import type { PolicyEngine } from "../policy/policy.js";
import { BatchLedger } from "../runs/batchLedger.js";
import type { InvocationContext } from "../runs/invocationContext.js";
import type { PostgresStore } from "../store/postgresStore.js";
import { canonicalBatchParams, type ExtractOptions, type GetOptions, type LocalInput } from "./options.js";

/** Walks one run through its states, mirroring each step into the ledger. */
class RunTracker {
  private state: RunState = "pending";
  private readonly outputs: string[] = [];
  private readonly skipped: string[] = [];
  private readonly attempts: AttemptRecord[] = [];
  private method: DownloadMethod | null = null;
  private error: string | null = null;

  constructor(
    readonly runId: RunAccession,
    private readonly ledger: BatchLedger
  ) {}

  get current(): RunState {
    return this.state;
  }

  async transition(to: RunState, message: string | null = null): Promise<void> {
    assertTransition(this.state, to);
    const from = this.state;
    this.state = to;
    if (isFailureState(to)) this.error = message;
    await this.ledger.event(this.runId, isFailureState(to) ? "error" : "info", `run.${to}`, message ?? `${from} -> ${to}`, {
      from,
      to
    });
    await this.ledger.outcome(this.snapshot());
  }

  async recordAttempts(attempts: AttemptRecord[], method: DownloadMethod | null): Promise<void> {
    this.method = method;
    for (const a of attempts) {
      this.attempts.push(a);
      await this.ledger.attempt(this.runId, a);
    }
  }

  addOutputs(paths: readonly string[], skipped: readonly string[]): void {
    for (const p of paths) if (!this.outputs.includes(p)) this.outputs.push(p);
    for (const p of skipped) if (!this.skipped.includes(p)) this.skipped.push(p);
  }

  /** Moves whatever phase was in flight to its failure state. */
  async fail(message: string): Promise<void> {
    if (isTerminalState(this.state)) {
      this.error ??= message;
      return;
    }
    const to = this.state === "pending" || this.state === "downloading" ? "download_failed" : "extraction_failed";
    if (this.state === "downloaded") {
      await this.transition("extracting");
    }
    await this.transition(to, message);
  }

  snapshot(): RunOutcome {
    return {
      runId: this.runId,
      state: this.state,
      outputs: [...this.outputs],
      skipped: [...this.skipped],
      attempts: [...this.attempts],
      method: this.method,
      error: this.error
    };
  }
}

export class BatchController {
  constructor(
    private readonly deps: {
      chain: FallbackChain;
      pipeline: ExtractionPipeline;
      policy: PolicyEngine;
      store: PostgresStore | null;
    }
  ) {}

  /** Download then extract every run. Options are validated before this is called. */
  async run(runIds: readonly RunAccession[], options: GetOptions, ctx: InvocationContext): Promise<BatchReport> {
    return this.execute("get", runIds, options, ctx, (runId, tracker) => this.getOne(runId, tracker, options, ctx));
  }

  /** Extraction of local artifacts; nothing is downloaded and the inputs are never removed. */
  async extractOnly(inputs: readonly LocalInput[], options: ExtractOptions, ctx: InvocationContext): Promise<BatchReport> {
    const byRun = new Map(inputs.map((i) => [i.runId, i.artifact]));
    return this.execute("extract", [...byRun.keys()], options, ctx, async (runId, tracker) => {
      const artifact = byRun.get(runId);
      if (!artifact) throw new Error(`no input recorded for ${runId}`);
      if (await this.alreadyComplete(runId, tracker, options)) return;
      await this.extractArtifact(runId, artifact, tracker, options, true, ctx);
    });
  }

  private async execute(
    command: BatchReport["command"],
    runIds: readonly RunAccession[],
    options: ExtractOptions,
    ctx: InvocationContext,
    perRun: (runId: RunAccession, tracker: RunTracker) => Promise<void>
  ): Promise<BatchReport> {
    const startedAt = new Date().toISOString();
    const canonicalParams = canonicalBatchParams(command, runIds, options);
    const ledger = new BatchLedger(
      { store: this.deps.store, ctx },
      {
        batchId: newBatchId(),
        command,
        paramsHash: sha256Prefixed(stableJsonStringify(canonicalParams)),
        canonicalParams,
        policyHash: this.deps.policy.policyHash
      }
    );
    await ledger.start(runIds.length);

    const limit = pLimit(options.concurrency);
    const outcomes = await Promise.all(
      runIds.map((runId) =>
        limit(async () => {
          const tracker = new RunTracker(runId, ledger);
          await ledger.outcome(tracker.snapshot());
          try {
            await perRun(runId, tracker);
          } catch (err) {
            // A run's failure, including an abort, ends that run only.
            const message = ctx.signal?.aborted ? `aborted: ${errorMessage(ctx.signal.reason)}` : errorMessage(err);
            await tracker.fail(message);
          }
          return tracker.snapshot();
        })
      )
    );

    const failed = outcomes.filter((o) => o.state !== "complete").length;
    const report: BatchReport = {
      batchId: ledger.batchId,
      command,
      startedAt,
      finishedAt: new Date().toISOString(),
      outcomes,
      succeeded: outcomes.length - failed,
      failed
    };
    await ledger.finish(report);
    return report;
  }

  private async getOne(runId: RunAccession, tracker: RunTracker, options: GetOptions, ctx: InvocationContext): Promise<void> {
    if (await this.alreadyComplete(runId, tracker, options)) return;

    const ws = await createRunWorkspace(options.outputDir, runId);
    await tracker.transition("downloading");
    const acquired = await this.deps.chain.acquire(
      ws,
      options.methods,
      {
        force: options.force,
        paidAccess: options.paidAccess,
        config: options.fetch,
        acceptsKind: (kind) => canSatisfy(kind, options.formats)
      },
      ctx
    );
    await tracker.recordAttempts(acquired.attempts, acquired.ok ? acquired.method : null);
    if (!acquired.ok) {
      await tracker.transition("download_failed", acquired.error.message);
      return;
    }
    await tracker.transition("downloaded", `${acquired.method}: ${acquired.artifact.paths.join(", ")}`);
    await this.extractArtifact(runId, acquired.artifact, tracker, options, false, ctx);
  }

  /** Every requested target already on disk: pending goes straight to complete. */
  private async alreadyComplete(runId: RunAccession, tracker: RunTracker, options: ExtractOptions): Promise<boolean> {
    if (options.force || options.stdout) return false;
    const ws = await createRunWorkspace(options.outputDir, runId);
    const present: string[] = [];
    for (const format of options.formats) {
      const found = await existingTargets(ws, format);
      if (!found.length) return false;
      present.push(...found);
    }
    tracker.addOutputs([], present);
    await tracker.transition("complete", "all requested outputs already exist");
    return true;
  }

  private async extractArtifact(
    runId: RunAccession,
    artifact: Artifact,
    tracker: RunTracker,
    options: ExtractOptions,
    retainArtifact: boolean,
    ctx: InvocationContext
  ): Promise<void> {
    await tracker.transition("extracting");
    const result = await this.deps.pipeline.extract(
      {
        runId,
        artifact,
        formats: options.formats,
        outputDir: options.outputDir,
        force: options.force,
        unsorted: options.unsorted,
        stdout: options.stdout,
        retainArtifact
      },
      options.extractionThreads,
      ctx
    );
    tracker.addOutputs(result.outputs, result.skipped);
    if (result.ok) {
      await tracker.transition("complete", `${result.outputs.length} output(s), ${result.skipped.length} already present`);
    } else {
      await tracker.transition("extraction_failed", result.error?.message ?? "extraction failed");
    }
  }
}
