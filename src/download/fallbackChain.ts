import {
  AdapterExecutionError,
  AdapterPreconditionError,
  AllMethodsExhaustedError,
  errorMessage,
  type FailedAttempt
} from "../core/errors.js";
import type { ArtifactKind } from "../core/formats.js";
import type { AttemptRecord } from "../core/outcome.js";
import type { RunWorkspace } from "../execution/workspace.js";
import { removeRunPartials } from "../execution/workspace.js";
import { isPaymentAllowed, type PaidAccess } from "../policy/policy.js";
import type { InvocationContext } from "../runs/invocationContext.js";
import { METHOD_TABLE, type DownloadMethod } from "./methods.js";
import type { AdapterRegistry, Artifact, DownloadAttemptResult, FetchConfig } from "./types.js";

export interface AcquireOptions {
  force: boolean;
  paidAccess: PaidAccess;
  config: FetchConfig;
  /** Artifact kinds extraction can turn into the requested formats. */
  acceptsKind: (kind: ArtifactKind) => boolean;
}

export type AcquireResult =
  | { ok: true; method: DownloadMethod; artifact: Artifact; attempts: AttemptRecord[] }
  | { ok: false; error: AllMethodsExhaustedError; attempts: AttemptRecord[] };

export class FallbackChain {
  constructor(private readonly adapters: AdapterRegistry) {}

  /**
   * Tries `methods` strictly in the order given and stops at the first
   * success. Later methods are never invoked once one has succeeded.
   */
  async acquire(
    ws: RunWorkspace,
    methods: readonly DownloadMethod[],
    options: AcquireOptions,
    ctx: InvocationContext
  ): Promise<AcquireResult> {
    const attempts: AttemptRecord[] = [];
    const failures: FailedAttempt[] = [];

    for (const method of methods) {
      ctx.signal?.throwIfAborted();
      const startedAt = new Date().toISOString();
      const result = await this.attempt(ws, method, options, ctx);
      const finishedAt = new Date().toISOString();

      if (result.ok) {
        attempts.push({ method, ok: true, reused: result.reused, reason: null, startedAt, finishedAt });
        ctx.log("info", "download.succeeded", `${ws.runId}: ${method}${result.reused ? " (already on disk)" : ""}`, {
          run: ws.runId,
          method,
          kind: result.artifact.kind,
          paths: result.artifact.paths
        });
        return { ok: true, method, artifact: result.artifact, attempts };
      }

      const reason = result.error.message;
      attempts.push({ method, ok: false, reused: false, reason, startedAt, finishedAt });
      failures.push({ method, reason });
      ctx.log("warn", "download.failed", `${ws.runId}: ${method}: ${reason}`, {
        run: ws.runId,
        method,
        error: result.error.name
      });

      const removed = await removeRunPartials(ws);
      if (removed.length) {
        ctx.log("debug", "download.cleanup", `removed ${removed.length} partial file(s)`, { run: ws.runId, removed });
      }
    }

    return { ok: false, error: new AllMethodsExhaustedError(ws.runId, failures), attempts };
  }

  private async attempt(
    ws: RunWorkspace,
    method: DownloadMethod,
    options: AcquireOptions,
    ctx: InvocationContext
  ): Promise<
    | { ok: true; artifact: Artifact; reused: boolean }
    | { ok: false; error: AdapterPreconditionError | AdapterExecutionError }
  > {
    const descriptor = METHOD_TABLE[method];
    if (!options.acceptsKind(descriptor.yields)) {
      return {
        ok: false,
        error: new AdapterPreconditionError(method, `${method} yields ${descriptor.yields}, which cannot produce the requested formats`)
      };
    }
    if (descriptor.paidProvider && !isPaymentAllowed(descriptor.paidProvider, options.paidAccess)) {
      return {
        ok: false,
        error: new AdapterPreconditionError(
          method,
          `${method} incurs ${descriptor.paidProvider} charges; pass --allow-paid or --allow-paid-from-${descriptor.paidProvider}`
        )
      };
    }

    const adapter = this.adapters[method];
    if (!options.force) {
      const existing = await adapter.existingArtifact(ws);
      if (existing) return { ok: true, artifact: existing, reused: true };
    }

    let result: DownloadAttemptResult;
    try {
      result = await adapter.fetch(ws, options.config, ctx);
    } catch (err) {
      if (ctx.signal?.aborted) throw err;
      return { ok: false, error: new AdapterExecutionError(method, errorMessage(err)) };
    }
    if (!result.ok) return { ok: false, error: result.error };
    return { ok: true, artifact: result.artifact, reused: false };
  }
}
