import { AdapterExecutionError, AdapterPreconditionError, errorMessage } from "../../core/errors.js";
import { describeFailure } from "../../execution/backends/localProcess.js";
import type { ProcessResult, ProcessRunner, ProcessSpec } from "../../execution/backends/types.js";
import type { PartialFiles, RunWorkspace } from "../../execution/workspace.js";
import { existingTargets, withPartialFiles } from "../../execution/workspace.js";
import type { InvocationContext } from "../../runs/invocationContext.js";
import type { DownloadMethod } from "../methods.js";
import type { Artifact, DownloadAttemptResult } from "../types.js";

export function refuse(method: DownloadMethod, message: string): DownloadAttemptResult {
  return { ok: false, method, error: new AdapterPreconditionError(method, message) };
}

export async function existingContainer(ws: RunWorkspace): Promise<Artifact | null> {
  const paths = await existingTargets(ws, "sra");
  return paths.length ? { kind: "sra", paths } : null;
}

export async function existingFastqGz(ws: RunWorkspace): Promise<Artifact | null> {
  const paths = await existingTargets(ws, "fastq.gz");
  return paths.length ? { kind: "fastq.gz", paths } : null;
}

export async function runTool(
  runner: ProcessRunner,
  method: DownloadMethod,
  spec: ProcessSpec,
  ctx: InvocationContext
): Promise<ProcessResult> {
  ctx.log("debug", "download.exec", spec.argv.join(" "), { method });
  const result = await runner.run({ ...spec, echoStderr: !ctx.hideProgress }, ctx.signal);
  if (result.exitCode !== 0) {
    throw new AdapterExecutionError(method, describeFailure(spec.argv[0] ?? method, result), result.exitCode);
  }
  return result;
}

/**
 * Runs one download inside a partial-file scope. Anything `body` reserved but
 * did not commit is deleted whichever way the scope exits.
 */
export async function guardedFetch(
  method: DownloadMethod,
  ws: RunWorkspace,
  ctx: InvocationContext,
  body: (files: PartialFiles) => Promise<Artifact>
): Promise<DownloadAttemptResult> {
  try {
    const artifact = await withPartialFiles(ws, body);
    return { ok: true, method, artifact };
  } catch (err) {
    if (ctx.signal?.aborted) throw err;
    if (err instanceof AdapterPreconditionError || err instanceof AdapterExecutionError) {
      return { ok: false, method, error: err };
    }
    return { ok: false, method, error: new AdapterExecutionError(method, errorMessage(err)) };
  }
}

export function curlArgv(curl: string, url: string, dest: string, ctx: InvocationContext): string[] {
  const progress = ctx.hideProgress ? ["--silent", "--show-error"] : ["--progress-bar"];
  return [curl, "--fail", "--location", "--retry", "3", ...progress, "--output", dest, url];
}
