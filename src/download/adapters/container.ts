import { AdapterExecutionError, errorMessage } from "../../core/errors.js";
import type { ProcessRunner } from "../../execution/backends/types.js";
import type { RunWorkspace } from "../../execution/workspace.js";
import type { CloudService, SraLocation, SraLocator } from "../../metadata/sraLocator.js";
import type { InvocationContext } from "../../runs/invocationContext.js";
import type { Artifact, BackendAdapter, DownloadAttemptResult, FetchConfig } from "../types.js";
import { curlArgv, existingContainer, guardedFetch, refuse, runTool } from "./common.js";

export class PrefetchAdapter implements BackendAdapter<"prefetch"> {
  readonly method = "prefetch" as const;

  constructor(private readonly runner: ProcessRunner) {}

  existingArtifact(ws: RunWorkspace): Promise<Artifact | null> {
    return existingContainer(ws);
  }

  async fetch(ws: RunWorkspace, config: FetchConfig, ctx: InvocationContext): Promise<DownloadAttemptResult> {
    return guardedFetch(this.method, ws, ctx, async (files) => {
      const dest = files.reserve(`${ws.runId}.sra`);
      const argv = [
        config.tools.prefetch,
        "--max-size",
        config.prefetchMaxSize,
        ...(ctx.hideProgress ? [] : ["--progress"]),
        "--output-file",
        dest,
        ws.runId
      ];
      await runTool(this.runner, this.method, { argv }, ctx);
      const [path] = await files.commit();
      return { kind: "sra", paths: path ? [path] : [] };
    });
  }
}

export class AwsHttpAdapter implements BackendAdapter<"aws-http"> {
  readonly method = "aws-http" as const;

  constructor(
    private readonly runner: ProcessRunner,
    private readonly openDataBaseUrl: string
  ) {}

  existingArtifact(ws: RunWorkspace): Promise<Artifact | null> {
    return existingContainer(ws);
  }

  async fetch(ws: RunWorkspace, config: FetchConfig, ctx: InvocationContext): Promise<DownloadAttemptResult> {
    return guardedFetch(this.method, ws, ctx, async (files) => {
      const dest = files.reserve(`${ws.runId}.sra`);
      const url = `${this.openDataBaseUrl.replace(/\/+$/, "")}/${ws.runId}/${ws.runId}`;
      await runTool(this.runner, this.method, { argv: curlArgv(config.tools.curl, url, dest, ctx) }, ctx);
      const [path] = await files.commit();
      return { kind: "sra", paths: path ? [path] : [] };
    });
  }
}

async function locateOrFail(
  locator: SraLocator,
  method: "aws-cp" | "gcp-cp",
  runId: string,
  service: CloudService,
  ctx: InvocationContext
): Promise<SraLocation> {
  try {
    return await locator.locate(runId, service, ctx.signal);
  } catch (err) {
    if (ctx.signal?.aborted) throw err;
    throw new AdapterExecutionError(method, errorMessage(err));
  }
}

export class AwsCpAdapter implements BackendAdapter<"aws-cp"> {
  readonly method = "aws-cp" as const;

  constructor(
    private readonly runner: ProcessRunner,
    private readonly locator: SraLocator
  ) {}

  existingArtifact(ws: RunWorkspace): Promise<Artifact | null> {
    return existingContainer(ws);
  }

  async fetch(ws: RunWorkspace, config: FetchConfig, ctx: InvocationContext): Promise<DownloadAttemptResult> {
    const { awsUserKeyId, awsUserKeySecret } = config.credentials;
    if (!awsUserKeyId || !awsUserKeySecret) {
      return refuse(this.method, "aws-cp requires AWS credentials (--aws-user-key-id and --aws-user-key-secret)");
    }

    return guardedFetch(this.method, ws, ctx, async (files) => {
      const location = await locateOrFail(this.locator, this.method, ws.runId, "s3", ctx);
      const dest = files.reserve(`${ws.runId}.sra`);
      const argv = [
        config.tools.aws,
        "s3",
        "cp",
        ...(ctx.hideProgress ? ["--no-progress"] : []),
        ...(location.payRequired ? ["--request-payer", "requester"] : []),
        location.uri,
        dest
      ];
      await runTool(
        this.runner,
        this.method,
        { argv, env: { AWS_ACCESS_KEY_ID: awsUserKeyId, AWS_SECRET_ACCESS_KEY: awsUserKeySecret } },
        ctx
      );
      const [path] = await files.commit();
      return { kind: "sra", paths: path ? [path] : [] };
    });
  }
}

export class GcpCpAdapter implements BackendAdapter<"gcp-cp"> {
  readonly method = "gcp-cp" as const;

  constructor(
    private readonly runner: ProcessRunner,
    private readonly locator: SraLocator
  ) {}

  existingArtifact(ws: RunWorkspace): Promise<Artifact | null> {
    return existingContainer(ws);
  }

  async fetch(ws: RunWorkspace, config: FetchConfig, ctx: InvocationContext): Promise<DownloadAttemptResult> {
    const project = config.credentials.gcpProject;
    if (!project) return refuse(this.method, "gcp-cp requires a billing project (--gcp-project)");

    return guardedFetch(this.method, ws, ctx, async (files) => {
      const location = await locateOrFail(this.locator, this.method, ws.runId, "gs", ctx);
      const dest = files.reserve(`${ws.runId}.sra`);
      const keyFile = config.credentials.gcpUserKeyFile;
      const argv = [
        config.tools.gsutil,
        ...(ctx.hideProgress ? ["-q"] : []),
        "-o",
        `GSUtil:parallel_thread_count=${config.downloadThreads}`,
        ...(keyFile ? ["-o", `Credentials:gs_service_key_file=${keyFile}`] : []),
        "-u",
        project,
        "cp",
        location.uri,
        dest
      ];
      await runTool(this.runner, this.method, { argv }, ctx);
      const [path] = await files.commit();
      return { kind: "sra", paths: path ? [path] : [] };
    });
  }
}
