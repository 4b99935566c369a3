import { AdapterExecutionError } from "../../core/errors.js";
import { retargetFileName } from "../../core/formats.js";
import { md5File } from "../../core/hashing.js";
import type { ProcessRunner } from "../../execution/backends/types.js";
import type { PartialFiles, RunWorkspace } from "../../execution/workspace.js";
import type { EnaFastqFile, EnaPortalClient } from "../../metadata/enaPortal.js";
import type { InvocationContext } from "../../runs/invocationContext.js";
import type { Artifact, BackendAdapter, DownloadAttemptResult, FetchConfig } from "../types.js";
import { curlArgv, existingFastqGz, guardedFetch, refuse, runTool } from "./common.js";

type EnaMethod = "ena-ascp" | "ena-ftp";

abstract class EnaAdapter<M extends EnaMethod> implements BackendAdapter<M> {
  abstract readonly method: M;

  constructor(
    protected readonly runner: ProcessRunner,
    private readonly ena: EnaPortalClient
  ) {}

  existingArtifact(ws: RunWorkspace): Promise<Artifact | null> {
    return existingFastqGz(ws);
  }

  protected abstract precondition(config: FetchConfig): string | null;

  protected abstract transfer(
    file: EnaFastqFile,
    dest: string,
    config: FetchConfig,
    ctx: InvocationContext
  ): Promise<void>;

  async fetch(ws: RunWorkspace, config: FetchConfig, ctx: InvocationContext): Promise<DownloadAttemptResult> {
    const refused = this.precondition(config);
    if (refused) return refuse(this.method, refused);

    return guardedFetch(this.method, ws, ctx, async (files: PartialFiles) => {
      const listed = await this.ena.runFastqFiles(ws.runId, ctx.signal);
      if (!listed.length) {
        throw new AdapterExecutionError(this.method, `ENA lists no fastq files for ${ws.runId}`);
      }
      for (const file of listed) {
        const dest = files.reserve(retargetFileName(ws.runId, file.name, "fastq.gz"));
        ctx.log("info", "download.file", `${this.method}: ${file.name}`, { run: ws.runId, bytes: file.bytes });
        await this.transfer(file, dest, config, ctx);
        if (config.checkMd5sums && file.md5) {
          const actual = await md5File(dest);
          if (actual !== file.md5) {
            throw new AdapterExecutionError(this.method, `md5 mismatch for ${file.name}: expected ${file.md5}, got ${actual}`);
          }
        }
      }
      const paths = await files.commit();
      return { kind: "fastq.gz", paths: paths.sort() };
    });
  }
}

export class EnaFtpAdapter extends EnaAdapter<"ena-ftp"> {
  readonly method = "ena-ftp" as const;

  protected precondition(): string | null {
    return null;
  }

  protected async transfer(file: EnaFastqFile, dest: string, config: FetchConfig, ctx: InvocationContext): Promise<void> {
    await runTool(this.runner, this.method, { argv: curlArgv(config.tools.curl, `https://${file.ftpPath}`, dest, ctx) }, ctx);
  }
}

export function asperaSource(file: EnaFastqFile): string {
  const path = file.asperaPath ?? file.ftpPath.replace(/^ftp\.sra\.ebi\.ac\.uk\//, "fasp.sra.ebi.ac.uk:/");
  return `era-fasp@${path}`;
}

export class EnaAscpAdapter extends EnaAdapter<"ena-ascp"> {
  readonly method = "ena-ascp" as const;

  protected precondition(config: FetchConfig): string | null {
    return config.credentials.ascpSshKey ? null : "ena-ascp requires an Aspera SSH key (--ascp-ssh-key)";
  }

  protected async transfer(file: EnaFastqFile, dest: string, config: FetchConfig, ctx: InvocationContext): Promise<void> {
    const key = config.credentials.ascpSshKey ?? "";
    const argv = [
      config.tools.ascp,
      "-T",
      "-l",
      "300m",
      "-P",
      "33001",
      ...(ctx.hideProgress ? ["-q"] : []),
      "-i",
      key,
      ...config.ascpArgs,
      asperaSource(file),
      dest
    ];
    await runTool(this.runner, this.method, { argv }, ctx);
  }
}
