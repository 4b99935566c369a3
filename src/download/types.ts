import type { AdapterExecutionError, AdapterPreconditionError } from "../core/errors.js";
import type { ArtifactKind } from "../core/formats.js";
import type { RunWorkspace } from "../execution/workspace.js";
import type { Credentials, ToolPaths } from "../policy/policy.js";
import type { InvocationContext } from "../runs/invocationContext.js";
import type { DownloadMethod } from "./methods.js";

export interface Artifact {
  kind: ArtifactKind;
  /** Fully written files; paired fastq.gz downloads carry one path per mate. */
  paths: string[];
}

export interface FetchConfig {
  downloadThreads: number;
  credentials: Credentials;
  checkMd5sums: boolean;
  prefetchMaxSize: string;
  ascpArgs: string[];
  tools: ToolPaths;
}

export type DownloadAttemptResult =
  | { ok: true; method: DownloadMethod; artifact: Artifact }
  | { ok: false; method: DownloadMethod; error: AdapterPreconditionError | AdapterExecutionError };

export interface BackendAdapter<M extends DownloadMethod = DownloadMethod> {
  readonly method: M;
  /** The artifact this method would produce, if it is already fully on disk. */
  existingArtifact(ws: RunWorkspace): Promise<Artifact | null>;
  fetch(ws: RunWorkspace, config: FetchConfig, ctx: InvocationContext): Promise<DownloadAttemptResult>;
}

export type AdapterRegistry = { readonly [M in DownloadMethod]: BackendAdapter<M> };
