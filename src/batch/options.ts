import { promises as fs } from "fs";
import path from "path";
import type { Writable } from "stream";
import { ConfigurationError } from "../core/errors.js";
import { detectArtifactKind, normalizeFormats, runIdFromFileName, type OutputFormat } from "../core/formats.js";
import type { JsonObject } from "../core/json.js";
import { parseMethods, type DownloadMethod } from "../download/methods.js";
import type { Artifact, FetchConfig } from "../download/types.js";
import { validateModes } from "../extraction/negotiator.js";
import type { Credentials, PaidAccess, PolicyEngine } from "../policy/policy.js";

/** Options shared by `get` and `extract`, as the CLI and MCP tools receive them. */
export interface ExtractRequest {
  formats: readonly string[];
  outputDir: string;
  force?: boolean;
  unsorted?: boolean;
  /** Stream reads to this sink instead of files. */
  stdout?: Writable | null;
  extractionThreads?: number;
  batchConcurrency?: number;
}

export interface GetRequest extends ExtractRequest {
  methods: readonly string[];
  downloadThreads?: number;
  paidAccess?: Partial<PaidAccess>;
  credentials?: Partial<Credentials>;
  ascpArgs?: string;
  prefetchMaxSize?: string;
  checkMd5sums?: boolean;
}

export interface ExtractOptions {
  formats: OutputFormat[];
  outputDir: string;
  force: boolean;
  unsorted: boolean;
  stdout: Writable | null;
  extractionThreads: number;
  concurrency: number;
}

export interface GetOptions extends ExtractOptions {
  methods: DownloadMethod[];
  paidAccess: PaidAccess;
  fetch: FetchConfig;
}

export function resolveExtractOptions(
  policy: PolicyEngine,
  req: ExtractRequest,
  methods: readonly DownloadMethod[] = []
): ExtractOptions {
  const formats = normalizeFormats(req.formats);
  const unsorted = req.unsorted ?? false;
  const stdout = req.stdout ?? null;
  validateModes(methods, formats, { unsorted, stdout: stdout !== null });

  const concurrency = policy.enforceBatchConcurrency(req.batchConcurrency);
  if (stdout && concurrency > 1) {
    throw new ConfigurationError("--stdout cannot be combined with batch concurrency above 1");
  }
  if (!req.outputDir.trim()) throw new ConfigurationError("output directory must not be empty");

  return {
    formats,
    outputDir: path.resolve(req.outputDir),
    force: req.force ?? false,
    unsorted,
    stdout,
    extractionThreads: policy.enforceThreads("extraction", req.extractionThreads),
    concurrency
  };
}

export function resolveGetOptions(policy: PolicyEngine, req: GetRequest): GetOptions {
  const methods = parseMethods(req.methods);
  for (const m of methods) policy.assertMethodAllowed(m);
  const base = resolveExtractOptions(policy, req, methods);

  const credentials = policy.credentials(req.credentials);
  return {
    ...base,
    methods,
    paidAccess: policy.paidAccess(req.paidAccess),
    fetch: {
      downloadThreads: policy.enforceThreads("download", req.downloadThreads),
      credentials,
      checkMd5sums: req.checkMd5sums ?? false,
      prefetchMaxSize: req.prefetchMaxSize ?? policy.prefetchMaxSize(),
      ascpArgs: req.ascpArgs ? req.ascpArgs.split(/\s+/).filter(Boolean) : [],
      tools: policy.tools()
    }
  };
}

/** What the ledger stores as a batch's parameters. Credentials stay out. */
export function canonicalBatchParams(command: "get" | "extract", runIds: readonly string[], opts: ExtractOptions | GetOptions): JsonObject {
  const params: JsonObject = {
    command,
    runs: [...runIds],
    formats: opts.formats,
    output_dir: opts.outputDir,
    force: opts.force,
    unsorted: opts.unsorted,
    stdout: opts.stdout !== null,
    extraction_threads: opts.extractionThreads,
    concurrency: opts.concurrency
  };
  if ("methods" in opts) {
    params["methods"] = opts.methods;
    params["download_threads"] = opts.fetch.downloadThreads;
    params["paid_access"] = {
      allow_paid: opts.paidAccess.allowPaid,
      allow_paid_from_aws: opts.paidAccess.allowPaidFromAws,
      allow_paid_from_gcp: opts.paidAccess.allowPaidFromGcp
    };
  }
  return params;
}

export interface LocalInput {
  runId: string;
  artifact: Artifact;
}

/**
 * Groups local files into one artifact per run. Mates of a pair
 * (`SRR1_1.fastq.gz`, `SRR1_2.fastq.gz`) become one artifact.
 */
export async function groupLocalInputs(files: readonly string[]): Promise<LocalInput[]> {
  if (!files.length) throw new ConfigurationError("at least one input file is required");
  const byRun = new Map<string, LocalInput>();

  for (const file of files) {
    const abs = path.resolve(file);
    const kind = detectArtifactKind(abs);
    if (!kind) {
      throw new ConfigurationError(`cannot tell the format of ${file} from its extension`);
    }
    const st = await fs.stat(abs).catch((err: NodeJS.ErrnoException) => {
      if (err.code === "ENOENT") throw new ConfigurationError(`input file not found: ${file}`);
      throw err;
    });
    if (!st.isFile() || st.size === 0) throw new ConfigurationError(`input file is empty: ${file}`);

    const runId = runIdFromFileName(abs);
    const existing = byRun.get(runId);
    if (!existing) {
      byRun.set(runId, { runId, artifact: { kind, paths: [abs] } });
      continue;
    }
    if (existing.artifact.kind !== kind) {
      throw new ConfigurationError(`inputs for ${runId} mix ${existing.artifact.kind} and ${kind}`);
    }
    if (kind === "sra") throw new ConfigurationError(`more than one container given for ${runId}`);
    if (!existing.artifact.paths.includes(abs)) existing.artifact.paths.push(abs);
  }

  for (const input of byRun.values()) input.artifact.paths.sort();
  return [...byRun.values()];
}
