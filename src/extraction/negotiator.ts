import { ConfigurationError } from "../core/errors.js";
import {
  compressedOf,
  type ArtifactKind,
  type CompressedReadFormat,
  type OutputFormat,
  type ReadFormat
} from "../core/formats.js";
import { METHOD_TABLE, type DownloadMethod } from "../download/methods.js";

export type DumpMode = "sorted" | "unsorted";

export type ConversionStep =
  /** The artifact already is this format; at most a copy into the output name. */
  | { op: "keep"; format: ArtifactKind }
  /** Container to reads. The only expensive step; runs at most once per read format. */
  | { op: "dump"; to: ReadFormat; mode: DumpMode; stdout: boolean }
  | { op: "fq2fa"; to: "fasta" }
  | { op: "compress"; from: ReadFormat; to: CompressedReadFormat; source: "produced" | "existing" }
  | { op: "decompress"; from: CompressedReadFormat; to: ReadFormat }
  /** Drop an intermediate that was produced but not requested. */
  | { op: "discard"; format: ReadFormat }
  | { op: "remove-artifact" };

export interface ConversionPlan {
  steps: ConversionStep[];
  warnings: string[];
}

export interface PlanOptions {
  unsorted: boolean;
  stdout: boolean;
  /** Formats whose targets are already on disk; they are not produced again. */
  present: ReadonlySet<OutputFormat>;
  /** Keep the input artifact even when its own format was not requested. */
  retainArtifact: boolean;
}

export class UnreachableFormatError extends Error {
  constructor(
    readonly kind: ArtifactKind,
    readonly format: OutputFormat
  ) {
    super(`cannot produce ${format} from a ${kind} artifact`);
    this.name = "UnreachableFormatError";
  }
}

const REACHABLE: Record<ArtifactKind, ReadonlySet<OutputFormat>> = {
  sra: new Set(["sra", "fastq", "fastq.gz", "fasta", "fasta.gz"]),
  "fastq.gz": new Set(["fastq", "fastq.gz", "fasta", "fasta.gz"]),
  fasta: new Set(["fasta", "fasta.gz"]),
  "fasta.gz": new Set(["fasta", "fasta.gz"])
};

export function canSatisfy(kind: ArtifactKind, requested: readonly OutputFormat[]): boolean {
  return requested.every((f) => REACHABLE[kind].has(f));
}

/**
 * The minimal step sequence turning an artifact of `kind` into `requested`.
 * Read formats that share an intermediate (fastq and fastq.gz, fasta and
 * fasta.gz) share a single dump or conversion pass.
 */
export function plan(kind: ArtifactKind, requested: readonly OutputFormat[], opts: PlanOptions): ConversionPlan {
  for (const f of requested) {
    if (!REACHABLE[kind].has(f)) throw new UnreachableFormatError(kind, f);
  }
  const want = new Set(requested);
  const need = (f: OutputFormat): boolean => want.has(f) && !opts.present.has(f);
  const steps: ConversionStep[] = [];
  const warnings: string[] = [];

  if (opts.unsorted && kind !== "sra") {
    warnings.push(`unsorted output ignored: the artifact is already ${kind}`);
  }

  if (opts.stdout) {
    const [format] = requested;
    if (kind !== "sra" || requested.length !== 1 || (format !== "fastq" && format !== "fasta")) {
      throw new UnreachableFormatError(kind, format ?? "fastq");
    }
    steps.push({ op: "dump", to: format, mode: "unsorted", stdout: true });
    if (!opts.retainArtifact) steps.push({ op: "remove-artifact" });
    return { steps, warnings };
  }

  if (need(kind)) steps.push({ op: "keep", format: kind });

  switch (kind) {
    case "sra":
      for (const base of ["fastq", "fasta"] as const) {
        planReadFamily(base, opts, need, steps, () => ({
          op: "dump",
          to: base,
          mode: opts.unsorted ? "unsorted" : "sorted",
          stdout: false
        }));
      }
      break;
    case "fastq.gz":
      if (need("fastq")) steps.push({ op: "decompress", from: "fastq.gz", to: "fastq" });
      planReadFamily("fasta", opts, need, steps, () => ({ op: "fq2fa", to: "fasta" }));
      break;
    case "fasta":
      if (need("fasta.gz")) steps.push({ op: "compress", from: "fasta", to: "fasta.gz", source: "produced" });
      break;
    case "fasta.gz":
      if (need("fasta")) steps.push({ op: "decompress", from: "fasta.gz", to: "fasta" });
      break;
  }

  const producedSomething = steps.some((s) => s.op !== "keep");
  if (!want.has(kind) && !opts.retainArtifact && producedSomething) {
    steps.push({ op: "remove-artifact" });
  }
  return { steps, warnings };
}

function planReadFamily(
  base: ReadFormat,
  opts: PlanOptions,
  need: (f: OutputFormat) => boolean,
  steps: ConversionStep[],
  produce: () => ConversionStep
): void {
  const gz = compressedOf(base);
  const needBase = need(base);
  const needGz = need(gz);
  if (!needBase && !needGz) return;

  // The uncompressed reads are already there: compress them, nothing to convert.
  if (!needBase && opts.present.has(base)) {
    steps.push({ op: "compress", from: base, to: gz, source: "existing" });
    return;
  }

  steps.push(produce());
  if (needGz) steps.push({ op: "compress", from: base, to: gz, source: "produced" });
  if (!needBase && !opts.present.has(base)) steps.push({ op: "discard", format: base });
}

export function conversionCount(p: ConversionPlan): number {
  return p.steps.filter((s) => s.op === "dump" || s.op === "fq2fa").length;
}

/**
 * Up-front check of unsorted and stdout modes against the methods' static
 * compatibility table. Raised before any adapter runs.
 */
export function validateModes(
  methods: readonly DownloadMethod[],
  formats: readonly OutputFormat[],
  opts: { unsorted: boolean; stdout: boolean }
): void {
  if (opts.stdout) {
    if (!opts.unsorted) throw new ConfigurationError("--stdout requires --unsorted");
    const [only] = formats;
    if (formats.length !== 1 || (only !== "fastq" && only !== "fasta")) {
      throw new ConfigurationError("--stdout requires exactly one output format, fastq or fasta");
    }
  }
  if (!opts.unsorted) return;

  for (const method of methods) {
    const support = METHOD_TABLE[method].unsorted;
    if (support === "unsupported") {
      throw new ConfigurationError(`--unsorted is not supported with download method ${method}`);
    }
    if (opts.stdout && support !== "stream") {
      throw new ConfigurationError(`--stdout cannot stream from download method ${method}`);
    }
  }
}
