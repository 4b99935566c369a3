import path from "path";
import { ConfigurationError } from "./errors.js";

export const OUTPUT_FORMATS = ["sra", "fastq", "fastq.gz", "fasta", "fasta.gz"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/** What a download (or a local input file) hands to extraction. */
export type ArtifactKind = Extract<OutputFormat, "sra" | "fastq.gz" | "fasta" | "fasta.gz">;

export type ReadFormat = Extract<OutputFormat, "fastq" | "fasta">;
export type CompressedReadFormat = `${ReadFormat}.gz`;

const FORMAT_SET = new Set<string>(OUTPUT_FORMATS);

export function isOutputFormat(value: string): value is OutputFormat {
  return FORMAT_SET.has(value);
}

export function compressedOf(format: ReadFormat): CompressedReadFormat {
  return `${format}.gz`;
}

/** Deduplicates and orders formats canonically; the set itself is order-insensitive. */
export function normalizeFormats(values: readonly string[]): OutputFormat[] {
  if (!values.length) throw new ConfigurationError("at least one output format is required");
  const seen = new Set<OutputFormat>();
  for (const raw of values) {
    const v = raw.trim().toLowerCase();
    if (!isOutputFormat(v)) {
      throw new ConfigurationError(`unknown output format: ${raw} (expected one of ${OUTPUT_FORMATS.join(", ")})`);
    }
    seen.add(v);
  }
  return OUTPUT_FORMATS.filter((f) => seen.has(f));
}

export function detectArtifactKind(filePath: string): ArtifactKind | null {
  const s = filePath.toLowerCase();
  if (s.endsWith(".sra") || s.endsWith(".sralite")) return "sra";
  if (s.endsWith(".fastq.gz") || s.endsWith(".fq.gz")) return "fastq.gz";
  if (s.endsWith(".fasta.gz") || s.endsWith(".fa.gz") || s.endsWith(".fna.gz")) return "fasta.gz";
  if (s.endsWith(".fasta") || s.endsWith(".fa") || s.endsWith(".fna")) return "fasta";
  return null;
}

/**
 * Every file name a format may occupy for one run. Containers are a single
 * `<run>.sra`; read formats use the split layout (`_1`, `_2`, plus unpaired).
 */
export function targetFileNames(runId: string, format: OutputFormat): string[] {
  if (format === "sra") return [`${runId}.sra`];
  return [`${runId}_1.${format}`, `${runId}_2.${format}`, `${runId}.${format}`];
}

const KIND_EXTENSIONS = [".fastq.gz", ".fq.gz", ".fasta.gz", ".fa.gz", ".fna.gz", ".fastq", ".fq", ".fasta", ".fa", ".fna", ".sralite", ".sra"];

export function stripKindExtension(fileName: string): string {
  const lower = fileName.toLowerCase();
  const ext = KIND_EXTENSIONS.find((e) => lower.endsWith(e));
  return ext ? fileName.slice(0, fileName.length - ext.length) : fileName;
}

/** `_1`, `_2` or `""` for a read file such as `SRR1_2.fastq.gz`. */
export function mateSuffix(filePath: string): "_1" | "_2" | "" {
  const stem = stripKindExtension(path.basename(filePath));
  if (stem.endsWith("_1")) return "_1";
  if (stem.endsWith("_2")) return "_2";
  return "";
}

/** The run-level name of a local input: `SRR1_1.fastq.gz` and `SRR1.sra` both give `SRR1`. */
export function runIdFromFileName(filePath: string): string {
  const stem = stripKindExtension(path.basename(filePath));
  return stem.replace(/_[12]$/, "");
}

/** The deterministic name a read file gets in another format, keeping its mate suffix. */
export function retargetFileName(runId: string, sourcePath: string, format: Exclude<OutputFormat, "sra">): string {
  return `${runId}${mateSuffix(sourcePath)}.${format}`;
}
