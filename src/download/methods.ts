import { ConfigurationError } from "../core/errors.js";
import type { ArtifactKind } from "../core/formats.js";

export const DOWNLOAD_METHODS = ["ena-ascp", "ena-ftp", "prefetch", "aws-http", "aws-cp", "gcp-cp"] as const;
export type DownloadMethod = (typeof DOWNLOAD_METHODS)[number];

export type PaidProvider = "aws" | "gcp";

/**
 * - stream: the artifact is a container that can be dumped in a single pass, in file order
 * - ignored: the artifact is already read files; unsorted has nothing to change
 * - unsupported: unsorted (and stdout) output is refused up front
 */
export type UnsortedSupport = "stream" | "ignored" | "unsupported";

export interface MethodDescriptor {
  method: DownloadMethod;
  yields: ArtifactKind;
  paidProvider: PaidProvider | null;
  unsorted: UnsortedSupport;
  description: string;
}

export const METHOD_TABLE: { readonly [M in DownloadMethod]: MethodDescriptor & { method: M } } = {
  "ena-ascp": {
    method: "ena-ascp",
    yields: "fastq.gz",
    paidProvider: null,
    unsorted: "ignored",
    description: "Aspera transfer of ENA fastq.gz files"
  },
  "ena-ftp": {
    method: "ena-ftp",
    yields: "fastq.gz",
    paidProvider: null,
    unsorted: "ignored",
    description: "HTTPS download of ENA fastq.gz files"
  },
  prefetch: {
    method: "prefetch",
    yields: "sra",
    paidProvider: null,
    unsorted: "unsupported",
    description: "NCBI SRA toolkit prefetch"
  },
  "aws-http": {
    method: "aws-http",
    yields: "sra",
    paidProvider: null,
    unsorted: "stream",
    description: "HTTPS download from the AWS open data mirror"
  },
  "aws-cp": {
    method: "aws-cp",
    yields: "sra",
    paidProvider: "aws",
    unsorted: "stream",
    description: "aws s3 cp from the SRA location in AWS"
  },
  "gcp-cp": {
    method: "gcp-cp",
    yields: "sra",
    paidProvider: "gcp",
    unsorted: "stream",
    description: "gsutil cp from the SRA location in Google Cloud (requester pays)"
  }
};

const METHOD_SET = new Set<string>(DOWNLOAD_METHODS);

export function isDownloadMethod(value: string): value is DownloadMethod {
  return METHOD_SET.has(value);
}

/** Keeps caller order and repeats: listing a method twice means trying it twice. */
export function parseMethods(values: readonly string[]): DownloadMethod[] {
  if (!values.length) throw new ConfigurationError("at least one download method is required");
  return values.map((raw) => {
    const v = raw.trim().toLowerCase();
    if (!isDownloadMethod(v)) {
      throw new ConfigurationError(`unknown download method: ${raw} (expected one of ${DOWNLOAD_METHODS.join(", ")})`);
    }
    return v;
  });
}
