import * as z from "zod/v4";

export type FetchLike = (input: string, init?: { signal?: AbortSignal }) => Promise<Response>;

export type EnaRow = Record<string, string>;

const zEnaRows = z.array(z.record(z.string(), z.union([z.string(), z.number(), z.boolean(), z.null()])));

export interface EnaFastqFile {
  name: string;
  /** `ftp.sra.ebi.ac.uk/vol1/fastq/...`, no scheme. */
  ftpPath: string;
  /** `fasp.sra.ebi.ac.uk:/vol1/fastq/...`. */
  asperaPath: string | null;
  md5: string | null;
  bytes: number | null;
}

export class EnaPortalError extends Error {
  constructor(
    message: string,
    readonly status: number | null = null
  ) {
    super(message);
    this.name = "EnaPortalError";
  }
}

function splitField(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(";").map((v) => v.trim());
}

export class EnaPortalClient {
  constructor(
    private readonly baseUrl: string,
    private readonly fetchImpl: FetchLike = (input, init) => fetch(input, init)
  ) {}

  async fileReport(accession: string, fields: readonly string[], signal?: AbortSignal): Promise<EnaRow[]> {
    const params = new URLSearchParams({
      accession,
      result: "read_run",
      format: "json",
      fields: fields.join(",")
    });
    const url = `${this.baseUrl.replace(/\/+$/, "")}/filereport?${params.toString()}`;
    const res = await this.fetchImpl(url, { signal });
    if (!res.ok) {
      throw new EnaPortalError(`ENA portal returned HTTP ${res.status} for ${accession}`, res.status);
    }
    const text = await res.text();
    if (!text.trim()) return [];

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw new EnaPortalError(`ENA portal returned non-JSON for ${accession}`);
    }
    const parsed = zEnaRows.safeParse(json);
    if (!parsed.success) {
      throw new EnaPortalError(`unexpected ENA portal response for ${accession}`);
    }
    return parsed.data.map((row) => {
      const out: EnaRow = {};
      for (const [k, v] of Object.entries(row)) out[k] = v === null ? "" : String(v);
      return out;
    });
  }

  async projectRuns(bioproject: string, signal?: AbortSignal): Promise<string[]> {
    const rows = await this.fileReport(bioproject, ["run_accession"], signal);
    return rows.map((r) => r["run_accession"] ?? "").filter((r) => r.length > 0);
  }

  async runFastqFiles(runId: string, signal?: AbortSignal): Promise<EnaFastqFile[]> {
    const rows = await this.fileReport(runId, ["run_accession", "fastq_ftp", "fastq_aspera", "fastq_md5", "fastq_bytes"], signal);
    const row = rows.find((r) => r["run_accession"] === runId);
    if (!row) return [];

    const ftp = splitField(row["fastq_ftp"]).filter(Boolean);
    const aspera = splitField(row["fastq_aspera"]);
    const md5 = splitField(row["fastq_md5"]);
    const bytes = splitField(row["fastq_bytes"]);

    return ftp.map((ftpPath, i) => {
      const size = Number(bytes[i]);
      return {
        name: ftpPath.slice(ftpPath.lastIndexOf("/") + 1),
        ftpPath,
        asperaPath: aspera[i] || null,
        md5: md5[i] || null,
        bytes: Number.isFinite(size) && bytes[i] ? size : null
      };
    });
  }
}
