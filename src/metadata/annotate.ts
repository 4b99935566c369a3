import { tableFromArrays, tableToIPC } from "apache-arrow";
import { promises as fs } from "fs";
import path from "path";
import type { Writable } from "stream";
import { fileURLToPath } from "url";
import * as z from "zod/v4";
import { ConfigurationError } from "../core/errors.js";
import type { RunAccession } from "../core/ids.js";
import type { InvocationContext } from "../runs/invocationContext.js";
import type { EnaPortalClient, EnaRow } from "./enaPortal.js";

export const ANNOTATE_FORMATS = ["pretty", "csv", "tsv", "json", "feather"] as const;
export type AnnotateFormat = (typeof ANNOTATE_FORMATS)[number];

export function isAnnotateFormat(value: string): value is AnnotateFormat {
  return (ANNOTATE_FORMATS as readonly string[]).includes(value);
}

export interface AnnotateOptions {
  format: AnnotateFormat;
  outputFile: string | null;
  allColumns: boolean;
}

export interface MetadataTable {
  columns: string[];
  rows: EnaRow[];
}

const DEFAULT_FIELDS_FILE = fileURLToPath(new URL("../../data/ena_read_run_fields.json", import.meta.url));

const zFieldsFile = z.object({
  default: z.array(z.string().min(1)).min(1),
  all: z.array(z.string().min(1)).min(1)
});

/** Raised before any request is made. */
export function validateAnnotateOptions(opts: AnnotateOptions): void {
  if (opts.format === "feather" && !opts.outputFile) {
    throw new ConfigurationError("feather output is binary and needs an output file (-o)");
  }
}

function csvCell(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function tsvCell(value: string): string {
  return value.replace(/[\t\r\n]+/g, " ");
}

export function renderText(table: MetadataTable, format: Exclude<AnnotateFormat, "feather">): string {
  const { columns, rows } = table;
  const cells = rows.map((row) => columns.map((c) => row[c] ?? ""));
  switch (format) {
    case "csv":
      return [columns, ...cells].map((line) => line.map(csvCell).join(",")).join("\n") + "\n";
    case "tsv":
      return [columns, ...cells].map((line) => line.map(tsvCell).join("\t")).join("\n") + "\n";
    case "json":
      return JSON.stringify(rows.map((row) => Object.fromEntries(columns.map((c) => [c, row[c] ?? ""]))), null, 2) + "\n";
    case "pretty": {
      const widths = columns.map((c, i) => Math.max(c.length, ...cells.map((line) => (line[i] ?? "").length)));
      const pad = (line: string[]): string =>
        line
          .map((v, i) => v.padEnd(widths[i] ?? 0))
          .join("  ")
          .trimEnd();
      return [pad(columns), pad(widths.map((w) => "-".repeat(w))), ...cells.map(pad)].join("\n") + "\n";
    }
  }
}

export function renderFeather(table: MetadataTable): Uint8Array {
  const arrays: Record<string, string[]> = {};
  for (const c of table.columns) arrays[c] = table.rows.map((row) => row[c] ?? "");
  return tableToIPC(tableFromArrays(arrays), "file");
}

export class Annotator {
  private fields: z.infer<typeof zFieldsFile> | null = null;

  constructor(
    private readonly ena: EnaPortalClient,
    private readonly fieldsFile: string = DEFAULT_FIELDS_FILE
  ) {}

  async columns(allColumns: boolean): Promise<string[]> {
    if (!this.fields) {
      const raw = await fs.readFile(this.fieldsFile, "utf8");
      this.fields = zFieldsFile.parse(JSON.parse(raw));
    }
    return allColumns ? this.fields.all : this.fields.default;
  }

  async fetch(runIds: readonly RunAccession[], allColumns: boolean, ctx: InvocationContext): Promise<MetadataTable> {
    const columns = await this.columns(allColumns);
    const rows: EnaRow[] = [];
    for (const runId of runIds) {
      ctx.signal?.throwIfAborted();
      const found = (await this.ena.fileReport(runId, columns, ctx.signal)).filter((r) => r["run_accession"] === runId);
      if (!found.length) {
        ctx.log("warn", "annotate.missing", `no metadata for ${runId}`, { run: runId });
      }
      rows.push(...found);
    }
    return { columns, rows };
  }

  /** Renders to `outputFile` when set, otherwise to `out`. */
  async annotate(
    runIds: readonly RunAccession[],
    opts: AnnotateOptions,
    ctx: InvocationContext,
    out: Writable | null
  ): Promise<MetadataTable> {
    validateAnnotateOptions(opts);
    const table = await this.fetch(runIds, opts.allColumns, ctx);

    if (opts.format === "feather") {
      if (opts.outputFile) await writeOutput(opts.outputFile, renderFeather(table));
    } else {
      const text = renderText(table, opts.format);
      if (opts.outputFile) await writeOutput(opts.outputFile, text);
      else out?.write(text);
    }
    ctx.log("info", "annotate.done", `${table.rows.length} row(s), ${table.columns.length} column(s)`, {
      format: opts.format,
      output: opts.outputFile
    });
    return table;
  }
}

async function writeOutput(file: string, data: string | Uint8Array): Promise<void> {
  await fs.mkdir(path.dirname(path.resolve(file)), { recursive: true });
  await fs.writeFile(file, data);
}
