import { describe, it, expect } from "vitest";
import { tableFromIPC } from "apache-arrow";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { Writable } from "stream";
import { ConfigurationError } from "../src/core/errors.js";
import { Annotator, renderText, type MetadataTable } from "../src/metadata/annotate.js";
import { EnaPortalClient, EnaPortalError } from "../src/metadata/enaPortal.js";
import { parseRunList, RunResolver } from "../src/metadata/runResolver.js";
import { quietContext, stubFetch } from "./helpers/fakes.js";

const ENA = "https://ena.test/api";

const TABLE: MetadataTable = {
  columns: ["run_accession", "read_count", "note"],
  rows: [
    { run_accession: "SRR000001", read_count: "12", note: 'a, "b"' },
    { run_accession: "SRR000002", read_count: "7", note: "" }
  ]
};

async function withDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "runfetch-meta-"));
  try {
    await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

describe("RunResolver", () => {
  it("merges accessions, list files and BioProjects in first-seen order", async () => {
    await withDir(async (dir) => {
      const list = path.join(dir, "runs.txt");
      await fs.writeFile(list, "# batch one\nSRR000003\n\n  SRR000001  \n");
      const calls: string[] = [];
      const ena = new EnaPortalClient(
        ENA,
        stubFetch({ [`${ENA}/filereport`]: [{ run_accession: "SRR000004" }, { run_accession: "SRR000003" }] }, calls)
      );

      const runs = await new RunResolver(ena).resolve(
        { runIds: ["SRR000001"], runIdentifiersList: list, bioprojects: ["PRJNA000001"] },
        quietContext()
      );
      expect(runs).toEqual(["SRR000001", "SRR000003", "SRR000004"]);
      expect(calls).toEqual([
        `${ENA}/filereport?accession=PRJNA000001&result=read_run&format=json&fields=run_accession`
      ]);
    });
  });

  it("rejects bad input before doing anything", async () => {
    const resolver = new RunResolver(new EnaPortalClient(ENA, stubFetch({})));
    await expect(resolver.resolve({ runIds: ["SRX000001"] }, quietContext())).rejects.toThrow(
      'invalid run accession "SRX000001" (run identifiers)'
    );
    await expect(resolver.resolve({ bioprojects: ["PRJ1"] }, quietContext())).rejects.toThrow(
      'invalid BioProject accession "PRJ1"'
    );
    await expect(resolver.resolve({ runIdentifiersList: "/nonexistent/runs.txt" }, quietContext())).rejects.toThrow(
      "run identifiers list not found: /nonexistent/runs.txt"
    );
    await expect(resolver.resolve({}, quietContext())).rejects.toThrow(new ConfigurationError("no run accessions to process"));
  });

  it("surfaces portal errors", async () => {
    const resolver = new RunResolver(new EnaPortalClient(ENA, stubFetch({})));
    await expect(resolver.resolve({ bioprojects: ["PRJEB000001"] }, quietContext())).rejects.toThrow(EnaPortalError);
  });

  it("parses list files", () => {
    expect(parseRunList("SRR1\r\n# note\n\nERR2\n")).toEqual(["SRR1", "ERR2"]);
  });
});

describe("renderText", () => {
  it("quotes csv cells that need it", () => {
    expect(renderText(TABLE, "csv")).toBe(
      'run_accession,read_count,note\nSRR000001,12,"a, ""b"""\nSRR000002,7,\n'
    );
  });

  it("writes tsv", () => {
    expect(renderText(TABLE, "tsv")).toBe('run_accession\tread_count\tnote\nSRR000001\t12\ta, "b"\nSRR000002\t7\t\n');
  });

  it("aligns the pretty table", () => {
    expect(renderText(TABLE, "pretty")).toBe(
      [
        "run_accession  read_count  note",
        "-------------  ----------  ------",
        'SRR000001      12          a, "b"',
        "SRR000002      7",
        ""
      ].join("\n")
    );
  });

  it("keeps column order in json", () => {
    expect(JSON.parse(renderText(TABLE, "json"))).toEqual(TABLE.rows);
    expect(renderText({ columns: ["run_accession"], rows: [] }, "json")).toBe("[]\n");
  });
});

describe("Annotator", () => {
  const ROWS = [
    { run_accession: "SRR000001", read_count: 12, scientific_name: "Homo sapiens" },
    { run_accession: "SRR000002", read_count: 7, scientific_name: null }
  ];

  async function annotator(dir: string, calls: string[] = []): Promise<Annotator> {
    const fieldsFile = path.join(dir, "fields.json");
    await fs.writeFile(
      fieldsFile,
      JSON.stringify({ default: ["run_accession", "read_count"], all: ["run_accession", "read_count", "scientific_name"] })
    );
    return new Annotator(new EnaPortalClient(ENA, stubFetch({ [`${ENA}/filereport`]: ROWS }, calls)), fieldsFile);
  }

  it("fetches one row per run and warns about runs without metadata", async () => {
    await withDir(async (dir) => {
      const calls: string[] = [];
      const lines: string[] = [];
      const table = await (await annotator(dir, calls)).fetch(["SRR000002", "SRR000009"], false, quietContext(lines));

      expect(table).toEqual({ columns: ["run_accession", "read_count"], rows: [{ run_accession: "SRR000002", read_count: "7", scientific_name: "" }] });
      expect(calls[0]).toBe(`${ENA}/filereport?accession=SRR000002&result=read_run&format=json&fields=run_accession%2Cread_count`);
      expect(lines.map((l) => JSON.parse(l).kind)).toContain("annotate.missing");
    });
  });

  it("writes the rendered table to the output file or the stream", async () => {
    await withDir(async (dir) => {
      const out = path.join(dir, "meta", "runs.tsv");
      const a = await annotator(dir);
      await a.annotate(["SRR000001"], { format: "tsv", outputFile: out, allColumns: true }, quietContext(), null);
      expect(await fs.readFile(out, "utf8")).toBe("run_accession\tread_count\tscientific_name\nSRR000001\t12\tHomo sapiens\n");

      const written: string[] = [];
      const sink = new Writable({
        write(chunk, _encoding, callback) {
          written.push(String(chunk));
          callback();
        }
      });
      await a.annotate(["SRR000001"], { format: "csv", outputFile: null, allColumns: false }, quietContext(), sink);
      expect(written.join("")).toBe("run_accession,read_count\nSRR000001,12\n");
    });
  });

  it("needs an output file for feather and writes an Arrow file", async () => {
    await withDir(async (dir) => {
      const calls: string[] = [];
      const a = await annotator(dir, calls);
      await expect(
        a.annotate(["SRR000001"], { format: "feather", outputFile: null, allColumns: false }, quietContext(), null)
      ).rejects.toThrow("feather output is binary and needs an output file (-o)");
      expect(calls).toEqual([]);

      const file = path.join(dir, "runs.feather");
      await a.annotate(["SRR000001", "SRR000002"], { format: "feather", outputFile: file, allColumns: false }, quietContext(), null);
      const table = tableFromIPC(await fs.readFile(file));
      expect(table.numRows).toBe(2);
      expect(table.getChild("run_accession")?.get(1)).toBe("SRR000002");
      expect(table.getChild("read_count")?.get(0)).toBe("12");
    });
  });
});
