import { describe, it, expect } from "vitest";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { Writable } from "stream";
import { gunzipSync, gzipSync } from "zlib";
import type { OutputFormat } from "../src/core/formats.js";
import type { Artifact } from "../src/download/types.js";
import { ExtractionPipeline, type ExtractionJob } from "../src/extraction/pipeline.js";
import {
  failingTool,
  FASTQ_1,
  FASTQ_2,
  fakeFasterqDump,
  fakeFastqDump,
  fakePigz,
  fakeSeqkit,
  FakeRunner,
  quietContext,
  testPolicy
} from "./helpers/fakes.js";

const RUN = "SRR000001";

function toolchain(): FakeRunner {
  return new FakeRunner()
    .on("fasterq-dump", fakeFasterqDump("paired"))
    .on("fastq-dump", fakeFastqDump())
    .on("pigz", fakePigz())
    .on("seqkit", fakeSeqkit());
}

function pipeline(runner: FakeRunner): ExtractionPipeline {
  return new ExtractionPipeline({ runner, tools: testPolicy().tools() });
}

function job(outputDir: string, artifact: Artifact, formats: OutputFormat[], overrides: Partial<ExtractionJob> = {}): ExtractionJob {
  return { runId: RUN, artifact, formats, outputDir, force: false, unsorted: false, stdout: null, retainArtifact: false, ...overrides };
}

async function withDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "runfetch-extract-"));
  try {
    await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

async function container(dir: string): Promise<Artifact> {
  const p = path.join(dir, `${RUN}.sra`);
  await fs.writeFile(p, "SRA-CONTAINER");
  return { kind: "sra", paths: [p] };
}

describe("ExtractionPipeline", () => {
  it("dumps a container once and compresses the paired reads", async () => {
    await withDir(async (dir) => {
      const runner = toolchain();
      const result = await pipeline(runner).extract(job(dir, await container(dir), ["fastq.gz"]), 2, quietContext());

      const gz1 = path.join(dir, "SRR000001_1.fastq.gz");
      const gz2 = path.join(dir, "SRR000001_2.fastq.gz");
      expect(result.ok).toBe(true);
      expect(result.outputs).toEqual([gz1, gz2]);
      expect(await fs.readdir(dir)).toEqual(["SRR000001_1.fastq.gz", "SRR000001_2.fastq.gz"]);
      expect(gunzipSync(await fs.readFile(gz1)).toString("utf8")).toBe(FASTQ_1);
      expect(gunzipSync(await fs.readFile(gz2)).toString("utf8")).toBe(FASTQ_2);

      const scratch = path.join(dir, "SRR000001.fastq.d.partial");
      expect(runner.argvOf("fasterq-dump")).toEqual([
        [
          "fasterq-dump",
          "--split-3",
          "--threads",
          "2",
          "--outdir",
          scratch,
          "--temp",
          scratch,
          "--outfile",
          "SRR000001.fastq",
          path.join(dir, "SRR000001.sra")
        ]
      ]);
      expect(runner.argvOf("pigz").map((argv) => argv.slice(0, 4))).toEqual([
        ["pigz", "-c", "-p", "2"],
        ["pigz", "-c", "-p", "2"]
      ]);
    });
  });

  it("keeps the container and the dump when both were requested", async () => {
    await withDir(async (dir) => {
      const runner = toolchain();
      const artifact = await container(dir);
      const result = await pipeline(runner).extract(job(dir, artifact, ["sra", "fasta"]), 1, quietContext());

      expect(result.outputs).toEqual([
        path.join(dir, "SRR000001.sra"),
        path.join(dir, "SRR000001_1.fasta"),
        path.join(dir, "SRR000001_2.fasta")
      ]);
      expect(runner.argvOf("fasterq-dump")[0]).toContain("--fasta");
      expect(await fs.readFile(path.join(dir, "SRR000001_1.fasta"), "utf8")).toBe(">r1/1\nACGT\n");
    });
  });

  it("compresses reads already on disk and reports them as skipped", async () => {
    await withDir(async (dir) => {
      const runner = toolchain();
      const existing = path.join(dir, "SRR000001.fastq");
      await fs.writeFile(existing, FASTQ_1);
      const result = await pipeline(runner).extract(
        job(dir, await container(dir), ["fastq", "fastq.gz"]),
        1,
        quietContext()
      );

      expect(result.ok).toBe(true);
      expect(result.skipped).toEqual([existing]);
      expect(result.outputs).toEqual([path.join(dir, "SRR000001.fastq.gz")]);
      expect(runner.argvOf("fasterq-dump")).toEqual([]);
      expect(await fs.readdir(dir)).toEqual(["SRR000001.fastq", "SRR000001.fastq.gz"]);
    });
  });

  it("converts local fastq.gz to fasta and leaves the inputs alone", async () => {
    await withDir(async (dir) => {
      const inputs = path.join(dir, "in");
      const out = path.join(dir, "out");
      await fs.mkdir(inputs);
      const mates = [path.join(inputs, "SRR000001_1.fastq.gz"), path.join(inputs, "SRR000001_2.fastq.gz")];
      await fs.writeFile(mates[0] ?? "", gzipSync(FASTQ_1));
      await fs.writeFile(mates[1] ?? "", gzipSync(FASTQ_2));

      const runner = toolchain();
      const result = await pipeline(runner).extract(
        job(out, { kind: "fastq.gz", paths: mates }, ["fasta"], { retainArtifact: true }),
        3,
        quietContext()
      );

      expect(result.outputs).toEqual([path.join(out, "SRR000001_1.fasta"), path.join(out, "SRR000001_2.fasta")]);
      expect(await fs.readFile(path.join(out, "SRR000001_2.fasta"), "utf8")).toBe(">r1/2\nTTGA\n");
      expect(runner.argvOf("seqkit")[0]).toEqual([
        "seqkit",
        "fq2fa",
        "--threads",
        "3",
        mates[0],
        "--out-file",
        path.join(out, "SRR000001_1.fasta.partial")
      ]);
      expect(await fs.readdir(inputs)).toEqual(["SRR000001_1.fastq.gz", "SRR000001_2.fastq.gz"]);
    });
  });

  it("streams an unsorted dump to the stdout sink without writing files", async () => {
    await withDir(async (dir) => {
      const chunks: string[] = [];
      const sink = new Writable({
        write(chunk, _encoding, callback) {
          chunks.push(String(chunk));
          callback();
        }
      });
      const runner = toolchain();
      const result = await pipeline(runner).extract(
        job(dir, await container(dir), ["fastq"], { unsorted: true, stdout: sink }),
        1,
        quietContext()
      );

      expect(result).toMatchObject({ ok: true, outputs: [], skipped: [] });
      expect(chunks.join("")).toBe(FASTQ_1);
      expect(runner.argvOf("fastq-dump")).toEqual([
        ["fastq-dump", "--stdout", "--split-spot", "--skip-technical", path.join(dir, "SRR000001.sra")]
      ]);
      expect(await fs.readdir(dir)).toEqual([]);
    });
  });

  it("dumps in file order with fastq-dump when unsorted", async () => {
    await withDir(async (dir) => {
      const runner = toolchain();
      const result = await pipeline(runner).extract(
        job(dir, await container(dir), ["fastq"], { unsorted: true }),
        4,
        quietContext()
      );

      expect(result.outputs).toEqual([path.join(dir, "SRR000001.fastq")]);
      expect(runner.argvOf("fastq-dump")).toEqual([
        ["fastq-dump", "--split-3", "--outdir", path.join(dir, "SRR000001.fastq.d.partial"), path.join(dir, "SRR000001.sra")]
      ]);
    });
  });

  it("keeps earlier outputs when a later step fails", async () => {
    await withDir(async (dir) => {
      const runner = toolchain().on("pigz", failingTool("pigz: disk full"));
      const result = await pipeline(runner).extract(
        job(dir, await container(dir), ["fastq", "fastq.gz"]),
        1,
        quietContext()
      );

      expect(result.ok).toBe(false);
      expect(result.error?.message).toBe("SRR000001: fastq -> fastq.gz: pigz failed (exit 1): pigz: disk full");
      expect(result.outputs).toEqual([path.join(dir, "SRR000001_1.fastq"), path.join(dir, "SRR000001_2.fastq")]);
      expect(await fs.readdir(dir)).toEqual(["SRR000001.sra", "SRR000001_1.fastq", "SRR000001_2.fastq"]);
    });
  });

  it("fails a dump that writes no reads", async () => {
    await withDir(async (dir) => {
      const runner = toolchain().on("fasterq-dump", () => undefined);
      const result = await pipeline(runner).extract(job(dir, await container(dir), ["fastq"]), 1, quietContext());

      expect(result.error?.message).toBe("SRR000001: dump fastq (sorted): no reads were written");
      expect(await fs.readdir(dir)).toEqual(["SRR000001.sra"]);
    });
  });

  it("refuses formats the artifact cannot produce without running anything", async () => {
    await withDir(async (dir) => {
      const runner = toolchain();
      const result = await pipeline(runner).extract(
        job(dir, { kind: "fastq.gz", paths: [path.join(dir, "SRR000001.fastq.gz")] }, ["sra"]),
        1,
        quietContext()
      );

      expect(result.error?.message).toBe("SRR000001: plan: cannot produce sra from a fastq.gz artifact");
      expect(runner.calls).toEqual([]);
    });
  });
});
