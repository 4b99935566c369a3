import { promises as fs } from "fs";
import path from "path";
import { gunzipSync, gzipSync } from "zlib";
import type { ProcessResult, ProcessRunner, ProcessSpec } from "../../src/execution/backends/types.js";
import type { FetchLike } from "../../src/metadata/enaPortal.js";
import { PolicyEngine } from "../../src/policy/policy.js";
import { createInvocationContext, type InvocationContext } from "../../src/runs/invocationContext.js";

type ToolOutcome = Partial<Pick<ProcessResult, "exitCode" | "stderr" | "stdout">>;
type HandlerResult = ToolOutcome | void;
export type FakeTool = (spec: ProcessSpec) => HandlerResult | Promise<HandlerResult>;

function isOutcome(value: HandlerResult): value is ToolOutcome {
  return typeof value === "object" && value !== null;
}

/** Runs registered handlers in place of external programs, keyed by argv[0]. */
export class FakeRunner implements ProcessRunner {
  readonly calls: ProcessSpec[] = [];
  private readonly tools = new Map<string, FakeTool>();

  on(tool: string, handler: FakeTool): this {
    this.tools.set(tool, handler);
    return this;
  }

  argvOf(tool: string): string[][] {
    return this.calls.filter((c) => c.argv[0] === tool).map((c) => c.argv);
  }

  async run(spec: ProcessSpec, signal?: AbortSignal): Promise<ProcessResult> {
    signal?.throwIfAborted();
    this.calls.push(spec);
    const now = new Date().toISOString();
    const tool = spec.argv[0] ?? "";
    const handler = this.tools.get(tool);
    const result = handler ? await handler(spec) : { exitCode: 127, stderr: `${tool}: command not found` };
    const out = isOutcome(result) ? result : {};
    signal?.throwIfAborted();
    return { exitCode: 0, signal: null, stdout: "", stderr: "", startedAt: now, finishedAt: now, ...out };
  }
}

export function flagValue(argv: readonly string[], flag: string): string {
  const i = argv.indexOf(flag);
  const v = i >= 0 ? argv[i + 1] : undefined;
  if (v === undefined) throw new Error(`missing ${flag} in ${argv.join(" ")}`);
  return v;
}

export const FASTQ_1 = "@r1/1\nACGT\n+\nIIII\n";
export const FASTQ_2 = "@r1/2\nTTGA\n+\nIIII\n";

function toFasta(fastq: string): string {
  const lines = fastq.trim().split("\n");
  const out: string[] = [];
  for (let i = 0; i + 1 < lines.length; i += 4) {
    out.push(`>${(lines[i] ?? "").slice(1)}`, lines[i + 1] ?? "");
  }
  return out.join("\n") + "\n";
}

/** fasterq-dump writing a paired split layout named after --outfile. */
export function fakeFasterqDump(layout: "paired" | "single" = "paired"): FakeTool {
  return async (spec) => {
    const outdir = flagValue(spec.argv, "--outdir");
    const outfile = flagValue(spec.argv, "--outfile");
    const fasta = spec.argv.includes("--fasta");
    const ext = fasta ? "fasta" : "fastq";
    const run = outfile.slice(0, outfile.length - ext.length - 1);
    const body = (s: string): string => (fasta ? toFasta(s) : s);
    if (layout === "paired") {
      await fs.writeFile(path.join(outdir, `${run}_1.${ext}`), body(FASTQ_1));
      await fs.writeFile(path.join(outdir, `${run}_2.${ext}`), body(FASTQ_2));
    } else {
      await fs.writeFile(path.join(outdir, `${run}.${ext}`), body(FASTQ_1));
    }
  };
}

/** fastq-dump: a file dump into --outdir, or reads on the stdout sink. */
export function fakeFastqDump(): FakeTool {
  return async (spec) => {
    const container = spec.argv[spec.argv.length - 1] ?? "";
    const run = path.basename(container).replace(/\.sra$/, "");
    const fasta = spec.argv.includes("--fasta");
    const text = fasta ? toFasta(FASTQ_1) : FASTQ_1;
    if (spec.argv.includes("--stdout")) {
      spec.stdout?.write(text);
      return;
    }
    const outdir = flagValue(spec.argv, "--outdir");
    await fs.writeFile(path.join(outdir, `${run}.${fasta ? "fasta" : "fastq"}`), text);
  };
}

/** pigz -c (compress) or pigz -d -c (decompress) of the last argument onto the stdout sink. */
export function fakePigz(): FakeTool {
  return async (spec) => {
    const src = spec.argv[spec.argv.length - 1] ?? "";
    const data = await fs.readFile(src);
    spec.stdout?.write(spec.argv.includes("-d") ? gunzipSync(data) : gzipSync(data));
  };
}

export function fakeSeqkit(): FakeTool {
  return async (spec) => {
    const dest = flagValue(spec.argv, "--out-file");
    const src = spec.argv[spec.argv.indexOf("--out-file") - 1] ?? "";
    const fastq = gunzipSync(await fs.readFile(src)).toString("utf8");
    await fs.writeFile(dest, toFasta(fastq));
  };
}

/** curl and prefetch writing `content` to their output file. */
export function fakeDownloader(outputFlag: "--output" | "--output-file", content = "SRA-CONTAINER"): FakeTool {
  return async (spec) => {
    await fs.writeFile(flagValue(spec.argv, outputFlag), content);
  };
}

export function failingTool(stderr: string, exitCode = 1): FakeTool {
  return () => ({ exitCode, stderr });
}

export function quietContext(lines: string[] = [], signal?: AbortSignal): InvocationContext {
  return createInvocationContext({ verbosity: "debug", hideProgress: true, signal, write: (l) => lines.push(l) });
}

export function testPolicy(overrides: Record<string, unknown> = {}): PolicyEngine {
  return PolicyEngine.parse({
    version: 1,
    methods_allowlist: ["ena-ascp", "ena-ftp", "prefetch", "aws-http", "aws-cp", "gcp-cp"],
    quotas: { max_download_threads: 8, max_extraction_threads: 8, max_batch_concurrency: 4 },
    ...overrides
  });
}

/** A fetch stand-in answering by URL prefix. */
export function stubFetch(routes: Record<string, unknown>, calls: string[] = []): FetchLike {
  return async (input) => {
    calls.push(input);
    const match = Object.keys(routes).find((prefix) => input.startsWith(prefix));
    if (!match) return new Response("not found", { status: 404 });
    const body = routes[match];
    return new Response(typeof body === "string" ? body : JSON.stringify(body), {
      status: 200,
      headers: { "content-type": "application/json" }
    });
  };
}
