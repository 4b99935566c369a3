import { createWriteStream, promises as fs } from "fs";
import path from "path";
import type { Writable } from "stream";
import { finished } from "stream/promises";
import { ConversionError, errorMessage } from "../core/errors.js";
import { retargetFileName, type OutputFormat, type ReadFormat } from "../core/formats.js";
import type { RunAccession } from "../core/ids.js";
import type { Artifact } from "../download/types.js";
import { describeFailure } from "../execution/backends/localProcess.js";
import type { ProcessRunner, ProcessSpec } from "../execution/backends/types.js";
import {
  createRunWorkspace,
  existingTargets,
  withPartialFiles,
  type RunWorkspace
} from "../execution/workspace.js";
import type { ToolPaths } from "../policy/policy.js";
import type { InvocationContext } from "../runs/invocationContext.js";
import { plan, UnreachableFormatError, type ConversionStep } from "./negotiator.js";

export interface ExtractionJob {
  runId: RunAccession;
  artifact: Artifact;
  formats: OutputFormat[];
  outputDir: string;
  force: boolean;
  unsorted: boolean;
  /** Stream reads here instead of writing files (unsorted single-format mode). */
  stdout: Writable | null;
  retainArtifact: boolean;
}

export interface ExtractionResult {
  ok: boolean;
  /** Files this job wrote, in step order. Kept even when a later step fails. */
  outputs: string[];
  /** Requested targets that already existed and were left alone. */
  skipped: string[];
  steps: ConversionStep[];
  error: ConversionError | null;
}

function describeStep(step: ConversionStep): string {
  switch (step.op) {
    case "keep":
      return `keep ${step.format}`;
    case "dump":
      return `dump ${step.to} (${step.mode}${step.stdout ? ", stdout" : ""})`;
    case "fq2fa":
      return "fastq.gz -> fasta";
    case "compress":
      return `${step.from} -> ${step.to}`;
    case "decompress":
      return `${step.from} -> ${step.to}`;
    case "discard":
      return `discard ${step.format}`;
    case "remove-artifact":
      return "remove artifact";
  }
}

const DUMP_OUTPUT_RE = (runId: string, ext: string): RegExp =>
  new RegExp(`^${runId.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")}(_[12])?\\.${ext}$`);

export class ExtractionPipeline {
  constructor(
    private readonly deps: {
      runner: ProcessRunner;
      tools: ToolPaths;
    }
  ) {}

  async extract(job: ExtractionJob, threads: number, ctx: InvocationContext): Promise<ExtractionResult> {
    const ws = await createRunWorkspace(job.outputDir, job.runId);

    const present = new Map<OutputFormat, string[]>();
    if (!job.force && !job.stdout) {
      for (const f of job.formats) {
        const existing = await existingTargets(ws, f);
        if (existing.length) present.set(f, existing);
      }
    }
    const skipped = job.formats.flatMap((f) => present.get(f) ?? []);

    let steps: ConversionStep[];
    try {
      const p = plan(job.artifact.kind, job.formats, {
        unsorted: job.unsorted,
        stdout: job.stdout !== null,
        present: new Set(present.keys()),
        retainArtifact: job.retainArtifact
      });
      steps = p.steps;
      for (const w of p.warnings) ctx.log("warn", "extract.warning", `${job.runId}: ${w}`, { run: job.runId });
    } catch (err) {
      if (err instanceof UnreachableFormatError) {
        return { ok: false, outputs: [], skipped, steps: [], error: new ConversionError(job.runId, "plan", err.message) };
      }
      throw err;
    }

    for (const s of skipped) {
      ctx.log("info", "extract.skipped", `${path.basename(s)} already exists`, { run: job.runId, path: s });
    }

    const state = new StepState(job, ws, present);
    for (const step of steps) {
      ctx.signal?.throwIfAborted();
      const label = describeStep(step);
      ctx.log("info", "extract.step", `${job.runId}: ${label}`, { run: job.runId, step: step.op });
      try {
        await this.execute(step, state, threads, ctx);
      } catch (err) {
        if (ctx.signal?.aborted) throw err;
        const error = err instanceof ConversionError ? err : new ConversionError(job.runId, label, errorMessage(err));
        ctx.log("error", "extract.failed", error.message, { run: job.runId, step: step.op });
        return { ok: false, outputs: state.outputs(), skipped, steps, error };
      }
    }

    return { ok: true, outputs: state.outputs(), skipped, steps, error: null };
  }

  private async execute(step: ConversionStep, state: StepState, threads: number, ctx: InvocationContext): Promise<void> {
    const { job, ws } = state;
    switch (step.op) {
      case "keep": {
        const paths = await withPartialFiles(ws, async (files) => {
          const out: string[] = [];
          for (const src of job.artifact.paths) {
            const name = step.format === "sra" ? `${job.runId}.sra` : retargetFileName(job.runId, src, step.format);
            const final = ws.finalPath(name);
            if (path.resolve(src) === final) {
              out.push(final);
              continue;
            }
            await fs.copyFile(src, files.reserve(name));
          }
          return [...out, ...(await files.commit())];
        });
        state.record(step.format, paths);
        return;
      }

      case "dump": {
        if (step.stdout) {
          await this.dumpToStdout(step.to, state, ctx);
          return;
        }
        const paths = await withPartialFiles(ws, async (files) => {
          const scratch = await files.scratchDir(`${job.runId}.${step.to}`);
          const container = this.containerPath(state);
          const argv =
            step.mode === "sorted"
              ? [
                  this.deps.tools.fasterq_dump,
                  "--split-3",
                  "--threads",
                  String(threads),
                  "--outdir",
                  scratch,
                  "--temp",
                  scratch,
                  "--outfile",
                  `${job.runId}.${step.to}`,
                  ...(step.to === "fasta" ? ["--fasta"] : []),
                  container
                ]
              : [
                  this.deps.tools.fastq_dump,
                  "--split-3",
                  "--outdir",
                  scratch,
                  ...(step.to === "fasta" ? ["--fasta", "0"] : []),
                  container
                ];
          if (step.mode === "unsorted" && threads > 1) {
            ctx.log("debug", "extract.threads", `unsorted dump is single-threaded; ignoring threads=${threads}`, {
              run: job.runId
            });
          }
          await this.runTool(step, argv, ctx);
          const pattern = DUMP_OUTPUT_RE(job.runId, step.to);
          const produced = (await fs.readdir(scratch)).filter((n) => pattern.test(n)).sort();
          if (!produced.length) throw new ConversionError(job.runId, describeStep(step), "no reads were written");
          for (const name of produced) files.adopt(path.join(scratch, name), name);
          return files.commit();
        });
        state.record(step.to, paths);
        return;
      }

      case "fq2fa": {
        const paths = await withPartialFiles(ws, async (files) => {
          for (const src of job.artifact.paths) {
            const dest = files.reserve(retargetFileName(job.runId, src, "fasta"));
            await this.runTool(step, [this.deps.tools.seqkit, "fq2fa", "--threads", String(threads), src, "--out-file", dest], ctx);
          }
          return files.commit();
        });
        state.record("fasta", paths);
        return;
      }

      case "compress": {
        const sources = step.source === "existing" ? (state.present.get(step.from) ?? []) : state.sourcesFor(step.from);
        const paths = await this.pigz(step, sources, step.to, ["-c", "-p", String(threads)], state, ctx);
        state.record(step.to, paths);
        return;
      }

      case "decompress": {
        const paths = await this.pigz(step, state.sourcesFor(step.from), step.to, ["-d", "-c", "-p", String(threads)], state, ctx);
        state.record(step.to, paths);
        return;
      }

      case "discard": {
        for (const p of state.take(step.format)) await fs.rm(p, { force: true });
        return;
      }

      case "remove-artifact": {
        for (const p of job.artifact.paths) await fs.rm(p, { force: true });
        return;
      }
    }
  }

  private async pigz(
    step: ConversionStep,
    sources: string[],
    to: Exclude<OutputFormat, "sra">,
    flags: string[],
    state: StepState,
    ctx: InvocationContext
  ): Promise<string[]> {
    if (!sources.length) throw new ConversionError(state.job.runId, describeStep(step), "no input files");
    return withPartialFiles(state.ws, async (files) => {
      for (const src of sources) {
        const dest = files.reserve(retargetFileName(state.job.runId, src, to));
        const out = createWriteStream(dest);
        try {
          await this.runTool(step, [this.deps.tools.pigz, ...flags, src], ctx, { stdout: out });
        } finally {
          out.end();
          await finished(out);
        }
      }
      return files.commit();
    });
  }

  private async dumpToStdout(to: ReadFormat, state: StepState, ctx: InvocationContext): Promise<void> {
    const sink = state.job.stdout;
    if (!sink) throw new Error("stdout dump requested without a sink");
    const argv = [
      this.deps.tools.fastq_dump,
      "--stdout",
      "--split-spot",
      "--skip-technical",
      ...(to === "fasta" ? ["--fasta", "0"] : []),
      this.containerPath(state)
    ];
    await this.runTool({ op: "dump", to, mode: "unsorted", stdout: true }, argv, ctx, { stdout: sink });
  }

  private containerPath(state: StepState): string {
    const [container] = state.job.artifact.paths;
    if (state.job.artifact.kind !== "sra" || !container) {
      throw new ConversionError(state.job.runId, "dump", "dump requires an sra container");
    }
    return container;
  }

  private async runTool(
    step: ConversionStep,
    argv: string[],
    ctx: InvocationContext,
    extra: Pick<ProcessSpec, "stdout"> = {}
  ): Promise<void> {
    ctx.log("debug", "extract.exec", argv.join(" "), { step: step.op });
    const result = await this.deps.runner.run({ argv, ...extra, echoStderr: !ctx.hideProgress }, ctx.signal);
    if (result.exitCode !== 0) {
      throw new Error(describeFailure(argv[0] ?? step.op, result));
    }
  }
}

/** Files each format currently occupies while a plan runs. */
class StepState {
  private readonly produced = new Map<OutputFormat, string[]>();
  private readonly written: string[] = [];

  constructor(
    readonly job: ExtractionJob,
    readonly ws: RunWorkspace,
    readonly present: ReadonlyMap<OutputFormat, string[]>
  ) {}

  record(format: OutputFormat, paths: string[]): void {
    this.produced.set(format, paths);
    for (const p of paths) if (!this.written.includes(p)) this.written.push(p);
  }

  sourcesFor(format: OutputFormat): string[] {
    const produced = this.produced.get(format);
    if (produced) return produced;
    if (this.job.artifact.kind === format) return this.job.artifact.paths;
    return [];
  }

  take(format: OutputFormat): string[] {
    const paths = this.produced.get(format) ?? [];
    this.produced.delete(format);
    for (const p of paths) {
      const i = this.written.indexOf(p);
      if (i >= 0) this.written.splice(i, 1);
    }
    return paths;
  }

  outputs(): string[] {
    return [...this.written];
  }
}
