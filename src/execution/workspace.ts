import { promises as fs } from "fs";
import path from "path";
import type { OutputFormat } from "../core/formats.js";
import { targetFileNames } from "../core/formats.js";
import type { RunAccession } from "../core/ids.js";

export const PARTIAL_SUFFIX = ".partial";

/**
 * Path discipline for one run. Every file a run touches starts with its
 * accession, so concurrent runs in one output directory never collide.
 */
export interface RunWorkspace {
  runId: RunAccession;
  outputDir: string;
  finalPath(name: string): string;
  partialPath(name: string): string;
}

export function safeJoin(baseDir: string, name: string): string {
  const joined = path.join(baseDir, name);
  const rel = path.relative(baseDir, joined);
  if (rel.startsWith("..") || path.isAbsolute(rel)) {
    throw new Error(`unsafe workspace path: ${name}`);
  }
  return joined;
}

/** `SRR1` owns `SRR1.sra` and `SRR1_2.fastq`, never `SRR12.sra`. */
export function isOwnedBy(name: string, runId: RunAccession): boolean {
  return name === runId || name.startsWith(`${runId}.`) || name.startsWith(`${runId}_`);
}

export async function createRunWorkspace(outputDir: string, runId: RunAccession): Promise<RunWorkspace> {
  const root = path.resolve(outputDir);
  await fs.mkdir(root, { recursive: true });
  const owned = (name: string): string => {
    if (!isOwnedBy(name, runId)) throw new Error(`workspace file ${name} is not owned by run ${runId}`);
    return safeJoin(root, name);
  };
  return {
    runId,
    outputDir: root,
    finalPath: (name: string) => owned(name),
    partialPath: (name: string) => owned(`${name}${PARTIAL_SUFFIX}`)
  };
}

export async function isNonEmptyFile(filePath: string): Promise<boolean> {
  try {
    const st = await fs.stat(filePath);
    return st.isFile() && st.size > 0;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return false;
    throw err;
  }
}

/** Non-empty files already occupying the deterministic targets of `format`. */
export async function existingTargets(ws: RunWorkspace, format: OutputFormat): Promise<string[]> {
  const found: string[] = [];
  for (const name of targetFileNames(ws.runId, format)) {
    const p = ws.finalPath(name);
    if (await isNonEmptyFile(p)) found.push(p);
  }
  // A lone mate file means an interrupted commit, not a finished target.
  const mates = found.filter((p) => /_[12]\.[^/]+$/.test(path.basename(p)));
  if (mates.length === 1) return [];
  return found;
}

/** Deletes every `<run>*.partial` entry left in the output directory. */
export async function removeRunPartials(ws: RunWorkspace): Promise<string[]> {
  const entries = await fs.readdir(ws.outputDir);
  const removed: string[] = [];
  for (const name of entries) {
    if (isOwnedBy(name, ws.runId) && name.endsWith(PARTIAL_SUFFIX)) {
      const p = safeJoin(ws.outputDir, name);
      await fs.rm(p, { recursive: true, force: true });
      removed.push(p);
    }
  }
  return removed;
}

/**
 * Files and scratch directories written under `.partial` names and promoted
 * to their final names only by `commit`. Whatever is still pending when the
 * owning scope exits is deleted.
 */
export class PartialFiles {
  private readonly pending = new Map<string, string>();
  private readonly scratch = new Set<string>();

  constructor(private readonly ws: RunWorkspace) {}

  reserve(name: string): string {
    const partial = this.ws.partialPath(name);
    this.pending.set(partial, this.ws.finalPath(name));
    return partial;
  }

  async scratchDir(name: string): Promise<string> {
    const dir = this.ws.partialPath(`${name}.d`);
    await fs.rm(dir, { recursive: true, force: true });
    await fs.mkdir(dir, { recursive: true });
    this.scratch.add(dir);
    return dir;
  }

  /** Moves a finished file out of a scratch directory into the final namespace. */
  adopt(sourcePath: string, name: string): void {
    this.pending.set(sourcePath, this.ws.finalPath(name));
  }

  async commit(): Promise<string[]> {
    const committed: string[] = [];
    for (const [partial, final] of this.pending) {
      if (!(await isNonEmptyFile(partial))) {
        throw new Error(`expected output missing or empty: ${path.basename(final)}`);
      }
    }
    for (const [partial, final] of this.pending) {
      await fs.rename(partial, final);
      committed.push(final);
    }
    this.pending.clear();
    return committed;
  }

  async discard(): Promise<void> {
    for (const partial of this.pending.keys()) {
      await fs.rm(partial, { force: true });
    }
    this.pending.clear();
    for (const dir of this.scratch) {
      await fs.rm(dir, { recursive: true, force: true });
    }
    this.scratch.clear();
  }
}

export async function withPartialFiles<T>(ws: RunWorkspace, fn: (files: PartialFiles) => Promise<T>): Promise<T> {
  const files = new PartialFiles(ws);
  try {
    return await fn(files);
  } finally {
    await files.discard();
  }
}
