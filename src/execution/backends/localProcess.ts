import { spawn } from "child_process";
import type { ProcessResult, ProcessRunner, ProcessSpec } from "./types.js";

const MAX_CAPTURE_BYTES = 1024 * 1024;

function appendLimited(chunks: Buffer[], chunk: Buffer, state: { bytes: number; truncated: boolean }): void {
  if (state.truncated) return;
  const next = state.bytes + chunk.byteLength;
  if (next > MAX_CAPTURE_BYTES) {
    const keep = Math.max(0, MAX_CAPTURE_BYTES - state.bytes);
    if (keep > 0) chunks.push(chunk.subarray(0, keep));
    state.bytes = MAX_CAPTURE_BYTES;
    state.truncated = true;
    return;
  }
  chunks.push(chunk);
  state.bytes = next;
}

export function stderrTail(result: Pick<ProcessResult, "stderr">, maxLines = 20): string {
  const lines = result.stderr
    .split(/\r?\n/)
    .map((l) => l.trimEnd())
    .filter((l) => l.length > 0);
  return lines.slice(-maxLines).join("\n");
}

export function describeFailure(tool: string, result: ProcessResult): string {
  const how = result.signal ? `signal ${result.signal}` : `exit ${result.exitCode}`;
  const tail = stderrTail(result);
  return `${tool} failed (${how})${tail ? `: ${tail}` : ""}`;
}

export class LocalProcessRunner implements ProcessRunner {
  async run(spec: ProcessSpec, signal?: AbortSignal): Promise<ProcessResult> {
    const [command, ...args] = spec.argv;
    if (!command) throw new Error("process argv must be non-empty");
    signal?.throwIfAborted();
    const startedAt = new Date().toISOString();

    const child = spawn(command, args, {
      cwd: spec.cwd,
      env: { ...process.env, ...spec.env },
      stdio: ["ignore", "pipe", "pipe"] as const
    });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    const stdoutState = { bytes: 0, truncated: false };
    const stderrState = { bytes: 0, truncated: false };

    if (spec.stdout) {
      child.stdout.pipe(spec.stdout, { end: false });
    } else {
      child.stdout.on("data", (chunk: Buffer) => appendLimited(stdoutChunks, chunk, stdoutState));
    }
    child.stderr.on("data", (chunk: Buffer) => {
      appendLimited(stderrChunks, chunk, stderrState);
      if (spec.echoStderr) process.stderr.write(chunk);
    });

    const onAbort = (): void => {
      child.kill("SIGTERM");
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    let timedOut = false;
    const timeoutMs = Math.max(0, Math.floor((spec.timeoutSeconds ?? 0) * 1000));
    const timeout =
      timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            child.kill("SIGKILL");
          }, timeoutMs)
        : null;

    const { exitCode, exitSignal } = await new Promise<{ exitCode: number; exitSignal: NodeJS.Signals | null }>(
      (resolve, reject) => {
        child.on("error", reject);
        child.on("close", (code: number | null, sig: NodeJS.Signals | null) =>
          resolve({ exitCode: code ?? (sig ? 128 : 0), exitSignal: sig })
        );
      }
    ).finally(() => {
      if (timeout) clearTimeout(timeout);
      signal?.removeEventListener("abort", onAbort);
      if (spec.stdout) child.stdout.unpipe(spec.stdout);
    });

    const finishedAt = new Date().toISOString();

    const stdout = Buffer.concat(stdoutChunks).toString("utf8") + (stdoutState.truncated ? "\n[stdout truncated]\n" : "");
    const stderr =
      Buffer.concat(stderrChunks).toString("utf8") +
      (stderrState.truncated ? "\n[stderr truncated]\n" : "") +
      (timedOut ? "\n[timeout]\n" : "");

    signal?.throwIfAborted();
    return { exitCode, signal: exitSignal, stdout, stderr, startedAt, finishedAt };
  }
}
