import type { Writable } from "stream";

export interface ProcessSpec {
  argv: string[];
  cwd?: string;
  env?: Record<string, string>;
  /** Where the child's stdout goes; captured (size-limited) unless a stream is given. */
  stdout?: Writable;
  /** Mirror stderr to this process's stderr while still capturing it. */
  echoStderr?: boolean;
  timeoutSeconds?: number;
}

export interface ProcessResult {
  exitCode: number;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  startedAt: string;
  finishedAt: string;
}

export interface ProcessRunner {
  run(spec: ProcessSpec, signal?: AbortSignal): Promise<ProcessResult>;
}
