import type { DownloadMethod } from "../download/methods.js";
import type { BatchId, RunAccession } from "./ids.js";

export const RUN_STATES = [
  "pending",
  "downloading",
  "downloaded",
  "download_failed",
  "extracting",
  "complete",
  "extraction_failed"
] as const;
export type RunState = (typeof RUN_STATES)[number];

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  // pending -> complete: every requested target already on disk.
  pending: ["downloading", "extracting", "complete", "download_failed"],
  downloading: ["downloaded", "download_failed"],
  downloaded: ["extracting"],
  extracting: ["complete", "extraction_failed"],
  download_failed: [],
  extraction_failed: [],
  complete: []
};

export function isRunState(value: string): value is RunState {
  return value in TRANSITIONS;
}

export function isTerminalState(state: RunState): boolean {
  return TRANSITIONS[state].length === 0;
}

export function isFailureState(state: RunState): boolean {
  return state === "download_failed" || state === "extraction_failed";
}

export function assertTransition(from: RunState, to: RunState): void {
  if (!TRANSITIONS[from].includes(to)) {
    throw new Error(`illegal run state transition: ${from} -> ${to}`);
  }
}

export interface AttemptRecord {
  method: DownloadMethod;
  ok: boolean;
  /** The artifact was already on disk; the adapter was not invoked. */
  reused: boolean;
  reason: string | null;
  startedAt: string;
  finishedAt: string;
}

export interface RunOutcome {
  runId: RunAccession;
  state: RunState;
  outputs: string[];
  /** Targets that already existed and were reported without doing work. */
  skipped: string[];
  attempts: AttemptRecord[];
  method: DownloadMethod | null;
  error: string | null;
}

export interface BatchReport {
  batchId: BatchId;
  command: "get" | "extract";
  startedAt: string;
  finishedAt: string;
  outcomes: RunOutcome[];
  succeeded: number;
  failed: number;
}
