import type { JsonObject } from "../core/json.js";

export type Verbosity = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<Verbosity, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export const VERBOSITIES: readonly Verbosity[] = ["debug", "info", "warn", "error"];

export function isVerbosity(value: string): value is Verbosity {
  return value in LEVEL_RANK;
}

/**
 * Everything one invocation needs to report progress and be interrupted.
 * Built once by the CLI or the gateway and passed down explicitly.
 */
export interface InvocationContext {
  readonly verbosity: Verbosity;
  readonly hideProgress: boolean;
  readonly signal: AbortSignal | undefined;
  log(level: Verbosity, kind: string, message: string, data?: JsonObject | null): void;
}

export function createInvocationContext(opts: {
  verbosity?: Verbosity;
  hideProgress?: boolean;
  signal?: AbortSignal;
  write?: (line: string) => void;
} = {}): InvocationContext {
  const verbosity = opts.verbosity ?? "info";
  const write = opts.write ?? ((line: string) => console.error(line));
  return {
    verbosity,
    hideProgress: opts.hideProgress ?? false,
    signal: opts.signal,
    log(level, kind, message, data = null) {
      if (LEVEL_RANK[level] < LEVEL_RANK[verbosity]) return;
      write(JSON.stringify({ ts: new Date().toISOString(), level, kind, message, data }));
    }
  };
}
