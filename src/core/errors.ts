import type { DownloadMethod } from "../download/methods.js";
import type { RunAccession } from "./ids.js";

/** A method refused before any external call: missing credentials, payment not allowed, wrong artifact kind. */
export class AdapterPreconditionError extends Error {
  constructor(
    readonly method: DownloadMethod,
    message: string
  ) {
    super(message);
    this.name = "AdapterPreconditionError";
  }
}

/** The external tool or request ran and failed. */
export class AdapterExecutionError extends Error {
  constructor(
    readonly method: DownloadMethod,
    message: string,
    readonly exitCode: number | null = null
  ) {
    super(message);
    this.name = "AdapterExecutionError";
  }
}

export interface FailedAttempt {
  method: DownloadMethod;
  reason: string;
}

export class AllMethodsExhaustedError extends Error {
  constructor(
    readonly runId: RunAccession,
    readonly failures: FailedAttempt[]
  ) {
    const detail = failures.map((f) => `${f.method}: ${f.reason}`).join("; ");
    super(`all download methods failed for ${runId}${detail ? ` (${detail})` : " (no methods given)"}`);
    this.name = "AllMethodsExhaustedError";
  }
}

export class ConversionError extends Error {
  constructor(
    readonly runId: RunAccession,
    readonly step: string,
    message: string
  ) {
    super(`${runId}: ${step}: ${message}`);
    this.name = "ConversionError";
  }
}

/** Raised before any work starts; nothing could succeed with this configuration. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** The policy file forbids what was asked for. */
export class PolicyDeniedError extends ConfigurationError {
  constructor(message: string) {
    super(`policy denied ${message}`);
    this.name = "PolicyDeniedError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
