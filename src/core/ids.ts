import { ulid } from "ulid";

export type BatchId = `batch_${string}`;
export type RunAccession = string;

const RUN_ACCESSION_RE = /^[SED]RR\d{6,}$/;
const BIOPROJECT_RE = /^PRJ[EDN][A-Z]\d+$/;

export function newBatchId(): BatchId {
  return `batch_${ulid()}` as const;
}

export function isBatchId(value: string): value is BatchId {
  return /^batch_[0-9A-HJKMNP-TV-Z]{26}$/.test(value);
}

export function isRunAccession(value: string): boolean {
  return RUN_ACCESSION_RE.test(value);
}

export function isBioProjectAccession(value: string): boolean {
  return BIOPROJECT_RE.test(value);
}
