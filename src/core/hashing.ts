import { createHash } from "crypto";
import { createReadStream } from "fs";

export function sha256Prefixed(data: string | Buffer): `sha256:${string}` {
  return `sha256:${createHash("sha256").update(data).digest("hex")}` as const;
}

export async function md5File(filePath: string): Promise<string> {
  const hash = createHash("md5");
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk as Buffer);
  }
  return hash.digest("hex");
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    (Object.getPrototypeOf(value) === Object.prototype || Object.getPrototypeOf(value) === null)
  );
}

function canonicalize(value: unknown): unknown {
  if (value === undefined) return undefined;
  if (value === null) return null;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "bigint") return value.toString();
  if (Array.isArray(value)) {
    return value.map((v) => {
      const c = canonicalize(v);
      return c === undefined ? null : c;
    });
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const c = canonicalize(value[key]);
      if (c !== undefined) out[key] = c;
    }
    return out;
  }
  throw new Error(`value is not JSON-serializable: ${Object.prototype.toString.call(value)}`);
}

// Key-sorted JSON, so equal parameter sets hash equally.
export function stableJsonStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}
