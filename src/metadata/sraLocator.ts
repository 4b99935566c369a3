import * as z from "zod/v4";
import type { FetchLike } from "./enaPortal.js";

const zLocation = z.object({
  service: z.string(),
  region: z.string().optional(),
  link: z.string(),
  payRequired: z.boolean().optional()
});

const zLocatorResponse = z.object({
  result: z.array(
    z.object({
      bundle: z.string(),
      status: z.number(),
      msg: z.string().optional(),
      files: z
        .array(
          z.object({
            type: z.string(),
            name: z.string().optional(),
            size: z.number().optional(),
            md5: z.string().optional(),
            locations: z.array(zLocation).default([])
          })
        )
        .optional()
    })
  )
});

export type CloudService = "s3" | "gs";

export interface SraLocation {
  /** `s3://bucket/key` or `gs://bucket/key`. */
  uri: string;
  region: string | null;
  payRequired: boolean;
  sizeBytes: number | null;
}

export class SraLocatorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SraLocatorError";
  }
}

/** Normalizes an https object link from the locator into a bucket URI the cloud CLIs take. */
export function toCloudUri(service: CloudService, link: string): string | null {
  if (link.startsWith(`${service}://`)) return link;
  let url: URL;
  try {
    url = new URL(link);
  } catch {
    return null;
  }
  const key = url.pathname.replace(/^\/+/, "");
  if (service === "s3") {
    const m = /^([^.]+)\.s3(?:[.-][a-z0-9-]+)?\.amazonaws\.com$/.exec(url.hostname);
    if (m && m[1]) return `s3://${m[1]}/${key}`;
    return null;
  }
  if (url.hostname === "storage.googleapis.com" && key.includes("/")) return `gs://${key}`;
  return null;
}

/** NCBI's SRA data locator: where a run's container lives in each cloud. */
export class SraLocator {
  constructor(
    private readonly baseUrl: string,
    private readonly fetchImpl: FetchLike = (input, init) => fetch(input, init)
  ) {}

  async locate(runId: string, service: CloudService, signal?: AbortSignal): Promise<SraLocation> {
    const params = new URLSearchParams({
      acc: runId,
      location: service === "s3" ? "s3.us-east-1" : "gs.us-east1",
      "accept-charges": service === "s3" ? "aws" : "gcp",
      filetype: "sra"
    });
    const res = await this.fetchImpl(`${this.baseUrl}?${params.toString()}`, { signal });
    if (!res.ok) throw new SraLocatorError(`SRA locator returned HTTP ${res.status} for ${runId}`);

    const parsed = zLocatorResponse.safeParse(await res.json());
    if (!parsed.success) throw new SraLocatorError(`unexpected SRA locator response for ${runId}`);

    const bundle = parsed.data.result.find((r) => r.bundle === runId);
    if (!bundle || bundle.status !== 200) {
      throw new SraLocatorError(`SRA locator: ${runId} not found (${bundle?.msg ?? "no result"})`);
    }
    for (const file of bundle.files ?? []) {
      if (file.type !== "sra") continue;
      for (const loc of file.locations) {
        if (loc.service !== service) continue;
        const uri = toCloudUri(service, loc.link);
        if (!uri) continue;
        return { uri, region: loc.region ?? null, payRequired: loc.payRequired ?? false, sizeBytes: file.size ?? null };
      }
    }
    throw new SraLocatorError(`SRA locator: no ${service} location for ${runId}`);
  }
}
