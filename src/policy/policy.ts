import { promises as fs } from "fs";
import YAML from "yaml";
import * as z from "zod/v4";
import { ConfigurationError, PolicyDeniedError } from "../core/errors.js";
import { sha256Prefixed, stableJsonStringify } from "../core/hashing.js";
import { DOWNLOAD_METHODS, type DownloadMethod, type PaidProvider } from "../download/methods.js";

export const TOOL_NAMES = [
  "ascp",
  "curl",
  "prefetch",
  "aws",
  "gsutil",
  "fasterq_dump",
  "fastq_dump",
  "pigz",
  "seqkit"
] as const;
export type ToolName = (typeof TOOL_NAMES)[number];
export type ToolPaths = Record<ToolName, string>;

const DEFAULT_TOOLS: ToolPaths = {
  ascp: "ascp",
  curl: "curl",
  prefetch: "prefetch",
  aws: "aws",
  gsutil: "gsutil",
  fasterq_dump: "fasterq-dump",
  fastq_dump: "fastq-dump",
  pigz: "pigz",
  seqkit: "seqkit"
};

export interface Endpoints {
  enaPortal: string;
  sraLocator: string;
  awsOpenData: string;
}

const DEFAULT_ENDPOINTS: Endpoints = {
  enaPortal: "https://www.ebi.ac.uk/ena/portal/api",
  sraLocator: "https://locate.ncbi.nlm.nih.gov/sdl/2/retrieve",
  awsOpenData: "https://sra-pub-run-odp.s3.amazonaws.com/sra"
};

export interface Credentials {
  ascpSshKey: string | null;
  gcpProject: string | null;
  gcpUserKeyFile: string | null;
  awsUserKeyId: string | null;
  awsUserKeySecret: string | null;
}

export interface PaidAccess {
  allowPaid: boolean;
  allowPaidFromAws: boolean;
  allowPaidFromGcp: boolean;
}

const zPolicyConfig = z.object({
  version: z.number().int(),
  methods_allowlist: z.array(z.enum(DOWNLOAD_METHODS)),
  quotas: z.object({
    max_download_threads: z.number().int().min(1),
    max_extraction_threads: z.number().int().min(1),
    max_batch_concurrency: z.number().int().min(1)
  }),
  prefetch: z.object({ max_size: z.string().min(1) }).optional(),
  paid_access: z
    .object({
      allow_paid: z.boolean().optional(),
      allow_paid_from_aws: z.boolean().optional(),
      allow_paid_from_gcp: z.boolean().optional()
    })
    .optional(),
  credentials: z
    .object({
      ascp_ssh_key: z.string().optional(),
      gcp_project: z.string().optional(),
      gcp_user_key_file: z.string().optional(),
      aws_user_key_id: z.string().optional(),
      aws_user_key_secret: z.string().optional()
    })
    .optional(),
  tools: z.record(z.string(), z.string().min(1)).optional(),
  endpoints: z
    .object({
      ena_portal: z.string().optional(),
      sra_locator: z.string().optional(),
      aws_open_data: z.string().optional()
    })
    .optional()
});

export type PolicyConfig = z.infer<typeof zPolicyConfig>;

function expandEnvToken(value: string | undefined): string | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  const m = /^\$\{([A-Z0-9_]+)\}$/.exec(trimmed) ?? /^\$([A-Z0-9_]+)$/.exec(trimmed);
  if (m && m[1]) {
    const v = process.env[m[1]]?.trim();
    return v ? v : null;
  }
  return trimmed.length > 0 ? trimmed : null;
}

export class PolicyEngine {
  readonly policyHash: `sha256:${string}`;

  constructor(private readonly policy: PolicyConfig) {
    this.policyHash = sha256Prefixed(stableJsonStringify(policy));
  }

  static parse(value: unknown, source = "policy"): PolicyEngine {
    const parsed = zPolicyConfig.safeParse(value);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue?.path.length ? ` at ${issue.path.join(".")}` : "";
      throw new ConfigurationError(`invalid policy in ${source}${where}: ${issue?.message ?? "unknown issue"}`);
    }
    const unknownTools = Object.keys(parsed.data.tools ?? {}).filter((t) => !(TOOL_NAMES as readonly string[]).includes(t));
    if (unknownTools.length) {
      throw new ConfigurationError(`invalid policy in ${source}: unknown tools ${unknownTools.join(", ")}`);
    }
    return new PolicyEngine(parsed.data);
  }

  static async loadFromFile(filePath: string): Promise<PolicyEngine> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") {
        throw new ConfigurationError(`policy file not found: ${filePath}`);
      }
      throw err;
    }
    return PolicyEngine.parse(YAML.parse(raw) as unknown, filePath);
  }

  snapshot(): Record<string, unknown> {
    return JSON.parse(JSON.stringify(this.policy)) as Record<string, unknown>;
  }

  assertMethodAllowed(method: DownloadMethod): void {
    if (!this.policy.methods_allowlist.includes(method)) {
      throw new PolicyDeniedError(`download method: ${method}`);
    }
  }

  enforceThreads(kind: "download" | "extraction", requested: number | undefined): number {
    const max = kind === "download" ? this.policy.quotas.max_download_threads : this.policy.quotas.max_extraction_threads;
    const threads = requested ?? 1;
    if (!Number.isInteger(threads) || threads < 1) {
      throw new ConfigurationError(`${kind} threads must be an integer >= 1`);
    }
    if (threads > max) {
      throw new PolicyDeniedError(`${kind} threads=${threads} (max ${max})`);
    }
    return threads;
  }

  enforceBatchConcurrency(requested: number | undefined): number {
    const max = this.policy.quotas.max_batch_concurrency;
    const n = requested ?? 1;
    if (!Number.isInteger(n) || n < 1) {
      throw new ConfigurationError(`batch concurrency must be an integer >= 1`);
    }
    if (n > max) {
      throw new PolicyDeniedError(`batch concurrency=${n} (max ${max})`);
    }
    return n;
  }

  prefetchMaxSize(): string {
    return this.policy.prefetch?.max_size ?? "50G";
  }

  /** Caller flags can only add permission on top of what the policy grants. */
  paidAccess(caller: Partial<PaidAccess> = {}): PaidAccess {
    const base = this.policy.paid_access ?? {};
    return {
      allowPaid: Boolean(caller.allowPaid || base.allow_paid),
      allowPaidFromAws: Boolean(caller.allowPaidFromAws || base.allow_paid_from_aws),
      allowPaidFromGcp: Boolean(caller.allowPaidFromGcp || base.allow_paid_from_gcp)
    };
  }

  credentials(caller: Partial<Credentials> = {}): Credentials {
    const c = this.policy.credentials ?? {};
    return {
      ascpSshKey: caller.ascpSshKey ?? expandEnvToken(c.ascp_ssh_key),
      gcpProject: caller.gcpProject ?? expandEnvToken(c.gcp_project),
      gcpUserKeyFile: caller.gcpUserKeyFile ?? expandEnvToken(c.gcp_user_key_file),
      awsUserKeyId: caller.awsUserKeyId ?? expandEnvToken(c.aws_user_key_id),
      awsUserKeySecret: caller.awsUserKeySecret ?? expandEnvToken(c.aws_user_key_secret)
    };
  }

  tools(): ToolPaths {
    const overrides = this.policy.tools ?? {};
    const out: ToolPaths = { ...DEFAULT_TOOLS };
    for (const name of TOOL_NAMES) {
      const v = overrides[name];
      if (v) out[name] = v;
    }
    return out;
  }

  endpoints(): Endpoints {
    const e = this.policy.endpoints ?? {};
    return {
      enaPortal: e.ena_portal ?? DEFAULT_ENDPOINTS.enaPortal,
      sraLocator: e.sra_locator ?? DEFAULT_ENDPOINTS.sraLocator,
      awsOpenData: e.aws_open_data ?? DEFAULT_ENDPOINTS.awsOpenData
    };
  }
}

export function isPaymentAllowed(provider: PaidProvider, access: PaidAccess): boolean {
  if (access.allowPaid) return true;
  return provider === "aws" ? access.allowPaidFromAws : access.allowPaidFromGcp;
}
