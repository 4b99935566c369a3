import * as z from "zod/v4";
import { OUTPUT_FORMATS } from "../core/formats.js";
import { DOWNLOAD_METHODS } from "../download/methods.js";
import { ANNOTATE_FORMATS } from "../metadata/annotate.js";
import { zBatchIdString, zBatchReportJson } from "../runs/reportJson.js";

export const zRunAccession = z.string().regex(/^[SED]RR\d{6,}$/, "invalid run accession");
export const zBioProject = z.string().regex(/^PRJ[EDN][A-Z]\d+$/, "invalid BioProject accession");

const zRunSelection = {
  runs: z.array(zRunAccession).max(10000).optional(),
  bioprojects: z.array(zBioProject).max(100).optional(),
  run_identifiers_list: z.string().min(1).optional()
};

const zExtractionSettings = {
  formats: z.array(z.enum(OUTPUT_FORMATS)).min(1),
  output_dir: z.string().min(1).optional(),
  force: z.boolean().default(false),
  unsorted: z.boolean().default(false),
  extraction_threads: z.number().int().min(1).max(256).default(1),
  batch_concurrency: z.number().int().min(1).max(64).default(1)
};

export const zRunsGetInput = z.object({
  ...zRunSelection,
  ...zExtractionSettings,
  methods: z.array(z.enum(DOWNLOAD_METHODS)).min(1),
  download_threads: z.number().int().min(1).max(256).default(1),
  allow_paid: z.boolean().default(false),
  allow_paid_from_aws: z.boolean().default(false),
  allow_paid_from_gcp: z.boolean().default(false),
  gcp_project: z.string().min(1).optional(),
  prefetch_max_size: z.string().min(1).optional(),
  check_md5sums: z.boolean().default(false)
});

export const zRunsExtractInput = z.object({
  ...zExtractionSettings,
  inputs: z.array(z.string().min(1)).min(1)
});

export const zBatchReportOutput = zBatchReportJson;

export const zRunsAnnotateInput = z.object({
  ...zRunSelection,
  format: z.enum(ANNOTATE_FORMATS).default("json"),
  output_file: z.string().min(1).optional(),
  all_columns: z.boolean().default(false)
});

export const zRunsAnnotateOutput = z.object({
  columns: z.array(z.string()),
  rows: z.array(z.record(z.string(), z.string())),
  output_file: z.string().nullable()
});

export const zBatchReportInput = z.object({
  batch_id: zBatchIdString
});

export const zBatchReportLookupOutput = z.object({
  batch_id: zBatchIdString,
  command: z.string(),
  status: z.enum(["running", "succeeded", "failed"]),
  params_hash: z.string(),
  policy_hash: z.string(),
  created_at: z.string(),
  finished_at: z.string().nullable(),
  report: zBatchReportJson.nullable()
});
