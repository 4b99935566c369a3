import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import path from "path";
import { resolveExtractOptions, resolveGetOptions, groupLocalInputs } from "../batch/options.js";
import { ConfigurationError, PolicyDeniedError } from "../core/errors.js";
import { isBatchId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { BatchReport } from "../core/outcome.js";
import { renderText, validateAnnotateOptions } from "../metadata/annotate.js";
import { batchReportToJson } from "../runs/reportJson.js";
import { createInvocationContext, type InvocationContext, type Verbosity } from "../runs/invocationContext.js";
import type { Services } from "../services.js";
import {
  zBatchReportInput,
  zBatchReportLookupOutput,
  zBatchReportOutput,
  zRunsAnnotateInput,
  zRunsAnnotateOutput,
  zRunsExtractInput,
  zRunsGetInput
} from "./toolSchemas.js";

export interface GatewayDeps {
  services: Services;
  outputDir: string;
  verbosity?: Verbosity;
}

function toMcpError(e: unknown): unknown {
  if (e instanceof McpError) return e;
  if (e instanceof PolicyDeniedError) return new McpError(ErrorCode.InvalidRequest, e.message);
  if (e instanceof ConfigurationError) return new McpError(ErrorCode.InvalidParams, e.message);
  return e;
}

function reportResult(report: BatchReport): { content: Array<{ type: "text"; text: string }>; structuredContent: JsonObject } {
  return {
    content: [
      {
        type: "text",
        text: `${report.command} ${report.batchId}: ${report.succeeded} succeeded, ${report.failed} failed`
      }
    ],
    structuredContent: batchReportToJson(report)
  };
}

export function createGatewayServer(deps: GatewayDeps): McpServer {
  const { services } = deps;
  const mcp = new McpServer({
    name: "runfetch-gateway",
    version: "0.1.0"
  });

  // The stdio transport owns stdout, so tool progress never goes there.
  const contextFor = (signal: AbortSignal): InvocationContext =>
    createInvocationContext({ verbosity: deps.verbosity ?? "info", hideProgress: true, signal });

  const outputDir = (requested: string | undefined): string =>
    requested ? path.resolve(deps.outputDir, requested) : deps.outputDir;

  mcp.registerTool(
    "runs_get",
    {
      description:
        "Download sequencing runs with an ordered list of methods (first success wins) and extract the requested formats.",
      inputSchema: zRunsGetInput,
      outputSchema: zBatchReportOutput
    },
    async (args, extra) => {
      const ctx = contextFor(extra.signal);
      try {
        const options = resolveGetOptions(services.policy, {
          methods: args.methods,
          formats: args.formats,
          outputDir: outputDir(args.output_dir),
          force: args.force,
          unsorted: args.unsorted,
          extractionThreads: args.extraction_threads,
          batchConcurrency: args.batch_concurrency,
          downloadThreads: args.download_threads,
          paidAccess: {
            allowPaid: args.allow_paid,
            allowPaidFromAws: args.allow_paid_from_aws,
            allowPaidFromGcp: args.allow_paid_from_gcp
          },
          credentials: args.gcp_project ? { gcpProject: args.gcp_project } : {},
          prefetchMaxSize: args.prefetch_max_size,
          checkMd5sums: args.check_md5sums
        });
        const runIds = await services.resolver.resolve(
          { runIds: args.runs, bioprojects: args.bioprojects, runIdentifiersList: args.run_identifiers_list ?? null },
          ctx
        );
        return reportResult(await services.controller.run(runIds, options, ctx));
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "runs_extract",
    {
      description: "Convert local .sra, fastq.gz, fasta or fasta.gz files into the requested formats. Inputs are kept.",
      inputSchema: zRunsExtractInput,
      outputSchema: zBatchReportOutput
    },
    async (args, extra) => {
      const ctx = contextFor(extra.signal);
      try {
        const options = resolveExtractOptions(services.policy, {
          formats: args.formats,
          outputDir: outputDir(args.output_dir),
          force: args.force,
          unsorted: args.unsorted,
          extractionThreads: args.extraction_threads,
          batchConcurrency: args.batch_concurrency
        });
        const inputs = await groupLocalInputs(args.inputs);
        return reportResult(await services.controller.extractOnly(inputs, options, ctx));
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "runs_annotate",
    {
      description: "Fetch ENA run metadata as a table (pretty, csv, tsv, json, or feather written to output_file).",
      inputSchema: zRunsAnnotateInput,
      outputSchema: zRunsAnnotateOutput
    },
    async (args, extra) => {
      const ctx = contextFor(extra.signal);
      try {
        const opts = {
          format: args.format,
          outputFile: args.output_file ? path.resolve(deps.outputDir, args.output_file) : null,
          allColumns: args.all_columns
        };
        validateAnnotateOptions(opts);
        const runIds = await services.resolver.resolve(
          { runIds: args.runs, bioprojects: args.bioprojects, runIdentifiersList: args.run_identifiers_list ?? null },
          ctx
        );
        const table = await services.annotator.annotate(runIds, opts, ctx, null);
        const text =
          opts.outputFile || opts.format === "feather"
            ? `wrote ${table.rows.length} row(s) to ${opts.outputFile ?? ""}`
            : renderText(table, opts.format);
        const structured: JsonObject = {
          columns: table.columns,
          rows: table.rows,
          output_file: opts.outputFile
        };
        return { content: [{ type: "text", text }], structuredContent: structured };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "batch_report",
    {
      description: "Look up a recorded batch and its per-run report.",
      inputSchema: zBatchReportInput,
      outputSchema: zBatchReportLookupOutput
    },
    async (args) => {
      const store = services.store;
      if (!store) throw new McpError(ErrorCode.InvalidRequest, "the batch ledger is disabled");
      const batchId = args.batch_id;
      if (!isBatchId(batchId)) throw new McpError(ErrorCode.InvalidParams, `invalid batch_id: ${batchId}`);
      const batch = await store.getBatch(batchId);
      if (!batch) throw new McpError(ErrorCode.InvalidParams, `unknown batch_id: ${batchId}`);

      const structured: JsonObject = {
        batch_id: batch.batchId,
        command: batch.command,
        status: batch.status,
        params_hash: batch.paramsHash,
        policy_hash: batch.policyHash,
        created_at: batch.createdAt,
        finished_at: batch.finishedAt,
        report: batch.report ? batchReportToJson(batch.report) : null
      };
      return {
        content: [{ type: "text", text: `${batch.batchId}: ${batch.status}` }],
        structuredContent: structured
      };
    }
  );

  return mcp;
}
