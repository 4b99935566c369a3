#!/usr/bin/env node
import { groupLocalInputs, resolveExtractOptions, resolveGetOptions } from "./batch/options.js";
import { parseCli, USAGE, type CliCommand } from "./cliArgs.js";
import { ConfigurationError } from "./core/errors.js";
import type { BatchReport } from "./core/outcome.js";
import { validateAnnotateOptions } from "./metadata/annotate.js";
import { createInvocationContext } from "./runs/invocationContext.js";
import { createServices, loadPolicy, openStore } from "./services.js";

const EXIT_RUN_FAILED = 1;
const EXIT_CONFIGURATION = 2;

function formatReport(report: BatchReport): string {
  const lines = report.outcomes.map((o) => {
    const detail = o.error ?? `${o.outputs.length} written, ${o.skipped.length} already present`;
    return `${o.runId}\t${o.state}\t${o.method ?? "-"}\t${detail}`;
  });
  return [...lines, `${report.batchId}: ${report.succeeded} succeeded, ${report.failed} failed`].join("\n");
}

async function main(argv: string[]): Promise<number | undefined> {
  let cmd: CliCommand;
  try {
    cmd = parseCli(argv);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(`runfetch: ${err.message}\n\n${USAGE}`);
      return EXIT_CONFIGURATION;
    }
    throw err;
  }
  if (cmd.command === "help") {
    process.stdout.write(USAGE);
    return 0;
  }

  const abort = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => abort.abort(new Error(`received ${signal}`));
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  const ctx = createInvocationContext({ verbosity: cmd.verbosity, hideProgress: cmd.hideProgress, signal: abort.signal });
  let close: (() => Promise<void>) | null = null;
  try {
    const policy = await loadPolicy(cmd.policyPath);
    const { store, db } = await openStore();
    close = () => db.destroy();
    const services = createServices({ policy, store });

    switch (cmd.command) {
      case "get": {
        const options = resolveGetOptions(policy, { ...cmd.request, stdout: cmd.stdout ? process.stdout : null });
        const runIds = await services.resolver.resolve(cmd.selection, ctx);
        const report = await services.controller.run(runIds, options, ctx);
        console.error(formatReport(report));
        return report.failed > 0 ? EXIT_RUN_FAILED : 0;
      }
      case "extract": {
        const options = resolveExtractOptions(policy, { ...cmd.request, stdout: cmd.stdout ? process.stdout : null });
        const inputs = await groupLocalInputs(cmd.inputs);
        const report = await services.controller.extractOnly(inputs, options, ctx);
        console.error(formatReport(report));
        return report.failed > 0 ? EXIT_RUN_FAILED : 0;
      }
      case "annotate": {
        validateAnnotateOptions(cmd.options);
        const runIds = await services.resolver.resolve(cmd.selection, ctx);
        await services.annotator.annotate(runIds, cmd.options, ctx, process.stdout);
        return 0;
      }
    }
  } catch (err) {
    if (err instanceof ConfigurationError) {
      ctx.log("error", "configuration", err.message, { error: err.name });
      return EXIT_CONFIGURATION;
    }
    throw err;
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    if (close) await close();
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  }
);
