import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import path from "path";
import { createGatewayServer } from "./mcp/gatewayServer.js";
import { isVerbosity } from "./runs/invocationContext.js";
import { createServices, loadPolicy, openStore } from "./services.js";

async function main(): Promise<void> {
  const outputDir = path.resolve(process.env.RUNFETCH_OUTPUT_DIR ?? "var/runs");
  const verbosity = process.env.RUNFETCH_VERBOSITY ?? "info";

  const policy = await loadPolicy();
  const { store, backend } = await openStore();
  const services = createServices({ policy, store });

  const server = createGatewayServer({
    services,
    outputDir,
    verbosity: isVerbosity(verbosity) ? verbosity : "info"
  });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`runfetch gateway ready (ledger: ${backend})`);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
