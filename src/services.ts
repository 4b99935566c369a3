import type { Kysely } from "kysely";
import { fileURLToPath } from "url";
import { BatchController } from "./batch/batchController.js";
import { applySchema, createDb, openPool, type LedgerBackend } from "./db/connection.js";
import type { DB } from "./db/types.js";
import { FallbackChain } from "./download/fallbackChain.js";
import { createAdapterRegistry } from "./download/registry.js";
import type { AdapterRegistry } from "./download/types.js";
import { LocalProcessRunner } from "./execution/backends/localProcess.js";
import type { ProcessRunner } from "./execution/backends/types.js";
import { ExtractionPipeline } from "./extraction/pipeline.js";
import { Annotator } from "./metadata/annotate.js";
import { EnaPortalClient, type FetchLike } from "./metadata/enaPortal.js";
import { RunResolver } from "./metadata/runResolver.js";
import { SraLocator } from "./metadata/sraLocator.js";
import { PolicyEngine } from "./policy/policy.js";
import { PostgresStore } from "./store/postgresStore.js";

export const DEFAULT_POLICY_PATH = fileURLToPath(new URL("../policies/default.policy.yaml", import.meta.url));
export const SCHEMA_PATH = fileURLToPath(new URL("../db/schema.sql", import.meta.url));

export interface Services {
  policy: PolicyEngine;
  store: PostgresStore | null;
  resolver: RunResolver;
  annotator: Annotator;
  controller: BatchController;
}

export function createServices(deps: {
  policy: PolicyEngine;
  store: PostgresStore | null;
  runner?: ProcessRunner;
  fetchImpl?: FetchLike;
  adapters?: AdapterRegistry;
}): Services {
  const runner = deps.runner ?? new LocalProcessRunner();
  const endpoints = deps.policy.endpoints();
  const ena = new EnaPortalClient(endpoints.enaPortal, deps.fetchImpl);
  const adapters =
    deps.adapters ??
    createAdapterRegistry({
      runner,
      ena,
      locator: new SraLocator(endpoints.sraLocator, deps.fetchImpl),
      awsOpenDataBaseUrl: endpoints.awsOpenData
    });

  return {
    policy: deps.policy,
    store: deps.store,
    resolver: new RunResolver(ena),
    annotator: new Annotator(ena),
    controller: new BatchController({
      chain: new FallbackChain(adapters),
      pipeline: new ExtractionPipeline({ runner, tools: deps.policy.tools() }),
      policy: deps.policy,
      store: deps.store
    })
  };
}

export async function loadPolicy(explicitPath?: string | null): Promise<PolicyEngine> {
  return PolicyEngine.loadFromFile(explicitPath ?? process.env.RUNFETCH_POLICY_PATH ?? DEFAULT_POLICY_PATH);
}

/**
 * The batch ledger. Without DATABASE_URL it lives in an in-process database
 * for the lifetime of this process.
 */
export async function openStore(
  env: NodeJS.ProcessEnv = process.env
): Promise<{ store: PostgresStore; db: Kysely<DB>; backend: LedgerBackend }> {
  const { pool, backend } = openPool(env.DATABASE_URL);
  const autoSchema = (env.AUTO_SCHEMA ?? "true").toLowerCase() !== "false";
  if (backend === "pg-mem" || autoSchema) {
    await applySchema(pool, SCHEMA_PATH);
  }
  const db = createDb(pool);
  return { store: new PostgresStore(db), db, backend };
}
