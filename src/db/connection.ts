import { promises as fs } from "fs";
import { Kysely, PostgresDialect } from "kysely";
import * as pg from "pg";
import { newDb } from "pg-mem";
import type { DB } from "./types.js";

export type LedgerBackend = "postgres" | "pg-mem";

/** A server pool when a URL is given, otherwise an in-process database that lives as long as the pool. */
export function openPool(databaseUrl: string | undefined): { pool: pg.Pool; backend: LedgerBackend } {
  if (databaseUrl) {
    return { pool: new pg.Pool({ connectionString: databaseUrl }), backend: "postgres" };
  }
  const mem = newDb({ autoCreateForeignKeyIndices: true });
  const adapter = mem.adapters.createPg();
  return { pool: new adapter.Pool() as unknown as pg.Pool, backend: "pg-mem" };
}

export async function applySchema(pool: pg.Pool, schemaFile: string): Promise<void> {
  const sql = await fs.readFile(schemaFile, "utf8");
  if (!sql.trim()) return;
  await pool.query(sql);
}

export function createDb(pool: pg.Pool): Kysely<DB> {
  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool })
  });
}
