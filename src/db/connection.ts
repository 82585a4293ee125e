import { promises as fs } from "fs";
import * as pg from "pg";
import { newDb } from "pg-mem";
import { Kysely, PostgresDialect } from "kysely";
import type { DB } from "./types.js";

export function createPgPool(databaseUrl: string): pg.Pool {
  return new pg.Pool({ connectionString: databaseUrl });
}

/** A pg-compatible pool backed by an in-process pg-mem database. */
export function createMemoryPool(): pg.Pool {
  const mem = newDb({ autoCreateForeignKeyIndices: true });
  const adapter = mem.adapters.createPg();
  return new adapter.Pool() as unknown as pg.Pool;
}

export async function applySqlFile(pool: pg.Pool, filePath: string): Promise<void> {
  const sql = await fs.readFile(filePath, "utf8");
  if (!sql.trim()) return;
  await pool.query(sql);
}

export async function openDatabase(input: {
  databaseUrl: string | null;
  schemaPath: string;
  autoSchema: boolean;
}): Promise<{ pool: pg.Pool; db: Kysely<DB> }> {
  const pool = input.databaseUrl ? createPgPool(input.databaseUrl) : createMemoryPool();
  // pg-mem always starts empty, so it always needs the schema.
  if (!input.databaseUrl || input.autoSchema) {
    await applySqlFile(pool, input.schemaPath);
  }
  return { pool, db: createDb(pool) };
}

export function createDb(pool: pg.Pool): Kysely<DB> {
  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool })
  });
}
