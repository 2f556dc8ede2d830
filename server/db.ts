import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "../drizzle/schema";
import { ENV } from "./_core/env";

export type Database = NodePgDatabase<typeof schema>;

let _pool: pg.Pool | null = null;
let _db: Database | null = null;

/**
 * Lazily create the shared drizzle instance.
 * Returns null when no DATABASE_URL is configured.
 */
export async function getDb(): Promise<Database | null> {
  if (_db) return _db;

  if (!ENV.DATABASE_URL) {
    console.warn("[db] DATABASE_URL is not set");
    return null;
  }

  _pool = new pg.Pool({ connectionString: ENV.DATABASE_URL, max: 10 });
  _pool.on("error", (error) => {
    console.error("[db] Idle client error:", error);
  });
  _db = drizzle(_pool, { schema });
  return _db;
}

export async function closeDb(): Promise<void> {
  if (_pool) {
    await _pool.end();
  }
  _pool = null;
  _db = null;
}
