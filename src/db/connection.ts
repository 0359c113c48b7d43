import pg from "pg";
import type { Pool } from "pg";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import * as schema from "./schema.js";

export type RegistryDatabase = NodePgDatabase<typeof schema>;

export interface DatabaseHandle {
  pool: Pool;
  db: RegistryDatabase;
}

/** Open a pooled connection. The caller owns the pool and must end it. */
export function createDatabase(connectionString: string): DatabaseHandle {
  const pool = new pg.Pool({ connectionString });
  const db = drizzle(pool, { schema });
  return { pool, db };
}
