#!/usr/bin/env tsx
/**
 * CLI: db:migrate
 *
 * Usage: DATABASE_URL=postgres://... npm run db:migrate
 *
 * Creates the modules table and its indexes when missing.
 */

import "dotenv/config";
import path from "path";
import { fileURLToPath } from "url";
import { sql } from "drizzle-orm";
import { createDatabase, type RegistryDatabase } from "./connection.js";
import { errorMessage } from "../shared/errors.js";

export async function ensureSchema(db: RegistryDatabase): Promise<void> {
  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS modules (
      id UUID PRIMARY KEY,
      name VARCHAR(200) NOT NULL,
      provider VARCHAR(20) NOT NULL,
      resource_type VARCHAR(200) NOT NULL,
      version VARCHAR(30) NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      template TEXT NOT NULL,
      variables JSONB NOT NULL DEFAULT '[]',
      outputs JSONB NOT NULL DEFAULT '[]',
      examples JSONB NOT NULL DEFAULT '[]',
      tags JSONB NOT NULL DEFAULT '[]',
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      download_count INTEGER NOT NULL DEFAULT 0
    )
  `);

  await db.execute(sql`CREATE UNIQUE INDEX IF NOT EXISTS idx_modules_name ON modules(name)`);
  await db.execute(sql`CREATE INDEX IF NOT EXISTS idx_modules_provider ON modules(provider)`);
  await db.execute(sql`CREATE INDEX IF NOT EXISTS idx_modules_resource_type ON modules(resource_type)`);
}

async function main(): Promise<void> {
  const url = process.env.DATABASE_URL;
  if (!url) {
    console.error("DATABASE_URL is not set.");
    process.exit(1);
  }

  const { pool, db } = createDatabase(url);
  console.log("Running migrations...");
  try {
    await ensureSchema(db);
    console.log("Migrations complete.");
  } finally {
    await pool.end();
  }
}

if (
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))
) {
  main().catch((err: unknown) => {
    console.error(`Migration failed: ${errorMessage(err)}`);
    process.exit(1);
  });
}
