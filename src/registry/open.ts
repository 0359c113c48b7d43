/**
 * Wire a ModuleRegistry to the store named by the configuration.
 */

import { createDatabase } from "../db/connection.js";
import { ensureSchema } from "../db/migrate.js";
import type { RegistryConfig } from "../shared/config.js";
import { ConfigError } from "../shared/errors.js";
import { FileModuleStore } from "./file_store.js";
import { InMemoryModuleStore } from "./memory_store.js";
import { PgModuleStore } from "./pg_store.js";
import { ModuleRegistry, type RegistryOptions } from "./registry.js";
import type { ModuleStore } from "./types.js";

export interface OpenRegistry {
  registry: ModuleRegistry;
  /** Release the store's resources (the pg pool). */
  close(): Promise<void>;
}

interface OpenStore {
  store: ModuleStore;
  close(): Promise<void>;
}

const noop = async (): Promise<void> => {};

async function openStore(config: RegistryConfig): Promise<OpenStore> {
  switch (config.store) {
    case "memory":
      return { store: new InMemoryModuleStore(), close: noop };
    case "file": {
      const store = await FileModuleStore.open(config.registryDir);
      for (const skipped of store.skipped) {
        console.warn(`[registry] Skipping ${skipped.path}: ${skipped.reason}`);
      }
      return { store, close: noop };
    }
    case "postgres": {
      if (!config.databaseUrl) {
        throw new ConfigError(["DATABASE_URL: required when the store is postgres"]);
      }
      const { pool, db } = createDatabase(config.databaseUrl);
      try {
        await ensureSchema(db);
      } catch (err) {
        await pool.end();
        throw err;
      }
      return { store: new PgModuleStore(db), close: () => pool.end() };
    }
  }
}

export async function openRegistry(
  config: RegistryConfig,
  options: RegistryOptions = {},
): Promise<OpenRegistry> {
  const { store, close } = await openStore(config);
  const registry = new ModuleRegistry(store, options);

  if (config.seedBuiltins) {
    try {
      await registry.seedBuiltins();
    } catch (err) {
      await close();
      throw err;
    }
  }
  return { registry, close };
}
