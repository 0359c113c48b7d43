#!/usr/bin/env tsx
/**
 * HTTP server for the module registry.
 *
 * Usage: npm run api:start   (honours REGISTRY_STORE, DATABASE_URL, PORT)
 */

import "dotenv/config";
import express, { type Express } from "express";
import path from "path";
import { fileURLToPath } from "url";
import { openRegistry } from "../registry/open.js";
import type { ModuleRegistry } from "../registry/registry.js";
import { loadConfig } from "../shared/config.js";
import { errorMessage } from "../shared/errors.js";
import { createRegistryRouter } from "./routes.js";

export function createApp(registry: ModuleRegistry): Express {
  const app = express();
  app.use(express.json());
  app.use(createRegistryRouter(registry));

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  return app;
}

async function main(): Promise<void> {
  const config = loadConfig();
  const { registry, close } = await openRegistry(config);
  const app = createApp(registry);

  const server = app.listen(config.port, () => {
    console.log(`Module registry API listening on port ${config.port} (store: ${config.store})`);
  });

  const shutdown = (): void => {
    server.close(() => {
      close().then(
        () => process.exit(0),
        (err: unknown) => {
          console.error(`Shutdown failed: ${errorMessage(err)}`);
          process.exit(1);
        },
      );
    });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

if (
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))
) {
  main().catch((err: unknown) => {
    console.error(`Failed to start API: ${errorMessage(err)}`);
    process.exit(1);
  });
}
