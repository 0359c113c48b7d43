/**
 * Run Configuration
 *
 * Resolves where modules are stored and how the registry starts:
 * - memory:    process-local, nothing persisted.
 * - file:      one module.json per module under REGISTRY_DIR.
 * - postgres:  the `modules` table behind DATABASE_URL.
 */

import os from "os";
import path from "path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export const STORE_KINDS = ["memory", "file", "postgres"] as const;

export type StoreKind = (typeof STORE_KINDS)[number];

export interface RegistryConfig {
  store: StoreKind;
  registryDir: string;
  databaseUrl?: string;
  seedBuiltins: boolean;
  port: number;
}

const FALSY = new Set(["0", "false", "no", "off"]);

const EnvSchema = z.object({
  REGISTRY_STORE: z.string().optional(),
  REGISTRY_DIR: z.string().min(1).optional(),
  DATABASE_URL: z.string().min(1).optional(),
  REGISTRY_SEED_BUILTINS: z
    .string()
    .optional()
    .transform((v) => (v === undefined ? true : !FALSY.has(v.trim().toLowerCase()))),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
});

/**
 * Parse a store kind from a CLI argument and/or environment variable.
 * CLI argument takes priority; dashes and case are normalized.
 */
export function parseStoreKind(cliArg?: string, envVar?: string): StoreKind | undefined {
  const raw = cliArg ?? envVar;
  if (raw === undefined || raw.trim() === "") return undefined;
  const normalized = raw.trim().toLowerCase().replace(/-/g, "_");
  if (normalized === "pg" || normalized === "postgresql") return "postgres";
  const kind = STORE_KINDS.find((k) => k === normalized);
  if (!kind) {
    throw new ConfigError([`store: expected one of ${STORE_KINDS.join(", ")}, got "${raw}"`]);
  }
  return kind;
}

/** Build the configuration from environment variables and an optional `--store` override. */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  storeOverride?: string,
): RegistryConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  const vars = parsed.data;

  const store =
    parseStoreKind(storeOverride, vars.REGISTRY_STORE) ?? (vars.DATABASE_URL ? "postgres" : "file");
  if (store === "postgres" && !vars.DATABASE_URL) {
    throw new ConfigError(["DATABASE_URL: required when the store is postgres"]);
  }

  return {
    store,
    registryDir: vars.REGISTRY_DIR ?? path.join(os.homedir(), ".iac-module-registry"),
    databaseUrl: vars.DATABASE_URL,
    seedBuiltins: vars.REGISTRY_SEED_BUILTINS,
    port: vars.PORT,
  };
}
