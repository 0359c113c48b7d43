/**
 * Module Registry Types
 *
 * A Module Record owns a template plus its variable/output declarations.
 * Records are persisted by a ModuleStore; the template engine only reads them.
 */

import type { OutputDeclaration, VariableDeclaration } from "../templates/types.js";

// ── Providers ───────────────────────────────────────────────────────

export const PROVIDERS = ["aws", "gcp", "azure", "kubernetes", "helm", "null"] as const;

export type Provider = (typeof PROVIDERS)[number];

// ── Module Record ───────────────────────────────────────────────────

export interface ModuleExample {
  title: string;
  description: string;
  /** HCL showing how to call the module. */
  code: string;
}

export interface ModuleRecord {
  id: string;
  /** Unique across the registry. */
  name: string;
  provider: Provider;
  resourceType: string;
  /** MAJOR.MINOR.PATCH */
  version: string;
  description: string;
  /** HCL with `${var.<name>}` placeholders. */
  template: string;
  variables: VariableDeclaration[];
  outputs: OutputDeclaration[];
  examples: ModuleExample[];
  tags: string[];
  /** ISO-8601 timestamp. */
  createdAt: string;
  downloadCount: number;
}

export type VersionPart = "major" | "minor" | "patch";

// ── Store ───────────────────────────────────────────────────────────

export interface ModuleFilter {
  provider?: string;
  resourceType?: string;
}

/**
 * Persistence boundary for Module Records.
 * `list` and `search` order by downloadCount desc, then name asc.
 */
export interface ModuleStore {
  /** Throws DuplicateModuleError when the name is taken. */
  insert(record: ModuleRecord): Promise<void>;
  /** Upsert by id. */
  save(record: ModuleRecord): Promise<void>;
  findByIdOrName(key: string): Promise<ModuleRecord | undefined>;
  list(filter?: ModuleFilter): Promise<ModuleRecord[]>;
  /** Case-insensitive substring match over name, description, provider, resourceType and tags. */
  search(query: string): Promise<ModuleRecord[]>;
  incrementDownloads(id: string): Promise<void>;
  delete(id: string): Promise<boolean>;
  count(): Promise<number>;
}

// ── Stats ───────────────────────────────────────────────────────────

export interface RegistryStats {
  totalModules: number;
  byProvider: Array<{ provider: string; count: number }>;
  mostDownloaded: Array<{ name: string; provider: string; downloads: number }>;
}
