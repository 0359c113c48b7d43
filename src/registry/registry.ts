/**
 * ModuleRegistry: the service layer over a ModuleStore.
 *
 * Owns registration (definition + template validation), lookups, rendering
 * with usage counting, version bumps, stats and the builtin catalog.
 */

import { v4 as uuidv4 } from "uuid";
import { formatModuleDocs } from "../docs/markdown.js";
import { formatPlan } from "../docs/plan.js";
import { InvalidTemplateError, ModuleNotFoundError } from "../shared/errors.js";
import type { ValidationResult } from "../shared/types.js";
import { render } from "../templates/renderer.js";
import type { UserValues } from "../templates/types.js";
import { validate } from "../templates/validate.js";
import { loadBuiltinDefinitions } from "./builtins.js";
import { parseModuleDefinition } from "./schemas.js";
import type {
  ModuleFilter,
  ModuleRecord,
  ModuleStore,
  RegistryStats,
  VersionPart,
} from "./types.js";

export interface RegistryOptions {
  now?: () => Date;
  newId?: () => string;
}

export interface GenerateResult {
  module: ModuleRecord;
  rendered: string;
}

const MOST_DOWNLOADED_LIMIT = 5;

export class ModuleRegistry {
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(
    readonly store: ModuleStore,
    options: RegistryOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? (() => uuidv4());
  }

  /** Validate and persist a new module. Throws on a bad definition, an invalid template or a taken name. */
  async register(input: unknown): Promise<ModuleRecord> {
    const definition = parseModuleDefinition(input);
    const result = validate(definition.template);
    if (!result.valid) {
      throw new InvalidTemplateError(result);
    }

    const record: ModuleRecord = {
      ...definition,
      id: this.newId(),
      createdAt: this.now().toISOString(),
      downloadCount: 0,
    };
    await this.store.insert(record);
    return record;
  }

  async get(idOrName: string): Promise<ModuleRecord> {
    const record = await this.store.findByIdOrName(idOrName);
    if (!record) throw new ModuleNotFoundError(idOrName);
    return record;
  }

  /** Render a module. The download counter moves only when rendering succeeds. */
  async generate(idOrName: string, values: UserValues = {}): Promise<GenerateResult> {
    const module = await this.get(idOrName);
    const rendered = render(module.template, module.variables, values);
    await this.store.incrementDownloads(module.id);
    return { module: { ...module, downloadCount: module.downloadCount + 1 }, rendered };
  }

  validateTemplate(text: string): ValidationResult {
    return validate(text);
  }

  list(filter?: ModuleFilter): Promise<ModuleRecord[]> {
    return this.store.list(filter);
  }

  search(query: string): Promise<ModuleRecord[]> {
    return this.store.search(query);
  }

  async delete(idOrName: string): Promise<boolean> {
    const record = await this.store.findByIdOrName(idOrName);
    if (!record) return false;
    return this.store.delete(record.id);
  }

  async stats(): Promise<RegistryStats> {
    const all = await this.store.list();

    const counts = new Map<string, number>();
    for (const record of all) {
      counts.set(record.provider, (counts.get(record.provider) ?? 0) + 1);
    }
    const byProvider = [...counts.entries()]
      .map(([provider, count]) => ({ provider, count }))
      .sort((a, b) => b.count - a.count || compareStrings(a.provider, b.provider));

    return {
      totalModules: all.length,
      byProvider,
      // list() is already ordered by downloads desc, name asc.
      mostDownloaded: all.slice(0, MOST_DOWNLOADED_LIMIT).map((r) => ({
        name: r.name,
        provider: r.provider,
        downloads: r.downloadCount,
      })),
    };
  }

  async bumpVersion(idOrName: string, part: VersionPart = "patch"): Promise<ModuleRecord> {
    const record = await this.get(idOrName);
    const updated = { ...record, version: bumpSemver(record.version, part) };
    await this.store.save(updated);
    return updated;
  }

  /** Register the builtin catalog into an empty store. Returns the records added. */
  async seedBuiltins(): Promise<ModuleRecord[]> {
    if ((await this.store.count()) > 0) return [];
    const added: ModuleRecord[] = [];
    for (const definition of loadBuiltinDefinitions()) {
      added.push(await this.register(definition));
    }
    return added;
  }

  async exportPlan(idOrName: string, values: UserValues = {}): Promise<string> {
    const { module, rendered } = await this.generate(idOrName, values);
    return formatPlan(module, rendered, this.now());
  }

  async docs(idOrName: string): Promise<string> {
    return formatModuleDocs(await this.get(idOrName));
  }
}

/** Bump one part of a MAJOR.MINOR.PATCH version, zeroing the lower parts. */
export function bumpSemver(version: string, part: VersionPart): string {
  const [major = 0, minor = 0, patch = 0] = version.split(".").map((n) => Number.parseInt(n, 10) || 0);
  switch (part) {
    case "major":
      return `${major + 1}.0.0`;
    case "minor":
      return `${major}.${minor + 1}.0`;
    case "patch":
      return `${major}.${minor}.${patch + 1}`;
  }
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
