/**
 * FileModuleStore: one JSON document per module on disk.
 *
 * Layout: <rootDir>/<moduleName>/module.json
 *
 * All records are loaded by `open()`; every mutation rewrites the affected
 * module.json. Files that fail to parse or validate are skipped and
 * listed in `skipped`.
 */

import { existsSync, mkdirSync, readdirSync, readFileSync, rmSync, statSync, writeFileSync } from "fs";
import path from "path";
import { errorMessage } from "../shared/errors.js";
import { InMemoryModuleStore } from "./memory_store.js";
import { formatIssues, ModuleRecordSchema } from "./schemas.js";
import type { ModuleFilter, ModuleRecord, ModuleStore } from "./types.js";

export const MODULE_FILE = "module.json";

export interface SkippedModuleFile {
  path: string;
  reason: string;
}

export class FileModuleStore implements ModuleStore {
  private memory = new InMemoryModuleStore();
  readonly skipped: SkippedModuleFile[] = [];

  private constructor(private readonly rootDir: string) {
    mkdirSync(rootDir, { recursive: true });
  }

  /** Open (creating if needed) a store rooted at `rootDir` and load every module.json. */
  static async open(rootDir: string): Promise<FileModuleStore> {
    const store = new FileModuleStore(rootDir);
    for (const { filePath, record } of store.readAll()) {
      if (
        (await store.memory.findByIdOrName(record.id)) ||
        (await store.memory.findByIdOrName(record.name))
      ) {
        store.skipped.push({ path: filePath, reason: `duplicate module "${record.name}" (${record.id})` });
        continue;
      }
      await store.memory.insert(record);
    }
    return store;
  }

  async insert(record: ModuleRecord): Promise<void> {
    await this.memory.insert(record);
    this.write(record);
  }

  async save(record: ModuleRecord): Promise<void> {
    const previous = await this.memory.findByIdOrName(record.id);
    await this.memory.save(record);
    if (previous && previous.name !== record.name) {
      this.remove(previous.name);
    }
    this.write(record);
  }

  findByIdOrName(key: string): Promise<ModuleRecord | undefined> {
    return this.memory.findByIdOrName(key);
  }

  list(filter?: ModuleFilter): Promise<ModuleRecord[]> {
    return this.memory.list(filter);
  }

  search(query: string): Promise<ModuleRecord[]> {
    return this.memory.search(query);
  }

  async incrementDownloads(id: string): Promise<void> {
    await this.memory.incrementDownloads(id);
    const updated = await this.memory.findByIdOrName(id);
    if (updated) this.write(updated);
  }

  async delete(id: string): Promise<boolean> {
    const existing = await this.memory.findByIdOrName(id);
    if (!existing) return false;
    await this.memory.delete(existing.id);
    this.remove(existing.name);
    return true;
  }

  count(): Promise<number> {
    return this.memory.count();
  }

  // ── Internals ──────────────────────────────────────────────

  private readAll(): Array<{ filePath: string; record: ModuleRecord }> {
    const found: Array<{ filePath: string; record: ModuleRecord }> = [];
    for (const dir of safeDirs(this.rootDir)) {
      const filePath = path.join(this.rootDir, dir, MODULE_FILE);
      if (!existsSync(filePath)) continue;

      let raw: unknown;
      try {
        raw = JSON.parse(readFileSync(filePath, "utf-8"));
      } catch (err) {
        this.skipped.push({ path: filePath, reason: errorMessage(err) });
        continue;
      }

      const parsed = ModuleRecordSchema.safeParse(raw);
      if (!parsed.success) {
        this.skipped.push({ path: filePath, reason: formatIssues(parsed.error).join("; ") });
        continue;
      }
      if (parsed.data.name !== dir) {
        this.skipped.push({
          path: filePath,
          reason: `module name "${parsed.data.name}" does not match directory "${dir}"`,
        });
        continue;
      }
      found.push({ filePath, record: parsed.data });
    }
    return found;
  }

  private write(record: ModuleRecord): void {
    const dir = path.join(this.rootDir, record.name);
    mkdirSync(dir, { recursive: true });
    writeFileSync(path.join(dir, MODULE_FILE), JSON.stringify(record, null, 2) + "\n", "utf-8");
  }

  private remove(name: string): void {
    rmSync(path.join(this.rootDir, name), { recursive: true, force: true });
  }
}

function safeDirs(dir: string): string[] {
  if (!existsSync(dir)) return [];
  return readdirSync(dir)
    .filter((entry) => statSync(path.join(dir, entry)).isDirectory())
    .sort();
}
