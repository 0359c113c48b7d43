/**
 * InMemoryModuleStore
 *
 * Map-backed store keyed by record id. Hands out copies, so callers cannot
 * mutate stored records behind the store's back.
 */

import { DuplicateModuleError } from "../shared/errors.js";
import { byPopularity, cloneRecord, matchesFilter, matchesQuery } from "./query.js";
import type { ModuleFilter, ModuleRecord, ModuleStore } from "./types.js";

export class InMemoryModuleStore implements ModuleStore {
  private records = new Map<string, ModuleRecord>();

  async insert(record: ModuleRecord): Promise<void> {
    if (this.findByName(record.name)) {
      throw new DuplicateModuleError(record.name);
    }
    this.records.set(record.id, cloneRecord(record));
  }

  async save(record: ModuleRecord): Promise<void> {
    const clash = this.findByName(record.name);
    if (clash && clash.id !== record.id) {
      throw new DuplicateModuleError(record.name);
    }
    this.records.set(record.id, cloneRecord(record));
  }

  async findByIdOrName(key: string): Promise<ModuleRecord | undefined> {
    const found = this.records.get(key) ?? this.findByName(key);
    return found ? cloneRecord(found) : undefined;
  }

  async list(filter?: ModuleFilter): Promise<ModuleRecord[]> {
    return [...this.records.values()]
      .filter((r) => matchesFilter(r, filter))
      .sort(byPopularity)
      .map(cloneRecord);
  }

  async search(query: string): Promise<ModuleRecord[]> {
    return [...this.records.values()]
      .filter((r) => matchesQuery(r, query))
      .sort(byPopularity)
      .map(cloneRecord);
  }

  async incrementDownloads(id: string): Promise<void> {
    const record = this.records.get(id);
    if (record) record.downloadCount += 1;
  }

  async delete(id: string): Promise<boolean> {
    return this.records.delete(id);
  }

  async count(): Promise<number> {
    return this.records.size;
  }

  private findByName(name: string): ModuleRecord | undefined {
    for (const record of this.records.values()) {
      if (record.name === name) return record;
    }
    return undefined;
  }
}
