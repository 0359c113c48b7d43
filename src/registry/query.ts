import type { ModuleFilter, ModuleRecord } from "./types.js";

/** downloadCount desc, then name asc. */
export function byPopularity(a: ModuleRecord, b: ModuleRecord): number {
  if (a.downloadCount !== b.downloadCount) return b.downloadCount - a.downloadCount;
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

export function matchesFilter(record: ModuleRecord, filter: ModuleFilter = {}): boolean {
  if (filter.provider && record.provider !== filter.provider) return false;
  if (filter.resourceType && record.resourceType !== filter.resourceType) return false;
  return true;
}

export function matchesQuery(record: ModuleRecord, query: string): boolean {
  const needle = query.toLowerCase();
  return [record.name, record.description, record.provider, record.resourceType, ...record.tags].some(
    (field) => field.toLowerCase().includes(needle),
  );
}

/** Deep copy so callers never alias stored records. */
export function cloneRecord(record: ModuleRecord): ModuleRecord {
  return structuredClone(record);
}
