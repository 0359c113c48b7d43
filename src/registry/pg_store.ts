/**
 * PgModuleStore: drizzle-orm over PostgreSQL.
 *
 * Rows are re-validated through ModuleRecordSchema on the way out so the
 * varchar provider column comes back as a typed Provider.
 */

import { and, asc, count, desc, eq, ilike, or, sql, type SQL } from "drizzle-orm";
import type { RegistryDatabase } from "../db/connection.js";
import { modules, type ModuleRow } from "../db/schema.js";
import { DuplicateModuleError } from "../shared/errors.js";
import { ModuleRecordSchema } from "./schemas.js";
import type { ModuleFilter, ModuleRecord, ModuleStore } from "./types.js";

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const UNIQUE_VIOLATION = "23505";

export class PgModuleStore implements ModuleStore {
  constructor(private readonly db: RegistryDatabase) {}

  async insert(record: ModuleRecord): Promise<void> {
    const rows = await this.db
      .insert(modules)
      .values(toRow(record))
      .onConflictDoNothing({ target: modules.name })
      .returning({ id: modules.id });
    if (rows.length === 0) throw new DuplicateModuleError(record.name);
  }

  async save(record: ModuleRecord): Promise<void> {
    const { id: _id, ...changes } = toRow(record);
    try {
      await this.db
        .insert(modules)
        .values(toRow(record))
        .onConflictDoUpdate({ target: modules.id, set: changes });
    } catch (err) {
      if (isUniqueViolation(err)) throw new DuplicateModuleError(record.name);
      throw err;
    }
  }

  async findByIdOrName(key: string): Promise<ModuleRecord | undefined> {
    const match = UUID.test(key) ? or(eq(modules.id, key), eq(modules.name, key)) : eq(modules.name, key);
    const rows = await this.db.select().from(modules).where(match).limit(1);
    return rows.length > 0 ? fromRow(rows[0]) : undefined;
  }

  async list(filter: ModuleFilter = {}): Promise<ModuleRecord[]> {
    const conditions: SQL[] = [];
    if (filter.provider) conditions.push(eq(modules.provider, filter.provider));
    if (filter.resourceType) conditions.push(eq(modules.resourceType, filter.resourceType));

    const rows = await this.db
      .select()
      .from(modules)
      .where(and(...conditions))
      .orderBy(desc(modules.downloadCount), asc(modules.name));
    return rows.map(fromRow);
  }

  async search(query: string): Promise<ModuleRecord[]> {
    const pattern = `%${escapeLike(query)}%`;
    const rows = await this.db
      .select()
      .from(modules)
      .where(
        or(
          ilike(modules.name, pattern),
          ilike(modules.description, pattern),
          ilike(modules.provider, pattern),
          ilike(modules.resourceType, pattern),
          sql`${modules.tags}::text ILIKE ${pattern}`,
        ),
      )
      .orderBy(desc(modules.downloadCount), asc(modules.name));
    return rows.map(fromRow);
  }

  async incrementDownloads(id: string): Promise<void> {
    await this.db
      .update(modules)
      .set({ downloadCount: sql`${modules.downloadCount} + 1` })
      .where(eq(modules.id, id));
  }

  async delete(id: string): Promise<boolean> {
    if (!UUID.test(id)) return false;
    const rows = await this.db.delete(modules).where(eq(modules.id, id)).returning({ id: modules.id });
    return rows.length > 0;
  }

  async count(): Promise<number> {
    const [row] = await this.db.select({ value: count() }).from(modules);
    return row?.value ?? 0;
  }
}

function toRow(record: ModuleRecord): ModuleRow {
  return {
    id: record.id,
    name: record.name,
    provider: record.provider,
    resourceType: record.resourceType,
    version: record.version,
    description: record.description,
    template: record.template,
    variables: record.variables,
    outputs: record.outputs,
    examples: record.examples,
    tags: record.tags,
    createdAt: new Date(record.createdAt),
    downloadCount: record.downloadCount,
  };
}

function fromRow(row: ModuleRow): ModuleRecord {
  return ModuleRecordSchema.parse({ ...row, createdAt: row.createdAt.toISOString() });
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === UNIQUE_VIOLATION;
}
