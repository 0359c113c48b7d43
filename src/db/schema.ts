import { pgTable, text, timestamp, integer, jsonb, uuid, varchar, uniqueIndex, index } from "drizzle-orm/pg-core";
import type { OutputDeclaration, VariableDeclaration } from "../templates/types.js";
import type { ModuleExample } from "../registry/types.js";

// ── Modules ────────────────────────────────────────────────────────
export const modules = pgTable(
  "modules",
  {
    id: uuid("id").primaryKey(),
    name: varchar("name", { length: 200 }).notNull(),
    provider: varchar("provider", { length: 20 }).notNull(),
    resourceType: varchar("resource_type", { length: 200 }).notNull(),
    version: varchar("version", { length: 30 }).notNull(),
    description: text("description").notNull().default(""),
    template: text("template").notNull(),
    variables: jsonb("variables").$type<VariableDeclaration[]>().notNull().default([]),
    outputs: jsonb("outputs").$type<OutputDeclaration[]>().notNull().default([]),
    examples: jsonb("examples").$type<ModuleExample[]>().notNull().default([]),
    tags: jsonb("tags").$type<string[]>().notNull().default([]),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    downloadCount: integer("download_count").notNull().default(0),
  },
  (table) => ({
    nameIdx: uniqueIndex("idx_modules_name").on(table.name),
    providerIdx: index("idx_modules_provider").on(table.provider),
    resourceTypeIdx: index("idx_modules_resource_type").on(table.resourceType),
  }),
);

export type ModuleRow = typeof modules.$inferSelect;
