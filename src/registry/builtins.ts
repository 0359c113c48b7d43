/**
 * Builtin module catalog, shipped as data/builtin_modules.json.
 */

import { readFileSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { ModuleDefinitionError } from "../shared/errors.js";
import { formatIssues, ModuleDefinitionSchema, type ModuleDefinition } from "./schemas.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const ROOT = path.resolve(__dirname, "..", "..");

export const BUILTIN_CATALOG_PATH = path.join(ROOT, "data", "builtin_modules.json");

const CatalogSchema = z.array(ModuleDefinitionSchema);

export function loadBuiltinDefinitions(catalogPath: string = BUILTIN_CATALOG_PATH): ModuleDefinition[] {
  const parsed = CatalogSchema.safeParse(JSON.parse(readFileSync(catalogPath, "utf-8")));
  if (!parsed.success) {
    throw new ModuleDefinitionError(formatIssues(parsed.error));
  }
  return parsed.data;
}
