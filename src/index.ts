/**
 * IaC Module Registry public API.
 */

export * from "./templates/index.js";

export type { Finding, FindingCode, FindingSeverity, JsonValue, ValidationResult } from "./shared/types.js";
export {
  ConfigError,
  DuplicateModuleError,
  InvalidTemplateError,
  MissingRequiredVariableError,
  ModuleDefinitionError,
  ModuleNotFoundError,
  RenderError,
  UndeclaredVariableReferenceError,
} from "./shared/errors.js";
export type { RenderErrorKind } from "./shared/errors.js";
export { loadConfig, type RegistryConfig, type StoreKind } from "./shared/config.js";

export { PROVIDERS } from "./registry/types.js";
export type {
  ModuleExample,
  ModuleFilter,
  ModuleRecord,
  ModuleStore,
  Provider,
  RegistryStats,
  VersionPart,
} from "./registry/types.js";
export { ModuleRegistry, bumpSemver, type GenerateResult, type RegistryOptions } from "./registry/registry.js";
export { InMemoryModuleStore } from "./registry/memory_store.js";
export { FileModuleStore } from "./registry/file_store.js";
export { PgModuleStore } from "./registry/pg_store.js";
export { openRegistry, type OpenRegistry } from "./registry/open.js";
export { loadBuiltinDefinitions } from "./registry/builtins.js";
export { parseModuleDefinition, type ModuleDefinition, type ModuleDefinitionInput } from "./registry/schemas.js";

export { formatModuleDocs } from "./docs/markdown.js";
export { extractResourceBlocks, formatPlan } from "./docs/plan.js";
export { createApp } from "./api/server.js";
export { createRegistryRouter } from "./api/routes.js";
