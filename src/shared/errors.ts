/**
 * Registry error types.
 *
 * Render failures and registry lookups throw these; static validation never
 * throws and reports findings inside its result instead.
 */

import type { ValidationResult } from "./types.js";

export type RenderErrorKind = "MissingRequiredVariable" | "UndeclaredVariableReference";

export abstract class RenderError extends Error {
  abstract readonly kind: RenderErrorKind;

  constructor(
    message: string,
    readonly variableName: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class MissingRequiredVariableError extends RenderError {
  readonly kind = "MissingRequiredVariable";

  /** All required variables without an effective value, in declaration order. */
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Missing required variables: ${missing.join(", ")}`, missing[0] ?? "");
    this.missing = missing;
  }
}

export class UndeclaredVariableReferenceError extends RenderError {
  readonly kind = "UndeclaredVariableReference";

  constructor(identifier: string) {
    super(`Template references undeclared variable: var.${identifier}`, identifier);
  }
}

export class ModuleNotFoundError extends Error {
  constructor(readonly key: string) {
    super(`Module not found: '${key}'`);
    this.name = "ModuleNotFoundError";
  }
}

export class DuplicateModuleError extends Error {
  constructor(readonly moduleName: string) {
    super(`Module already registered: '${moduleName}'`);
    this.name = "DuplicateModuleError";
  }
}

export class ModuleDefinitionError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid module definition:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.name = "ModuleDefinitionError";
  }
}

export class InvalidTemplateError extends Error {
  constructor(readonly result: ValidationResult) {
    super(`Invalid HCL template:\n${result.errors.map((e) => `  ERROR: ${e}`).join("\n")}`);
    this.name = "InvalidTemplateError";
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
