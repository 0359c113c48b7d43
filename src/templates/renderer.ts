/**
 * Template Renderer. Substitutes `${var.<name>}` tokens with the effective
 * value of each declared variable.
 *
 * Rendering is all-or-nothing: a missing required variable or a reference to
 * an undeclared one throws before any output is produced.
 */

import type { JsonValue } from "../shared/types.js";
import {
  MissingRequiredVariableError,
  UndeclaredVariableReferenceError,
} from "../shared/errors.js";
import { dollarRunLength, readIdentifier } from "./scanner.js";
import { encodeJsonValue } from "./values.js";
import type { UserValues, VariableDeclaration } from "./types.js";

const VAR_PREFIX = "${var.";

export interface EffectiveVariable {
  declaration: VariableDeclaration;
  /** undefined when neither a user value nor a default exists. */
  value: JsonValue | undefined;
}

/**
 * Resolve each declaration to its effective value (user value, else default).
 * A required variable is satisfied by its default when no user value is given.
 */
export function resolveEffectiveValues(
  declarations: readonly VariableDeclaration[],
  userValues: UserValues,
): Map<string, EffectiveVariable> {
  const effective = new Map<string, EffectiveVariable>();
  const missing: string[] = [];

  for (const declaration of declarations) {
    if (effective.has(declaration.name)) continue;
    const value = Object.hasOwn(userValues, declaration.name)
      ? userValues[declaration.name]
      : declaration.default;
    if (declaration.required && value === undefined) {
      missing.push(declaration.name);
    }
    effective.set(declaration.name, { declaration, value });
  }

  if (missing.length > 0) {
    throw new MissingRequiredVariableError(missing);
  }
  return effective;
}

/** Render a template with the given declarations and user values. */
export function render(
  template: string,
  declarations: readonly VariableDeclaration[],
  userValues: UserValues = {},
): string {
  const effective = resolveEffectiveValues(declarations, userValues);
  const parts: string[] = [];
  let copiedUpTo = 0;
  let i = 0;

  while (i < template.length) {
    if (template[i] !== "$") {
      i++;
      continue;
    }

    const run = dollarRunLength(template, i);
    const tokenStart = i + run - 1;
    i += run;
    // Even runs are escapes: `$${` stays literal.
    if (run % 2 === 0 || !template.startsWith(VAR_PREFIX, tokenStart)) continue;

    const nameStart = tokenStart + VAR_PREFIX.length;
    const nameEnd = readIdentifier(template, nameStart);
    if (nameEnd === nameStart || template[nameEnd] !== "}") continue;

    const name = template.slice(nameStart, nameEnd);
    const variable = effective.get(name);
    if (!variable) {
      throw new UndeclaredVariableReferenceError(name);
    }
    i = nameEnd + 1;
    if (variable.value === undefined) continue;

    parts.push(template.slice(copiedUpTo, tokenStart));
    parts.push(encodeJsonValue(variable.value, variable.declaration.kind));
    copiedUpTo = i;
  }

  parts.push(template.slice(copiedUpTo));
  return parts.join("");
}
