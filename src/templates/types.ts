/**
 * Variable Model
 *
 * Declared inputs and outputs of a module template, and the tagged value
 * representation the renderer encodes into template text.
 */

import type { JsonValue } from "../shared/types.js";

// ── Declarations ────────────────────────────────────────────────────

export const VARIABLE_KINDS = ["string", "number", "bool", "list", "map", "object", "any"] as const;

export type VariableKind = (typeof VARIABLE_KINDS)[number];

export interface VariableDeclaration {
  /** Unique within a template; referenced as `${var.<name>}`. */
  name: string;
  kind: VariableKind;
  description: string;
  /** Fallback when no user value is supplied. Absent means no default. */
  default?: JsonValue;
  required: boolean;
  sensitive: boolean;
}

export interface OutputDeclaration {
  name: string;
  description: string;
  /** Opaque HCL expression; never evaluated. */
  valueExpression: string;
  sensitive: boolean;
}

/** User-supplied values keyed by variable name. */
export type UserValues = Readonly<Record<string, JsonValue>>;

// ── Tagged values ───────────────────────────────────────────────────

export type VariableValue =
  | { kind: "string"; value: string }
  | { kind: "number"; value: number }
  | { kind: "bool"; value: boolean }
  | { kind: "list"; items: VariableValue[] }
  | { kind: "map"; entries: Array<[string, VariableValue]> }
  | { kind: "object"; entries: Array<[string, VariableValue]> }
  | { kind: "opaque"; raw: null };
