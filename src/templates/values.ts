/**
 * Value lifting and textual encoding.
 *
 * JSON values are lifted into the tagged `VariableValue` union first so that
 * encoding is an exhaustive switch over known arms.
 */

import type { JsonValue } from "../shared/types.js";
import type { VariableKind, VariableValue } from "./types.js";

const BARE_KEY = /^[A-Za-z_][A-Za-z0-9_-]*$/;

/**
 * Lift a JSON value into a tagged value. Objects become `object` when the
 * declared kind is `object` and `map` otherwise; `null` becomes opaque.
 */
export function toVariableValue(value: JsonValue, kind: VariableKind = "any"): VariableValue {
  if (value === null) return { kind: "opaque", raw: null };
  if (typeof value === "string") return { kind: "string", value };
  if (typeof value === "number") return { kind: "number", value };
  if (typeof value === "boolean") return { kind: "bool", value };
  if (Array.isArray(value)) {
    return { kind: "list", items: value.map((item) => toVariableValue(item)) };
  }
  const entries = Object.keys(value)
    .sort()
    .map((key): [string, VariableValue] => [key, toVariableValue(value[key])]);
  return kind === "object" ? { kind: "object", entries } : { kind: "map", entries };
}

/**
 * Encode a tagged value as template text.
 * Top-level strings are inserted raw; strings nested in collections are quoted.
 */
export function encodeValue(value: VariableValue, nested = false): string {
  switch (value.kind) {
    case "string":
      return nested ? JSON.stringify(value.value) : value.value;
    case "number":
      return String(value.value);
    case "bool":
      return value.value ? "true" : "false";
    case "list":
      return `[${value.items.map((item) => encodeValue(item, true)).join(", ")}]`;
    case "map":
    case "object":
      if (value.entries.length === 0) return "{}";
      return `{ ${value.entries
        .map(([key, item]) => `${encodeKey(key)} = ${encodeValue(item, true)}`)
        .join(", ")} }`;
    case "opaque":
      return "null";
  }
}

/** Convenience: lift and encode a JSON value in one step. */
export function encodeJsonValue(value: JsonValue, kind: VariableKind = "any"): string {
  return encodeValue(toVariableValue(value, kind));
}

function encodeKey(key: string): string {
  return BARE_KEY.test(key) ? key : JSON.stringify(key);
}
