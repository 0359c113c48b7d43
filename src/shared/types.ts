/** Any value that survives a JSON round trip. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** Validation severity levels */
export type FindingSeverity = "error" | "warning";

/** Finding codes emitted by the static validator */
export type FindingCode =
  | "EmptyTemplate"
  | "UnbalancedDelimiter"
  | "InvalidResourceLabels"
  | "UnknownInterpolation"
  | "EscapedDollarAdvisory"
  | "NoBlockFound";

/** A single structural finding, positioned at 1-based line/column. */
export interface Finding {
  code: FindingCode;
  severity: FindingSeverity;
  message: string;
  line: number;
  column: number;
}

/**
 * Outcome of one validation call.
 * `errors` and `warnings` hold the finding messages in discovery order;
 * `valid` is true iff there are no errors.
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  findings: Finding[];
}
