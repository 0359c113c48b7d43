/**
 * Static Validator: lexical structure checks for HCL template text.
 *
 * One left-to-right scan over a context stack. Frames are the three
 * delimiters, `${` interpolations and `"` string literals; the top frame
 * decides whether the current character is code or string content.
 *
 * Checks:
 * 1. Non-empty input (short-circuits everything else)
 * 2. Correctly nested `{ } [ ] ( )` outside string literals
 * 3. Interpolation namespaces (var / local / module / data)
 * 4. `$${` escapes that do not precede a recognized interpolation
 * 5. `resource` statements carry exactly two quoted labels
 * 6. At least one resource / data / module block
 */

import type { Finding, FindingCode, FindingSeverity, ValidationResult } from "../shared/types.js";
import {
  createLocator,
  dollarRunLength,
  interpolationNamespace,
  isIdentifierStart,
  isKnownNamespace,
  isWhitespace,
  readIdentifier,
  skipStringLiteral,
} from "./scanner.js";

type DelimiterKind = "{" | "[" | "(";

interface Frame {
  kind: DelimiterKind | "${" | '"';
  offset: number;
}

const OPENER_FOR: Record<string, DelimiterKind> = { "}": "{", "]": "[", ")": "(" };

const SEVERITY: Record<FindingCode, FindingSeverity> = {
  EmptyTemplate: "error",
  UnbalancedDelimiter: "error",
  InvalidResourceLabels: "error",
  UnknownInterpolation: "warning",
  EscapedDollarAdvisory: "warning",
  NoBlockFound: "warning",
};

/** Validate raw or rendered template text. Never throws. */
export function validate(text: string): ValidationResult {
  const findings: Finding[] = [];
  const locate = createLocator(text);

  const at = (offset: number): string => {
    const { line, column } = locate(offset);
    return `line ${line}, column ${column}`;
  };

  const report = (code: FindingCode, offset: number, message: string): void => {
    const { line, column } = locate(offset);
    findings.push({ code, severity: SEVERITY[code], message, line, column });
  };

  if (text.trim() === "") {
    report("EmptyTemplate", 0, "Template is empty");
    return toResult(findings);
  }

  const stack: Frame[] = [];
  let sawStatement = false;
  let sawBlock = false;

  // Handles a run of `$` at `start`; returns the index to resume from.
  const scanDollars = (start: number, inString: boolean): number => {
    const run = dollarRunLength(text, start);
    const brace = start + run;
    if (text[brace] !== "{") return brace;

    if (run % 2 === 1) {
      stack.push({ kind: "${", offset: brace - 1 });
      return brace + 1;
    }

    const nameEnd = readIdentifier(text, brace + 1);
    const namespace = text.slice(brace + 1, nameEnd);
    const recognized = isKnownNamespace(namespace) && text[nameEnd] === ".";
    if (!recognized) {
      report(
        "EscapedDollarAdvisory",
        brace - 2,
        `Escaped "$\${" at ${at(brace - 2)} is not followed by a recognized interpolation; ` +
          `use "$\${" only for a literal "\${"`,
      );
    }
    if (!inString) stack.push({ kind: "{", offset: brace });
    return brace + 1;
  };

  const closeDelimiter = (ch: string, offset: number): void => {
    const top = stack[stack.length - 1];
    if (!top) {
      report("UnbalancedDelimiter", offset, `Unbalanced delimiter: unexpected "${ch}" at ${at(offset)}`);
      return;
    }

    const expected = OPENER_FOR[ch];
    if (top.kind === expected) {
      stack.pop();
      return;
    }
    if (ch === "}" && top.kind === "${") {
      stack.pop();
      const expression = text.slice(top.offset + 2, offset);
      const namespace = interpolationNamespace(expression);
      if (!isKnownNamespace(namespace)) {
        report(
          "UnknownInterpolation",
          top.offset,
          `Unknown interpolation namespace "${namespace}" at ${at(top.offset)}: ${text.slice(top.offset, offset + 1)}`,
        );
      }
      return;
    }

    report(
      "UnbalancedDelimiter",
      offset,
      `Unbalanced delimiter: "${ch}" at ${at(offset)} does not close "${top.kind}" opened at ${at(top.offset)}`,
    );
  };

  // `resource` must be followed by whitespace, two quoted labels, then `{`.
  const hasTwoLabels = (from: number): boolean => {
    if (!isWhitespace(text[from])) return false;
    let labels = 0;
    let j = from;
    while (j < text.length) {
      if (isWhitespace(text[j])) {
        j++;
        continue;
      }
      if (text[j] === '"') {
        const after = skipStringLiteral(text, j);
        if (after === -1) return false;
        labels++;
        j = after;
        continue;
      }
      return text[j] === "{" && labels === 2;
    }
    return false;
  };

  const followedByLabel = (from: number): boolean => {
    if (!isWhitespace(text[from])) return false;
    let j = from;
    while (isWhitespace(text[j])) j++;
    return text[j] === '"';
  };

  const statement = (start: number, end: number): void => {
    sawStatement = true;
    const keyword = text.slice(start, end);
    if (keyword === "resource") {
      sawBlock = true;
      if (!hasTwoLabels(end)) {
        const lineEnd = text.indexOf("\n", start);
        const lineText = text.slice(start, lineEnd === -1 ? text.length : lineEnd).trim();
        report(
          "InvalidResourceLabels",
          start,
          `Invalid resource labels at ${at(start)}: expected two quoted labels before "{" in '${lineText}'`,
        );
      }
    } else if ((keyword === "data" || keyword === "module") && followedByLabel(end)) {
      sawBlock = true;
    }
  };

  // True while only whitespace or comments follow the start of the text,
  // a newline, a `;` or a `}` that closes the last open frame.
  let statementStart = true;
  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    const top = stack[stack.length - 1];

    if (top?.kind === '"') {
      if (ch === "\\") {
        i += 2;
      } else if (ch === '"') {
        stack.pop();
        i++;
      } else if (ch === "$") {
        i = scanDollars(i, true);
      } else {
        i++;
      }
      continue;
    }

    if (ch === "#" || (ch === "/" && text[i + 1] === "/")) {
      const lineEnd = text.indexOf("\n", i);
      i = lineEnd === -1 ? text.length : lineEnd;
    } else if (ch === "/" && text[i + 1] === "*") {
      const commentEnd = text.indexOf("*/", i + 2);
      i = commentEnd === -1 ? text.length : commentEnd + 2;
    } else if (ch === '"') {
      stack.push({ kind: '"', offset: i });
      statementStart = false;
      i++;
    } else if (ch === "$") {
      i = scanDollars(i, false);
      statementStart = false;
    } else if (ch === "{" || ch === "[" || ch === "(") {
      stack.push({ kind: ch, offset: i });
      statementStart = false;
      i++;
    } else if (ch === "}" || ch === "]" || ch === ")") {
      closeDelimiter(ch, i);
      statementStart = ch === "}" && stack.length === 0;
      i++;
    } else if (stack.length === 0 && isIdentifierStart(ch)) {
      const end = readIdentifier(text, i);
      if (statementStart) statement(i, end);
      statementStart = false;
      i = end;
    } else {
      if (ch === "\n" || ch === ";") {
        statementStart = true;
      } else if (!isWhitespace(ch)) {
        statementStart = false;
      }
      i++;
    }
  }

  for (const frame of stack) {
    if (frame.kind === '"') continue;
    report(
      "UnbalancedDelimiter",
      frame.offset,
      `Unbalanced delimiter: "${frame.kind}" opened at ${at(frame.offset)} is never closed`,
    );
  }

  if (sawStatement && !sawBlock) {
    report("NoBlockFound", 0, "No resource, data or module block found; is this intentional?");
  }

  return toResult(findings);
}

function toResult(findings: Finding[]): ValidationResult {
  const errors = findings.filter((f) => f.severity === "error").map((f) => f.message);
  const warnings = findings.filter((f) => f.severity === "warning").map((f) => f.message);
  return { valid: errors.length === 0, errors, warnings, findings };
}
