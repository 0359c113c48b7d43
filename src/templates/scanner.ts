/**
 * Token scanning helpers shared by the renderer, the validator and the plan
 * exporter.
 *
 * Interpolation starts follow HCL escaping: in a run of `$` characters
 * followed by `{`, every `$$` pair is a literal dollar, so the `{` opens an
 * interpolation only when the run length is odd.
 */

/** Interpolation namespaces that never trigger a warning. */
export const KNOWN_NAMESPACES: ReadonlySet<string> = new Set(["var", "local", "module", "data"]);

export function isIdentifierStart(ch: string | undefined): boolean {
  return ch !== undefined && /^[A-Za-z_]$/.test(ch);
}

export function isIdentifierPart(ch: string | undefined): boolean {
  return ch !== undefined && /^[A-Za-z0-9_-]$/.test(ch);
}

export function isWhitespace(ch: string | undefined): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || ch === "\r";
}

/**
 * End index (exclusive) of the identifier starting at `start`,
 * or `start` itself when no identifier starts there.
 */
export function readIdentifier(text: string, start: number): number {
  if (!isIdentifierStart(text[start])) return start;
  let i = start + 1;
  while (isIdentifierPart(text[i])) i++;
  return i;
}

/** Length of the run of `$` characters beginning at `start`. */
export function dollarRunLength(text: string, start: number): number {
  let i = start;
  while (text[i] === "$") i++;
  return i - start;
}

/** Number of `$` characters immediately preceding `index`. */
export function dollarRunBefore(text: string, index: number): number {
  let i = index - 1;
  while (i >= 0 && text[i] === "$") i--;
  return index - 1 - i;
}

/** True when the `$` at `index` starts a genuine `${` interpolation. */
export function isInterpolationStart(text: string, index: number): boolean {
  return text[index] === "$" && text[index + 1] === "{" && dollarRunBefore(text, index) % 2 === 0;
}

/** The leading dot-segment of an interpolation expression. */
export function interpolationNamespace(expression: string): string {
  const trimmed = expression.trim();
  const dot = trimmed.indexOf(".");
  return dot === -1 ? trimmed : trimmed.slice(0, dot);
}

export function isKnownNamespace(namespace: string): boolean {
  return KNOWN_NAMESPACES.has(namespace);
}

/**
 * Skip a double-quoted string literal whose opening quote is at `quoteIndex`.
 * Backslash escapes and nested `${...}` interpolations are honoured.
 * Returns the index just past the closing quote, or -1 if unterminated.
 */
export function skipStringLiteral(text: string, quoteIndex: number): number {
  let i = quoteIndex + 1;
  while (i < text.length) {
    const ch = text[i];
    if (ch === "\\") {
      i += 2;
      continue;
    }
    if (ch === '"') return i + 1;
    if (ch === "$") {
      const run = dollarRunLength(text, i);
      const next = i + run;
      if (text[next] === "{" && run % 2 === 1) {
        const close = findClosingBrace(text, next);
        if (close === -1) return -1;
        i = close + 1;
      } else {
        i = next;
      }
      continue;
    }
    i++;
  }
  return -1;
}

/**
 * Index of the `}` matching the `{` at `openIndex`, skipping braces inside
 * string literals. Returns -1 when the brace is never closed.
 */
export function findClosingBrace(text: string, openIndex: number): number {
  let depth = 0;
  let i = openIndex;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '"') {
      const after = skipStringLiteral(text, i);
      if (after === -1) return -1;
      i = after;
      continue;
    }
    if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth === 0) return i;
    }
    i++;
  }
  return -1;
}

export interface Position {
  line: number;
  column: number;
}

/** Build an offset → 1-based line/column lookup for `text`. */
export function createLocator(text: string): (offset: number) => Position {
  const lineStarts = [0];
  for (let i = 0; i < text.length; i++) {
    if (text[i] === "\n") lineStarts.push(i + 1);
  }

  return (offset: number): Position => {
    let lo = 0;
    let hi = lineStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (lineStarts[mid] <= offset) lo = mid;
      else hi = mid - 1;
    }
    return { line: lo + 1, column: offset - lineStarts[lo] + 1 };
  };
}
