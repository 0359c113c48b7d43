/**
 * Simulated `terraform plan` output for a rendered module.
 *
 * Only top-level `resource "<type>" "<name>" { ... }` blocks are listed;
 * every resource is reported as an addition.
 */

import type { ModuleRecord } from "../registry/types.js";
import { findClosingBrace } from "../templates/scanner.js";

export interface ResourceBlock {
  type: string;
  name: string;
  /** Non-empty body lines, trimmed. */
  body: string[];
}

const BLOCK_HEADER = /^[ \t]*([A-Za-z_][A-Za-z0-9_-]*)([^\n{]*)\{/gm;
const RESOURCE_LABELS = /^\s*"([^"]*)"\s+"([^"]*)"\s*$/;

/** Top-level resource blocks of `text`, in source order. */
export function extractResourceBlocks(text: string): ResourceBlock[] {
  const blocks: ResourceBlock[] = [];
  BLOCK_HEADER.lastIndex = 0;

  let match: RegExpExecArray | null;
  while ((match = BLOCK_HEADER.exec(text)) !== null) {
    const open = match.index + match[0].length - 1;
    const close = findClosingBrace(text, open);
    const end = close === -1 ? text.length : close;

    const labels = match[1] === "resource" ? RESOURCE_LABELS.exec(match[2]) : null;
    if (labels) {
      blocks.push({
        type: labels[1],
        name: labels[2],
        body: text
          .slice(open + 1, end)
          .split("\n")
          .map((line) => line.trim())
          .filter((line) => line.length > 0),
      });
    }

    // Nested blocks are never top-level.
    BLOCK_HEADER.lastIndex = end + 1;
  }
  return blocks;
}

/** UTC timestamp with second precision: YYYY-MM-DDTHH:MM:SSZ. */
export function planTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19) + "Z";
}

export function formatPlan(module: ModuleRecord, rendered: string, generatedAt: Date): string {
  const lines: string[] = [
    `# Plan for module: ${module.name} v${module.version}`,
    `# Provider: ${module.provider}`,
    `# Generated: ${planTimestamp(generatedAt)}`,
    "",
  ];

  const blocks = extractResourceBlocks(rendered);
  if (blocks.length === 0) {
    lines.push("No resource blocks found in the rendered configuration.", "");
  } else {
    lines.push("Terraform will perform the following actions:", "");
    for (const block of blocks) {
      lines.push(`  + resource "${block.type}" "${block.name}" {`);
      for (const line of block.body) lines.push(`      ${line}`);
      lines.push("    }", "");
    }
    lines.push(`Plan: ${blocks.length} to add, 0 to change, 0 to destroy.`, "");
  }

  lines.push("# ── Rendered configuration ──", "", rendered.trimEnd(), "");
  return lines.join("\n");
}
