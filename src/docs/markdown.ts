/**
 * Markdown documentation for a Module Record.
 */

import type { ModuleRecord } from "../registry/types.js";
import type { OutputDeclaration, VariableDeclaration } from "../templates/types.js";
import { encodeValue, toVariableValue } from "../templates/values.js";

const NONE = "—";

export function formatModuleDocs(module: ModuleRecord): string {
  const lines: string[] = [
    `# ${module.name}`,
    "",
    `**Provider:** ${module.provider} | **Resource:** \`${module.resourceType}\` | **Version:** ${module.version}`,
    "",
  ];

  if (module.description) {
    lines.push(module.description, "");
  }

  lines.push("## Variables", "");
  if (module.variables.length === 0) {
    lines.push("_This module declares no variables._", "");
  } else {
    lines.push(
      "| Name | Type | Required | Sensitive | Default | Description |",
      "|------|------|----------|-----------|---------|-------------|",
      ...module.variables.map(variableRow),
      "",
    );
  }

  lines.push("## Outputs", "");
  if (module.outputs.length === 0) {
    lines.push("_This module declares no outputs._", "");
  } else {
    lines.push(
      "| Name | Description | Sensitive |",
      "|------|-------------|-----------|",
      ...module.outputs.map(outputRow),
      "",
    );
  }

  lines.push("## Template", "", "```hcl", module.template.trimEnd(), "```", "");

  if (module.examples.length > 0) {
    lines.push("## Examples", "");
    for (const example of module.examples) {
      lines.push(`### ${example.title}`, "");
      if (example.description) lines.push(example.description, "");
      if (example.code) lines.push("```hcl", example.code.trimEnd(), "```", "");
    }
  }

  if (module.tags.length > 0) {
    lines.push("## Tags", "", module.tags.map((t) => `\`${t}\``).join(" "), "");
  }

  lines.push(
    "## Metadata",
    "",
    `- **ID:** ${module.id}`,
    `- **Created:** ${module.createdAt}`,
    `- **Downloads:** ${module.downloadCount}`,
    "",
  );

  return lines.join("\n");
}

function variableRow(v: VariableDeclaration): string {
  return [
    "",
    `\`${v.name}\``,
    v.kind,
    v.required ? "✅" : "❌",
    v.sensitive ? "🔒" : NONE,
    formatDefault(v),
    cell(v.description),
    "",
  ].join(" | ").trim();
}

function outputRow(o: OutputDeclaration): string {
  return ["", `\`${o.name}\``, cell(o.description), o.sensitive ? "🔒" : NONE, ""].join(" | ").trim();
}

function formatDefault(v: VariableDeclaration): string {
  if (v.default === undefined) return NONE;
  if (v.sensitive) return "`(sensitive)`";
  return `\`${cell(encodeValue(toVariableValue(v.default, v.kind), true))}\``;
}

function cell(text: string): string {
  return text.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}
