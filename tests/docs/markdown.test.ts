/**
 * Markdown docs — Unit Tests
 */

import { describe, it, expect } from "vitest";
import { formatModuleDocs } from "../../src/docs/markdown.js";
import type { ModuleRecord } from "../../src/registry/types.js";

const MODULE: ModuleRecord = {
  id: "id-1",
  name: "aws_rds_instance",
  provider: "aws",
  resourceType: "aws_db_instance",
  version: "1.4.2",
  description: "Managed PostgreSQL",
  template: 'resource "aws_db_instance" "${var.identifier}" {}\n\n',
  variables: [
    { name: "identifier", kind: "string", description: "Instance identifier", required: true, sensitive: false },
    {
      name: "instance_class",
      kind: "string",
      description: "Instance class",
      default: "db.t3.micro",
      required: false,
      sensitive: false,
    },
    { name: "password", kind: "string", description: "Master password", default: "changeme", required: true, sensitive: true },
    { name: "labels", kind: "map", description: "Extra | labels", default: { team: "data", app: "db" }, required: false, sensitive: false },
  ],
  outputs: [
    { name: "endpoint", description: "Connection endpoint", valueExpression: "aws_db_instance.x.endpoint", sensitive: false },
    { name: "secret", description: "", valueExpression: "x", sensitive: true },
  ],
  examples: [{ title: "Basic", description: "Smallest setup.", code: 'module "db" {}\n' }],
  tags: ["aws", "rds"],
  createdAt: "2026-01-02T03:04:05.000Z",
  downloadCount: 7,
};

describe("formatModuleDocs", () => {
  const lines = formatModuleDocs(MODULE).split("\n");

  it("starts with the title and summary line", () => {
    expect(lines.slice(0, 5)).toEqual([
      "# aws_rds_instance",
      "",
      "**Provider:** aws | **Resource:** `aws_db_instance` | **Version:** 1.4.2",
      "",
      "Managed PostgreSQL",
    ]);
  });

  it("tabulates variables with encoded defaults", () => {
    const start = lines.indexOf("## Variables");
    expect(lines.slice(start + 2, start + 8)).toEqual([
      "| Name | Type | Required | Sensitive | Default | Description |",
      "|------|------|----------|-----------|---------|-------------|",
      "| `identifier` | string | ✅ | — | — | Instance identifier |",
      '| `instance_class` | string | ❌ | — | `"db.t3.micro"` | Instance class |',
      "| `password` | string | ✅ | 🔒 | `(sensitive)` | Master password |",
      '| `labels` | map | ❌ | — | `{ app = "db", team = "data" }` | Extra \\| labels |',
    ]);
  });

  it("tabulates outputs", () => {
    const start = lines.indexOf("## Outputs");
    expect(lines.slice(start + 2, start + 6)).toEqual([
      "| Name | Description | Sensitive |",
      "|------|-------------|-----------|",
      "| `endpoint` | Connection endpoint | — |",
      "| `secret` |  | 🔒 |",
    ]);
  });

  it("fences the template and examples as hcl", () => {
    const start = lines.indexOf("## Template");
    expect(lines.slice(start + 2, start + 5)).toEqual([
      "```hcl",
      'resource "aws_db_instance" "${var.identifier}" {}',
      "```",
    ]);
    const examples = lines.indexOf("### Basic");
    expect(lines.slice(examples, examples + 7)).toEqual(["### Basic", "", "Smallest setup.", "", "```hcl", 'module "db" {}', "```"]);
  });

  it("ends with tags and metadata", () => {
    expect(lines).toContain("`aws` `rds`");
    expect(lines.slice(-5)).toEqual([
      "",
      "- **ID:** id-1",
      "- **Created:** 2026-01-02T03:04:05.000Z",
      "- **Downloads:** 7",
      "",
    ]);
  });

  it("notes modules without variables or outputs", () => {
    const docs = formatModuleDocs({ ...MODULE, variables: [], outputs: [], examples: [], tags: [] });
    expect(docs).toContain("_This module declares no variables._");
    expect(docs).toContain("_This module declares no outputs._");
    expect(docs).not.toContain("## Examples");
    expect(docs).not.toContain("## Tags");
  });
});
