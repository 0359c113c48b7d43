/**
 * Shared test fixtures: a small module definition and a deterministic registry.
 */

import { InMemoryModuleStore } from "../src/registry/memory_store.js";
import { ModuleRegistry } from "../src/registry/registry.js";
import type { ModuleDefinitionInput } from "../src/registry/schemas.js";
import type { VariableDeclaration } from "../src/templates/types.js";

export const FIXED_NOW = new Date("2026-01-02T03:04:05.000Z");

export const WEB_TEMPLATE = [
  'resource "aws_instance" "${var.name}" {',
  '  ami           = "${var.ami}"',
  '  instance_type = "${var.instance_type}"',
  "}",
  "",
].join("\n");

export function webServerDefinition(overrides: Partial<ModuleDefinitionInput> = {}): ModuleDefinitionInput {
  return {
    name: "web_server",
    provider: "aws",
    resourceType: "aws_instance",
    description: "Single EC2 web server",
    template: WEB_TEMPLATE,
    variables: [
      { name: "name", description: "Instance name" },
      { name: "ami", description: "AMI ID", default: "ami-123" },
      { name: "instance_type", description: "Instance type", default: "t3.micro", required: false },
    ],
    outputs: [{ name: "instance_id", description: "Instance ID", valueExpression: "aws_instance.${var.name}.id" }],
    tags: ["aws", "compute"],
    ...overrides,
  };
}

/** Registry over an in-memory store with a fixed clock and sequential ids. */
export function createTestRegistry(): ModuleRegistry {
  let next = 0;
  return new ModuleRegistry(new InMemoryModuleStore(), {
    now: () => FIXED_NOW,
    newId: () => `id-${++next}`,
  });
}

export function decl(name: string, overrides: Partial<VariableDeclaration> = {}): VariableDeclaration {
  return { name, kind: "string", description: "", required: true, sensitive: false, ...overrides };
}
