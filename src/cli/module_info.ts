#!/usr/bin/env tsx
/**
 * CLI: module:info
 *
 * Usage: npm run module:info -- <module>
 */

import type { VariableDeclaration } from "../templates/types.js";
import { encodeJsonValue } from "../templates/values.js";
import { command, isMainModule, parseCliArgs, runMain, UsageError } from "./common.js";

const USAGE = "npm run module:info -- <module>";

export const run = command(USAGE, async (args, { registry, io }) => {
  const { positionals } = parseCliArgs(args, []);
  const key = positionals[0];
  if (!key) throw new UsageError("A module name or id is required");

  const m = await registry.get(key);
  io.out(`  Name:        ${m.name}`);
  io.out(`  ID:          ${m.id}`);
  io.out(`  Provider:    ${m.provider}`);
  io.out(`  Resource:    ${m.resourceType}`);
  io.out(`  Version:     ${m.version}`);
  io.out(`  Downloads:   ${m.downloadCount}`);
  io.out(`  Created:     ${m.createdAt}`);
  if (m.tags.length > 0) io.out(`  Tags:        ${m.tags.join(", ")}`);
  if (m.description) io.out(`  Description: ${m.description}`);

  io.out("");
  io.out(`  Variables (${m.variables.length}):`);
  for (const v of m.variables) io.out(`    ${describeVariable(v)}`);

  io.out("");
  io.out(`  Outputs (${m.outputs.length}):`);
  for (const o of m.outputs) {
    io.out(`    ${o.name}${o.sensitive ? " [sensitive]" : ""}${o.description ? `: ${o.description}` : ""}`);
  }
  return 0;
});

function describeVariable(v: VariableDeclaration): string {
  const traits = [v.kind, v.required ? "required" : "optional"];
  if (v.sensitive) traits.push("sensitive");
  let line = `${v.name} (${traits.join(", ")})`;
  if (v.default !== undefined) {
    line += ` default=${v.sensitive ? "***" : encodeJsonValue(v.default, v.kind)}`;
  }
  return v.description ? `${line}: ${v.description}` : line;
}

if (isMainModule(import.meta.url)) {
  void runMain(run, USAGE);
}
