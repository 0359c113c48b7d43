#!/usr/bin/env tsx
/**
 * CLI: module:generate
 *
 * Usage: npm run module:generate -- <module> [--var key=value]... [--vars-file <f.json>] [--out <file.tf>]
 *
 * Renders the module with the given values. Without --out the rendered HCL
 * goes to stdout.
 */

import { mkdirSync, writeFileSync } from "fs";
import path from "path";
import {
  collectUserValues,
  command,
  flagValue,
  isMainModule,
  parseCliArgs,
  runMain,
  UsageError,
} from "./common.js";

const USAGE = "npm run module:generate -- <module> [--var key=value]... [--vars-file <f.json>] [--out <file>]";

export const run = command(USAGE, async (args, { registry, io }) => {
  const parsed = parseCliArgs(args, ["--var", "--vars-file", "--out"]);
  const key = parsed.positionals[0];
  if (!key) throw new UsageError("A module name or id is required");

  const { module, rendered } = await registry.generate(key, collectUserValues(parsed));

  const out = flagValue(parsed, "--out");
  if (!out) {
    io.out(rendered);
    return 0;
  }
  const outPath = path.resolve(out);
  mkdirSync(path.dirname(outPath), { recursive: true });
  writeFileSync(outPath, rendered, "utf-8");
  io.out(`✓ Generated ${module.name} v${module.version} → ${outPath}`);
  return 0;
});

if (isMainModule(import.meta.url)) {
  void runMain(run, USAGE);
}
