#!/usr/bin/env tsx
/**
 * CLI: module:validate
 *
 * Usage: npm run module:validate -- <file.tf>
 *
 * Static checks only. Exits 1 when the file has errors; warnings alone pass.
 */

import { existsSync, readFileSync } from "fs";
import path from "path";
import { command, isMainModule, parseCliArgs, runMain, UsageError } from "./common.js";

const USAGE = "npm run module:validate -- <file>";

export const run = command(USAGE, async (args, { registry, io }) => {
  const { positionals } = parseCliArgs(args, []);
  const file = positionals[0];
  if (!file) throw new UsageError("A template file is required");

  const filePath = path.resolve(file);
  if (!existsSync(filePath)) throw new UsageError(`File not found: ${filePath}`);

  const result = registry.validateTemplate(readFileSync(filePath, "utf-8"));
  io.out(result.valid ? `✓ ${file} is valid` : `✗ ${file} is invalid`);
  for (const error of result.errors) io.out(`  ERROR: ${error}`);
  for (const warning of result.warnings) io.out(`  WARNING: ${warning}`);
  return result.valid ? 0 : 1;
});

if (isMainModule(import.meta.url)) {
  void runMain(run, USAGE);
}
