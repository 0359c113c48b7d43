#!/usr/bin/env tsx
/**
 * CLI: module:docs
 *
 * Usage: npm run module:docs -- <module> [--out <README.md>]
 */

import { writeFileSync } from "fs";
import path from "path";
import { command, flagValue, isMainModule, parseCliArgs, runMain, UsageError } from "./common.js";

const USAGE = "npm run module:docs -- <module> [--out <file.md>]";

export const run = command(USAGE, async (args, { registry, io }) => {
  const parsed = parseCliArgs(args, ["--out"]);
  const key = parsed.positionals[0];
  if (!key) throw new UsageError("A module name or id is required");

  const markdown = await registry.docs(key);
  const out = flagValue(parsed, "--out");
  if (!out) {
    io.out(markdown);
    return 0;
  }
  const outPath = path.resolve(out);
  writeFileSync(outPath, markdown, "utf-8");
  io.out(`✓ Docs written to ${outPath}`);
  return 0;
});

if (isMainModule(import.meta.url)) {
  void runMain(run, USAGE);
}
