#!/usr/bin/env tsx
/**
 * CLI: module:plan
 *
 * Usage: npm run module:plan -- <module> [--var key=value]... [--vars-file <f.json>] [--out <file>]
 */

import { writeFileSync } from "fs";
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

const USAGE = "npm run module:plan -- <module> [--var key=value]... [--vars-file <f.json>] [--out <file>]";

export const run = command(USAGE, async (args, { registry, io }) => {
  const parsed = parseCliArgs(args, ["--var", "--vars-file", "--out"]);
  const key = parsed.positionals[0];
  if (!key) throw new UsageError("A module name or id is required");

  const plan = await registry.exportPlan(key, collectUserValues(parsed));

  const out = flagValue(parsed, "--out");
  if (!out) {
    io.out(plan);
    return 0;
  }
  const outPath = path.resolve(out);
  writeFileSync(outPath, plan, "utf-8");
  io.out(`✓ Plan written to ${outPath}`);
  return 0;
});

if (isMainModule(import.meta.url)) {
  void runMain(run, USAGE);
}
