#!/usr/bin/env tsx
/**
 * CLI: module:delete
 *
 * Usage: npm run module:delete -- <module>
 */

import { ModuleNotFoundError } from "../shared/errors.js";
import { command, isMainModule, parseCliArgs, runMain, UsageError } from "./common.js";

const USAGE = "npm run module:delete -- <module>";

export const run = command(USAGE, async (args, { registry, io }) => {
  const { positionals } = parseCliArgs(args, []);
  const key = positionals[0];
  if (!key) throw new UsageError("A module name or id is required");

  if (!(await registry.delete(key))) throw new ModuleNotFoundError(key);
  io.out(`✓ Deleted ${key}`);
  return 0;
});

if (isMainModule(import.meta.url)) {
  void runMain(run, USAGE);
}
