#!/usr/bin/env tsx
/**
 * CLI: module:list
 *
 * Usage: npm run module:list -- [--provider <p>] [--resource <type>] [--store memory|file|postgres]
 */

import { command, flagValue, isMainModule, moduleTable, parseCliArgs, runMain } from "./common.js";

const USAGE = "npm run module:list -- [--provider <p>] [--resource <type>]";

export const run = command(USAGE, async (args, { registry, io }) => {
  const parsed = parseCliArgs(args, ["--provider", "--resource"]);
  const modules = await registry.list({
    provider: flagValue(parsed, "--provider"),
    resourceType: flagValue(parsed, "--resource"),
  });

  if (modules.length === 0) {
    io.out("No modules found.");
    return 0;
  }
  for (const line of moduleTable(modules)) io.out(line);
  io.out("");
  io.out(`${modules.length} module(s)`);
  return 0;
});

if (isMainModule(import.meta.url)) {
  void runMain(run, USAGE);
}
