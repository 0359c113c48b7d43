#!/usr/bin/env tsx
/**
 * CLI: module:search
 *
 * Usage: npm run module:search -- <query>
 *
 * Case-insensitive match over name, description, provider, resource type and tags.
 */

import { command, isMainModule, moduleTable, parseCliArgs, runMain, UsageError } from "./common.js";

const USAGE = "npm run module:search -- <query>";

export const run = command(USAGE, async (args, { registry, io }) => {
  const { positionals } = parseCliArgs(args, []);
  const query = positionals.join(" ").trim();
  if (!query) throw new UsageError("A search query is required");

  const modules = await registry.search(query);
  if (modules.length === 0) {
    io.out(`No modules match "${query}".`);
    return 0;
  }
  for (const line of moduleTable(modules)) io.out(line);
  io.out("");
  io.out(`${modules.length} match(es) for "${query}"`);
  return 0;
});

if (isMainModule(import.meta.url)) {
  void runMain(run, USAGE);
}
