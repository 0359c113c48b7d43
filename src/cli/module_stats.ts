#!/usr/bin/env tsx
/**
 * CLI: module:stats
 *
 * Usage: npm run module:stats
 */

import { command, isMainModule, parseCliArgs, runMain } from "./common.js";

const USAGE = "npm run module:stats";

export const run = command(USAGE, async (args, { registry, io }) => {
  parseCliArgs(args, []);
  const stats = await registry.stats();

  io.out(`Total modules: ${stats.totalModules}`);
  if (stats.byProvider.length > 0) {
    io.out("");
    io.out("By provider:");
    for (const { provider, count } of stats.byProvider) {
      io.out(`  ${provider.padEnd(12)}${count}`);
    }
  }
  if (stats.mostDownloaded.length > 0) {
    io.out("");
    io.out("Most downloaded:");
    stats.mostDownloaded.forEach((m, index) => {
      io.out(`  ${index + 1}. ${m.name} (${m.provider}): ${m.downloads} download(s)`);
    });
  }
  return 0;
});

if (isMainModule(import.meta.url)) {
  void runMain(run, USAGE);
}
