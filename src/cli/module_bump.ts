#!/usr/bin/env tsx
/**
 * CLI: module:bump
 *
 * Usage: npm run module:bump -- <module> [--part major|minor|patch]
 */

import type { VersionPart } from "../registry/types.js";
import { command, flagValue, isMainModule, parseCliArgs, runMain, UsageError } from "./common.js";

const USAGE = "npm run module:bump -- <module> [--part major|minor|patch]";

function parsePart(raw: string | undefined): VersionPart {
  if (raw === undefined || raw === "patch") return "patch";
  if (raw === "major" || raw === "minor") return raw;
  throw new UsageError(`--part must be major, minor or patch (got "${raw}")`);
}

export const run = command(USAGE, async (args, { registry, io }) => {
  const parsed = parseCliArgs(args, ["--part"]);
  const key = parsed.positionals[0];
  if (!key) throw new UsageError("A module name or id is required");
  const part = parsePart(flagValue(parsed, "--part"));

  const before = await registry.get(key);
  const after = await registry.bumpVersion(before.id, part);
  io.out(`✓ ${after.name}: ${before.version} → ${after.version}`);
  return 0;
});

if (isMainModule(import.meta.url)) {
  void runMain(run, USAGE);
}
