#!/usr/bin/env tsx
/**
 * CLI: module:register
 *
 * Usage: npm run module:register -- --name <name> --provider <p> --resource <type>
 *          --template <file.tf> [--definition <file.json>] [--description <text>]
 *          [--version <x.y.z>] [--tag <tag>]...
 *
 * The optional definition file supplies variables, outputs, examples and tags
 * (or any other field); command-line flags take precedence over it.
 */

import { existsSync, readFileSync } from "fs";
import path from "path";
import { z } from "zod";
import { errorMessage } from "../shared/errors.js";
import { command, flagValue, isMainModule, parseCliArgs, runMain, UsageError } from "./common.js";

const USAGE =
  "npm run module:register -- --name <name> --provider <p> --resource <type> --template <file> " +
  "[--definition <json>] [--description <text>] [--version <x.y.z>] [--tag <tag>]...";

const FLAGS = ["--name", "--provider", "--resource", "--template", "--definition", "--description", "--version", "--tag"];

export const run = command(USAGE, async (args, { registry, io }) => {
  const parsed = parseCliArgs(args, FLAGS);
  const templatePath = flagValue(parsed, "--template");
  const definitionPath = flagValue(parsed, "--definition");

  const definition: Record<string, unknown> = definitionPath ? readDefinition(path.resolve(definitionPath)) : {};
  const overrides: Record<string, unknown> = {
    name: flagValue(parsed, "--name"),
    provider: flagValue(parsed, "--provider"),
    resourceType: flagValue(parsed, "--resource"),
    description: flagValue(parsed, "--description"),
    version: flagValue(parsed, "--version"),
    tags: parsed.flags.get("--tag"),
    template: templatePath ? readTemplate(path.resolve(templatePath)) : undefined,
  };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) definition[key] = value;
  }

  if (definition.template === undefined) {
    throw new UsageError("--template is required (or a template field in --definition)");
  }

  const record = await registry.register(definition);
  io.out(`✓ Registered ${record.name} v${record.version} (${record.id})`);
  for (const warning of registry.validateTemplate(record.template).warnings) {
    io.out(`  WARNING: ${warning}`);
  }
  return 0;
});

function readTemplate(filePath: string): string {
  if (!existsSync(filePath)) throw new UsageError(`Template file not found: ${filePath}`);
  return readFileSync(filePath, "utf-8");
}

function readDefinition(filePath: string): Record<string, unknown> {
  if (!existsSync(filePath)) throw new UsageError(`Definition file not found: ${filePath}`);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new UsageError(`Cannot parse definition file ${filePath}: ${errorMessage(err)}`);
  }
  const parsed = z.record(z.unknown()).safeParse(raw);
  if (!parsed.success) {
    throw new UsageError(`Definition file ${filePath} must contain a JSON object`);
  }
  return parsed.data;
}

if (isMainModule(import.meta.url)) {
  void runMain(run, USAGE);
}
