/**
 * Shared plumbing for the module:* CLI scripts.
 *
 * Every script exports `run(args, deps)` returning an exit code so it can be
 * driven in-process; `runMain` wires it to process.argv, the configured store
 * and the console.
 */

import "dotenv/config";
import { readFileSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import type { ModuleRegistry } from "../registry/registry.js";
import { openRegistry } from "../registry/open.js";
import { formatIssues, JsonValueSchema, UserValuesSchema } from "../registry/schemas.js";
import { loadConfig } from "../shared/config.js";
import { errorMessage } from "../shared/errors.js";
import type { JsonValue } from "../shared/types.js";
import type { UserValues } from "../templates/types.js";

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

export interface CliDeps {
  registry: ModuleRegistry;
  io: CliIO;
}

export type CliCommand = (args: string[], deps: CliDeps) => Promise<number>;

export const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

// ── Argument parsing ────────────────────────────────────────────────

export interface ParsedArgs {
  positionals: string[];
  /** Every value given for each `--flag`, in order. */
  flags: Map<string, string[]>;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/**
 * Split `args` into positionals and `--flag value` pairs.
 * `--flag=value` is accepted too. Flags not in `valueFlags` are rejected.
 */
export function parseCliArgs(args: readonly string[], valueFlags: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Map<string, string[]>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith("--")) {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf("=");
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    if (!valueFlags.includes(flag)) {
      throw new UsageError(`Unknown option: ${flag}`);
    }

    let value: string;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else if (i + 1 < args.length) {
      value = args[i + 1];
      i++;
    } else {
      throw new UsageError(`Option ${flag} needs a value`);
    }
    flags.set(flag, [...(flags.get(flag) ?? []), value]);
  }

  return { positionals, flags };
}

/** Last value given for a flag. */
export function flagValue(parsed: ParsedArgs, flag: string): string | undefined {
  const values = parsed.flags.get(flag);
  return values ? values[values.length - 1] : undefined;
}

/** Remove `--store <kind>` from argv, returning it separately. */
export function extractStoreFlag(args: readonly string[]): { store?: string; rest: string[] } {
  const rest: string[] = [];
  let store: string | undefined;
  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--store" && i + 1 < args.length) {
      store = args[i + 1];
      i++;
    } else if (args[i].startsWith("--store=")) {
      store = args[i].slice("--store=".length);
    } else {
      rest.push(args[i]);
    }
  }
  return { store, rest };
}

// ── Variable values ─────────────────────────────────────────────────

/**
 * Parse `key=value` assignments. Values that parse as JSON keep their JSON
 * type (`3`, `true`, `["a"]`); anything else is taken as a plain string.
 */
export function parseVarAssignments(assignments: readonly string[]): Record<string, JsonValue> {
  const values: Record<string, JsonValue> = {};
  for (const assignment of assignments) {
    const eq = assignment.indexOf("=");
    if (eq <= 0) {
      throw new UsageError(`Invalid --var "${assignment}": expected key=value`);
    }
    values[assignment.slice(0, eq)] = parseVarValue(assignment.slice(eq + 1));
  }
  return values;
}

function parseVarValue(raw: string): JsonValue {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return raw;
  }
  const checked = JsonValueSchema.safeParse(parsed);
  return checked.success ? checked.data : raw;
}

/** Read a JSON object of variable values. */
export function readVarsFile(filePath: string): Record<string, JsonValue> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new UsageError(`Cannot read vars file ${filePath}: ${errorMessage(err)}`);
  }
  const parsed = UserValuesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UsageError(`Invalid vars file ${filePath}: ${formatIssues(parsed.error).join("; ")}`);
  }
  return parsed.data;
}

/** Values from `--vars-file` overlaid with every `--var`. */
export function collectUserValues(parsed: ParsedArgs): UserValues {
  const file = flagValue(parsed, "--vars-file");
  return {
    ...(file ? readVarsFile(path.resolve(file)) : {}),
    ...parseVarAssignments(parsed.flags.get("--var") ?? []),
  };
}

// ── Entry point ─────────────────────────────────────────────────────

export function isMainModule(moduleUrl: string): boolean {
  return Boolean(
    process.argv[1] && path.resolve(process.argv[1]) === path.resolve(fileURLToPath(moduleUrl)),
  );
}

/**
 * Run a command against the configured registry and set the process exit
 * code. Usage errors print `usage` as well.
 */
export async function runMain(cmd: CliCommand, usage: string): Promise<void> {
  const { store, rest } = extractStoreFlag(process.argv.slice(2));
  let exitCode = 1;
  try {
    const { registry, close } = await openRegistry(loadConfig(process.env, store));
    try {
      exitCode = await cmd(rest, { registry, io: consoleIO });
    } finally {
      await close();
    }
  } catch (err) {
    consoleIO.err(`Error: ${errorMessage(err)}`);
    if (err instanceof UsageError) consoleIO.err(`Usage: ${usage}`);
  }
  process.exitCode = exitCode;
}

/**
 * Wrap a command body so every thrown error becomes `Error: <message>` on
 * stderr and exit code 1.
 */
export function command(usage: string, body: CliCommand): CliCommand {
  return async (args, deps) => {
    try {
      return await body(args, deps);
    } catch (err) {
      deps.io.err(`Error: ${errorMessage(err)}`);
      if (err instanceof UsageError) deps.io.err(`Usage: ${usage}`);
      return 1;
    }
  };
}

// ── Output helpers ──────────────────────────────────────────────────

/** Fixed-width listing of modules, one per line, with a header. */
export function moduleTable(
  records: ReadonlyArray<{ name: string; provider: string; resourceType: string; version: string; downloadCount: number }>,
): string[] {
  const nameWidth = Math.max(4, ...records.map((r) => r.name.length)) + 2;
  const resourceWidth = Math.max(8, ...records.map((r) => r.resourceType.length)) + 2;
  const row = (name: string, provider: string, resource: string, version: string, downloads: string) =>
    `  ${name.padEnd(nameWidth)}${provider.padEnd(12)}${resource.padEnd(resourceWidth)}${version.padEnd(9)}${downloads}`;

  return [
    row("NAME", "PROVIDER", "RESOURCE", "VERSION", "DOWNLOADS"),
    ...records.map((r) => row(r.name, r.provider, r.resourceType, r.version, String(r.downloadCount))),
  ];
}
