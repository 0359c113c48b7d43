import { z } from "zod";
import type { JsonValue } from "../shared/types.js";
import { ModuleDefinitionError } from "../shared/errors.js";
import { VARIABLE_KINDS } from "../templates/types.js";
import { PROVIDERS } from "./types.js";

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_-]*$/;
const SEMVER = /^\d+\.\d+\.\d+$/;

// ── JSON values ────────────────────────────────────────────────────
export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

export const UserValuesSchema = z.record(JsonValueSchema);

// ── Declarations ───────────────────────────────────────────────────
export const VariableDeclarationSchema = z.object({
  name: z.string().regex(IDENTIFIER, "must be an identifier"),
  kind: z.enum(VARIABLE_KINDS).default("string"),
  description: z.string().default(""),
  // Absent means no default; an explicit null is a default that encodes as `null`.
  default: JsonValueSchema.optional(),
  required: z.boolean().default(true),
  sensitive: z.boolean().default(false),
});

export const OutputDeclarationSchema = z.object({
  name: z.string().regex(IDENTIFIER, "must be an identifier"),
  description: z.string().default(""),
  valueExpression: z.string().default(""),
  sensitive: z.boolean().default(false),
});

export const ModuleExampleSchema = z.object({
  title: z.string().min(1),
  description: z.string().default(""),
  code: z.string().default(""),
});

// ── Module definition / record ─────────────────────────────────────
const ModuleDefinitionShape = z.object({
  name: z.string().regex(IDENTIFIER, "must be an identifier"),
  provider: z.enum(PROVIDERS),
  resourceType: z.string().min(1),
  version: z.string().regex(SEMVER, "must be MAJOR.MINOR.PATCH").default("1.0.0"),
  description: z.string().default(""),
  template: z.string(),
  variables: z.array(VariableDeclarationSchema).default([]),
  outputs: z.array(OutputDeclarationSchema).default([]),
  examples: z.array(ModuleExampleSchema).default([]),
  tags: z.array(z.string()).default([]),
});

function checkUniqueNames(
  def: { variables: Array<{ name: string }>; outputs: Array<{ name: string }> },
  ctx: z.RefinementCtx,
): void {
  for (const field of ["variables", "outputs"] as const) {
    const seen = new Set<string>();
    def[field].forEach((entry, index) => {
      if (seen.has(entry.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [field, index, "name"],
          message: `duplicate name "${entry.name}"`,
        });
      }
      seen.add(entry.name);
    });
  }
}

export const ModuleDefinitionSchema = ModuleDefinitionShape.superRefine(checkUniqueNames);

export const ModuleRecordSchema = ModuleDefinitionShape.extend({
  id: z.string().min(1),
  createdAt: z.string(),
  downloadCount: z.number().int().nonnegative(),
}).superRefine(checkUniqueNames);

export type ModuleDefinitionInput = z.input<typeof ModuleDefinitionSchema>;
export type ModuleDefinition = z.output<typeof ModuleDefinitionSchema>;

/** Flatten zod issues into "path: message" lines. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
}

/** Parse a module definition or throw ModuleDefinitionError. */
export function parseModuleDefinition(input: unknown): ModuleDefinition {
  const parsed = ModuleDefinitionSchema.safeParse(input);
  if (!parsed.success) {
    throw new ModuleDefinitionError(formatIssues(parsed.error));
  }
  return parsed.data;
}
