/**
 * ModuleRegistry — Unit Tests
 *
 * Tests:
 *   - register() validation (definition + template) and duplicates
 *   - get() by id and name
 *   - generate() usage counting
 *   - list/search/delete/stats
 *   - bumpVersion() and seedBuiltins()
 */

import { describe, it, expect, beforeEach } from "vitest";
import { bumpSemver, ModuleRegistry } from "../../src/registry/registry.js";
import {
  DuplicateModuleError,
  InvalidTemplateError,
  MissingRequiredVariableError,
  ModuleDefinitionError,
  ModuleNotFoundError,
} from "../../src/shared/errors.js";
import { createTestRegistry, webServerDefinition, WEB_TEMPLATE } from "../fixtures.js";

describe("ModuleRegistry", () => {
  let registry: ModuleRegistry;

  beforeEach(() => {
    registry = createTestRegistry();
  });

  describe("register", () => {
    it("fills in defaults and metadata", async () => {
      const record = await registry.register(webServerDefinition());

      expect(record.id).toBe("id-1");
      expect(record.version).toBe("1.0.0");
      expect(record.createdAt).toBe("2026-01-02T03:04:05.000Z");
      expect(record.downloadCount).toBe(0);
      expect(record.examples).toEqual([]);
      expect(record.variables[0]).toEqual({
        name: "name",
        kind: "string",
        description: "Instance name",
        required: true,
        sensitive: false,
      });
      expect(record.outputs[0].sensitive).toBe(false);
    });

    it("rejects a second module with the same name", async () => {
      await registry.register(webServerDefinition());
      await expect(registry.register(webServerDefinition())).rejects.toThrow(DuplicateModuleError);
      await expect(registry.register(webServerDefinition())).rejects.toThrow(
        "Module already registered: 'web_server'",
      );
    });

    it("rejects templates with validation errors", async () => {
      const error = await registry
        .register(webServerDefinition({ template: 'resource "a" {' }))
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(InvalidTemplateError);
      if (error instanceof InvalidTemplateError) {
        expect(error.result.valid).toBe(false);
        expect(error.result.findings.map((f) => f.code)).toEqual(["InvalidResourceLabels", "UnbalancedDelimiter"]);
      }
      expect(await registry.list()).toEqual([]);
    });

    it("accepts templates that only raise warnings", async () => {
      const record = await registry.register(
        webServerDefinition({ name: "outputs_only", template: 'output "x" {\n  value = 1\n}\n', variables: [] }),
      );
      expect(record.name).toBe("outputs_only");
    });

    it("reports every field problem", async () => {
      const error = await registry
        .register({ ...webServerDefinition(), provider: "ibm", version: "1.0" })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ModuleDefinitionError);
      if (error instanceof ModuleDefinitionError) {
        expect(error.issues).toHaveLength(2);
        expect(error.issues[0].startsWith("provider: ")).toBe(true);
        expect(error.issues[1]).toBe("version: must be MAJOR.MINOR.PATCH");
      }
    });

    it("rejects duplicate variable names", async () => {
      const error = await registry
        .register(webServerDefinition({ variables: [{ name: "a" }, { name: "a" }] }))
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ModuleDefinitionError);
      if (error instanceof ModuleDefinitionError) {
        expect(error.issues).toEqual(['variables.1.name: duplicate name "a"']);
      }
    });

    it("rejects variable names that are not identifiers", async () => {
      await expect(
        registry.register(webServerDefinition({ variables: [{ name: "1st" }] })),
      ).rejects.toThrow("variables.0.name: must be an identifier");
    });
  });

  describe("get", () => {
    it("finds modules by id or name", async () => {
      const record = await registry.register(webServerDefinition());
      expect((await registry.get("web_server")).id).toBe(record.id);
      expect((await registry.get(record.id)).name).toBe("web_server");
    });

    it("throws ModuleNotFoundError for unknown keys", async () => {
      await expect(registry.get("nope")).rejects.toThrow(ModuleNotFoundError);
      await expect(registry.get("nope")).rejects.toThrow("Module not found: 'nope'");
    });

    it("hands out copies", async () => {
      const record = await registry.register(webServerDefinition());
      record.tags.push("mutated");
      expect((await registry.get("web_server")).tags).toEqual(["aws", "compute"]);
    });
  });

  describe("generate", () => {
    it("renders and counts one download per success", async () => {
      await registry.register(webServerDefinition());

      const { module, rendered } = await registry.generate("web_server", { name: "web" });

      expect(rendered).toBe(WEB_TEMPLATE.replace("${var.name}", "web").replace("${var.ami}", "ami-123").replace("${var.instance_type}", "t3.micro"));
      expect(module.downloadCount).toBe(1);
      expect((await registry.get("web_server")).downloadCount).toBe(1);

      await registry.generate("web_server", { name: "api" });
      expect((await registry.get("web_server")).downloadCount).toBe(2);
    });

    it("keeps an explicit null default and renders it as null", async () => {
      const record = await registry.register(
        webServerDefinition({
          template: 'resource "aws_instance" "web" {\n  ami = ${var.ami}\n}\n',
          variables: [{ name: "ami", default: null }],
        }),
      );
      expect(record.variables[0]).toHaveProperty("default", null);

      const { rendered } = await registry.generate("web_server", {});
      expect(rendered).toBe('resource "aws_instance" "web" {\n  ami = null\n}\n');
    });

    it("does not count failed renders", async () => {
      await registry.register(webServerDefinition());
      await expect(registry.generate("web_server", {})).rejects.toThrow(MissingRequiredVariableError);
      expect((await registry.get("web_server")).downloadCount).toBe(0);
    });
  });

  describe("list, search and delete", () => {
    beforeEach(async () => {
      await registry.register(webServerDefinition());
      await registry.register(
        webServerDefinition({
          name: "bucket",
          provider: "gcp",
          resourceType: "google_storage_bucket",
          description: "Object storage",
          template: 'resource "google_storage_bucket" "b" {}',
          variables: [],
          outputs: [],
          tags: ["Storage"],
        }),
      );
    });

    it("filters by provider and resource type", async () => {
      expect((await registry.list({ provider: "gcp" })).map((m) => m.name)).toEqual(["bucket"]);
      expect((await registry.list({ resourceType: "aws_instance" })).map((m) => m.name)).toEqual(["web_server"]);
      expect(await registry.list({ provider: "azure" })).toEqual([]);
    });

    it("orders by downloads, then name", async () => {
      expect((await registry.list()).map((m) => m.name)).toEqual(["bucket", "web_server"]);
      await registry.generate("web_server", { name: "web" });
      expect((await registry.list()).map((m) => m.name)).toEqual(["web_server", "bucket"]);
    });

    it("searches case-insensitively across fields and tags", async () => {
      expect((await registry.search("storage")).map((m) => m.name)).toEqual(["bucket"]);
      expect((await registry.search("AWS_INST")).map((m) => m.name)).toEqual(["web_server"]);
      expect(await registry.search("nothing-like-this")).toEqual([]);
    });

    it("deletes by name or id", async () => {
      expect(await registry.delete("bucket")).toBe(true);
      expect(await registry.delete("bucket")).toBe(false);
      expect(await registry.delete("id-1")).toBe(true);
      expect(await registry.list()).toEqual([]);
    });
  });

  describe("stats", () => {
    it("summarises providers and downloads", async () => {
      await registry.register(webServerDefinition());
      await registry.register(webServerDefinition({ name: "web_b" }));
      await registry.register(
        webServerDefinition({ name: "bucket", provider: "gcp", template: 'resource "x" "y" {}', variables: [] }),
      );
      await registry.generate("web_b", { name: "b" });
      await registry.generate("web_b", { name: "b" });
      await registry.generate("bucket");

      expect(await registry.stats()).toEqual({
        totalModules: 3,
        byProvider: [
          { provider: "aws", count: 2 },
          { provider: "gcp", count: 1 },
        ],
        mostDownloaded: [
          { name: "web_b", provider: "aws", downloads: 2 },
          { name: "bucket", provider: "gcp", downloads: 1 },
          { name: "web_server", provider: "aws", downloads: 0 },
        ],
      });
    });

    it("reports an empty registry", async () => {
      expect(await registry.stats()).toEqual({ totalModules: 0, byProvider: [], mostDownloaded: [] });
    });
  });

  describe("bumpVersion", () => {
    it("persists the bumped version", async () => {
      await registry.register(webServerDefinition({ version: "1.2.3" }));
      expect((await registry.bumpVersion("web_server", "minor")).version).toBe("1.3.0");
      expect((await registry.get("web_server")).version).toBe("1.3.0");
      expect((await registry.bumpVersion("web_server")).version).toBe("1.3.1");
    });

    it("throws for unknown modules", async () => {
      await expect(registry.bumpVersion("ghost", "major")).rejects.toThrow(ModuleNotFoundError);
    });
  });

  describe("seedBuiltins", () => {
    it("registers the catalog into an empty store only", async () => {
      const added = await registry.seedBuiltins();
      expect(added).toHaveLength(9);
      expect((await registry.stats()).totalModules).toBe(9);
      expect(await registry.seedBuiltins()).toEqual([]);
    });

    it("leaves a populated store alone", async () => {
      await registry.register(webServerDefinition());
      expect(await registry.seedBuiltins()).toEqual([]);
      expect((await registry.list()).map((m) => m.name)).toEqual(["web_server"]);
    });
  });

  describe("exportPlan and docs", () => {
    it("renders a plan and counts the download", async () => {
      await registry.register(webServerDefinition());
      const plan = await registry.exportPlan("web_server", { name: "web" });

      expect(plan.split("\n")).toContain('  + resource "aws_instance" "web" {');
      expect(plan.split("\n")).toContain("Plan: 1 to add, 0 to change, 0 to destroy.");
      expect(plan.split("\n")).toContain("# Generated: 2026-01-02T03:04:05Z");
      expect((await registry.get("web_server")).downloadCount).toBe(1);
    });

    it("formats docs for a module", async () => {
      await registry.register(webServerDefinition());
      const docs = await registry.docs("web_server");
      expect(docs.split("\n")[0]).toBe("# web_server");
    });
  });
});

describe("bumpSemver", () => {
  it("bumps one part and zeroes the lower ones", () => {
    expect(bumpSemver("1.2.3", "major")).toBe("2.0.0");
    expect(bumpSemver("1.2.3", "minor")).toBe("1.3.0");
    expect(bumpSemver("1.2.3", "patch")).toBe("1.2.4");
  });
});
