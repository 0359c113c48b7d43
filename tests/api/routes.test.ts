/**
 * Module Registry API — Tests
 *
 * Exercises the Express app in-process with supertest over an in-memory store.
 */

import { describe, it, expect, beforeEach } from "vitest";
import request from "supertest";
import type { Express } from "express";
import { createApp } from "../../src/api/server.js";
import type { ModuleRegistry } from "../../src/registry/registry.js";
import { createTestRegistry, webServerDefinition } from "../fixtures.js";

describe("registry API", () => {
  let registry: ModuleRegistry;
  let app: Express;

  beforeEach(async () => {
    registry = createTestRegistry();
    await registry.register(webServerDefinition());
    app = createApp(registry);
  });

  describe("GET /v1/modules", () => {
    it("lists module summaries", async () => {
      const res = await request(app).get("/v1/modules");
      expect(res.status).toBe(200);
      expect(res.body.count).toBe(1);
      expect(res.body.modules[0]).toEqual({
        id: "id-1",
        name: "web_server",
        provider: "aws",
        resourceType: "aws_instance",
        version: "1.0.0",
        description: "Single EC2 web server",
        tags: ["aws", "compute"],
        downloadCount: 0,
      });
    });

    it("filters by provider", async () => {
      const res = await request(app).get("/v1/modules").query({ provider: "gcp" });
      expect(res.body).toEqual({ count: 0, modules: [] });
    });
  });

  describe("GET /v1/modules/search", () => {
    it("searches case-insensitively", async () => {
      const res = await request(app).get("/v1/modules/search").query({ q: "EC2" });
      expect(res.status).toBe(200);
      expect(res.body.query).toBe("EC2");
      expect(res.body.modules.map((m: { name: string }) => m.name)).toEqual(["web_server"]);
    });

    it("requires a query", async () => {
      const res = await request(app).get("/v1/modules/search");
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: "Query parameter 'q' is required" });
    });
  });

  describe("GET /v1/modules/:module", () => {
    it("returns the full record", async () => {
      const res = await request(app).get("/v1/modules/web_server");
      expect(res.status).toBe(200);
      expect(res.body.template).toBe(webServerDefinition().template);
    });

    it("returns 404 for unknown modules", async () => {
      const res = await request(app).get("/v1/modules/ghost");
      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: "Module not found: 'ghost'" });
    });
  });

  describe("POST /v1/modules", () => {
    it("registers a module", async () => {
      const res = await request(app)
        .post("/v1/modules")
        .send(webServerDefinition({ name: "web_two" }));
      expect(res.status).toBe(201);
      expect(res.body.module.id).toBe("id-2");
      expect(res.body.warnings).toEqual([]);
    });

    it("returns 409 for a taken name", async () => {
      const res = await request(app).post("/v1/modules").send(webServerDefinition());
      expect(res.status).toBe(409);
      expect(res.body.error).toBe("Module already registered: 'web_server'");
    });

    it("returns 400 for an invalid definition", async () => {
      const res = await request(app)
        .post("/v1/modules")
        .send({ ...webServerDefinition(), name: "bad name" });
      expect(res.status).toBe(400);
      expect(res.body.issues).toEqual(["name: must be an identifier"]);
    });

    it("returns 422 with the validation result for an invalid template", async () => {
      const res = await request(app)
        .post("/v1/modules")
        .send(webServerDefinition({ name: "broken", template: 'resource "a" "b" { ] }', variables: [] }));
      expect(res.status).toBe(422);
      expect(res.body.validation.valid).toBe(false);
      expect(res.body.validation.errors).toHaveLength(1);
    });
  });

  describe("POST /v1/modules/:module/generate", () => {
    it("renders with the posted values", async () => {
      const res = await request(app)
        .post("/v1/modules/web_server/generate")
        .send({ values: { name: "web" } });
      expect(res.status).toBe(200);
      expect(res.body.module).toBe("web_server");
      expect(res.body.rendered.split("\n")[0]).toBe('resource "aws_instance" "web" {');
    });

    it("returns 422 for render errors", async () => {
      const res = await request(app).post("/v1/modules/web_server/generate").send({});
      expect(res.status).toBe(422);
      expect(res.body).toEqual({
        error: "Missing required variables: name",
        kind: "MissingRequiredVariable",
        variable: "name",
      });
    });

    it("returns 400 when values is not an object", async () => {
      const res = await request(app).post("/v1/modules/web_server/generate").send({ values: "web" });
      expect(res.status).toBe(400);
      expect(res.body.error).toBe("Invalid request");
    });
  });

  describe("plan and docs", () => {
    it("returns the plan as text", async () => {
      const res = await request(app)
        .post("/v1/modules/web_server/plan")
        .send({ values: { name: "web" } });
      expect(res.status).toBe(200);
      expect(res.headers["content-type"]).toMatch(/^text\/plain/);
      expect(res.text.split("\n")).toContain("Plan: 1 to add, 0 to change, 0 to destroy.");
    });

    it("returns docs as markdown", async () => {
      const res = await request(app).get("/v1/modules/web_server/docs");
      expect(res.status).toBe(200);
      expect(res.headers["content-type"]).toMatch(/^text\/markdown/);
      expect(res.text.split("\n")[0]).toBe("# web_server");
    });
  });

  describe("POST /v1/validate", () => {
    it("returns the validation result", async () => {
      const res = await request(app).post("/v1/validate").send({ template: "" });
      expect(res.status).toBe(200);
      expect(res.body.valid).toBe(false);
      expect(res.body.errors).toEqual(["Template is empty"]);
    });

    it("requires a template string", async () => {
      const res = await request(app).post("/v1/validate").send({});
      expect(res.status).toBe(400);
      expect(res.body.issues).toEqual(["template: Required"]);
    });
  });

  describe("DELETE /v1/modules/:module and GET /v1/stats", () => {
    it("deletes then reports 404", async () => {
      expect((await request(app).delete("/v1/modules/web_server")).status).toBe(204);
      expect((await request(app).delete("/v1/modules/web_server")).status).toBe(404);
    });

    it("returns stats", async () => {
      await request(app).post("/v1/modules/web_server/generate").send({ values: { name: "web" } });
      const res = await request(app).get("/v1/stats");
      expect(res.body).toEqual({
        totalModules: 1,
        byProvider: [{ provider: "aws", count: 1 }],
        mostDownloaded: [{ name: "web_server", provider: "aws", downloads: 1 }],
      });
    });
  });

  it("returns 404 JSON for unknown routes", async () => {
    const res = await request(app).get("/v2/nothing");
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "Not found" });
  });
});
