/**
 * Module Registry API Routes
 *
 * Express Router exposing registry lookups, rendering, plans, docs and
 * static validation. Errors map to status codes in `sendError`.
 */

import { Router, type Response } from "express";
import { z } from "zod";
import { formatIssues, UserValuesSchema } from "../registry/schemas.js";
import type { ModuleRegistry } from "../registry/registry.js";
import type { ModuleRecord } from "../registry/types.js";
import {
  DuplicateModuleError,
  errorMessage,
  InvalidTemplateError,
  ModuleDefinitionError,
  ModuleNotFoundError,
  RenderError,
} from "../shared/errors.js";

const RenderRequestSchema = z.object({
  values: UserValuesSchema.default({}),
});

const ValidateRequestSchema = z.object({
  template: z.string(),
});

export function createRegistryRouter(registry: ModuleRegistry): Router {
  const router = Router();

  // ── GET /v1/modules ─────────────────────────────────────────────────
  router.get("/v1/modules", async (req, res) => {
    try {
      const modules = await registry.list({
        provider: queryString(req.query.provider),
        resourceType: queryString(req.query.resource),
      });
      res.json({ count: modules.length, modules: modules.map(summarize) });
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── GET /v1/modules/search?q= ───────────────────────────────────────
  router.get("/v1/modules/search", async (req, res) => {
    try {
      const query = queryString(req.query.q)?.trim();
      if (!query) return res.status(400).json({ error: "Query parameter 'q' is required" });
      const modules = await registry.search(query);
      res.json({ query, count: modules.length, modules: modules.map(summarize) });
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── GET /v1/modules/:module ─────────────────────────────────────────
  router.get("/v1/modules/:module", async (req, res) => {
    try {
      res.json(await registry.get(req.params.module));
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── POST /v1/modules ────────────────────────────────────────────────
  router.post("/v1/modules", async (req, res) => {
    try {
      const record = await registry.register(req.body);
      res.status(201).json({ module: record, warnings: registry.validateTemplate(record.template).warnings });
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── DELETE /v1/modules/:module ──────────────────────────────────────
  router.delete("/v1/modules/:module", async (req, res) => {
    try {
      const deleted = await registry.delete(req.params.module);
      if (!deleted) throw new ModuleNotFoundError(req.params.module);
      res.status(204).end();
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── POST /v1/modules/:module/generate ───────────────────────────────
  router.post("/v1/modules/:module/generate", async (req, res) => {
    try {
      const body = RenderRequestSchema.safeParse(req.body ?? {});
      if (!body.success) return res.status(400).json({ error: "Invalid request", issues: formatIssues(body.error) });

      const { module, rendered } = await registry.generate(req.params.module, body.data.values);
      res.json({ module: module.name, version: module.version, rendered });
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── POST /v1/modules/:module/plan ───────────────────────────────────
  router.post("/v1/modules/:module/plan", async (req, res) => {
    try {
      const body = RenderRequestSchema.safeParse(req.body ?? {});
      if (!body.success) return res.status(400).json({ error: "Invalid request", issues: formatIssues(body.error) });

      const plan = await registry.exportPlan(req.params.module, body.data.values);
      res.type("text/plain").send(plan);
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── GET /v1/modules/:module/docs ────────────────────────────────────
  router.get("/v1/modules/:module/docs", async (req, res) => {
    try {
      const markdown = await registry.docs(req.params.module);
      res.type("text/markdown").send(markdown);
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── POST /v1/validate ───────────────────────────────────────────────
  router.post("/v1/validate", (req, res) => {
    const body = ValidateRequestSchema.safeParse(req.body);
    if (!body.success) return res.status(400).json({ error: "Invalid request", issues: formatIssues(body.error) });
    res.json(registry.validateTemplate(body.data.template));
  });

  // ── GET /v1/stats ───────────────────────────────────────────────────
  router.get("/v1/stats", async (_req, res) => {
    try {
      res.json(await registry.stats());
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}

function summarize(m: ModuleRecord) {
  return {
    id: m.id,
    name: m.name,
    provider: m.provider,
    resourceType: m.resourceType,
    version: m.version,
    description: m.description,
    tags: m.tags,
    downloadCount: m.downloadCount,
  };
}

function queryString(value: unknown): string | undefined {
  return typeof value === "string" && value !== "" ? value : undefined;
}

export function sendError(res: Response, err: unknown): void {
  if (err instanceof ModuleNotFoundError) {
    res.status(404).json({ error: err.message });
  } else if (err instanceof DuplicateModuleError) {
    res.status(409).json({ error: err.message });
  } else if (err instanceof ModuleDefinitionError) {
    res.status(400).json({ error: err.message, issues: err.issues });
  } else if (err instanceof InvalidTemplateError) {
    res.status(422).json({ error: err.message, validation: err.result });
  } else if (err instanceof RenderError) {
    res.status(422).json({ error: err.message, kind: err.kind, variable: err.variableName });
  } else {
    console.error(`[api] ${errorMessage(err)}`);
    res.status(500).json({ error: errorMessage(err) });
  }
}
