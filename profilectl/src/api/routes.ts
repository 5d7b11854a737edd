/**
 * Read API over the dependency resolver.
 *
 * Endpoints:
 * - GET /dependencies/:slicer/:type/<path> - ancestors of a config, root first
 * - GET /resolved/:slicer/:type/<path> - fully merged config
 */

import { Router, type NextFunction, type Request, type Response } from "express";
import type { DependencyResolver } from "../resolver/resolver.js";
import { validateResolved } from "../resolver/validate.js";
import type { SchemaRegistry } from "../schema/registry.js";

export type ApiDeps = {
  resolver: DependencyResolver;
  registry: SchemaRegistry;
};

// ============================================================================
// Query helpers
// ============================================================================

function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === "string" ? value : undefined;
}

function queryFlag(req: Request, name: string): boolean {
  const value = queryString(req, name);
  return value === "true" || value === "1";
}

/** Non-negative integer or undefined; anything else is null. */
function queryDepth(req: Request): number | undefined | null {
  const value = queryString(req, "depth");
  if (value === undefined) return undefined;
  return /^\d+$/.test(value) ? Number(value) : null;
}

function badRequest(res: Response, message: string): void {
  res.status(400).json({ error: { kind: "BadRequest", message } });
}

type Target = { slicer: string; type: string; path: string };

function target(req: Request): Target {
  return { slicer: req.params.slicer, type: req.params.type, path: req.params[0] };
}

// ============================================================================
// Router
// ============================================================================

export function createApiRouter(deps: ApiDeps): Router {
  const router = Router();

  router.get("/dependencies/:slicer/:type/*", (req: Request, res: Response) => {
    const depth = queryDepth(req);
    if (depth === null) {
      badRequest(res, "depth must be a non-negative integer");
      return;
    }
    const format = queryString(req, "format") ?? "list";
    if (format !== "list" && format !== "tree") {
      badRequest(res, `Unknown format: ${format}`);
      return;
    }
    const t = target(req);
    // thrown resolution errors reach the error handler
    const report = deps.resolver.dependencies(t.slicer, t.type, t.path, {
      depth,
      tree: format === "tree",
      includeMetadata: queryFlag(req, "include_metadata"),
    });
    res.json(report);
  });

  router.get("/resolved/:slicer/:type/*", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const t = target(req);
      const result = deps.resolver.resolvePath(t.slicer, t.type, t.path);
      const body: Record<string, unknown> = {
        resolved_config: result.resolved_config,
        inheritance_chain: result.inheritance_chain,
        instantiable: result.instantiable,
      };
      if (queryFlag(req, "include_source_map")) body.source_map = result.source_map;
      if (queryFlag(req, "validate")) body.validation_errors = await validateResolved(deps.registry, result);
      res.json(body);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
