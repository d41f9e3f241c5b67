import { Router } from "express";
import type { EnvironmentLifecycleManager } from "../environments/lifecycle.js";
import { ENVIRONMENT_STATUSES, type EnvironmentFilter, type EnvironmentStatus } from "../environments/types.js";
import { ValidationError } from "../errors.js";

function queryString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

function isEnvironmentStatus(value: string): value is EnvironmentStatus {
  return ENVIRONMENT_STATUSES.some((status) => status === value);
}

function parseFilter(query: Record<string, unknown>): EnvironmentFilter {
  const ownerId = queryString(query.ownerId);
  const status = queryString(query.status)?.toUpperCase();
  if (status !== undefined && !isEnvironmentStatus(status)) {
    throw new ValidationError(`Unknown status filter: ${status}`, [`status: must be one of ${ENVIRONMENT_STATUSES.join(", ")}`]);
  }
  return { ownerId, status };
}

export function createEnvironmentRouter(manager: EnvironmentLifecycleManager): Router {
  const router = Router();

  // Request context is resolved before routing, so the path id is attached here.
  router.param("id", (req, _res, next, id: string) => {
    if (req.context && !req.context.environment_id) req.context.environment_id = id;
    next();
  });

  router.get("/api/v1/environments", async (req, res, next) => {
    try {
      const environments = await manager.listEnvironments(parseFilter(req.query));
      res.json({ environments });
    } catch (error) {
      next(error);
    }
  });

  router.post("/api/v1/environments", async (req, res, next) => {
    try {
      res.status(201).json(await manager.createEnvironment(req.body));
    } catch (error) {
      next(error);
    }
  });

  router.get("/api/v1/environments/:id", async (req, res, next) => {
    try {
      res.json(await manager.getEnvironment(req.params.id));
    } catch (error) {
      next(error);
    }
  });

  router.patch("/api/v1/environments/:id", async (req, res, next) => {
    try {
      res.json(await manager.updateEnvironment(req.params.id, req.body));
    } catch (error) {
      next(error);
    }
  });

  router.delete("/api/v1/environments/:id", async (req, res, next) => {
    try {
      await manager.deleteEnvironment(req.params.id);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  router.get("/api/v1/environments/:id/status", async (req, res, next) => {
    try {
      res.json(await manager.getEnvironmentStatus(req.params.id));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
