import { nanoid } from "nanoid";
import type { NextFunction, Request, Response } from "express";
import { PlatformError } from "../errors.js";
import { errorMessage, type LogContext, logError, logInfo } from "./logger.js";
import { recordHttpRequest } from "./metrics.js";

export type RequestContext = LogContext & { request_id: string };

function nonBlank(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function fieldOf(source: unknown, key: string): string | undefined {
  return typeof source === "object" && source !== null ? nonBlank(Reflect.get(source, key)) : undefined;
}

/** First non-blank candidate wins; headers are listed before request fields. */
function firstOf(...candidates: Array<string | undefined>): string | undefined {
  return candidates.find((candidate) => candidate !== undefined);
}

export function resolveRequestContext(req: Request): RequestContext {
  const context: RequestContext = { request_id: nonBlank(req.header("x-request-id")) ?? nanoid(10) };

  const environmentId = firstOf(
    nonBlank(req.header("x-environment-id")),
    fieldOf(req.params, "id"),
    fieldOf(req.query, "environmentId")
  );
  if (environmentId) context.environment_id = environmentId;

  const tenantId = firstOf(nonBlank(req.header("x-tenant-id")), fieldOf(req.body, "ownerId"));
  if (tenantId) context.tenant_id = tenantId;

  return context;
}

export function attachRequestContext(req: Request, res: Response, next: NextFunction): void {
  const context = resolveRequestContext(req);
  req.context = context;
  res.setHeader("x-request-id", context.request_id);
  next();
}

/** Route template for metrics labels, so ids in paths do not create new series. */
function routeTemplate(req: Request): string {
  const matched: unknown = req.route?.path;
  return typeof matched === "string" ? `${req.baseUrl}${matched}` : "unmatched";
}

export function logRequestLifecycle(req: Request, res: Response, next: NextFunction): void {
  const started = process.hrtime.bigint();

  res.on("finish", () => {
    const durationMs = Number(process.hrtime.bigint() - started) / 1_000_000;
    recordHttpRequest({ method: req.method, endpoint: routeTemplate(req), statusCode: res.statusCode, durationMs });

    const log = res.statusCode >= 500 ? logError : logInfo;
    log("http request completed", {
      context: req.context,
      data: { method: req.method, path: req.path, status_code: res.statusCode, duration_ms: Math.round(durationMs) }
    });
  });

  next();
}

/** Error middleware: platform errors answer with their own status, anything else is logged and answers 500. */
export function logUnhandledError(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof PlatformError) {
    res.status(err.httpStatus).json(err.toJSON());
    return;
  }
  logError("http request failed", {
    context: req.context,
    data: { method: req.method, path: req.path, error: errorMessage(err) }
  });
  res.status(500).json({ error: "Internal server error" });
}
