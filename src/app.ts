import cors from "cors";
import express from "express";
import type { EnvironmentLifecycleManager } from "./environments/lifecycle.js";
import { renderPrometheusMetrics } from "./observability/metrics.js";
import { attachRequestContext, logRequestLifecycle, logUnhandledError } from "./observability/requestContext.js";
import { createEnvironmentRouter } from "./routes/environmentRoutes.js";

export interface AppDeps {
  manager: EnvironmentLifecycleManager;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json());
  app.use(attachRequestContext);
  app.use(logRequestLifecycle);

  app.get("/health", (_req, res) => {
    res.json({ ok: true, service: "envplane" });
  });

  app.get("/metrics", (_req, res) => {
    res.type("text/plain; version=0.0.4").send(renderPrometheusMetrics());
  });

  app.use(createEnvironmentRouter(deps.manager));

  app.use(logUnhandledError);
  return app;
}
