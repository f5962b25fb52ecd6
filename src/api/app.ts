import { Hono } from "hono";
import type { ErrorHandler, NotFoundHandler } from "hono";
import { type RequestIdVariables, requestId } from "hono/request-id";
import { secureHeaders } from "hono/secure-headers";
import type { UnitOfWork } from "../compute/compute-backend.js";
import { ComputeError } from "../compute/errors.js";
import { logger } from "../config/logger.js";
import { createFlavorRoutes } from "./routes/flavors.js";
import { createHealthRoutes, type HealthRouteDeps } from "./routes/health.js";
import { createImageRoutes } from "./routes/images.js";
import { createServerRoutes } from "./routes/servers.js";

export type AppEnv = { Variables: RequestIdVariables };

export interface AppDeps {
  uow: UnitOfWork;
  health: HealthRouteDeps;
}

// Global error handler: domain errors map to their status, everything else
// is a 500 whose details stay in the log.
export const errorHandler: ErrorHandler<AppEnv> = (err, c) => {
  if (err instanceof ComputeError) {
    logger.warn("Request rejected", {
      code: err.code,
      error: err.message,
      path: c.req.path,
      method: c.req.method,
      requestId: c.get("requestId"),
    });
    return c.json({ error: { code: err.code, message: err.message, details: err.details } }, err.status);
  }

  logger.error("Unhandled error in request", {
    error: err.message,
    stack: err.stack,
    path: c.req.path,
    method: c.req.method,
    requestId: c.get("requestId"),
  });
  return c.json({ error: { code: "INTERNAL_ERROR", message: "An unexpected error occurred", details: null } }, 500);
};

export const notFoundHandler: NotFoundHandler<AppEnv> = (c) =>
  c.json({ error: { code: "NOT_FOUND", message: `Route ${c.req.method} ${c.req.path} not found`, details: null } }, 404);

export function createApp(deps: AppDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.use("*", requestId());
  app.use("*", secureHeaders());

  app.route("/health", createHealthRoutes(deps.health));
  app.route("/api/v1/servers", createServerRoutes(deps.uow));
  app.route("/api/v1/flavors", createFlavorRoutes(deps.uow));
  app.route("/api/v1/images", createImageRoutes(deps.uow));

  app.notFound(notFoundHandler);
  app.onError(errorHandler);
  return app;
}
