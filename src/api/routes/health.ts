import { Hono } from "hono";
import { logger } from "../../config/logger.js";

/** A dependency probe: resolves when healthy, rejects otherwise. */
export type HealthCheck = () => Promise<void>;

export interface HealthRouteDeps {
  version: string;
  env: string;
  checks: Record<string, HealthCheck>;
  /** Process start, epoch ms. Defaults to module load time. */
  startedAt?: number;
  now?: () => number;
}

type CheckStatus = "ok" | "error";

const MODULE_LOADED_AT = Date.now();

// Public, unauthenticated, used by load balancers and monitoring.
export function createHealthRoutes(deps: HealthRouteDeps): Hono {
  const routes = new Hono();
  const startedAt = deps.startedAt ?? MODULE_LOADED_AT;
  const now = deps.now ?? Date.now;

  routes.get("/", async (c) => {
    const checks: Record<string, { status: CheckStatus }> = {};
    await Promise.all(
      Object.entries(deps.checks).map(async ([name, check]) => {
        try {
          await check();
          checks[name] = { status: "ok" };
        } catch (err) {
          logger.error("Health check failed", {
            check: name,
            error: err instanceof Error ? err.message : String(err),
          });
          checks[name] = { status: "error" };
        }
      }),
    );

    const healthy = Object.values(checks).every((check) => check.status === "ok");
    return c.json(
      {
        status: healthy ? "healthy" : "unhealthy",
        version: deps.version,
        env: deps.env,
        uptime_s: Math.floor((now() - startedAt) / 1000),
        checks,
      },
      healthy ? 200 : 503,
    );
  });

  return routes;
}
