import { serve } from "@hono/node-server";
import pg from "pg";
import { createApp } from "./api/app.js";
import type { HealthRouteDeps } from "./api/routes/health.js";
import type { UnitOfWork } from "./compute/compute-backend.js";
import { drizzleUnitOfWork } from "./compute/drizzle-compute-backend.js";
import { OpenStackClient } from "./compute/openstack-client.js";
import { openStackUnitOfWork } from "./compute/openstack-compute-backend.js";
import type { Config } from "./config/index.js";
import { logger } from "./config/logger.js";
import { createDb, pingDb } from "./db/index.js";
import { runMigrations } from "./db/migrate.js";
import { seedCatalog } from "./db/seed.js";

export interface Runtime {
  uow: UnitOfWork;
  checks: HealthRouteDeps["checks"];
  /** Release pools and clients. */
  close: () => Promise<void>;
}

/** Wire the configured compute backend and everything it needs. */
export async function createRuntime(cfg: Config): Promise<Runtime> {
  if (cfg.compute.backend === "openstack") {
    const client = new OpenStackClient(cfg.compute.openstack);
    logger.info("Using OpenStack compute backend", {
      authUrl: cfg.compute.openstack.authUrl,
      region: cfg.compute.openstack.region,
    });
    return {
      uow: openStackUnitOfWork(client),
      checks: { compute: () => client.authenticate() },
      close: async () => {},
    };
  }

  const pool = new pg.Pool({ connectionString: cfg.databaseUrl });
  const db = createDb(pool);
  const applied = await runMigrations(db);
  if (applied.length > 0) logger.info("Migrations applied", { migrations: applied });
  await seedCatalog(db);
  logger.info("Using database-backed mock compute backend");
  return {
    uow: drizzleUnitOfWork(db),
    checks: { database: () => pingDb(db) },
    close: () => pool.end(),
  };
}

// Handle unhandled promise rejections (async errors that weren't caught)
export const unhandledRejectionHandler = (reason: unknown, promise: Promise<unknown>) => {
  logger.error("Unhandled promise rejection", {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
    promise: String(promise),
  });
};

// Handle uncaught exceptions (synchronous errors that weren't caught)
export const uncaughtExceptionHandler = (err: Error, origin: string) => {
  logger.error("Uncaught exception", {
    error: err.message,
    stack: err.stack,
    origin,
  });
  // Uncaught exceptions leave the process in an undefined state.
  // Exit immediately after logging (Winston Console transport is synchronous).
  process.exit(1);
};

export interface ClosableServer {
  close(callback: (err?: Error) => void): unknown;
}

/**
 * Build the SIGINT/SIGTERM handler: stop accepting connections, then release
 * resources, then exit. A second signal while draining is ignored.
 */
export function createShutdownHandler(
  server: ClosableServer,
  closeResources: () => Promise<void>,
  exit: (code: number) => void = (code) => process.exit(code),
): (signal: string) => Promise<void> {
  let shuttingDown = false;
  return async (signal) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down", { signal });
    try {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
      await closeResources();
      logger.info("Shutdown complete");
      exit(0);
    } catch (err) {
      logger.error("Shutdown failed", { error: err instanceof Error ? err.message : String(err) });
      exit(1);
    }
  };
}

export async function startServer(cfg: Config): Promise<void> {
  process.on("unhandledRejection", unhandledRejectionHandler);
  process.on("uncaughtException", uncaughtExceptionHandler);

  const runtime = await createRuntime(cfg);
  const app = createApp({
    uow: runtime.uow,
    health: { version: cfg.appVersion, env: cfg.nodeEnv, checks: runtime.checks },
  });

  const server = serve({ fetch: app.fetch, port: cfg.port }, () => {
    logger.info(`${cfg.appName} listening on http://0.0.0.0:${cfg.port}`);
  });

  const shutdown = createShutdownHandler(server, runtime.close);
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      void shutdown(signal);
    });
  }
}
