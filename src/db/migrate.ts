import { readdirSync, readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { sql } from "drizzle-orm";
import type { DrizzleDb } from "./index.js";
import { schemaMigrations } from "./schema/index.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * <root>/migrations, resolved from either <root>/src/db (dev, tests) or
 * <root>/dist/db (compiled), which sit at the same depth.
 */
export const DEFAULT_MIGRATIONS_FOLDER = path.resolve(__dirname, "../../migrations");

/** drizzle-kit's marker between statements; one file may hold several. */
const STATEMENT_BREAKPOINT = "--> statement-breakpoint";

/** Split a migration file into executable statements. */
export function splitStatements(source: string): string[] {
  return source
    .split(STATEMENT_BREAKPOINT)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Apply every pending migrations/*.sql file, in file-name order.
 *
 * Each file runs in its own transaction together with its schema_migrations
 * row, so a failed file leaves no partial schema behind and is retried on the
 * next boot. Returns the names of the files applied by this call.
 */
export async function runMigrations(db: DrizzleDb, migrationsFolder = DEFAULT_MIGRATIONS_FOLDER): Promise<string[]> {
  await db.execute(
    sql`CREATE TABLE IF NOT EXISTS "schema_migrations" ("name" text PRIMARY KEY NOT NULL, "applied_at" bigint NOT NULL)`,
  );

  const rows = await db.select({ name: schemaMigrations.name }).from(schemaMigrations);
  const done = new Set(rows.map((r) => r.name));

  const pending = readdirSync(migrationsFolder)
    .filter((f) => f.endsWith(".sql") && !done.has(f))
    .sort();

  for (const file of pending) {
    const statements = splitStatements(readFileSync(path.join(migrationsFolder, file), "utf8"));
    await db.transaction(async (tx) => {
      for (const statement of statements) {
        await tx.execute(sql.raw(statement));
      }
      await tx.insert(schemaMigrations).values({ name: file, appliedAt: Date.now() });
    });
  }

  return pending;
}
