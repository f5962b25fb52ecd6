import { PGlite } from "@electric-sql/pglite";
import { drizzle } from "drizzle-orm/pglite";
import type { DrizzleDb } from "../db/index.js";
import { runMigrations } from "../db/migrate.js";
import * as schema from "../db/schema/index.js";
import { flavors } from "../db/schema/flavors.js";
import { images } from "../db/schema/images.js";

// Migrate once per worker process, then snapshot. Each test restores from snapshot
// instead of re-running all migrations.
let migratedSnapshot: Blob | null = null;

async function getSnapshot(): Promise<Blob> {
  if (migratedSnapshot) return migratedSnapshot;
  const pool = new PGlite();
  await runMigrations(drizzle(pool, { schema }) as unknown as DrizzleDb);
  migratedSnapshot = await pool.dumpDataDir("auto");
  await pool.close();
  return migratedSnapshot;
}

export async function createTestDb(): Promise<{ db: DrizzleDb; pool: PGlite }> {
  const snapshot = await getSnapshot();
  const pool = new PGlite({ loadDataDir: snapshot });
  const db = drizzle(pool, { schema }) as unknown as DrizzleDb;
  return { db, pool };
}

/** Empty every table except the migration ledger. */
export async function truncateAllTables(pool: PGlite): Promise<void> {
  const result = await pool.query<{ tablename: string }>(
    `SELECT tablename FROM pg_tables WHERE schemaname = 'public' AND tablename <> 'schema_migrations'`,
  );
  const tables = result.rows.map((r) => `"${r.tablename}"`).join(", ");
  if (tables) {
    await pool.query(`TRUNCATE ${tables} RESTART IDENTITY CASCADE`);
  }
}

export interface SeedFlavorOptions {
  id: string;
  name?: string;
  vcpus?: number;
  ramMb?: number;
  diskGb?: number;
}

export async function seedFlavor(db: DrizzleDb, opts: SeedFlavorOptions): Promise<void> {
  await db.insert(flavors).values({
    id: opts.id,
    name: opts.name ?? `flavor-${opts.id}`,
    vcpus: opts.vcpus ?? 1,
    ramMb: opts.ramMb ?? 1024,
    diskGb: opts.diskGb ?? 10,
  });
}

export interface SeedImageOptions {
  id: string;
  name?: string;
  osDistro?: string;
  minDiskGb?: number;
  sizeBytes?: number;
  status?: string;
}

export async function seedImage(db: DrizzleDb, opts: SeedImageOptions): Promise<void> {
  await db.insert(images).values({
    id: opts.id,
    name: opts.name ?? `image-${opts.id}`,
    osDistro: opts.osDistro ?? "linux",
    minDiskGb: opts.minDiskGb ?? 1,
    sizeBytes: opts.sizeBytes ?? 1024,
    status: opts.status ?? "active",
  });
}
