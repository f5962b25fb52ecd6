import { sql } from "drizzle-orm";
import { drizzle } from "drizzle-orm/node-postgres";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import type { Pool } from "pg";
import * as schema from "./schema/index.js";

/** The schema type shared across all db instances. */
export type Schema = typeof schema;

/**
 * Structural DrizzleDb type, satisfied by NodePgDatabase (production),
 * PgliteDatabase (tests) and the transaction handle passed to
 * db.transaction() callbacks. Repositories and backends accept this type.
 */
export type DrizzleDb = PgDatabase<PgQueryResultHKT, Schema>;

/** Create a Drizzle database instance wrapping the given pg.Pool. */
export function createDb(pool: Pool): DrizzleDb {
  return drizzle(pool, { schema }) as unknown as DrizzleDb;
}

/** Round-trip a trivial query; rejects when the database is unreachable. */
export async function pingDb(db: DrizzleDb): Promise<void> {
  await db.execute(sql`SELECT 1`);
}

export { schema };
