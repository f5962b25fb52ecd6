import { bigint, pgTable, text } from "drizzle-orm/pg-core";

/** Bookkeeping for runMigrations(): one row per applied migrations/*.sql file. */
export const schemaMigrations = pgTable("schema_migrations", {
  name: text("name").primaryKey(),
  /** Unix epoch milliseconds */
  appliedAt: bigint("applied_at", { mode: "number" }).notNull(),
});
