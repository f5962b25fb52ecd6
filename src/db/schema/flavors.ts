import { integer, pgTable, text } from "drizzle-orm/pg-core";

/**
 * Hardware sizing templates. Seeded at boot, never mutated through the API.
 */
export const flavors = pgTable("flavors", {
  /** UUID */
  id: text("id").primaryKey(),
  /** e.g. "m1.small" */
  name: text("name").notNull().unique(),
  vcpus: integer("vcpus").notNull(),
  ramMb: integer("ram_mb").notNull(),
  diskGb: integer("disk_gb").notNull(),
});
