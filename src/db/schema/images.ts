import { bigint, integer, pgTable, text } from "drizzle-orm/pg-core";

/**
 * Bootable OS templates. Seeded at boot, never mutated through the API.
 */
export const images = pgTable("images", {
  /** UUID */
  id: text("id").primaryKey(),
  /** e.g. "Ubuntu 22.04 LTS" */
  name: text("name").notNull().unique(),
  /** Distribution tag: "ubuntu" | "debian" | ... */
  osDistro: text("os_distro").notNull(),
  minDiskGb: integer("min_disk_gb").notNull().default(0),
  sizeBytes: bigint("size_bytes", { mode: "number" }).notNull().default(0),
  status: text("status").notNull().default("active"),
});
