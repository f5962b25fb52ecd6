import { bigint, index, integer, pgTable, text } from "drizzle-orm/pg-core";
import { SERVER_STATUSES } from "../../compute/server-state-machine.js";
import { flavors } from "./flavors.js";
import { images } from "./images.js";

/**
 * Server lifecycle records. Rows are never removed: delete sets status to
 * DELETED and the row stays as a tombstone.
 */
export const servers = pgTable(
  "servers",
  {
    /** UUID */
    id: text("id").primaryKey(),
    name: text("name").notNull(),
    status: text("status", { enum: SERVER_STATUSES }).notNull().default("BUILD"),
    flavorId: text("flavor_id")
      .notNull()
      .references(() => flavors.id),
    imageId: text("image_id")
      .notNull()
      .references(() => images.id),
    /** Private IPv4 address, null until one is assigned */
    ipAddress: text("ip_address"),
    /** Bumped on every write; updates are compare-and-swap on (id, version) */
    version: integer("version").notNull().default(1),
    /** Unix epoch milliseconds */
    createdAt: bigint("created_at", { mode: "number" }).notNull(),
    /** Unix epoch milliseconds */
    updatedAt: bigint("updated_at", { mode: "number" }).notNull(),
  },
  (table) => [index("idx_servers_status_created").on(table.status, table.createdAt)],
);
