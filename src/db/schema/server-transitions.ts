import { bigint, index, pgTable, text } from "drizzle-orm/pg-core";
import { SERVER_STATUSES, TRANSITION_ACTIONS } from "../../compute/server-state-machine.js";

/**
 * Append-only audit log of server lifecycle changes.
 * Written in the same transaction as the status change it records.
 */
export const serverTransitions = pgTable(
  "server_transitions",
  {
    /** UUID */
    id: text("id").primaryKey(),
    /** References servers.id */
    serverId: text("server_id").notNull(),
    /** Status before the change; null for create */
    fromStatus: text("from_status", { enum: SERVER_STATUSES }),
    /** Status after the change */
    toStatus: text("to_status", { enum: SERVER_STATUSES }).notNull(),
    /** "create" | "delete" | a user action */
    action: text("action", { enum: TRANSITION_ACTIONS }).notNull(),
    /** Unix epoch milliseconds */
    createdAt: bigint("created_at", { mode: "number" }).notNull(),
  },
  (t) => [index("idx_server_transitions_server").on(t.serverId, t.createdAt)],
);
