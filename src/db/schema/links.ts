import { index, integer, primaryKey, real, sqliteTable, text } from "drizzle-orm/sqlite-core";
import { LIFECYCLE_STATUSES, LINK_MEDIA } from "../../collector/types.js";

/**
 * Links table — directed links between nodes, one row per (source, destination, medium).
 */
export const links = sqliteTable(
  "links",
  {
    sourceId: text("source_id").notNull(),
    destinationId: text("destination_id").notNull(),
    /** radio | dtd | tunnel | unknown */
    medium: text("medium", { enum: LINK_MEDIA }).notNull(),
    interfaceName: text("interface_name").notNull(),
    signal: real("signal"),
    noise: real("noise"),
    txRate: real("tx_rate"),
    rxRate: real("rx_rate"),
    /** Percent, 0–100 */
    quality: real("quality"),
    /** Percent, 0–100 */
    neighborQuality: real("neighbor_quality"),
    /** Routing cost, 99.99 = unreachable */
    cost: real("cost"),
    /** Kilometres between the endpoints */
    distance: real("distance"),
    /** Degrees from source to destination */
    bearing: real("bearing"),
    firstSeen: integer("first_seen").notNull(),
    lastSeen: integer("last_seen").notNull(),
    status: text("status", { enum: LIFECYCLE_STATUSES }).notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.sourceId, table.destinationId, table.medium] }),
    index("idx_links_status").on(table.status),
  ],
);
