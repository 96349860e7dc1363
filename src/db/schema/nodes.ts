import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";
import { LIFECYCLE_STATUSES, type NodeAttributes } from "../../collector/types.js";

/**
 * Nodes table — one row per durable mesh node identity.
 * A node that reappears after going inactive gets a new row, never the old one.
 */
export const nodes = sqliteTable(
  "nodes",
  {
    /** Synthetic node id (UUID) */
    id: text("id").primaryKey(),
    /** Lowercased node name */
    name: text("name").notNull(),
    /** Name as the node reports it */
    displayName: text("display_name").notNull(),
    /** Radio interface IP, null when the node has none */
    wlanIp: text("wlan_ip"),
    /** Radio MAC, lowercase hex without separators; empty when unknown */
    macAddress: text("mac_address").notNull().default(""),
    /** Every status field of the last observation */
    attributes: text("attributes", { mode: "json" }).$type<NodeAttributes>().notNull(),
    /** Unix epoch ms of the first run that saw this node */
    firstSeen: integer("first_seen").notNull(),
    /** Unix epoch ms of the last run that saw this node */
    lastSeen: integer("last_seen").notNull(),
    /** current | recent | inactive, as of the last run */
    status: text("status", { enum: LIFECYCLE_STATUSES }).notNull(),
  },
  (table) => [
    index("idx_nodes_wlan_ip").on(table.wlanIp),
    index("idx_nodes_mac_address").on(table.macAddress),
    index("idx_nodes_name").on(table.name),
    index("idx_nodes_status").on(table.status),
  ],
);
