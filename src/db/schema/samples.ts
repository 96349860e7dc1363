import { integer, primaryKey, real, sqliteTable, text } from "drizzle-orm/sqlite-core";

/**
 * Node samples — per-run time series for current nodes. Retention is not handled here.
 */
export const nodeSamples = sqliteTable(
  "node_samples",
  {
    nodeId: text("node_id").notNull(),
    /** Unix epoch ms of the run */
    timestamp: integer("timestamp").notNull(),
    upTimeSeconds: integer("up_time_seconds"),
    load1: real("load1"),
    linkCount: integer("link_count"),
    radioLinkCount: integer("radio_link_count"),
    dtdLinkCount: integer("dtd_link_count"),
    tunnelLinkCount: integer("tunnel_link_count"),
  },
  (table) => [primaryKey({ columns: [table.nodeId, table.timestamp] })],
);

/**
 * Link samples — per-run time series for current links.
 */
export const linkSamples = sqliteTable(
  "link_samples",
  {
    /** "<sourceId>-<destinationId>-<medium>" */
    linkKey: text("link_key").notNull(),
    timestamp: integer("timestamp").notNull(),
    signal: real("signal"),
    noise: real("noise"),
    quality: real("quality"),
    neighborQuality: real("neighbor_quality"),
    cost: real("cost"),
    txRate: real("tx_rate"),
    rxRate: real("rx_rate"),
  },
  (table) => [primaryKey({ columns: [table.linkKey, table.timestamp] })],
);
