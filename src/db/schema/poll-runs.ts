import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";
import { type ReconciliationConflict, RUN_ERROR_CATEGORIES, TOPOLOGY_SOURCES } from "../../collector/types.js";

/**
 * Poll runs table — append-only, one row per collection run.
 */
export const pollRuns = sqliteTable(
  "poll_runs",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    /** Unix epoch ms when the run started */
    startedAt: integer("started_at").notNull(),
    /** Topology discovery plus polling */
    pollingDurationMs: integer("polling_duration_ms").notNull(),
    /** Up to and including the node/link hand-off */
    totalDurationMs: integer("total_duration_ms").notNull(),
    nodeCount: integer("node_count").notNull(),
    linkCount: integer("link_count").notNull(),
    errorCount: integer("error_count").notNull(),
    partialTopology: integer("partial_topology", { mode: "boolean" }).notNull(),
    topologySource: text("topology_source", { enum: TOPOLOGY_SOURCES }).notNull(),
    conflicts: text("conflicts", { mode: "json" }).$type<ReconciliationConflict[]>().notNull(),
    stats: text("stats", { mode: "json" }).$type<Record<string, number>>().notNull(),
  },
  (table) => [index("idx_poll_runs_started_at").on(table.startedAt)],
);

/**
 * Run errors table — nodes that could not be collected in a run.
 */
export const runErrors = sqliteTable(
  "run_errors",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    runId: integer("run_id").notNull(),
    address: text("address").notNull(),
    /** Reverse-DNS name; empty when unknown */
    dnsName: text("dns_name").notNull().default(""),
    category: text("category", { enum: RUN_ERROR_CATEGORIES }).notNull(),
    /** Error message or raw response */
    details: text("details").notNull(),
  },
  (table) => [index("idx_run_errors_run").on(table.runId), index("idx_run_errors_category").on(table.category)],
);
