import { z } from "zod";

const DAY_MS = 24 * 60 * 60 * 1000;

/** Collector tuning. Durations are given in the units operators think in and converted by callers. */
export const collectorConfigSchema = z.object({
  /** Per-node status request timeout, seconds. Bounds connect and read together. */
  nodeTimeoutS: z.coerce.number().positive().default(30),
  /** Maximum simultaneously in-flight status requests. */
  concurrency: z.coerce.number().int().min(1).max(1000).default(50),
  /** Days a node may go unseen before it is inactive. */
  nodeInactiveDays: z.coerce.number().positive().default(7),
  /** Days a link may go unseen before it is inactive. */
  linkInactiveDays: z.coerce.number().positive().default(1),
  /** Minutes between collection runs when running as a service. */
  periodMinutes: z.coerce.number().positive().default(5),
  /** Collect once and exit instead of looping. */
  runOnce: z
    .union([z.boolean(), z.enum(["true", "false", "1", "0"])])
    .transform((v) => v === true || v === "true" || v === "1")
    .default(false),
});

export type CollectorConfig = z.infer<typeof collectorConfigSchema>;

export const configSchema = z.object({
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),
  /** Mesh node whose routing daemon and status document seed the topology. */
  localNode: z.string().min(1).default("localnode.local.mesh"),
  /** TCP port of the routing daemon's topology dump. */
  olsrPort: z.coerce.number().int().min(1).max(65535).default(2004),
  olsrTimeoutS: z.coerce.number().positive().default(5),
  /** HTTP port serving each node's status document. */
  statusPort: z.coerce.number().int().min(1).max(65535).default(8080),
  /** Timeout for reverse-DNS lookups used to label errors, seconds. */
  dnsTimeoutS: z.coerce.number().positive().default(2),
  databasePath: z.string().min(1).default("./data/collector.db"),
  collector: collectorConfigSchema.default({}),
});

export type Config = z.infer<typeof configSchema>;

/** Build a config object from an environment map. Exported for tests; the app uses `config`. */
export function loadConfig(env: NodeJS.ProcessEnv): Config {
  return configSchema.parse({
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    localNode: env.LOCAL_NODE || undefined,
    olsrPort: env.OLSR_PORT,
    olsrTimeoutS: env.OLSR_TIMEOUT_S,
    statusPort: env.NODE_STATUS_PORT,
    dnsTimeoutS: env.DNS_TIMEOUT_S,
    databasePath: env.DATABASE_PATH || undefined,
    collector: {
      nodeTimeoutS: env.COLLECTOR_NODE_TIMEOUT_S,
      concurrency: env.COLLECTOR_CONCURRENCY,
      nodeInactiveDays: env.COLLECTOR_NODE_INACTIVE_DAYS,
      linkInactiveDays: env.COLLECTOR_LINK_INACTIVE_DAYS,
      periodMinutes: env.COLLECTOR_PERIOD_MINUTES,
      runOnce: env.COLLECTOR_RUN_ONCE,
    },
  });
}

export function daysToMs(days: number): number {
  return Math.round(days * DAY_MS);
}

export const config = loadConfig(process.env);
