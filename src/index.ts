import { Collector } from "./collector/collector.js";
import { CollectorService } from "./collector/collector-service.js";
import { NodePoller } from "./collector/node-poller.js";
import { queryRoutingDaemon } from "./collector/olsr.js";
import { createReverseLookup } from "./collector/reverse-dns.js";
import { StatusClient } from "./collector/status-client.js";
import { TopologySource } from "./collector/topology.js";
import { config, daysToMs } from "./config/index.js";
import { logger } from "./config/logger.js";
import { openDatabase } from "./db/index.js";
import { DrizzleMeshRepository } from "./infrastructure/persistence/drizzle-mesh-repository.js";
import { captureError, initSentry } from "./observability/sentry.js";

// Global process-level error handlers.

// Handle unhandled promise rejections (async errors that weren't caught)
export const unhandledRejectionHandler = (reason: unknown, promise: Promise<unknown>) => {
  logger.error("Unhandled promise rejection", {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
    promise: String(promise),
  });
  captureError(reason instanceof Error ? reason : new Error(String(reason)), {
    source: "unhandledRejection",
  });
  // Don't exit — the next period's run starts from a clean slate
};

// Handle uncaught exceptions (synchronous errors that weren't caught)
export const uncaughtExceptionHandler = (err: Error, origin: string) => {
  logger.error("Uncaught exception", {
    error: err.message,
    stack: err.stack,
    origin,
  });
  captureError(err, { source: "uncaughtException", extra: { origin } });
  // Uncaught exceptions leave the process in an undefined state.
  // Exit immediately after logging (Winston Console transport is synchronous).
  process.exit(1);
};

/** Wire the collector from configuration and run it once or as a service. */
export async function main(): Promise<void> {
  const { sqlite, db } = openDatabase(config.databasePath);
  const repository = new DrizzleMeshRepository(db);

  const statusClient = new StatusClient({ port: config.statusPort });
  const topology = new TopologySource({
    queryRoutingTable: (host) => queryRoutingDaemon(host, config.olsrPort, config.olsrTimeoutS * 1000),
    fetchStatusDocument: (host, signal) => statusClient.fetchTopologyDocument(host, signal),
    timeoutMs: config.collector.nodeTimeoutS * 1000,
  });
  const poller = new NodePoller(statusClient, {
    concurrency: config.collector.concurrency,
    timeoutMs: config.collector.nodeTimeoutS * 1000,
  });

  const collector = new Collector(
    {
      topology,
      poller,
      reverseLookup: createReverseLookup(config.localNode, config.dnsTimeoutS * 1000),
      repository,
    },
    {
      localNode: config.localNode,
      nodeThresholdMs: daysToMs(config.collector.nodeInactiveDays),
      linkThresholdMs: daysToMs(config.collector.linkInactiveDays),
      dnsTimeoutMs: config.dnsTimeoutS * 1000,
    },
  );
  const service = new CollectorService(collector, { periodMs: config.collector.periodMinutes * 60_000 });

  if (config.collector.runOnce) {
    const result = await service.runOnce();
    sqlite.close();
    if (!result || result.persistenceError) process.exitCode = 1;
    return;
  }

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    service.stop();
    sqlite.close();
    process.exit(0);
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));

  logger.info("mesh-collector started", {
    localNode: config.localNode,
    databasePath: config.databasePath,
    periodMinutes: config.collector.periodMinutes,
  });
  service.start();
}

if (process.env.NODE_ENV !== "test") {
  process.on("unhandledRejection", unhandledRejectionHandler);
  process.on("uncaughtException", uncaughtExceptionHandler);

  // Initialize Sentry error tracking (no-op when SENTRY_DSN absent)
  initSentry(process.env.SENTRY_DSN);

  main().catch((err: unknown) => {
    logger.error("Collector failed to start", { error: err instanceof Error ? err.message : String(err) });
    captureError(err, { source: "startup" });
    process.exit(1);
  });
}
