import { randomUUID } from "node:crypto";
import { logger } from "../config/logger.js";
import { captureError } from "../observability/sentry.js";
import { PersistenceError, TopologyUnavailableError } from "./errors.js";
import { type ReconcileResult, reconcile } from "./identity-reconciler.js";
import { DEFAULT_LINK_INACTIVE_MS, DEFAULT_NODE_INACTIVE_MS, classifyLinks, classifyNodes } from "./lifecycle.js";
import { buildLinks } from "./link-builder.js";
import type { MeshRepository } from "./repository-types.js";
import { labelErrors, type ReverseLookup } from "./reverse-dns.js";
import { finalize, summarizeErrors, topologyUnavailableRun } from "./run-aggregator.js";
import { linkSample, nodeSample } from "./samples.js";
import type { Topology } from "./topology.js";
import {
  type FetchError,
  type FetchResult,
  isFetchError,
  type Link,
  linkKeyString,
  type Node,
  type NodeObservation,
  type PollRun,
  type RunSnapshot,
  type RunStats,
} from "./types.js";

export interface CollectorDeps {
  topology: { discover(localNode: string): Promise<Topology> };
  poller: { run(addresses: readonly string[]): Promise<FetchResult[]> };
  reverseLookup: ReverseLookup;
  repository: MeshRepository;
  /** Epoch ms. Default: Date.now */
  clock?: () => number;
  /** Id generator for new nodes. Default: randomUUID */
  newId?: () => string;
}

export interface CollectorOptions {
  localNode: string;
  nodeThresholdMs?: number;
  linkThresholdMs?: number;
  /** Concurrent reverse-DNS lookups when labelling errors. Default: 10 */
  dnsConcurrency?: number;
  /** Per-lookup deadline in ms. Default: 2000 */
  dnsTimeoutMs?: number;
}

export interface CollectionResult {
  run: PollRun;
  /** Every node handed to persistence, tagged with its status. */
  nodes: Node[];
  links: Link[];
  samples: Pick<RunSnapshot, "nodeSamples" | "linkSamples">;
  /** Set when persistence failed; the rest of the result is unaffected. */
  persistenceError?: PersistenceError;
}

function mergeStats(...sources: RunStats[]): RunStats {
  const merged: RunStats = {};
  for (const source of sources) {
    for (const [key, value] of Object.entries(source)) merged[key] = (merged[key] ?? 0) + value;
  }
  return merged;
}

/**
 * One collection run: discover, poll, reconcile, classify, persist.
 *
 * Durable state is read before reconciliation and written only after every
 * poll has settled. The run's start time is the `now` every observed node
 * and link is stamped with.
 */
export class Collector {
  private readonly clock: () => number;
  private readonly newId: () => string;
  private readonly nodeThresholdMs: number;
  private readonly linkThresholdMs: number;

  constructor(
    private readonly deps: CollectorDeps,
    private readonly options: CollectorOptions,
  ) {
    this.clock = deps.clock ?? Date.now;
    this.newId = deps.newId ?? randomUUID;
    this.nodeThresholdMs = options.nodeThresholdMs ?? DEFAULT_NODE_INACTIVE_MS;
    this.linkThresholdMs = options.linkThresholdMs ?? DEFAULT_LINK_INACTIVE_MS;
  }

  async collect(): Promise<CollectionResult> {
    const { localNode } = this.options;
    const startedAt = this.clock();

    let topology: Topology;
    try {
      topology = await this.deps.topology.discover(localNode);
    } catch (err) {
      if (!(err instanceof TopologyUnavailableError)) throw err;
      return this.recordTopologyFailure(err, startedAt);
    }

    const results = await this.deps.poller.run(topology.addresses);
    const polledAt = this.clock();

    const observations: NodeObservation[] = [];
    const failures: FetchError[] = [];
    for (const result of results) {
      if (isFetchError(result)) failures.push(result);
      else observations.push(result);
    }
    const errors = await labelErrors(failures, this.deps.reverseLookup, {
      concurrency: this.options.dnsConcurrency ?? 10,
      timeoutMs: this.options.dnsTimeoutMs ?? 2_000,
    });

    const now = startedAt;
    const { repository } = this.deps;
    let knownLinks: Link[];
    let reconciled: ReconcileResult;
    try {
      knownLinks = await repository.allActiveAndRecentLinks();
      reconciled = await reconcile(observations, repository, {
        now,
        nodeThresholdMs: this.nodeThresholdMs,
        newId: this.newId,
      });
    } catch (err) {
      throw new PersistenceError("readKnown", err);
    }

    const built = buildLinks({
      assignments: reconciled.assignments,
      linksBySource: topology.linksBySource,
      knownLinks,
      now,
    });

    const observedKeys = new Set(built.links.map(linkKeyString));
    const carried = knownLinks.filter((link) => !observedKeys.has(linkKeyString(link)));
    const nodes = classifyNodes([...built.nodes, ...reconciled.unmatched], now, this.nodeThresholdMs);
    const links = classifyLinks([...built.links, ...carried], now, this.linkThresholdMs);

    const stats = mergeStats(reconciled.stats, built.stats);
    stats["nodes: expired"] = nodes.filter((n) => n.status === "inactive").length;
    stats["links: expired"] = links.filter((l) => l.status === "inactive").length;

    const snapshot: RunSnapshot = {
      timestamp: now,
      nodes,
      links,
      nodeSamples: nodes.filter((n) => n.status === "current").map((n) => nodeSample(n, now)),
      linkSamples: links.filter((l) => l.status === "current").map((l) => linkSample(l, now)),
    };

    let persistenceError = await this.persist("saveSnapshot", () => repository.saveSnapshot(snapshot));

    const run = finalize({
      startedAt,
      polledAt,
      finishedAt: this.clock(),
      nodeCount: built.nodes.length,
      linkCount: built.links.length,
      errors,
      topologySource: topology.source,
      partialTopology: topology.partial,
      conflicts: reconciled.conflicts,
      stats,
    });
    const runError = await this.persist("saveRun", () => repository.saveRun(run));
    persistenceError ??= runError;

    logger.info("Collection finished", {
      nodes: run.nodeCount,
      links: run.linkCount,
      errors: summarizeErrors(run),
      conflicts: run.conflicts.length,
      partialTopology: run.partialTopology,
      pollingDurationMs: run.pollingDurationMs,
      totalDurationMs: run.totalDurationMs,
    });

    return {
      run,
      nodes,
      links,
      samples: { nodeSamples: snapshot.nodeSamples, linkSamples: snapshot.linkSamples },
      ...(persistenceError && { persistenceError }),
    };
  }

  private async recordTopologyFailure(err: TopologyUnavailableError, startedAt: number): Promise<CollectionResult> {
    logger.error("Topology unavailable, recording empty run", {
      localNode: err.localNode,
      routingTableError: err.routingTableError,
      fallbackError: err.fallbackError,
    });
    captureError(err, { source: "collector:topology", localNode: err.localNode });

    const run = topologyUnavailableRun(err, startedAt, this.clock());
    const persistenceError = await this.persist("saveRun", () => this.deps.repository.saveRun(run));
    return {
      run,
      nodes: [],
      links: [],
      samples: { nodeSamples: [], linkSamples: [] },
      ...(persistenceError && { persistenceError }),
    };
  }

  /** Run a write; a failure is logged, reported and returned instead of thrown. */
  private async persist(
    operation: "saveSnapshot" | "saveRun",
    write: () => Promise<void>,
  ): Promise<PersistenceError | undefined> {
    try {
      await write();
      return undefined;
    } catch (err) {
      const error = new PersistenceError(operation, err);
      logger.error("Failed to persist collection results", { operation, error: error.message });
      captureError(error, { source: `collector:${operation}`, localNode: this.options.localNode });
      return error;
    }
  }
}
