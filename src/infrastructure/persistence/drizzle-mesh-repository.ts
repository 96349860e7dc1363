/**
 * Drizzle Implementation: MeshRepository (ASYNC API over synchronous better-sqlite3)
 */
import { desc, eq, inArray } from "drizzle-orm";
import type { IdentityKey, MeshRepository } from "../../collector/repository-types.js";
import { tallyErrors } from "../../collector/run-aggregator.js";
import type { Link, Node, PollRun, RunSnapshot } from "../../collector/types.js";
import type { DrizzleDb } from "../../db/index.js";
import { links, linkSamples, nodeSamples, nodes, pollRuns, runErrors } from "../../db/schema/index.js";

const ACTIVE = ["current", "recent"] as const;

function rowToNode(row: typeof nodes.$inferSelect): Node {
  return {
    id: row.id,
    name: row.name,
    displayName: row.displayName,
    wlanIp: row.wlanIp,
    macAddress: row.macAddress,
    attributes: row.attributes,
    firstSeen: row.firstSeen,
    lastSeen: row.lastSeen,
    status: row.status,
  };
}

function keyColumn(key: IdentityKey) {
  const separator = key.indexOf(":");
  const kind = key.slice(0, separator);
  const value = key.slice(separator + 1);
  switch (kind) {
    case "ip":
      return eq(nodes.wlanIp, value);
    case "mac":
      return eq(nodes.macAddress, value);
    default:
      return eq(nodes.name, value);
  }
}

export class DrizzleMeshRepository implements MeshRepository {
  constructor(private readonly db: DrizzleDb) {}

  async lookup(key: IdentityKey): Promise<Node | null> {
    const row = this.db.select().from(nodes).where(keyColumn(key)).orderBy(desc(nodes.lastSeen)).limit(1).get();
    return row ? rowToNode(row) : null;
  }

  async allActiveAndRecent(): Promise<Node[]> {
    return this.db
      .select()
      .from(nodes)
      .where(inArray(nodes.status, [...ACTIVE]))
      .all()
      .map(rowToNode);
  }

  async allActiveAndRecentLinks(): Promise<Link[]> {
    return this.db
      .select()
      .from(links)
      .where(inArray(links.status, [...ACTIVE]))
      .all();
  }

  async saveSnapshot(snapshot: RunSnapshot): Promise<void> {
    this.db.transaction((tx) => {
      for (const node of snapshot.nodes) {
        tx.insert(nodes).values(node).onConflictDoUpdate({ target: nodes.id, set: node }).run();
      }
      for (const link of snapshot.links) {
        tx.insert(links)
          .values(link)
          .onConflictDoUpdate({ target: [links.sourceId, links.destinationId, links.medium], set: link })
          .run();
      }
      for (const sample of snapshot.nodeSamples) {
        tx.insert(nodeSamples).values(sample).onConflictDoNothing().run();
      }
      for (const sample of snapshot.linkSamples) {
        tx.insert(linkSamples).values(sample).onConflictDoNothing().run();
      }
    });
  }

  async saveRun(run: PollRun): Promise<void> {
    this.db.transaction((tx) => {
      const row = tx
        .insert(pollRuns)
        .values({
          startedAt: run.startedAt,
          pollingDurationMs: run.pollingDurationMs,
          totalDurationMs: run.totalDurationMs,
          nodeCount: run.nodeCount,
          linkCount: run.linkCount,
          errorCount: run.errorCount,
          partialTopology: run.partialTopology,
          topologySource: run.topologySource,
          conflicts: run.conflicts,
          stats: run.stats,
        })
        .returning({ id: pollRuns.id })
        .get();
      for (const error of run.errors) {
        tx.insert(runErrors)
          .values({ runId: row.id, ...error })
          .run();
      }
    });
  }

  async recentRuns(limit: number): Promise<PollRun[]> {
    const rows = this.db.select().from(pollRuns).orderBy(desc(pollRuns.id)).limit(limit).all();
    if (rows.length === 0) return [];

    const errorRows = this.db
      .select()
      .from(runErrors)
      .where(
        inArray(
          runErrors.runId,
          rows.map((r) => r.id),
        ),
      )
      .orderBy(runErrors.id)
      .all();

    return rows.map((row) => {
      const errors = errorRows
        .filter((e) => e.runId === row.id)
        .map(({ address, dnsName, category, details }) => ({ address, dnsName, category, details }));
      return {
        startedAt: row.startedAt,
        pollingDurationMs: row.pollingDurationMs,
        totalDurationMs: row.totalDurationMs,
        nodeCount: row.nodeCount,
        linkCount: row.linkCount,
        errorCount: row.errorCount,
        partialTopology: row.partialTopology,
        topologySource: row.topologySource,
        errors,
        ...tallyErrors(errors),
        conflicts: row.conflicts,
        stats: row.stats,
      };
    });
  }

  /** Every stored node, whatever its status. */
  async allNodes(): Promise<Node[]> {
    return this.db.select().from(nodes).all().map(rowToNode);
  }
}
