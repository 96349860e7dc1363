/**
 * In-Memory Implementation: MeshRepository (ASYNC)
 */

import type { IdentityKey, MeshRepository } from "../../collector/repository-types.js";
import {
  type Link,
  type LinkSample,
  linkKeyString,
  type Node,
  type NodeSample,
  type PollRun,
  type RunSnapshot,
} from "../../collector/types.js";

function holdsKey(node: Node, key: IdentityKey): boolean {
  const separator = key.indexOf(":");
  const kind = key.slice(0, separator);
  const value = key.slice(separator + 1);
  switch (kind) {
    case "ip":
      return node.wlanIp === value;
    case "mac":
      return node.macAddress === value;
    default:
      return node.name === value;
  }
}

const isActiveOrRecent = (entity: { status: string }) => entity.status === "current" || entity.status === "recent";

export class InMemoryMeshRepository implements MeshRepository {
  private nodes = new Map<string, Node>();
  private links = new Map<string, Link>();
  private runs: PollRun[] = [];
  readonly nodeSamples: NodeSample[] = [];
  readonly linkSamples: LinkSample[] = [];

  /** Seed durable state, e.g. nodes from an earlier run. */
  constructor(seed: { nodes?: Node[]; links?: Link[] } = {}) {
    for (const node of seed.nodes ?? []) this.nodes.set(node.id, structuredClone(node));
    for (const link of seed.links ?? []) this.links.set(linkKeyString(link), structuredClone(link));
  }

  async lookup(key: IdentityKey): Promise<Node | null> {
    let best: Node | null = null;
    for (const node of this.nodes.values()) {
      if (holdsKey(node, key) && (!best || node.lastSeen > best.lastSeen)) best = node;
    }
    return best ? structuredClone(best) : null;
  }

  async allActiveAndRecent(): Promise<Node[]> {
    return [...this.nodes.values()].filter(isActiveOrRecent).map((node) => structuredClone(node));
  }

  async allActiveAndRecentLinks(): Promise<Link[]> {
    return [...this.links.values()].filter(isActiveOrRecent).map((link) => structuredClone(link));
  }

  async saveSnapshot(snapshot: RunSnapshot): Promise<void> {
    for (const node of snapshot.nodes) this.nodes.set(node.id, structuredClone(node));
    for (const link of snapshot.links) this.links.set(linkKeyString(link), structuredClone(link));
    this.nodeSamples.push(...snapshot.nodeSamples);
    this.linkSamples.push(...snapshot.linkSamples);
  }

  async saveRun(run: PollRun): Promise<void> {
    this.runs.push(structuredClone(run));
  }

  async recentRuns(limit: number): Promise<PollRun[]> {
    return this.runs
      .slice()
      .reverse()
      .slice(0, limit)
      .map((run) => structuredClone(run));
  }

  /** Every stored node, whatever its status. */
  async allNodes(): Promise<Node[]> {
    return [...this.nodes.values()].map((node) => structuredClone(node));
  }
}
