import { randomUUID } from "node:crypto";
import { logger } from "../config/logger.js";
import { classify, isActive } from "./lifecycle.js";
import type { IdentityKey, KnownNodeReadModel } from "./repository-types.js";
import { count, type Node, type NodeObservation, type ReconciliationConflict, type RunStats } from "./types.js";

export interface ReconcileOptions {
  /** This run's timestamp; becomes `lastSeen` of every observed node. */
  now: number;
  nodeThresholdMs: number;
  /** Id generator for new nodes. Default: randomUUID */
  newId?: () => string;
}

export interface Assignment {
  observation: NodeObservation;
  node: Node;
}

export interface ReconcileResult {
  /** One per observation, in canonical order. */
  assignments: Assignment[];
  conflicts: ReconciliationConflict[];
  /** Known active/recent nodes no observation matched, unchanged. */
  unmatched: Node[];
  stats: RunStats;
}

type KeyKind = "ip" | "mac" | "name";
const KEY_KINDS: readonly KeyKind[] = ["ip", "mac", "name"];
/** Kinds strong enough that an inactive holder forces a new identity. */
const RETIRING_KINDS: readonly KeyKind[] = ["ip", "mac"];

interface Identified {
  wlanIp: string | null;
  macAddress: string;
  name: string;
}

export function identityKey(entity: Identified, kind: KeyKind): IdentityKey | null {
  switch (kind) {
    case "ip":
      return entity.wlanIp ? `ip:${entity.wlanIp}` : null;
    case "mac":
      return entity.macAddress ? `mac:${entity.macAddress}` : null;
    case "name":
      return `name:${entity.name}`;
  }
}

export function identityKeys(entity: Identified): IdentityKey[] {
  return KEY_KINDS.map((kind) => identityKey(entity, kind)).filter((key): key is IdentityKey => key !== null);
}

/** The strongest key available for an entity. */
export function primaryIdentityKey(entity: Identified): IdentityKey {
  return identityKeys(entity)[0] ?? `name:${entity.name}`;
}

function compareObservations(a: NodeObservation, b: NodeObservation): number {
  const ka = primaryIdentityKey(a);
  const kb = primaryIdentityKey(b);
  if (ka !== kb) return ka < kb ? -1 : 1;
  if (a.name !== b.name) return a.name < b.name ? -1 : 1;
  if (a.address !== b.address) return a.address < b.address ? -1 : 1;
  return 0;
}

/** Most recently seen first; id breaks ties so the choice never depends on read order. */
function compareKnown(a: Node, b: Node): number {
  return b.lastSeen - a.lastSeen || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);
}

/**
 * Map each observation of this run onto a durable Node identity.
 *
 * Policy, per observation:
 *
 * 1. an active/recent node sharing its strongest matching key (radio IP, then
 *    MAC, then name) is updated in place; its id survives a rename
 * 2. otherwise, if an inactive node once held its radio IP or MAC, a new node
 *    is minted and the inactive one is left untouched; a returning node never
 *    inherits the old node's history
 * 3. otherwise a new node is minted
 *
 * Observations are processed in a canonical order, one key strength at a
 * time, so the result does not depend on the order polls completed in.
 * Observations sharing a primary key, or contending for the same known node,
 * are all kept and reported as conflicts.
 */
export async function reconcile(
  observations: readonly NodeObservation[],
  readModel: KnownNodeReadModel,
  options: ReconcileOptions,
): Promise<ReconcileResult> {
  const { now, nodeThresholdMs } = options;
  const newId = options.newId ?? randomUUID;
  const stats: RunStats = {};

  const stored = await readModel.allActiveAndRecent();
  const known = stored.filter((node) => isActive(classify(node.lastSeen, now, nodeThresholdMs)));
  const index = new Map<IdentityKey, Node[]>();
  for (const node of known) {
    for (const key of identityKeys(node)) {
      const holders = index.get(key) ?? [];
      holders.push(node);
      index.set(key, holders);
    }
  }
  for (const holders of index.values()) holders.sort(compareKnown);

  const ordered = [...observations].sort(compareObservations);
  const conflictsByKey = new Map<IdentityKey, Set<NodeObservation>>();
  const flag = (key: IdentityKey, ...members: NodeObservation[]) => {
    const set = conflictsByKey.get(key) ?? new Set<NodeObservation>();
    for (const member of members) set.add(member);
    conflictsByKey.set(key, set);
  };

  // Same primary key twice in one run: duplicate or misconfigured address
  const byPrimary = new Map<IdentityKey, NodeObservation[]>();
  for (const obs of ordered) {
    const key = primaryIdentityKey(obs);
    byPrimary.set(key, [...(byPrimary.get(key) ?? []), obs]);
  }
  for (const [key, group] of byPrimary) {
    if (group.length > 1) flag(key, ...group);
  }

  const matched = new Map<NodeObservation, Node>();
  const claimedBy = new Map<string, NodeObservation>();
  const contested = new Set<NodeObservation>();

  for (const kind of KEY_KINDS) {
    for (const obs of ordered) {
      if (matched.has(obs) || contested.has(obs)) continue;
      const key = identityKey(obs, kind);
      const candidate = key ? index.get(key)?.[0] : undefined;
      if (!key || !candidate) continue;

      const claimant = claimedBy.get(candidate.id);
      if (claimant) {
        // Never merge two live observations into one node
        flag(key, claimant, obs);
        contested.add(obs);
        continue;
      }
      claimedBy.set(candidate.id, obs);
      matched.set(obs, candidate);
    }
  }

  const assignments: Assignment[] = [];
  for (const obs of ordered) {
    const existing = matched.get(obs);
    if (existing) {
      if (existing.name !== obs.name) {
        logger.info("Node renamed", { id: existing.id, from: existing.name, to: obs.name });
        count(stats, "nodes: renamed");
      }
      count(stats, "nodes: updated");
      assignments.push({
        observation: obs,
        node: {
          ...existing,
          name: obs.name,
          displayName: obs.displayName,
          wlanIp: obs.wlanIp,
          macAddress: obs.macAddress,
          attributes: obs.attributes,
          lastSeen: now,
          status: "current",
        },
      });
      continue;
    }

    const retired = await findRetired(obs, readModel, now, nodeThresholdMs);
    if (retired) {
      logger.info("Inactive node identity reappeared; minting a new node", {
        name: obs.name,
        retiredId: retired.id,
        lastSeen: retired.lastSeen,
      });
      count(stats, "nodes: reappeared");
    }
    count(stats, "nodes: added");
    assignments.push({
      observation: obs,
      node: {
        id: newId(),
        name: obs.name,
        displayName: obs.displayName,
        wlanIp: obs.wlanIp,
        macAddress: obs.macAddress,
        attributes: obs.attributes,
        firstSeen: now,
        lastSeen: now,
        status: "current",
      },
    });
  }

  const nodeIdOf = new Map(assignments.map((a) => [a.observation, a.node.id]));
  const conflicts: ReconciliationConflict[] = [...conflictsByKey.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([identityKey, members]) => {
      const sorted = [...members].sort(compareObservations);
      return {
        identityKey,
        names: sorted.map((m) => m.name),
        nodeIds: sorted.map((m) => nodeIdOf.get(m) ?? ""),
      };
    });
  for (const conflict of conflicts) {
    logger.warn("Reconciliation conflict", { ...conflict });
  }
  count(stats, "nodes: conflicts", conflicts.length);
  count(stats, "nodes: total", assignments.length);

  const unmatched = stored.filter((node) => !claimedBy.has(node.id));
  return { assignments, conflicts, unmatched, stats };
}

async function findRetired(
  obs: NodeObservation,
  readModel: KnownNodeReadModel,
  now: number,
  nodeThresholdMs: number,
): Promise<Node | null> {
  for (const kind of RETIRING_KINDS) {
    const key = identityKey(obs, kind);
    if (!key) continue;
    const holder = await readModel.lookup(key);
    if (holder && !isActive(classify(holder.lastSeen, now, nodeThresholdMs))) return holder;
  }
  return null;
}
