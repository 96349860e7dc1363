/**
 * Recency tiers.
 *
 * ```
 * current   last seen in this run (lastSeen === now)
 * recent    now - lastSeen <= threshold
 * inactive  anything older
 * ```
 *
 * Current and recent are both "active". The same rule applies to every node
 * and every link medium; only the threshold differs between nodes and links.
 */

import type { LifecycleStatus } from "./types.js";

export const DEFAULT_NODE_INACTIVE_MS = 7 * 24 * 60 * 60 * 1000;
export const DEFAULT_LINK_INACTIVE_MS = 24 * 60 * 60 * 1000;

export function classify(lastSeen: number, now: number, thresholdMs: number): LifecycleStatus {
  if (lastSeen === now) return "current";
  if (now - lastSeen <= thresholdMs) return "recent";
  return "inactive";
}

export function isActive(status: LifecycleStatus): boolean {
  return status === "current" || status === "recent";
}

/** Re-derive `status` on every entity; returns new objects. */
export function classifyAll<T extends { lastSeen: number; status: LifecycleStatus }>(
  entities: readonly T[],
  now: number,
  thresholdMs: number,
): T[] {
  return entities.map((entity) => ({ ...entity, status: classify(entity.lastSeen, now, thresholdMs) }));
}

export function classifyNodes<T extends { lastSeen: number; status: LifecycleStatus }>(
  nodes: readonly T[],
  now: number,
  thresholdMs = DEFAULT_NODE_INACTIVE_MS,
): T[] {
  return classifyAll(nodes, now, thresholdMs);
}

export function classifyLinks<T extends { lastSeen: number; status: LifecycleStatus }>(
  links: readonly T[],
  now: number,
  thresholdMs = DEFAULT_LINK_INACTIVE_MS,
): T[] {
  return classifyAll(links, now, thresholdMs);
}
