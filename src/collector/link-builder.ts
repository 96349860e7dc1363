import { logger } from "../config/logger.js";
import { bearingDegrees, distanceKm, hasCoordinates } from "./geo.js";
import type { Assignment } from "./identity-reconciler.js";
import type { TopoLink } from "./olsr.js";
import { compareApiVersion, parseApiVersion } from "./sysinfo-schema.js";
import { count, type Link, type LinkObservation, linkKeyString, type Node, type RunStats } from "./types.js";

/** Firmware before this version reports no cost in link_info. */
const LINK_COST_SINCE = { major: 1, minor: 9 };

export interface BuildLinksInput {
  assignments: readonly Assignment[];
  /** Routing-table edges keyed by source address; empty for a partial topology. */
  linksBySource: ReadonlyMap<string, readonly TopoLink[]>;
  /** Known active/recent links, for `firstSeen` of links seen again. */
  knownLinks: readonly Link[];
  now: number;
}

export interface BuildLinksResult {
  links: Link[];
  /** Reconciled nodes with their link counts filled in, same order as the input. */
  nodes: Node[];
  stats: RunStats;
}

function reportsCost(apiVersion: string): boolean {
  const version = parseApiVersion(apiVersion);
  return version !== null && compareApiVersion(version, LINK_COST_SINCE) >= 0;
}

function routingAddress(assignment: Assignment): string {
  return assignment.observation.wlanIp ?? assignment.observation.address;
}

/** Links of a node without link data, one per routing-table edge. */
function fromRoutingTable(assignment: Assignment, edges: readonly TopoLink[]): LinkObservation[] {
  return edges.map((edge): LinkObservation => ({
    sourceName: assignment.node.name,
    destinationName: "",
    destinationIp: edge.destination,
    medium: "unknown",
    interfaceName: "unknown",
    signal: null,
    noise: null,
    txRate: null,
    rxRate: null,
    quality: null,
    neighborQuality: null,
    cost: edge.cost,
  }));
}

/**
 * Turn this run's observations into Links between reconciled nodes and write
 * per-node link counts back onto the node attributes.
 *
 * A destination is resolved by node name, then by any address the run saw
 * for a node. Links whose far end was not polled successfully this run are
 * dropped.
 */
export function buildLinks(input: BuildLinksInput): BuildLinksResult {
  const { assignments, linksBySource, now } = input;
  const stats: RunStats = {};

  const byName = new Map<string, Node>();
  const byIp = new Map<string, Node>();
  for (const { observation, node } of assignments) {
    if (!byName.has(node.name)) byName.set(node.name, node);
    for (const ip of [node.wlanIp, node.attributes.lanIp, observation.address]) {
      if (ip && !byIp.has(ip)) byIp.set(ip, node);
    }
  }
  const firstSeen = new Map(input.knownLinks.map((link) => [linkKeyString(link), link.firstSeen]));

  const links = new Map<string, Link>();
  const nodes: Node[] = [];

  for (const assignment of assignments) {
    const { observation, node } = assignment;
    const edges = linksBySource.get(routingAddress(assignment)) ?? [];

    let reported: LinkObservation[];
    if (observation.hasLinkInfo) {
      reported = observation.links;
      if (!reportsCost(observation.attributes.apiVersion)) {
        const costs = new Map(edges.map((edge) => [edge.destination, edge.cost]));
        reported = reported.map((link) => ({ ...link, cost: link.cost ?? costs.get(link.destinationIp) ?? null }));
      }
    } else {
      reported = fromRoutingTable(assignment, edges);
      if (reported.length > 0) count(stats, "links: from routing table", reported.length);
    }

    for (const observed of reported) {
      const destination =
        (observed.destinationName ? byName.get(observed.destinationName) : undefined) ?? byIp.get(observed.destinationIp);
      if (!destination) {
        logger.debug("Dropping link to node not seen this run", {
          source: node.name,
          destination: observed.destinationName || observed.destinationIp,
        });
        count(stats, "links: missing node");
        continue;
      }

      const key = { sourceId: node.id, destinationId: destination.id, medium: observed.medium };
      const keyString = linkKeyString(key);
      if (links.has(keyString)) {
        count(stats, "links: duplicate");
        continue;
      }

      const source = node.attributes;
      const far = destination.attributes;
      const geometry =
        hasCoordinates(source) && hasCoordinates(far)
          ? { distance: distanceKm(source, far), bearing: bearingDegrees(source, far) }
          : { distance: null, bearing: null };
      const knownFirstSeen = firstSeen.get(keyString);
      count(stats, knownFirstSeen === undefined ? "links: new" : "links: updated");

      links.set(keyString, {
        ...key,
        interfaceName: observed.interfaceName,
        signal: observed.signal,
        noise: observed.noise,
        txRate: observed.txRate,
        rxRate: observed.rxRate,
        quality: observed.quality,
        neighborQuality: observed.neighborQuality,
        cost: observed.cost,
        ...geometry,
        firstSeen: knownFirstSeen ?? now,
        lastSeen: now,
        status: "current",
      });
    }

    const byMedium = (medium: LinkObservation["medium"]) => reported.filter((link) => link.medium === medium).length;
    nodes.push({
      ...node,
      attributes: {
        ...node.attributes,
        linkCount: reported.length,
        radioLinkCount: observation.hasLinkInfo ? byMedium("radio") : null,
        dtdLinkCount: observation.hasLinkInfo ? byMedium("dtd") : null,
        tunnelLinkCount: observation.hasLinkInfo ? byMedium("tunnel") : node.attributes.activeTunnelCount,
      },
    });
  }

  return { links: [...links.values()], nodes, stats };
}
