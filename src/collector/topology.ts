import { isIP } from "node:net";
import { z } from "zod";
import { logger } from "../config/logger.js";
import { TopologyUnavailableError } from "./errors.js";
import { parseRoutingTable, type TopoLink } from "./olsr.js";
import { describeError } from "./status-client.js";

export interface Topology {
  /** Addresses to poll, sorted. */
  addresses: string[];
  /** Routing-table edges; empty when the topology came from the fallback. */
  linksBySource: Map<string, TopoLink[]>;
  source: "routing-table" | "status-document";
  /** Only the local node's direct neighbors are known. */
  partial: boolean;
}

export interface TopologySourceDeps {
  /** Raw routing-daemon dump for a host. */
  queryRoutingTable: (host: string) => Promise<string>;
  /** Decoded status document (with topology section) for a host. */
  fetchStatusDocument: (host: string, signal: AbortSignal) => Promise<unknown>;
  /** Deadline for the fallback status request. */
  timeoutMs: number;
}

const neighborDocumentSchema = z.object({
  topology: z.array(z.object({ destinationIP: z.string() }).passthrough()).optional(),
  link_info: z.record(z.string(), z.unknown()).optional(),
});

/**
 * Neighbor addresses listed in a node's own status document: the
 * `topology` section where present, plus the keys of `link_info`.
 */
export function extractNeighborAddresses(document: unknown): string[] {
  const parsed = neighborDocumentSchema.safeParse(document);
  if (!parsed.success) return [];
  const addresses = new Set<string>();
  for (const entry of parsed.data.topology ?? []) {
    if (isIP(entry.destinationIP) === 4) addresses.add(entry.destinationIP);
  }
  for (const address of Object.keys(parsed.data.link_info ?? {})) {
    if (isIP(address) === 4) addresses.add(address);
  }
  return [...addresses].sort();
}

/**
 * Discovers which addresses to poll.
 *
 * The routing daemon's table covers the whole mesh and is preferred. When it
 * cannot be reached or yields nothing usable, the local node's status
 * document still lists its direct neighbors; that keeps the run alive with a
 * partial topology instead of failing it.
 */
export class TopologySource {
  constructor(private readonly deps: TopologySourceDeps) {}

  async discover(localNode: string): Promise<Topology> {
    let routingTableError: string;
    try {
      const table = parseRoutingTable(await this.deps.queryRoutingTable(localNode));
      if (table.addresses.size > 0) {
        logger.info("Loaded topology from routing table", {
          localNode,
          nodeCount: table.addresses.size,
          linkCount: [...table.linksBySource.values()].reduce((sum, links) => sum + links.length, 0),
        });
        return {
          addresses: [...table.addresses].sort(),
          linksBySource: table.linksBySource,
          source: "routing-table",
          partial: false,
        };
      }
      routingTableError = "routing table contained no node entries";
    } catch (err) {
      routingTableError = describeError(err);
    }

    logger.warn("Routing table unavailable, falling back to local node status document", {
      localNode,
      error: routingTableError,
    });

    let fallbackError: string;
    try {
      const document = await this.deps.fetchStatusDocument(localNode, AbortSignal.timeout(this.deps.timeoutMs));
      const addresses = extractNeighborAddresses(document);
      if (addresses.length > 0) {
        logger.warn("Using partial topology from local node neighbors", { localNode, nodeCount: addresses.length });
        return { addresses, linksBySource: new Map(), source: "status-document", partial: true };
      }
      fallbackError = "status document listed no neighbors";
    } catch (err) {
      fallbackError = describeError(err);
    }

    throw new TopologyUnavailableError(localNode, routingTableError, fallbackError);
  }
}
