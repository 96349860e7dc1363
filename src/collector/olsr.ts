import { Socket } from "node:net";
import { logger } from "../config/logger.js";
import { MAX_LINK_COST, toLinkCost } from "./values.js";

/** One routing-table edge as advertised by the routing daemon. */
export interface TopoLink {
  source: string;
  destination: string;
  cost: number;
}

export interface RoutingTable {
  /** Every mesh address that appears as an edge source. */
  addresses: Set<string>;
  linksBySource: Map<string, TopoLink[]>;
}

export type RoutingTableQuery = () => Promise<string>;

/**
 * Lines of the daemon's dot-draw output look like
 *
 *     "10.32.66.190" -> "10.80.213.95"[label="1.000"];
 *
 * Announced networks ("HNA") point at CIDR blocks and are not nodes.
 */
const NODE_LINE = /^"(\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3})" -> "\d+/;
const LINK_LINE = /^"(10\.\d{1,3}\.\d{1,3}\.\d{1,3})" -> "(10\.\d{1,3}\.\d{1,3}\.\d{1,3})"\[label="(.+?)"\];/;

export function parseRoutingTable(text: string): RoutingTable {
  const table: RoutingTable = { addresses: new Set(), linksBySource: new Map() };

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trimEnd();
    const node = NODE_LINE.exec(line);
    if (node) table.addresses.add(node[1]);

    const link = LINK_LINE.exec(line);
    if (!link) continue;
    const [, source, destination, label] = link;
    const links = table.linksBySource.get(source) ?? [];
    if (links.some((l) => l.destination === destination)) continue;
    links.push({ source, destination, cost: toLinkCost(label) ?? MAX_LINK_COST });
    table.linksBySource.set(source, links);
  }

  return table;
}

/**
 * Connect to the routing daemon's topology port and read until it closes
 * the connection. The timeout covers connecting and reading.
 */
export function queryRoutingDaemon(host: string, port: number, timeoutMs: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const socket = new Socket();
    const chunks: Buffer[] = [];
    let done = false;

    const finish = (err: Error | null) => {
      if (done) return;
      done = true;
      clearTimeout(timer);
      socket.destroy();
      if (err) reject(err);
      else resolve(Buffer.concat(chunks).toString("utf8"));
    };

    const timer = setTimeout(() => {
      finish(new Error(`Timed out after ${timeoutMs}ms reading routing table from ${host}:${port}`));
    }, timeoutMs);

    logger.debug("Connecting to routing daemon for topology data", { host, port });
    socket.on("data", (chunk: Buffer) => chunks.push(chunk));
    socket.on("end", () => finish(null));
    socket.on("error", (err) => finish(err));
    socket.connect(port, host);
  });
}
