import { describe, expect, it, vi } from "vitest";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { TopologyUnavailableError } from "./errors.js";
import { extractNeighborAddresses, TopologySource } from "./topology.js";

const DUMP = '"10.1.1.1" -> "10.2.2.2"[label="1.000"];\n"10.2.2.2" -> "10.1.1.1"[label="1.000"];\n';

function makeSource(deps: {
  queryRoutingTable?: (host: string) => Promise<string>;
  fetchStatusDocument?: (host: string, signal: AbortSignal) => Promise<unknown>;
}) {
  const queryRoutingTable = vi.fn<(host: string) => Promise<string>>(deps.queryRoutingTable ?? (async () => DUMP));
  const fetchStatusDocument = vi.fn<(host: string, signal: AbortSignal) => Promise<unknown>>(
    deps.fetchStatusDocument ?? (async () => ({})),
  );
  return {
    source: new TopologySource({ queryRoutingTable, fetchStatusDocument, timeoutMs: 1_000 }),
    queryRoutingTable,
    fetchStatusDocument,
  };
}

describe("extractNeighborAddresses", () => {
  it("merges topology destinations and link_info keys", () => {
    expect(
      extractNeighborAddresses({
        topology: [{ destinationIP: "10.5.5.5", lastHopIP: "10.0.0.1" }, { destinationIP: "not-an-ip" }],
        link_info: { "10.4.4.4": {}, "10.5.5.5": {} },
      }),
    ).toEqual(["10.4.4.4", "10.5.5.5"]);
  });

  it("skips out-of-range and IPv6 addresses", () => {
    expect(
      extractNeighborAddresses({
        topology: [{ destinationIP: "999.1.1.1" }, { destinationIP: "10.6.6.6" }],
        link_info: { "fe80::1": {}, "10.256.0.1": {} },
      }),
    ).toEqual(["10.6.6.6"]);
  });

  it("returns nothing for unexpected shapes", () => {
    expect(extractNeighborAddresses("nope")).toEqual([]);
    expect(extractNeighborAddresses({ topology: "nope" })).toEqual([]);
  });
});

describe("TopologySource.discover", () => {
  it("uses the routing table when it yields addresses", async () => {
    const { source, fetchStatusDocument, queryRoutingTable } = makeSource({});
    const topology = await source.discover("localnode");

    expect(queryRoutingTable).toHaveBeenCalledWith("localnode");
    expect(fetchStatusDocument).not.toHaveBeenCalled();
    expect(topology.source).toBe("routing-table");
    expect(topology.partial).toBe(false);
    expect(topology.addresses).toEqual(["10.1.1.1", "10.2.2.2"]);
    expect(topology.linksBySource.get("10.1.1.1")).toEqual([{ source: "10.1.1.1", destination: "10.2.2.2", cost: 1 }]);
  });

  it("falls back to the local status document when the routing daemon is unreachable", async () => {
    const { source, fetchStatusDocument } = makeSource({
      queryRoutingTable: async () => {
        throw new Error("connect ECONNREFUSED");
      },
      fetchStatusDocument: async () => ({ link_info: { "10.7.7.7": {}, "10.6.6.6": {} } }),
    });

    const topology = await source.discover("localnode");

    expect(fetchStatusDocument).toHaveBeenCalledWith("localnode", expect.any(AbortSignal));
    expect(topology).toEqual({
      addresses: ["10.6.6.6", "10.7.7.7"],
      linksBySource: new Map(),
      source: "status-document",
      partial: true,
    });
  });

  it("falls back when the routing table is empty", async () => {
    const { source } = makeSource({
      queryRoutingTable: async () => "",
      fetchStatusDocument: async () => ({ topology: [{ destinationIP: "10.8.8.8" }] }),
    });
    const topology = await source.discover("localnode");
    expect(topology.partial).toBe(true);
    expect(topology.addresses).toEqual(["10.8.8.8"]);
  });

  it("throws TopologyUnavailableError when neither source works", async () => {
    const { source } = makeSource({
      queryRoutingTable: async () => {
        throw new Error("timed out");
      },
      fetchStatusDocument: async () => {
        throw new Error("HTTP 500 from localnode");
      },
    });

    const error = await source.discover("localnode").catch((err: unknown) => err);
    expect(error).toBeInstanceOf(TopologyUnavailableError);
    expect(error).toMatchObject({
      localNode: "localnode",
      routingTableError: "timed out",
      fallbackError: "HTTP 500 from localnode",
    });
  });

  it("throws when the fallback lists no neighbors", async () => {
    const { source } = makeSource({
      queryRoutingTable: async () => "",
      fetchStatusDocument: async () => ({ link_info: {} }),
    });
    await expect(source.discover("localnode")).rejects.toMatchObject({
      routingTableError: "routing table contained no node entries",
      fallbackError: "status document listed no neighbors",
    });
  });
});
