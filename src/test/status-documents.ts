/**
 * Builders for status documents and collector values used across tests.
 */
import type { Link, LinkObservation, Node, NodeAttributes, NodeObservation } from "../collector/types.js";

export function flatDocument(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    node: "K6ABC-Hill",
    api_version: "1.5",
    interfaces: [
      { name: "wlan0", mac: "AA:BB:CC:00:11:22", ip: "10.1.2.3" },
      { name: "br-lan", mac: "aa:bb:cc:00:11:23", ip: "10.200.1.1" },
    ],
    lat: "34.1",
    lon: "-118.2",
    grid_square: "DM04",
    ssid: "MeshNet-10-v3",
    channel: "-2",
    chanbw: "10",
    freq: "2397",
    firmware_version: "3.20.3.1",
    firmware_mfg: "MeshFW",
    model: "Test Radio M2",
    board_id: "0xe0a2",
    description: "Hill &amp; Tower",
    uptime: "2 days, 01:00:00",
    loads: [0.1, 0.2, 0.3],
    tunnel_installed: "false",
    services_local: [{ name: "Web", protocol: "tcp", link: "http://k6abc-hill:80/" }, { bogus: true }],
    ...overrides,
  };
}

export function nestedDocument(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    node: "N0CALL-Roof",
    api_version: "1.13",
    interfaces: [{ name: "wlan0", mac: "02:00:00:00:00:01", ip: "10.9.9.9" }],
    lat: 34,
    lon: -118,
    sysinfo: { uptime: "05:00:00", loads: [0.5, "x", 0.1] },
    meshrf: { status: "on", ssid: "MeshNet-20-v3", channel: 149, chanbw: "20", freq: "5745" },
    node_details: {
      description: "",
      firmware_version: "3.24.4.0",
      firmware_mfg: "MeshFW",
      model: "Test Dish 5",
      board_id: "0x0000",
    },
    tunnels: { active_tunnel_count: 2, tunnel_installed: true },
    link_info: {
      "10.9.9.10": {
        hostname: "N0CALL-Tower.local.mesh",
        linkType: "RF",
        olsrInterface: "wlan0",
        linkQuality: 0.95,
        neighborLinkQuality: 0.9,
        signal: -65,
        noise: -95,
        tx_rate: 130,
        rx_rate: 117,
        linkCost: 1.1,
      },
      "10.9.9.11": {
        hostname: "dtdlink.N0CALL-Shed.local.mesh",
        linkType: "DTD",
        olsrInterface: "br-dtdlink",
        linkQuality: 1,
        neighborLinkQuality: 1,
        signal: -10,
        linkCost: 0.1,
      },
      "10.9.9.12": {
        hostname: "KX1Z-Far.local.mesh",
        linkType: "WIREGUARD",
        olsrInterface: "wg0",
        linkQuality: 1,
        neighborLinkQuality: 1,
        linkCost: "INFINITE",
      },
    },
    ...overrides,
  };
}

export function makeAttributes(overrides: Partial<NodeAttributes> = {}): NodeAttributes {
  return {
    description: "",
    model: "",
    boardId: "",
    firmwareVersion: "",
    firmwareManufacturer: "",
    apiVersion: "1.13",
    upTime: "",
    upTimeSeconds: null,
    loadAverages: null,
    ssid: "",
    channel: "",
    channelBandwidth: "",
    frequency: "",
    band: "Unknown",
    services: [],
    tunnelInstalled: null,
    activeTunnelCount: 0,
    latitude: null,
    longitude: null,
    gridSquare: "",
    lanIp: null,
    linkCount: null,
    radioLinkCount: null,
    dtdLinkCount: null,
    tunnelLinkCount: null,
    ...overrides,
  };
}

export function makeObservation(overrides: Partial<NodeObservation> = {}): NodeObservation {
  const name = overrides.name ?? "node-a";
  return {
    address: overrides.wlanIp ?? "10.0.0.1",
    name,
    displayName: name.toUpperCase(),
    wlanIp: "10.0.0.1",
    macAddress: "",
    generation: "nested",
    attributes: makeAttributes(),
    hasLinkInfo: false,
    links: [],
    ...overrides,
  };
}

export function makeLinkObservation(overrides: Partial<LinkObservation> = {}): LinkObservation {
  return {
    sourceName: "node-a",
    destinationName: "node-b",
    destinationIp: "10.0.0.2",
    medium: "radio",
    interfaceName: "wlan0",
    signal: -70,
    noise: -95,
    txRate: 65,
    rxRate: 58,
    quality: 90,
    neighborQuality: 85,
    cost: 1.2,
    ...overrides,
  };
}

export function makeNode(overrides: Partial<Node> = {}): Node {
  return {
    id: "node-id-a",
    name: "node-a",
    displayName: "NODE-A",
    wlanIp: "10.0.0.1",
    macAddress: "",
    attributes: makeAttributes(),
    firstSeen: 0,
    lastSeen: 0,
    status: "current",
    ...overrides,
  };
}

export function makeLink(overrides: Partial<Link> = {}): Link {
  return {
    sourceId: "node-id-a",
    destinationId: "node-id-b",
    medium: "radio",
    interfaceName: "wlan0",
    signal: -70,
    noise: -95,
    txRate: 65,
    rxRate: 58,
    quality: 90,
    neighborQuality: 85,
    cost: 1.2,
    distance: null,
    bearing: null,
    firstSeen: 0,
    lastSeen: 0,
    status: "current",
    ...overrides,
  };
}
