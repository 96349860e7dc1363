import { logger } from "../config/logger.js";
import { deriveBand } from "./band.js";
import {
  type FlatDocument,
  linkInfoEntrySchema,
  type NestedDocument,
  parseStatusDocument,
  type RawInterface,
  serviceSchema,
  type StatusDocument,
} from "./sysinfo-schema.js";
import type { LinkMedium, LinkObservation, NodeAttributes, NodeObservation, Service } from "./types.js";
import {
  parseUptime,
  toFlag,
  toInteger,
  toLinkCost,
  toNumber,
  toPercent,
  unescapeHtml,
} from "./values.js";

/** Interfaces that carry the mesh radio address, most preferred first. */
const WIRELESS_INTERFACES = ["wlan0", "wlan1", "eth0.3975", "eth1.3975", "br-nomesh"] as const;
const LAN_INTERFACES = ["br-lan", "eth0", "eth0.0"] as const;

/** Device-to-device (wired) links: `br-dtdlink` interfaces, `dtdlink.<node>` hostnames. */
const DTD_PATTERN = /(^|[.-])dtdlink([.]|$)/i;
/** Legacy VTun (`tun50`) and WireGuard (`wg0`) tunnel interfaces. */
const TUNNEL_INTERFACE_PATTERN = /^(tun|wg)\d*$/i;
/** Reported link types, across firmware releases. */
const REPORTED_MEDIA: Record<string, LinkMedium> = {
  RF: "radio",
  DTD: "dtd",
  TUN: "tunnel",
  WIREGUARD: "tunnel",
};

/** Secondary-interface hostname prefixes that name the same node. */
const HOSTNAME_PREFIX = /^(dtdlink|mid\d+)\./i;

/** "mid2.K6ABC-Node.local.mesh" → "k6abc-node" */
export function normalizeNodeName(hostname: string): string {
  return hostname.replace(/\.local\.mesh$/i, "").replace(/^\.+/, "").replace(HOSTNAME_PREFIX, "").toLowerCase();
}

export function classifyMedium(input: {
  hostname: string;
  interfaceName: string;
  reportedType: string;
  hasRadioMetrics: boolean;
}): LinkMedium {
  if (DTD_PATTERN.test(input.interfaceName) || DTD_PATTERN.test(input.hostname)) return "dtd";
  if (TUNNEL_INTERFACE_PATTERN.test(input.interfaceName)) return "tunnel";
  const reported = REPORTED_MEDIA[input.reportedType.trim().toUpperCase()];
  if (reported) return reported;
  if (input.hasRadioMetrics) return "radio";
  return "unknown";
}

function toLinkObservation(raw: unknown, sourceName: string, destinationIp: string): LinkObservation | null {
  const parsed = linkInfoEntrySchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn("Skipping malformed link entry", { source: sourceName, destinationIp, issues: parsed.error.issues.length });
    return null;
  }
  const entry = parsed.data;
  const interfaceName = entry.olsrInterface ?? "";
  const signal = toNumber(entry.signal);
  const noise = toNumber(entry.noise);
  const medium = classifyMedium({
    hostname: entry.hostname,
    interfaceName,
    reportedType: entry.linkType ?? "",
    hasRadioMetrics: signal !== null || noise !== null,
  });
  const isRadio = medium === "radio";

  return {
    sourceName,
    destinationName: normalizeNodeName(entry.hostname),
    destinationIp,
    medium,
    interfaceName,
    signal: isRadio ? signal : null,
    noise: isRadio ? noise : null,
    txRate: isRadio ? toNumber(entry.tx_rate) : null,
    rxRate: isRadio ? toNumber(entry.rx_rate) : null,
    quality: isRadio ? toPercent(entry.linkQuality) : null,
    neighborQuality: isRadio ? toPercent(entry.neighborLinkQuality) : null,
    cost: toLinkCost(entry.linkCost),
  };
}

function pickInterface(interfaces: RawInterface[], names: readonly string[]): RawInterface | null {
  for (const name of names) {
    const iface = interfaces.find((i) => i.name === name);
    if (iface && usableIp(iface.ip)) return iface;
  }
  return null;
}

function usableIp(ip: string | null | undefined): ip is string {
  return typeof ip === "string" && ip !== "" && ip !== "none";
}

function parseServices(raw: unknown[] | undefined, node: string): Service[] {
  const services: Service[] = [];
  for (const entry of raw ?? []) {
    const parsed = serviceSchema.safeParse(entry);
    if (parsed.success) services.push(parsed.data);
    else logger.debug("Ignoring malformed service entry", { node });
  }
  return services;
}

function parseLoads(raw: unknown[] | undefined): number[] | null {
  if (!raw) return null;
  const loads = raw.map(toNumber);
  return loads.every((v): v is number => v !== null) ? loads : null;
}

function parseCoordinate(raw: unknown, limit: number): number | null {
  const value = toNumber(raw);
  return value !== null && Math.abs(value) <= limit ? value : null;
}

interface GenerationFields {
  upTime: string;
  loads: unknown[] | undefined;
  radioStatus: string;
  ssid: string;
  channel: string;
  channelBandwidth: string;
  frequency: string;
  description: string;
  firmwareVersion: string;
  firmwareManufacturer: string;
  model: string;
  boardId: string;
  tunnelInstalled: boolean | null;
  activeTunnelCount: number;
}

/** Older firmware: everything at the root, tunnels reported as a flag. */
function flatFields(doc: FlatDocument): GenerationFields {
  const tunnelInstalled = toFlag(doc.tunnel_installed);
  const reportedCount = toInteger(doc.active_tunnel_count);
  return {
    upTime: doc.uptime ?? "",
    loads: doc.loads,
    radioStatus: "on",
    ssid: doc.ssid ?? "",
    channel: doc.channel ?? "",
    channelBandwidth: doc.chanbw ?? "",
    frequency: doc.freq ?? "",
    description: doc.description ?? "",
    firmwareVersion: doc.firmware_version ?? "",
    firmwareManufacturer: doc.firmware_mfg ?? "",
    model: doc.model ?? "",
    boardId: doc.board_id ?? "",
    tunnelInstalled,
    activeTunnelCount: tunnelInstalled === false || reportedCount === null ? 0 : Math.max(0, reportedCount),
  };
}

function nestedFields(doc: NestedDocument): GenerationFields {
  const details = doc.node_details;
  const rf = doc.meshrf;
  const reportedCount = toInteger(doc.tunnels?.active_tunnel_count);
  return {
    upTime: doc.sysinfo?.uptime ?? "",
    loads: doc.sysinfo?.loads,
    radioStatus: rf?.status ?? "on",
    ssid: rf?.ssid ?? "",
    channel: rf?.channel ?? "",
    channelBandwidth: rf?.chanbw ?? "",
    frequency: rf?.freq ?? "",
    description: details?.description ?? "",
    firmwareVersion: details?.firmware_version ?? "",
    firmwareManufacturer: details?.firmware_mfg ?? "",
    model: details?.model ?? "",
    boardId: details?.board_id ?? "",
    tunnelInstalled: toFlag(doc.tunnels?.tunnel_installed),
    activeTunnelCount: reportedCount === null ? 0 : Math.max(0, reportedCount),
  };
}

/** Build the canonical observation from an already-validated, generation-tagged document. */
export function toNodeObservation(parsed: StatusDocument, address: string): NodeObservation {
  const doc = parsed.document;
  const fields = parsed.generation === "nested" ? nestedFields(parsed.document) : flatFields(parsed.document);

  const name = doc.node.toLowerCase();
  const wireless = pickInterface(doc.interfaces, WIRELESS_INTERFACES);
  const lan = pickInterface(doc.interfaces, LAN_INTERFACES);
  if (!wireless) {
    logger.debug("Unable to identify wireless interface", { node: name, address });
  }

  const linkEntries = Object.entries(doc.link_info ?? {});
  const links: LinkObservation[] = [];
  for (const [destinationIp, raw] of linkEntries) {
    const link = toLinkObservation(raw, name, destinationIp);
    if (link) links.push(link);
  }

  const attributes: NodeAttributes = {
    description: unescapeHtml(fields.description),
    model: fields.model,
    boardId: fields.boardId,
    firmwareVersion: fields.firmwareVersion,
    firmwareManufacturer: fields.firmwareManufacturer,
    apiVersion: doc.api_version,
    upTime: fields.upTime,
    upTimeSeconds: fields.upTime === "" ? null : parseUptime(fields.upTime),
    loadAverages: parseLoads(fields.loads),
    ssid: fields.ssid,
    channel: fields.channel,
    channelBandwidth: fields.channelBandwidth,
    frequency: fields.frequency,
    band: deriveBand(fields.radioStatus, fields.boardId, fields.channel),
    services: parseServices(doc.services_local, name),
    tunnelInstalled: fields.tunnelInstalled,
    activeTunnelCount: fields.activeTunnelCount,
    latitude: parseCoordinate(doc.lat, 90),
    longitude: parseCoordinate(doc.lon, 180),
    gridSquare: doc.grid_square ?? "",
    lanIp: lan?.ip ?? null,
    linkCount: null,
    radioLinkCount: null,
    dtdLinkCount: null,
    tunnelLinkCount: null,
  };

  return {
    address,
    name,
    displayName: doc.node,
    wlanIp: wireless?.ip ?? null,
    macAddress: (wireless?.mac ?? "").replace(/[:-]/g, "").toLowerCase(),
    generation: parsed.generation,
    attributes,
    hasLinkInfo: linkEntries.length > 0,
    links,
  };
}

/**
 * Parse and normalize a decoded `sysinfo.json` payload.
 *
 * @throws StatusParseError for payloads that are not a supported schema
 */
export function normalizeStatusDocument(raw: unknown, address: string): NodeObservation {
  return toNodeObservation(parseStatusDocument(raw), address);
}
