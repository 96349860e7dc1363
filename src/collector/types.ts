/**
 * Canonical, firmware-independent model of what one collection run sees.
 *
 * Observations are transient (owned by a single run); Node, Link and PollRun
 * are what the run hands to persistence. All timestamps are epoch milliseconds.
 */

export const LINK_MEDIA = ["radio", "dtd", "tunnel", "unknown"] as const;
export type LinkMedium = (typeof LINK_MEDIA)[number];

export const LINK_MEDIUM_LABELS: Record<LinkMedium, string> = {
  radio: "Radio",
  dtd: "DTD",
  tunnel: "Tunnel",
  unknown: "Unknown",
};

export const BANDS = ["900MHz", "2.4GHz", "3.4GHz", "5.8GHz", "Off", "Unknown"] as const;
export type Band = (typeof BANDS)[number];

export const LIFECYCLE_STATUSES = ["current", "recent", "inactive"] as const;
export type LifecycleStatus = (typeof LIFECYCLE_STATUSES)[number];

/** Status document generations the normalizer understands. */
export type SchemaGeneration = "flat" | "nested";

export const FETCH_ERROR_CATEGORIES = ["FetchTimeout", "FetchTransportError", "FetchHttpError", "FetchParseError"] as const;
export type FetchErrorCategory = (typeof FETCH_ERROR_CATEGORIES)[number];

export const RUN_ERROR_CATEGORIES = [...FETCH_ERROR_CATEGORIES, "TopologyUnavailable"] as const;
export type RunErrorCategory = (typeof RUN_ERROR_CATEGORIES)[number];

export interface Service {
  name: string;
  protocol: string;
  link: string;
}

export interface LinkObservation {
  sourceName: string;
  destinationName: string;
  destinationIp: string;
  medium: LinkMedium;
  interfaceName: string;
  signal: number | null;
  noise: number | null;
  txRate: number | null;
  rxRate: number | null;
  /** Percent, 0–100. */
  quality: number | null;
  /** Percent, 0–100. */
  neighborQuality: number | null;
  /** Routing cost, 0–99.99 where 99.99 means unreachable. */
  cost: number | null;
}

/** Status fields that are carried onto the persisted Node verbatim. */
export interface NodeAttributes {
  description: string;
  model: string;
  boardId: string;
  firmwareVersion: string;
  firmwareManufacturer: string;
  apiVersion: string;
  upTime: string;
  upTimeSeconds: number | null;
  loadAverages: number[] | null;
  ssid: string;
  channel: string;
  channelBandwidth: string;
  frequency: string;
  band: Band;
  services: Service[];
  tunnelInstalled: boolean | null;
  activeTunnelCount: number;
  latitude: number | null;
  longitude: number | null;
  gridSquare: string;
  lanIp: string | null;
  /** Null until links have been built for this run (unknown for firmware without link data). */
  linkCount: number | null;
  radioLinkCount: number | null;
  dtdLinkCount: number | null;
  tunnelLinkCount: number | null;
}

export interface NodeObservation {
  /** Address the status document was fetched from. */
  address: string;
  /** Lowercased node name. */
  name: string;
  displayName: string;
  wlanIp: string | null;
  /** Lowercase hex without separators; empty when unknown. */
  macAddress: string;
  generation: SchemaGeneration;
  attributes: NodeAttributes;
  /** Whether the document carried per-link data at all. */
  hasLinkInfo: boolean;
  links: LinkObservation[];
}

export interface FetchError {
  address: string;
  /** Reverse-DNS name, filled in after polling; empty when unknown. */
  dnsName: string;
  category: FetchErrorCategory;
  /** Error message or the raw response, for diagnostics. */
  details: string;
}

export type FetchResult = NodeObservation | FetchError;

export function isFetchError(result: FetchResult): result is FetchError {
  return "category" in result;
}

export interface Node {
  id: string;
  name: string;
  displayName: string;
  wlanIp: string | null;
  macAddress: string;
  attributes: NodeAttributes;
  firstSeen: number;
  lastSeen: number;
  status: LifecycleStatus;
}

export interface LinkKey {
  sourceId: string;
  destinationId: string;
  medium: LinkMedium;
}

export interface Link extends LinkKey {
  interfaceName: string;
  signal: number | null;
  noise: number | null;
  txRate: number | null;
  rxRate: number | null;
  quality: number | null;
  neighborQuality: number | null;
  cost: number | null;
  /** Kilometres. */
  distance: number | null;
  /** Degrees, [0, 360). */
  bearing: number | null;
  firstSeen: number;
  lastSeen: number;
  status: LifecycleStatus;
}

export function linkKeyString(key: LinkKey): string {
  return `${key.sourceId}-${key.destinationId}-${key.medium}`;
}

export interface RunError {
  address: string;
  dnsName: string;
  category: RunErrorCategory;
  details: string;
}

export interface ReconciliationConflict {
  identityKey: string;
  names: string[];
  nodeIds: string[];
}

export const TOPOLOGY_SOURCES = ["routing-table", "status-document", "none"] as const;
export type TopologySource = (typeof TOPOLOGY_SOURCES)[number];

export interface PollRun {
  startedAt: number;
  pollingDurationMs: number;
  totalDurationMs: number;
  nodeCount: number;
  linkCount: number;
  errorCount: number;
  partialTopology: boolean;
  topologySource: TopologySource;
  errors: RunError[];
  errorsByCategory: Record<RunErrorCategory, number>;
  /** Keyed by `errorLabel()`: "name (address)", or "name unknown (address)". */
  errorsByAddress: Record<string, RunErrorCategory>;
  conflicts: ReconciliationConflict[];
  stats: Record<string, number>;
}

export interface NodeSample {
  nodeId: string;
  timestamp: number;
  upTimeSeconds: number | null;
  load1: number | null;
  linkCount: number | null;
  radioLinkCount: number | null;
  dtdLinkCount: number | null;
  tunnelLinkCount: number | null;
}

export interface LinkSample {
  linkKey: string;
  timestamp: number;
  signal: number | null;
  noise: number | null;
  quality: number | null;
  neighborQuality: number | null;
  cost: number | null;
  txRate: number | null;
  rxRate: number | null;
}

/** Everything a run produced, tagged with lifecycle status, ready for persistence. */
export interface RunSnapshot {
  timestamp: number;
  nodes: Node[];
  links: Link[];
  nodeSamples: NodeSample[];
  linkSamples: LinkSample[];
}

/** Free-form run counters, e.g. `count(stats, "nodes: added")`. */
export type RunStats = Record<string, number>;

export function count(stats: RunStats, key: string, by = 1): void {
  stats[key] = (stats[key] ?? 0) + by;
}
