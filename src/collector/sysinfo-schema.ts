import { z } from "zod";
import { StatusParseError } from "./errors.js";
import type { SchemaGeneration } from "./types.js";

/**
 * Wire schemas for a node's `sysinfo.json` status document.
 *
 * Two generations exist in the field:
 *
 * - flat:   radio and firmware details at the document root, tunnel support
 *           reported as a `tunnel_installed` flag (count optional)
 * - nested: details grouped under `meshrf`, `node_details`, `sysinfo` and
 *           `tunnels`, with a numeric `active_tunnel_count`
 *
 * Only the fields needed to identify a node are required. Everything else is
 * optional and loosely typed here; the normalizer decides what a malformed
 * value means.
 */

/** Highest `1.x` API minor version accepted. Newer documents fail closed. */
export const MAX_SUPPORTED_API_MINOR = 20;

/** Strings that some firmware emits as bare numbers (channel "36" vs 36). */
const text = z
  .union([z.string(), z.number()])
  .transform((v) => String(v))
  .optional();

const loose = z.unknown().optional();

export const interfaceSchema = z.object({
  name: z.string(),
  mac: z.string().optional(),
  ip: z.string().nullable().optional(),
});
export type RawInterface = z.infer<typeof interfaceSchema>;

export const serviceSchema = z.object({
  name: z.string(),
  protocol: z.string(),
  link: z.string(),
});

export const linkInfoEntrySchema = z.object({
  hostname: z.string().min(1),
  linkType: z.string().optional(),
  olsrInterface: z.string().optional(),
  linkQuality: loose,
  neighborLinkQuality: loose,
  signal: loose,
  noise: loose,
  tx_rate: loose,
  rx_rate: loose,
  linkCost: loose,
});
export type RawLinkInfoEntry = z.infer<typeof linkInfoEntrySchema>;

const commonFields = {
  node: z.string().min(1),
  api_version: z.union([z.string(), z.number()]).transform((v) => String(v)),
  interfaces: z.array(interfaceSchema),
  lat: loose,
  lon: loose,
  grid_square: text,
  /** Entries are validated one by one so a single bad service does not sink the node. */
  services_local: z.array(z.unknown()).optional(),
  /** Keyed by the neighbor's IP address. */
  link_info: z.record(z.string(), z.unknown()).optional(),
};

export const flatDocumentSchema = z.object({
  ...commonFields,
  ssid: text,
  channel: text,
  chanbw: text,
  freq: text,
  firmware_version: text,
  firmware_mfg: text,
  model: text,
  board_id: text,
  description: text,
  uptime: text,
  loads: z.array(z.unknown()).optional(),
  tunnel_installed: loose,
  active_tunnel_count: loose,
});
export type FlatDocument = z.infer<typeof flatDocumentSchema>;

export const nestedDocumentSchema = z.object({
  ...commonFields,
  sysinfo: z
    .object({
      uptime: text,
      loads: z.array(z.unknown()).optional(),
    })
    .optional(),
  meshrf: z
    .object({
      status: text,
      ssid: text,
      channel: text,
      chanbw: text,
      freq: text,
    })
    .optional(),
  node_details: z
    .object({
      description: text,
      firmware_version: text,
      firmware_mfg: text,
      model: text,
      board_id: text,
    })
    .optional(),
  tunnels: z
    .object({
      active_tunnel_count: loose,
      tunnel_installed: loose,
    })
    .optional(),
});
export type NestedDocument = z.infer<typeof nestedDocumentSchema>;

export type StatusDocument =
  | { generation: "flat"; apiVersion: ApiVersion; document: FlatDocument }
  | { generation: "nested"; apiVersion: ApiVersion; document: NestedDocument };

export interface ApiVersion {
  major: number;
  minor: number;
}

const NESTED_MARKERS = ["meshrf", "node_details", "sysinfo", "tunnels"] as const;

export function parseApiVersion(raw: unknown): ApiVersion | null {
  if (typeof raw !== "string" && typeof raw !== "number") return null;
  const match = /^(\d+)\.(\d+)$/.exec(String(raw).trim());
  if (!match) return null;
  return { major: Number(match[1]), minor: Number(match[2]) };
}

export function compareApiVersion(a: ApiVersion, b: ApiVersion): number {
  return a.major - b.major || a.minor - b.minor;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function detectGeneration(raw: Record<string, unknown>): SchemaGeneration {
  return NESTED_MARKERS.some((key) => isRecord(raw[key])) ? "nested" : "flat";
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

/**
 * Validate a decoded status document and tag it with its generation.
 *
 * @throws StatusParseError when the payload is not an object, its API
 *   version is missing or unsupported, or required fields are absent
 */
export function parseStatusDocument(raw: unknown): StatusDocument {
  if (!isRecord(raw)) {
    throw new StatusParseError("Status document is not a JSON object");
  }

  const apiVersion = parseApiVersion(raw.api_version);
  if (!apiVersion) {
    throw new StatusParseError(`Missing or malformed api_version: ${JSON.stringify(raw.api_version)}`);
  }
  if (apiVersion.major !== 1 || apiVersion.minor > MAX_SUPPORTED_API_MINOR) {
    throw new StatusParseError(`Unsupported api_version ${apiVersion.major}.${apiVersion.minor}`);
  }

  if (detectGeneration(raw) === "nested") {
    const result = nestedDocumentSchema.safeParse(raw);
    if (!result.success) throw new StatusParseError(`Invalid nested status document: ${describeIssues(result.error)}`);
    return { generation: "nested", apiVersion, document: result.data };
  }

  const result = flatDocumentSchema.safeParse(raw);
  if (!result.success) throw new StatusParseError(`Invalid flat status document: ${describeIssues(result.error)}`);
  return { generation: "flat", apiVersion, document: result.data };
}
