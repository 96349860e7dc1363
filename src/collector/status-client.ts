import { logger } from "../config/logger.js";
import { StatusParseError } from "./errors.js";
import { normalizeStatusDocument } from "./normalizer.js";
import type { FetchError, FetchErrorCategory, FetchResult } from "./types.js";

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface StatusClientOptions {
  /** Port serving `/cgi-bin/sysinfo.json`. Default: 8080 */
  port?: number;
  fetchFn?: FetchFn;
}

/** Raw payloads kept for diagnostics are cut to this many characters. */
const MAX_DETAILS_LENGTH = 2_000;

const STATUS_PATH = "/cgi-bin/sysinfo.json";

export function describeError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  const cause = err.cause;
  if (cause instanceof Error) {
    return "code" in cause && typeof cause.code === "string"
      ? `${err.message} (${cause.code})`
      : `${err.message} (${cause.message})`;
  }
  return err.message;
}

function truncate(text: string): string {
  return text.length > MAX_DETAILS_LENGTH ? `${text.slice(0, MAX_DETAILS_LENGTH)}…` : text;
}

function failure(address: string, category: FetchErrorCategory, details: string): FetchError {
  return { address, dnsName: "", category, details: truncate(details) };
}

/**
 * Fetches node status documents over HTTP.
 *
 * The caller owns the deadline: the AbortSignal it passes bounds the whole
 * exchange (connect, headers and body). Nothing here throws for a per-node
 * problem; every outcome is a NodeObservation or a categorized FetchError.
 */
export class StatusClient {
  private readonly port: number;
  private readonly fetchFn: FetchFn;

  constructor(options: StatusClientOptions = {}) {
    this.port = options.port ?? 8080;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  }

  statusUrl(address: string, params: Record<string, string>): string {
    const query = new URLSearchParams(params).toString();
    return `http://${address}:${this.port}${STATUS_PATH}?${query}`;
  }

  async fetchAndParse(address: string, signal: AbortSignal): Promise<FetchResult> {
    const url = this.statusUrl(address, { services_local: "1", link_info: "1" });

    let status: number;
    let body: string;
    try {
      const res = await this.fetchFn(url, { method: "GET", signal });
      status = res.status;
      // Descriptions pasted from other encodings are not always valid UTF-8
      body = new TextDecoder("utf-8", { fatal: false }).decode(await res.arrayBuffer());
    } catch (err) {
      const category: FetchErrorCategory =
        signal.aborted || (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError"))
          ? "FetchTimeout"
          : "FetchTransportError";
      logger.debug("Status request failed", { address, category, error: describeError(err) });
      return failure(address, category, describeError(err));
    }

    if (status !== 200) {
      logger.debug("Status request returned HTTP error", { address, status });
      return failure(address, "FetchHttpError", `${status}: ${body}`);
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(body);
    } catch {
      logger.debug("Invalid JSON in status response", { address });
      return failure(address, "FetchParseError", `Invalid JSON: ${body}`);
    }

    try {
      return normalizeStatusDocument(decoded, address);
    } catch (err) {
      if (!(err instanceof StatusParseError)) {
        logger.warn("Unexpected error normalizing status document", { address, error: describeError(err) });
      }
      return failure(address, "FetchParseError", `${describeError(err)}: ${body}`);
    }
  }

  /**
   * Fetch a node's status document with its topology section, for topology
   * fallback. Unlike `fetchAndParse`, failures are thrown.
   */
  async fetchTopologyDocument(address: string, signal: AbortSignal): Promise<unknown> {
    const url = this.statusUrl(address, { topology: "1", link_info: "1" });
    const res = await this.fetchFn(url, { method: "GET", signal });
    if (!res.ok) {
      throw new Error(`HTTP ${res.status} from ${address}`);
    }
    return res.json();
  }
}
