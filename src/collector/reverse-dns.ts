import { lookup, Resolver } from "node:dns/promises";
import { logger } from "../config/logger.js";
import { normalizeNodeName } from "./normalizer.js";
import type { FetchError } from "./types.js";
import { runPool } from "./worker-pool.js";

/** Resolves an address to the node name it is registered under; "" when unknown. Never rejects. */
export type ReverseLookup = (address: string) => Promise<string>;

/**
 * PTR lookups against the mesh's own DNS (served by the local node), which
 * knows names of nodes that failed to answer their status request.
 */
export function createReverseLookup(dnsServer: string, timeoutMs: number): ReverseLookup {
  let resolver: Promise<Resolver> | null = null;

  const getResolver = (): Promise<Resolver> => {
    resolver ??= (async () => {
      const r = new Resolver({ timeout: timeoutMs, tries: 1 });
      const { address } = await lookup(dnsServer);
      r.setServers([address]);
      return r;
    })().catch((err: unknown) => {
      // Resolve the server again on the next lookup
      resolver = null;
      throw err;
    });
    return resolver;
  };

  return async (address) => {
    try {
      const names = await (await getResolver()).reverse(address);
      const name = (names[0] ?? "").replace(/\.$/, "");
      return name ? normalizeNodeName(name) : "";
    } catch (err) {
      logger.debug("Reverse DNS lookup failed", { address, error: err instanceof Error ? err.message : String(err) });
      return "";
    }
  };
}

/** Fill in `dnsName` on each error, at most `concurrency` lookups at a time. */
export async function labelErrors(
  errors: readonly FetchError[],
  reverseLookup: ReverseLookup,
  options: { concurrency: number; timeoutMs: number },
): Promise<FetchError[]> {
  return runPool<FetchError, FetchError>(
    errors,
    async (error) => ({ ...error, dnsName: await reverseLookup(error.address) }),
    {
      concurrency: options.concurrency,
      timeoutMs: options.timeoutMs,
      onTimeout: (error) => error,
      onError: (error) => error,
    },
  );
}
