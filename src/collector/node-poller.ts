import { logger } from "../config/logger.js";
import { describeError } from "./status-client.js";
import { type FetchError, type FetchResult, isFetchError } from "./types.js";
import { runPool } from "./worker-pool.js";

export interface NodeFetcher {
  fetchAndParse(address: string, signal: AbortSignal): Promise<FetchResult>;
}

export interface NodePollerOptions {
  /** Maximum in-flight status requests. Default: 50 */
  concurrency?: number;
  /** Per-node deadline in ms. Default: 30000 */
  timeoutMs?: number;
}

/**
 * Drives fetch-and-parse over every discovered address with bounded
 * concurrency and a per-node deadline.
 *
 * Calls to `run` are serialized: a second call waits until the previous
 * call's fetch phase has finished, so requests from consecutive runs never
 * pile up on the mesh.
 */
export class NodePoller {
  private readonly fetcher: NodeFetcher;
  private readonly concurrency: number;
  private readonly timeoutMs: number;

  private tail: Promise<void> = Promise.resolve();
  private active = 0;

  constructor(fetcher: NodeFetcher, options: NodePollerOptions = {}) {
    this.fetcher = fetcher;
    this.concurrency = options.concurrency ?? 50;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  /** True while a fetch phase is running or queued. */
  get busy(): boolean {
    return this.active > 0;
  }

  run(addresses: readonly string[]): Promise<FetchResult[]> {
    this.active++;
    const run = this.tail.then(() => this.poll(addresses)).finally(() => {
      this.active--;
    });
    // The caller observes failures through `run`; the queue only needs ordering.
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async poll(addresses: readonly string[]): Promise<FetchResult[]> {
    const startedAt = Date.now();
    logger.info("Polling nodes", { count: addresses.length, concurrency: this.concurrency, timeoutMs: this.timeoutMs });

    const results = await runPool<string, FetchResult>(
      addresses,
      (address, signal) => this.fetcher.fetchAndParse(address, signal),
      {
        concurrency: this.concurrency,
        timeoutMs: this.timeoutMs,
        onTimeout: (address): FetchError => ({
          address,
          dnsName: "",
          category: "FetchTimeout",
          details: `No response within ${this.timeoutMs}ms`,
        }),
        onError: (address, err): FetchError => ({
          address,
          dnsName: "",
          category: "FetchTransportError",
          details: describeError(err),
        }),
      },
    );

    const errors = results.filter(isFetchError).length;
    logger.info("Querying nodes finished", {
      elapsedMs: Date.now() - startedAt,
      nodes: results.length - errors,
      errors,
    });
    return results;
  }
}
