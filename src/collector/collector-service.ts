import { logger } from "../config/logger.js";
import { captureError } from "../observability/sentry.js";
import type { CollectionResult } from "./collector.js";

/** Service loop configuration */
export interface CollectorServiceConfig {
  /** Run period in milliseconds; runs start on multiples of it. */
  periodMs?: number;
}

/**
 * Collector service — runs a collection at the start of every period.
 *
 * Runs never overlap: a tick that arrives while the previous run is still
 * going is skipped with a warning.
 */
export class CollectorService {
  private readonly collector: { collect(): Promise<CollectionResult> };
  private readonly PERIOD_MS: number;

  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<CollectionResult | null> | null = null;

  constructor(collector: { collect(): Promise<CollectionResult> }, config: CollectorServiceConfig = {}) {
    this.collector = collector;
    this.PERIOD_MS = config.periodMs ?? 5 * 60_000;
  }

  /** True while a run is in progress. */
  get running(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Start the period timer
   */
  start(): void {
    if (this.timer) {
      logger.warn("Collector service already running");
      return;
    }
    logger.info("Starting collector service", { periodMs: this.PERIOD_MS });
    this.schedule();
  }

  /**
   * Stop the period timer. A run in progress is left to finish.
   */
  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
      logger.info("Collector service stopped");
    }
  }

  /**
   * Run one collection now, unless one is already in progress.
   * Resolves to null when skipped or when the run failed outright.
   */
  runOnce(): Promise<CollectionResult | null> {
    if (this.inFlight) {
      logger.warn("Previous collection still running, skipping this one");
      return Promise.resolve(null);
    }

    const run = this.collector
      .collect()
      .catch((err: unknown) => {
        logger.error("Collection run failed", { error: err instanceof Error ? err.message : String(err) });
        captureError(err, { source: "collector-service" });
        return null;
      })
      .finally(() => {
        this.inFlight = null;
      });
    this.inFlight = run;
    return run;
  }

  /** Milliseconds from `now` until the next period boundary. */
  delayUntilNextRun(now: number): number {
    return this.PERIOD_MS - (now % this.PERIOD_MS);
  }

  private schedule(): void {
    this.timer = setTimeout(() => {
      this.schedule();
      void this.runOnce();
    }, this.delayUntilNextRun(Date.now()));
  }
}
