import * as Sentry from "@sentry/node";
import { config } from "../config/index.js";

/**
 * Initialize Sentry SDK. Call at the very top of src/index.ts.
 *
 * Reads SENTRY_DSN from env. If absent, Sentry is disabled (no-op).
 */
export function initSentry(dsn: string | undefined = process.env.SENTRY_DSN): void {
  if (!dsn) return;

  Sentry.init({
    dsn,
    environment: config.nodeEnv,
    release: process.env.SENTRY_RELEASE ?? undefined,
    tracesSampleRate: config.nodeEnv === "production" ? 0.1 : 1.0,
    // Deduplicate — a mesh-wide outage produces the same error every run
    integrations: [Sentry.dedupeIntegration()],
  });
}

/**
 * Capture an exception in Sentry with collector tags.
 */
export function captureError(
  error: unknown,
  context?: {
    source?: string;
    localNode?: string;
    extra?: Record<string, unknown>;
  },
): void {
  Sentry.captureException(error, {
    tags: {
      ...(context?.source && { source: context.source }),
      ...(context?.localNode && { localNode: context.localNode }),
    },
    extra: context?.extra,
  });
}
