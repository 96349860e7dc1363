import type { TopologyUnavailableError } from "./errors.js";
import {
  type FetchError,
  type PollRun,
  RUN_ERROR_CATEGORIES,
  type ReconciliationConflict,
  type RunError,
  type RunErrorCategory,
  type RunStats,
  type TopologySource,
} from "./types.js";

export interface FinalizeInput {
  startedAt: number;
  /** End of the fetch phase (topology + polling). */
  polledAt: number;
  /** End of the node/link persistence hand-off. */
  finishedAt: number;
  nodeCount: number;
  linkCount: number;
  errors: readonly (FetchError | RunError)[];
  topologySource: TopologySource;
  partialTopology: boolean;
  conflicts: readonly ReconciliationConflict[];
  stats: RunStats;
}

/** "name (address)", or "name unknown (address)" when reverse DNS had nothing. */
export function errorLabel(error: { address: string; dnsName: string }): string {
  return `${error.dnsName || "name unknown"} (${error.address})`;
}

function emptyCategoryCounts(): Record<RunErrorCategory, number> {
  return {
    FetchTimeout: 0,
    FetchTransportError: 0,
    FetchHttpError: 0,
    FetchParseError: 0,
    TopologyUnavailable: 0,
  };
}

/** Errors sorted by label so the record reads the same whatever order nodes answered in. */
function sortErrors(errors: readonly (FetchError | RunError)[]): RunError[] {
  return errors
    .map(({ address, dnsName, category, details }) => ({ address, dnsName, category, details }))
    .sort((a, b) => {
      const la = errorLabel(a);
      const lb = errorLabel(b);
      return la < lb ? -1 : la > lb ? 1 : 0;
    });
}

/** Bucket errors by category and by node label. */
export function tallyErrors(
  errors: readonly RunError[],
): Pick<PollRun, "errorsByCategory" | "errorsByAddress"> {
  const errorsByCategory = emptyCategoryCounts();
  const errorsByAddress: Record<string, RunErrorCategory> = {};
  for (const error of errors) {
    errorsByCategory[error.category]++;
    errorsByAddress[errorLabel(error)] = error.category;
  }
  return { errorsByCategory, errorsByAddress };
}

/** Build the immutable record of one run. Zero-node runs are recorded like any other. */
export function finalize(input: FinalizeInput): PollRun {
  const errors = sortErrors(input.errors);
  const { errorsByCategory, errorsByAddress } = tallyErrors(errors);

  return {
    startedAt: input.startedAt,
    pollingDurationMs: Math.max(0, input.polledAt - input.startedAt),
    totalDurationMs: Math.max(0, input.finishedAt - input.startedAt),
    nodeCount: input.nodeCount,
    linkCount: input.linkCount,
    errorCount: errors.length,
    partialTopology: input.partialTopology,
    topologySource: input.topologySource,
    errors,
    errorsByCategory,
    errorsByAddress,
    conflicts: [...input.conflicts],
    stats: { ...input.stats },
  };
}

/** The zero-node run recorded when no topology could be obtained at all. */
export function topologyUnavailableRun(error: TopologyUnavailableError, startedAt: number, finishedAt: number): PollRun {
  return finalize({
    startedAt,
    polledAt: finishedAt,
    finishedAt,
    nodeCount: 0,
    linkCount: 0,
    errors: [{ address: error.localNode, dnsName: "", category: "TopologyUnavailable", details: error.message }],
    topologySource: "none",
    partialTopology: false,
    conflicts: [],
    stats: {},
  });
}

/** Error counts per category, skipping empty ones, for log lines. */
export function summarizeErrors(run: PollRun): Partial<Record<RunErrorCategory, number>> {
  const summary: Partial<Record<RunErrorCategory, number>> = {};
  for (const category of RUN_ERROR_CATEGORIES) {
    if (run.errorsByCategory[category] > 0) summary[category] = run.errorsByCategory[category];
  }
  return summary;
}
