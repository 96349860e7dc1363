/** Thrown when neither the routing daemon nor the local node's status document yields an address list. */
export class TopologyUnavailableError extends Error {
  readonly name = "TopologyUnavailableError" as const;
  constructor(
    readonly localNode: string,
    readonly routingTableError: string,
    readonly fallbackError: string,
  ) {
    super(`Topology unavailable from ${localNode}: routing table (${routingTableError}); status document (${fallbackError})`);
  }
}

/** Wraps a failure raised by the persistence collaborator; the computed run result is unaffected. */
export class PersistenceError extends Error {
  readonly name = "PersistenceError" as const;
  constructor(
    readonly operation: "saveSnapshot" | "saveRun" | "readKnown",
    cause: unknown,
  ) {
    super(`Persistence failed during ${operation}: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
  }
}

/** Raised inside the normalizer; converted to a FetchParseError at the node boundary. */
export class StatusParseError extends Error {
  readonly name = "StatusParseError" as const;
}
