/**
 * Boundary with the persistence collaborator.
 *
 * The collector reads durable state only through these read models, once per
 * run, and writes only after all in-run concurrency has finished. Transactions
 * and locking, if any, belong to the implementation.
 */

import type { Link, Node, PollRun, RunSnapshot } from "./types.js";

/** Strongest first: radio IP, then radio MAC, then node name. */
export type IdentityKey = `ip:${string}` | `mac:${string}` | `name:${string}`;

export interface KnownNodeReadModel {
  /** The most recently seen node that ever held `key`, whatever its status. */
  lookup(key: IdentityKey): Promise<Node | null>;
  /** Nodes whose stored status is current or recent. */
  allActiveAndRecent(): Promise<Node[]>;
}

export interface KnownLinkReadModel {
  /** Links whose stored status is current or recent. */
  allActiveAndRecentLinks(): Promise<Link[]>;
}

export interface MeshRepository extends KnownNodeReadModel, KnownLinkReadModel {
  /** Upsert nodes/links by id/key and append the run's samples. */
  saveSnapshot(snapshot: RunSnapshot): Promise<void>;
  /** Append an immutable run record with its errors. */
  saveRun(run: PollRun): Promise<void>;
  /** Stored runs, newest first. */
  recentRuns(limit: number): Promise<PollRun[]>;
}
