import type Database from "better-sqlite3";

/**
 * Apply the collector's pragmas to a SQLite database handle.
 *
 * - journal_mode = WAL: readers (dashboards, exports) never block a run's writes
 * - busy_timeout = 5000: wait up to 5 seconds for write locks instead of
 *   failing immediately with SQLITE_BUSY
 * - foreign_keys = OFF: samples outlive the rows they were taken from
 */
export function applyPragmas(sqlite: Database.Database): void {
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("busy_timeout = 5000");
  sqlite.pragma("foreign_keys = OFF");
}
