import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { type BetterSQLite3Database, drizzle } from "drizzle-orm/better-sqlite3";
import { runMigrations } from "./migrate.js";
import { applyPragmas } from "./pragmas.js";
import * as schema from "./schema/index.js";

/** The schema type shared across all db instances. */
export type Schema = typeof schema;

/** Drizzle handle over better-sqlite3. Repositories accept this type. */
export type DrizzleDb = BetterSQLite3Database<Schema>;

/** Create a Drizzle database instance wrapping the given SQLite handle. */
export function createDb(sqlite: Database.Database): DrizzleDb {
  return drizzle(sqlite, { schema });
}

/**
 * Open (creating if needed) the collector database at `databasePath`,
 * apply pragmas and pending migrations.
 */
export function openDatabase(databasePath: string): { sqlite: Database.Database; db: DrizzleDb } {
  if (databasePath !== ":memory:") {
    fs.mkdirSync(path.dirname(path.resolve(databasePath)), { recursive: true });
  }
  const sqlite = new Database(databasePath);
  applyPragmas(sqlite);
  runMigrations(sqlite);
  return { sqlite, db: createDb(sqlite) };
}

export { schema };
