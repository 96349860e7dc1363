import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type Database from "better-sqlite3";
import { logger } from "../config/logger.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * `<root>/drizzle/migrations`, from either `<root>/src/db` or `<root>/dist/db`.
 */
export const MIGRATIONS_FOLDER = path.resolve(__dirname, "../../drizzle/migrations");

/**
 * Apply every `*.sql` file in `folder` that has not been applied yet, in file
 * name order. Each file runs in its own transaction and is recorded in
 * `schema_migrations`, so running twice is a no-op.
 */
export function runMigrations(sqlite: Database.Database, folder: string = MIGRATIONS_FOLDER): string[] {
  sqlite.exec(
    "CREATE TABLE IF NOT EXISTS schema_migrations (name TEXT PRIMARY KEY NOT NULL, applied_at INTEGER NOT NULL)",
  );
  const applied = new Set(
    sqlite
      .prepare("SELECT name FROM schema_migrations")
      .pluck()
      .all()
      .filter((name): name is string => typeof name === "string"),
  );

  const pending = fs
    .readdirSync(folder)
    .filter((file) => file.endsWith(".sql") && !applied.has(file))
    .sort();

  const record = sqlite.prepare("INSERT INTO schema_migrations (name, applied_at) VALUES (?, ?)");
  for (const file of pending) {
    const ddl = fs.readFileSync(path.join(folder, file), "utf8");
    sqlite.transaction(() => {
      sqlite.exec(ddl);
      record.run(file, Date.now());
    })();
    logger.info("Applied migration", { file });
  }
  return pending;
}
