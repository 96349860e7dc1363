import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { runMigrations } from "./migrate.js";

function tableNames(sqlite: Database.Database): string[] {
  return sqlite
    .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
    .pluck()
    .all()
    .filter((name): name is string => typeof name === "string");
}

describe("runMigrations", () => {
  let sqlite: Database.Database;

  beforeEach(() => {
    sqlite = new Database(":memory:");
  });

  afterEach(() => {
    sqlite.close();
  });

  it("creates every collector table from the bundled migrations", () => {
    const applied = runMigrations(sqlite);

    expect(applied).toEqual(["0000_initial.sql"]);
    expect(tableNames(sqlite)).toEqual([
      "link_samples",
      "links",
      "node_samples",
      "nodes",
      "poll_runs",
      "run_errors",
      "schema_migrations",
    ]);
  });

  it("applies nothing the second time", () => {
    runMigrations(sqlite);
    expect(runMigrations(sqlite)).toEqual([]);
  });

  describe("with a custom folder", () => {
    let folder: string;

    beforeEach(() => {
      folder = mkdtempSync(join(tmpdir(), "migrate-test-"));
      writeFileSync(join(folder, "0002_second.sql"), "ALTER TABLE widgets ADD COLUMN size INTEGER;");
      writeFileSync(join(folder, "0001_first.sql"), "CREATE TABLE widgets (id INTEGER PRIMARY KEY);");
      writeFileSync(join(folder, "README.md"), "not a migration");
    });

    afterEach(() => {
      rmSync(folder, { recursive: true, force: true });
    });

    it("applies pending files in name order", () => {
      expect(runMigrations(sqlite, folder)).toEqual(["0001_first.sql", "0002_second.sql"]);
      const columns = sqlite
        .prepare("SELECT name FROM pragma_table_info('widgets')")
        .pluck()
        .all();
      expect(columns).toEqual(["id", "size"]);
    });

    it("rolls back a failing file and leaves it pending", () => {
      writeFileSync(join(folder, "0003_broken.sql"), "CREATE TABLE gadgets (id INTEGER); NOT VALID SQL;");

      expect(() => runMigrations(sqlite, folder)).toThrow();
      expect(tableNames(sqlite)).not.toContain("gadgets");
      expect(
        sqlite.prepare("SELECT name FROM schema_migrations ORDER BY name").pluck().all(),
      ).toEqual(["0001_first.sql", "0002_second.sql"]);
    });
  });
});
