import Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MIGRATIONS_DIR } from "../config";
import { readMigrations, runMigrations } from "./migrate";

describe("migrations", () => {
  let sqlite: Database.Database;

  beforeEach(() => {
    sqlite = new Database(":memory:");
  });

  afterEach(() => {
    sqlite.close();
  });

  it("splits files on statement breakpoints", () => {
    const migrations = readMigrations(MIGRATIONS_DIR);

    expect(migrations.map((m) => m.file)).toEqual([
      "0000_container_snapshots.sql",
    ]);
    expect(migrations[0]?.statements).toHaveLength(2);
  });

  it("applies each file once", () => {
    runMigrations(sqlite, MIGRATIONS_DIR);
    runMigrations(sqlite, MIGRATIONS_DIR);

    const applied = sqlite.prepare("SELECT name FROM _migrations").all();
    expect(applied).toEqual([{ name: "0000_container_snapshots.sql" }]);

    const tables = sqlite
      .prepare(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'container_snapshots'",
      )
      .all();
    expect(tables).toHaveLength(1);
  });

  it("treats a missing directory as empty", () => {
    expect(readMigrations("/nonexistent/migrations")).toEqual([]);
  });
});
