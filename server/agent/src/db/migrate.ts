import { existsSync, readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import type Database from "better-sqlite3";
import { asString, isRecord } from "../lib/guards";
import { createLogger } from "../lib/logger";

const log = createLogger("db:migrate");

/**
 * Read the statements of every migration file, in alphabetical order.
 * Statements inside a file are separated by a statement-breakpoint marker.
 */
export function readMigrations(
  migrationsDir: string,
): Array<{ file: string; statements: string[] }> {
  if (!existsSync(migrationsDir)) return [];

  return readdirSync(migrationsDir)
    .filter((f) => f.endsWith(".sql"))
    .sort()
    .map((file) => ({
      file,
      statements: readFileSync(join(migrationsDir, file), "utf-8")
        .split("--> statement-breakpoint")
        .map((s) => s.trim())
        .filter(Boolean),
    }));
}

/**
 * Run SQL migrations from the migrations directory.
 * Uses a _migrations table to track applied files.
 */
export function runMigrations(
  sqlite: Database.Database,
  migrationsDir: string,
): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL
    )
  `);

  const migrations = readMigrations(migrationsDir);
  if (migrations.length === 0) {
    log.info({ migrationsDir }, "no migration files found");
    return;
  }

  const applied = new Set(
    sqlite
      .prepare("SELECT name FROM _migrations")
      .all()
      .map((row) => (isRecord(row) ? asString(row.name) : "")),
  );

  for (const { file, statements } of migrations) {
    if (applied.has(file)) continue;

    log.info({ file }, "applying migration");
    sqlite.transaction(() => {
      for (const statement of statements) {
        sqlite.exec(statement);
      }
      sqlite
        .prepare("INSERT INTO _migrations (name, applied_at) VALUES (?, ?)")
        .run(file, new Date().toISOString());
    })();
    log.info({ file }, "applied migration");
  }
}
