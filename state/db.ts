import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import Database from "better-sqlite3";
import type BetterSqlite3 from "better-sqlite3";
import { getDatabasePath } from "../config/paths.js";

export const SCHEMA_PATH = path.join(path.dirname(fileURLToPath(import.meta.url)), "schema.sql");

export function openDatabase(dbPath: string = getDatabasePath()): BetterSqlite3.Database {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");

  initializeSchema(db);

  return db;
}

export function initializeSchema(db: BetterSqlite3.Database): void {
  const schema = fs.readFileSync(SCHEMA_PATH, "utf-8");
  db.exec(schema);

  applyMigrations(db);
}

export function applyMigrations(db: BetterSqlite3.Database): void {
  migrateIterationCyclesEvaluated(db);
  migrateTasksFinalScore(db);
  migrateCostUsd(db);
}

function migrateIterationCyclesEvaluated(db: BetterSqlite3.Database): void {
  const columns = db.pragma("table_info(iteration_cycles)") as ReadonlyArray<{ name: string }>;
  const columnNames = new Set(columns.map((c) => c.name));

  if (!columnNames.has("evaluated")) {
    db.exec("ALTER TABLE iteration_cycles ADD COLUMN evaluated INTEGER NOT NULL DEFAULT 1");
  }
}

function migrateTasksFinalScore(db: BetterSqlite3.Database): void {
  const columns = db.pragma("table_info(tasks)") as ReadonlyArray<{ name: string }>;
  const columnNames = new Set(columns.map((c) => c.name));

  if (!columnNames.has("final_score")) {
    db.exec("ALTER TABLE tasks ADD COLUMN final_score REAL");
  }
  if (!columnNames.has("tokens_spent")) {
    db.exec("ALTER TABLE tasks ADD COLUMN tokens_spent INTEGER NOT NULL DEFAULT 0");
  }
}

function migrateCostUsd(db: BetterSqlite3.Database): void {
  for (const table of ["tasks", "iteration_cycles"]) {
    const columns = db.pragma(`table_info(${table})`) as ReadonlyArray<{ name: string }>;
    if (!columns.some((c) => c.name === "cost_usd")) {
      db.exec(`ALTER TABLE ${table} ADD COLUMN cost_usd REAL NOT NULL DEFAULT 0`);
    }
  }
}
