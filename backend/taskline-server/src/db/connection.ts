/**
 * Database Connection Module
 *
 * Opens the shared SQLite store with better-sqlite3 and Drizzle ORM.
 * Every process (API server and workers) opens the same file.
 *
 * Design decisions:
 * - WAL mode so readers never block the single writer
 * - busy_timeout so a writer waits for the lock instead of failing at once
 * - Lazy module-level connection with an explicit close for shutdown
 */

import fs from "fs";
import path from "path";
import Database from "better-sqlite3";
import { drizzle, BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema";

export type StoreDatabase = BetterSQLite3Database<typeof schema>;

const DEFAULT_BUSY_TIMEOUT_MS = 5000;

// Module-level connection state
let sqlite: Database.Database | null = null;
let db: StoreDatabase | null = null;

/**
 * Get or create the database connection
 *
 * @param dbPath - Path to the SQLite file, or ":memory:"
 * @returns Drizzle database instance with typed schema
 */
export function getDatabase(dbPath: string = getDefaultDbPath()): StoreDatabase {
  if (db) {
    return db;
  }

  if (dbPath !== ":memory:") {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  sqlite = new Database(dbPath);
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma(`busy_timeout = ${DEFAULT_BUSY_TIMEOUT_MS}`);

  db = drizzle(sqlite, { schema });

  return db;
}

/**
 * Default store location, ~/.taskline/taskline.db
 */
export function getDefaultDbPath(): string {
  const homeDir = process.env.HOME || process.env.USERPROFILE || ".";
  return path.join(homeDir, ".taskline", "taskline.db");
}

/**
 * Create tables and indexes if they don't exist
 */
export function initializeDatabase(): void {
  if (!sqlite) {
    throw new Error("Database not initialized. Call getDatabase() first.");
  }
  createTables(sqlite);
}

/**
 * DDL shared by the runtime connection and the test helpers
 */
export function createTables(connection: Database.Database): void {
  connection.exec(`
    CREATE TABLE IF NOT EXISTS task_status (
      id TEXT PRIMARY KEY,
      task_type TEXT NOT NULL,
      payload TEXT NOT NULL,
      state TEXT NOT NULL DEFAULT 'PENDING',
      result TEXT,
      enqueued_at INTEGER NOT NULL,
      started_at INTEGER,
      completed_at INTEGER
    )
  `);

  connection.exec(`
    CREATE TABLE IF NOT EXISTS pending_tasks (
      seq INTEGER PRIMARY KEY AUTOINCREMENT,
      task_id TEXT NOT NULL UNIQUE,
      enqueued_at INTEGER NOT NULL
    )
  `);

  connection.exec(`
    CREATE INDEX IF NOT EXISTS idx_pending_tasks_order
    ON pending_tasks (enqueued_at, seq)
  `);

  connection.exec(`
    CREATE TABLE IF NOT EXISTS broker_messages (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      task_id TEXT NOT NULL,
      task_type TEXT NOT NULL,
      payload TEXT NOT NULL,
      enqueued_at INTEGER NOT NULL,
      claimed_by TEXT,
      lease_expires_at INTEGER,
      deliveries INTEGER NOT NULL DEFAULT 0
    )
  `);
}

/**
 * Close the database connection
 * Should be called during graceful shutdown
 */
export function closeDatabase(): void {
  if (sqlite) {
    sqlite.close();
    sqlite = null;
    db = null;
  }
}

/**
 * Get the raw SQLite connection
 */
export function getSqliteConnection(): Database.Database | null {
  return sqlite;
}

export { schema };
