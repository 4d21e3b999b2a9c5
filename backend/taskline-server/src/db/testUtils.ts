/**
 * Database Test Utilities
 *
 * Provides an isolated in-memory store per test, and a file-backed store
 * shared by several connections.
 */

import fs from "fs";
import os from "os";
import path from "path";
import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema";
import { createTables, StoreDatabase } from "./connection";

export interface TestStore {
  db: StoreDatabase;
  sqlite: Database.Database;
  close: () => void;
}

/**
 * Create a fresh in-memory store with all tables
 */
export function createTestStore(): TestStore {
  const sqlite = new Database(":memory:");
  createTables(sqlite);
  return {
    db: drizzle(sqlite, { schema }),
    sqlite,
    close: () => sqlite.close(),
  };
}

export interface SharedFileStore {
  /** Independent connections to one database file */
  connections: TestStore[];
  close: () => void;
}

/**
 * Open several connections to one temporary WAL-mode database file, the
 * way separate server and worker processes share the store.
 */
export function createSharedFileStore(connectionCount = 2): SharedFileStore {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "taskline-test-"));
  const dbPath = path.join(dir, "taskline.db");

  const connections: TestStore[] = [];
  for (let i = 0; i < connectionCount; i++) {
    const sqlite = new Database(dbPath);
    sqlite.pragma("journal_mode = WAL");
    sqlite.pragma("busy_timeout = 5000");
    if (i === 0) {
      createTables(sqlite);
    }
    connections.push({
      db: drizzle(sqlite, { schema }),
      sqlite,
      close: () => sqlite.close(),
    });
  }

  return {
    connections,
    close: () => {
      for (const connection of connections) {
        connection.close();
      }
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}
