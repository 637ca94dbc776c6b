import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import { config } from "../config.js";
import { initializeSchema } from "./schema.js";

let db: Database.Database | null = null;

export function getDb(): Database.Database {
  if (!db) {
    throw new Error("Database not initialized. Call initDatabase() first.");
  }
  return db;
}

export function isDatabaseOpen(): boolean {
  return db !== null;
}

export function initDatabase(): Database.Database {
  if (db) return db;

  // Ensure directory exists
  if (config.dbPath !== ":memory:") {
    mkdirSync(dirname(config.dbPath), { recursive: true });
  }

  db = new Database(config.dbPath);

  initializeSchema(db);

  if (config.nodeEnv !== "test") {
    console.log(`[DB] SQLite database initialized at ${config.dbPath}`);
  }
  return db;
}

export function closeDatabase(): void {
  if (db) {
    if (config.dbPath !== ":memory:") {
      // WAL checkpoint before closing
      db.pragma("wal_checkpoint(TRUNCATE)");
    }
    db.close();
    db = null;
    if (config.nodeEnv !== "test") {
      console.log("[DB] Database closed");
    }
  }
}

// --- Helper: Run in transaction ---
export function transaction<T>(fn: (db: Database.Database) => T): T {
  const database = getDb();
  const txn = database.transaction(fn);
  return txn(database);
}

// --- Helper: Order timestamps, local time, second resolution ---
export function formatOrderDate(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
