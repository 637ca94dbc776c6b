import { randomBytes } from "crypto";
import { getDb } from "../db/index.js";
import type { SessionBackend } from "../config.js";

/** Maps opaque session tokens to user ids. Tokens never expire. */
export interface SessionStore {
  create(userId: number): string;
  resolve(token: string): number | null;
  destroy(token: string): void;
}

function newToken(): string {
  return randomBytes(24).toString("base64url");
}

/** Sessions in the `sessions` table; they survive a restart when the database is a file. */
export class SqliteSessionStore implements SessionStore {
  create(userId: number): string {
    const token = newToken();
    getDb().prepare("INSERT INTO sessions (token, user_id) VALUES (?, ?)").run(token, userId);
    return token;
  }

  resolve(token: string): number | null {
    const row = getDb()
      .prepare<[string], { user_id: number }>("SELECT user_id FROM sessions WHERE token = ?")
      .get(token);
    return row?.user_id ?? null;
  }

  destroy(token: string): void {
    getDb().prepare("DELETE FROM sessions WHERE token = ?").run(token);
  }
}

export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, number>();

  create(userId: number): string {
    const token = newToken();
    this.sessions.set(token, userId);
    return token;
  }

  resolve(token: string): number | null {
    return this.sessions.get(token) ?? null;
  }

  destroy(token: string): void {
    this.sessions.delete(token);
  }

  get size(): number {
    return this.sessions.size;
  }
}

export function createSessionStore(backend: SessionBackend): SessionStore {
  return backend === "memory" ? new MemorySessionStore() : new SqliteSessionStore();
}
