import { getDb, transaction } from "../db/index.js";
import type { DeletePolicy } from "../config.js";

export interface User {
  id: number;
  username: string;
  // Stored and compared as plaintext. Needs a security review before production use.
  password: string;
  isRestaurant: boolean;
}

interface UserRow {
  id: number;
  username: string;
  password: string;
  is_restaurant: number;
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    password: row.password,
    isRestaurant: row.is_restaurant === 1,
  };
}

export function findUserById(id: number): User | null {
  const row = getDb()
    .prepare<[number], UserRow>("SELECT id, username, password, is_restaurant FROM users WHERE id = ?")
    .get(id);
  return row ? toUser(row) : null;
}

export function findUserByUsername(username: string): User | null {
  const row = getDb()
    .prepare<[string], UserRow>("SELECT id, username, password, is_restaurant FROM users WHERE username = ?")
    .get(username);
  return row ? toUser(row) : null;
}

export function listUsers(): User[] {
  return getDb()
    .prepare<[], UserRow>("SELECT id, username, password, is_restaurant FROM users ORDER BY id")
    .all()
    .map(toUser);
}

export function hasRestaurantAccount(): boolean {
  const row = getDb()
    .prepare<[], { id: number }>("SELECT id FROM users WHERE is_restaurant = 1 LIMIT 1")
    .get();
  return row !== undefined;
}

/** Returns null when the username is already taken. */
export function createUser(username: string, password: string, isRestaurant: boolean): User | null {
  const info = getDb()
    .prepare(`
      INSERT INTO users (username, password, is_restaurant) VALUES (?, ?, ?)
      ON CONFLICT(username) DO NOTHING
    `)
    .run(username, password, isRestaurant ? 1 : 0);
  if (info.changes === 0) return null;
  return findUserById(Number(info.lastInsertRowid));
}

export function updatePassword(id: number, password: string): boolean {
  const info = getDb().prepare("UPDATE users SET password = ? WHERE id = ?").run(password, id);
  return info.changes > 0;
}

/** Returns false when nothing was deleted (unknown id, or refused by the restrict policy). */
export function deleteUser(id: number, policy: DeletePolicy): boolean {
  return transaction((db) => {
    if (policy === "restrict") {
      const hasOrders = db
        .prepare<[number], { id: number }>("SELECT id FROM orders WHERE user_id = ? LIMIT 1")
        .get(id);
      if (hasOrders) return false;
    }

    if (policy === "cascade") {
      // order_items go with their orders (ON DELETE CASCADE)
      db.prepare("DELETE FROM orders WHERE user_id = ?").run(id);
      db.prepare("DELETE FROM sessions WHERE user_id = ?").run(id);
    }

    return db.prepare("DELETE FROM users WHERE id = ?").run(id).changes > 0;
  });
}
