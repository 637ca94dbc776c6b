import type Database from "better-sqlite3";

/**
 * Restaurant ordering schema.
 *
 * orders.user_id and order_items.menu_item_id are not foreign keys; under the
 * "orphan" delete policy they may point at rows that no longer exist.
 */
export function initializeSchema(db: Database.Database): void {
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  db.pragma("busy_timeout = 5000");

  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      username TEXT NOT NULL UNIQUE,
      password TEXT NOT NULL,
      is_restaurant INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL DEFAULT (datetime('now'))
    );

    CREATE TABLE IF NOT EXISTS menu_items (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL,
      price REAL NOT NULL CHECK (price >= 0),
      description TEXT,
      image_path TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_menu_items_name ON menu_items(name);

    CREATE TABLE IF NOT EXISTS orders (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id INTEGER NOT NULL,
      order_date TEXT NOT NULL,
      total_price REAL NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_orders_user_date ON orders(user_id, order_date);
    CREATE INDEX IF NOT EXISTS idx_orders_date ON orders(order_date);

    CREATE TABLE IF NOT EXISTS order_items (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      order_id INTEGER NOT NULL REFERENCES orders(id) ON DELETE CASCADE,
      menu_item_id INTEGER NOT NULL,
      quantity INTEGER NOT NULL CHECK (quantity > 0)
    );

    CREATE INDEX IF NOT EXISTS idx_order_items_order ON order_items(order_id);
    CREATE INDEX IF NOT EXISTS idx_order_items_menu_item ON order_items(menu_item_id);

    CREATE TABLE IF NOT EXISTS menu_settings (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      full_menu_image TEXT
    );

    -- Backing table for the sqlite session store
    CREATE TABLE IF NOT EXISTS sessions (
      token TEXT PRIMARY KEY,
      user_id INTEGER NOT NULL,
      created_at TEXT NOT NULL DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_sessions_user ON sessions(user_id);
  `);
}
