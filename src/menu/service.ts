import { getDb, transaction } from "../db/index.js";
import type { DeletePolicy } from "../config.js";

export interface MenuItem {
  id: number;
  name: string;
  price: number;
  description: string | null;
  imagePath: string | null;
}

export interface MenuItemInput {
  name: string;
  price: number;
  description: string | null;
}

export interface MenuSettings {
  id: number;
  fullMenuImage: string | null;
}

interface MenuItemRow {
  id: number;
  name: string;
  price: number;
  description: string | null;
  image_path: string | null;
}

function toMenuItem(row: MenuItemRow): MenuItem {
  return {
    id: row.id,
    name: row.name,
    price: row.price,
    description: row.description,
    imagePath: row.image_path,
  };
}

export function listMenuItems(): MenuItem[] {
  return getDb()
    .prepare<[], MenuItemRow>("SELECT id, name, price, description, image_path FROM menu_items ORDER BY id")
    .all()
    .map(toMenuItem);
}

export function findMenuItem(id: number): MenuItem | null {
  const row = getDb()
    .prepare<[number], MenuItemRow>("SELECT id, name, price, description, image_path FROM menu_items WHERE id = ?")
    .get(id);
  return row ? toMenuItem(row) : null;
}

export function createMenuItem(input: MenuItemInput, imagePath: string | null = null): MenuItem {
  const info = getDb()
    .prepare("INSERT INTO menu_items (name, price, description, image_path) VALUES (?, ?, ?, ?)")
    .run(input.name, input.price, input.description, imagePath);
  return {
    id: Number(info.lastInsertRowid),
    ...input,
    imagePath,
  };
}

/** Name, price and description only; the image is left as it is. */
export function updateMenuItem(id: number, input: MenuItemInput): boolean {
  const info = getDb()
    .prepare("UPDATE menu_items SET name = ?, price = ?, description = ? WHERE id = ?")
    .run(input.name, input.price, input.description, id);
  return info.changes > 0;
}

export function setMenuItemImage(id: number, imagePath: string): boolean {
  const info = getDb().prepare("UPDATE menu_items SET image_path = ? WHERE id = ?").run(imagePath, id);
  return info.changes > 0;
}

export function deleteMenuItem(id: number, policy: DeletePolicy): boolean {
  return transaction((db) => {
    if (policy === "restrict") {
      const referenced = db
        .prepare<[number], { id: number }>("SELECT id FROM order_items WHERE menu_item_id = ? LIMIT 1")
        .get(id);
      if (referenced) return false;
    }

    if (policy === "cascade") {
      db.prepare("DELETE FROM order_items WHERE menu_item_id = ?").run(id);
    }

    return db.prepare("DELETE FROM menu_items WHERE id = ?").run(id).changes > 0;
  });
}

/** The settings row is a singleton, created on first access. */
export function getMenuSettings(): MenuSettings {
  const db = getDb();
  const select = db.prepare<[], { id: number; full_menu_image: string | null }>(
    "SELECT id, full_menu_image FROM menu_settings ORDER BY id LIMIT 1",
  );

  const row = select.get();
  if (row) {
    return { id: row.id, fullMenuImage: row.full_menu_image };
  }

  const info = db.prepare("INSERT INTO menu_settings (full_menu_image) VALUES (NULL)").run();
  return { id: Number(info.lastInsertRowid), fullMenuImage: null };
}

export function setFullMenuImage(imagePath: string): MenuSettings {
  const settings = getMenuSettings();
  getDb().prepare("UPDATE menu_settings SET full_menu_image = ? WHERE id = ?").run(imagePath, settings.id);
  return { ...settings, fullMenuImage: imagePath };
}
