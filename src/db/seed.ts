import { transaction } from "./index.js";
import { hasRestaurantAccount } from "../users/service.js";

export const DEFAULT_ACCOUNTS = [
  { username: "restaurant", password: "restaurant", isRestaurant: true },
  { username: "customer", password: "customer", isRestaurant: false },
] as const;

const DEFAULT_MENU = [
  { name: "Burger", price: 80, description: "Beef burger" },
  { name: "Fries", price: 40, description: "Crispy fries" },
  { name: "Cola", price: 30, description: "Iced cola" },
  { name: "Salad", price: 60, description: "Fresh garden salad" },
] as const;

/**
 * Seeds the default accounts, a starter menu and the menu settings row when
 * no restaurant account exists yet. Returns whether anything was seeded.
 * The starter menu only goes into an empty menu. Throws, leaving the database
 * untouched, when the default restaurant username belongs to a customer.
 */
export function seedDatabase(): boolean {
  if (hasRestaurantAccount()) return false;

  transaction((db) => {
    const insertUser = db.prepare(`
      INSERT INTO users (username, password, is_restaurant) VALUES (?, ?, ?)
      ON CONFLICT(username) DO NOTHING
    `);
    for (const account of DEFAULT_ACCOUNTS) {
      insertUser.run(account.username, account.password, account.isRestaurant ? 1 : 0);
    }

    if (!hasRestaurantAccount()) {
      const taken = DEFAULT_ACCOUNTS.filter((a) => a.isRestaurant).map((a) => a.username);
      throw new Error(
        `Cannot seed a restaurant account: username ${taken.join(", ")} belongs to a customer account`,
      );
    }

    const menu = db.prepare<[], { id: number }>("SELECT id FROM menu_items LIMIT 1").get();
    if (!menu) {
      const insertItem = db.prepare("INSERT INTO menu_items (name, price, description) VALUES (?, ?, ?)");
      for (const item of DEFAULT_MENU) {
        insertItem.run(item.name, item.price, item.description);
      }
    }

    const settings = db.prepare("SELECT id FROM menu_settings LIMIT 1").get();
    if (!settings) {
      db.prepare("INSERT INTO menu_settings (full_menu_image) VALUES (NULL)").run();
    }
  });

  console.log("[DB] Seeded default accounts and menu");
  return true;
}
