import { getDb, transaction, formatOrderDate } from "../db/index.js";
import type { OrderLineRequest, OrderRequest } from "./request.js";

export interface PlacedOrder {
  id: number;
  userId: number;
  orderDate: string;
  totalPrice: number;
  lines: OrderLineRequest[];
}

/**
 * An order line joined with the menu as it is NOW. name/price/subtotal are
 * null when the menu item has since been deleted.
 */
export interface OrderLineView {
  menuItemId: number;
  quantity: number;
  name: string | null;
  price: number | null;
  subtotal: number | null;
}

export interface OrderView {
  id: number;
  userId: number;
  // null when the ordering user has been deleted
  username: string | null;
  orderDate: string;
  totalPrice: number;
  lines: OrderLineView[];
}

/**
 * Creates an order for the resolvable lines of the request. Lines naming a
 * menu item that does not exist are dropped; when none remain nothing is
 * written and null is returned.
 */
export function placeOrder(userId: number, request: OrderRequest, now: Date = new Date()): PlacedOrder | null {
  return transaction((db) => {
    const findPrice = db.prepare<[number], { id: number; price: number }>(
      "SELECT id, price FROM menu_items WHERE id = ?",
    );

    const lines: OrderLineRequest[] = [];
    let totalPrice = 0;
    for (const line of request.lines) {
      const item = findPrice.get(line.menuItemId);
      if (!item) continue;
      lines.push(line);
      totalPrice += item.price * line.quantity;
    }

    if (lines.length === 0) return null;

    const orderDate = formatOrderDate(now);
    const info = db
      .prepare("INSERT INTO orders (user_id, order_date, total_price) VALUES (?, ?, ?)")
      .run(userId, orderDate, totalPrice);
    const orderId = Number(info.lastInsertRowid);

    const insertItem = db.prepare(
      "INSERT INTO order_items (order_id, menu_item_id, quantity) VALUES (?, ?, ?)",
    );
    for (const line of lines) {
      insertItem.run(orderId, line.menuItemId, line.quantity);
    }

    return { id: orderId, userId, orderDate, totalPrice, lines };
  });
}

interface OrderRow {
  id: number;
  user_id: number;
  username: string | null;
  order_date: string;
  total_price: number;
}

interface OrderLineRow {
  menu_item_id: number;
  quantity: number;
  name: string | null;
  price: number | null;
}

/**
 * Orders, most recent first, optionally limited to one user. Each line is
 * re-joined with the current menu, so subtotals follow later price changes
 * while totalPrice stays what was charged.
 */
export function listOrders(filter: { userId?: number } = {}): OrderView[] {
  const db = getDb();

  let sql = `
    SELECT o.id, o.user_id, u.username, o.order_date, o.total_price
    FROM orders o
    LEFT JOIN users u ON u.id = o.user_id
  `;
  const params: number[] = [];

  if (filter.userId !== undefined) {
    sql += " WHERE o.user_id = ?";
    params.push(filter.userId);
  }

  sql += " ORDER BY o.order_date DESC, o.id DESC";

  const orders = db.prepare<number[], OrderRow>(sql).all(...params);

  const getLines = db.prepare<[number], OrderLineRow>(`
    SELECT oi.menu_item_id, oi.quantity, m.name, m.price
    FROM order_items oi
    LEFT JOIN menu_items m ON m.id = oi.menu_item_id
    WHERE oi.order_id = ?
    ORDER BY oi.id
  `);

  return orders.map((order) => ({
    id: order.id,
    userId: order.user_id,
    username: order.username,
    orderDate: order.order_date,
    totalPrice: order.total_price,
    lines: getLines.all(order.id).map((line) => ({
      menuItemId: line.menu_item_id,
      quantity: line.quantity,
      name: line.name,
      price: line.price,
      subtotal: line.price === null ? null : line.price * line.quantity,
    })),
  }));
}
