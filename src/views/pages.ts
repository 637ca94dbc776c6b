import { html, type SafeHtml } from "./html.js";
import type { User } from "../users/service.js";
import type { MenuItem } from "../menu/service.js";
import type { OrderLineView, OrderView } from "../orders/service.js";

export const LOGIN_ERROR = "Incorrect username or password";

export interface LoginView {
  error?: string;
}

export interface DashboardView {
  user: User;
  orders: OrderView[];
}

export interface UsersView {
  user: User;
  users: User[];
}

export interface MenuView {
  user: User;
  items: MenuItem[];
  fullMenuImage: string | null;
}

export interface OrderHistoryView {
  user: User;
  orders: OrderView[];
}

export function formatPrice(value: number): string {
  return value.toFixed(2);
}

function nav(user: User | null): SafeHtml {
  if (!user) return html``;
  const links = user.isRestaurant
    ? html`<a href="/restaurant/dashboard">Orders</a>
      <a href="/restaurant/menu">Menu</a>
      <a href="/restaurant/users">Users</a>
      <a href="/customer/menu">Customer view</a>`
    : html`<a href="/customer/menu">Menu</a>
      <a href="/customer/orders">My orders</a>`;
  return html`<nav>${links} <span class="user">${user.username}</span> <a href="/logout">Log out</a></nav>`;
}

function layout(title: string, user: User | null, body: SafeHtml): string {
  return html`<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${title}</title>
</head>
<body>
  ${nav(user)}
  <main>
    <h1>${title}</h1>
    ${body}
  </main>
</body>
</html>
`.value;
}

function fullMenu(image: string | null): SafeHtml {
  if (!image) return html``;
  return html`<section class="full-menu"><img src="${image}" alt="Full menu"></section>`;
}

function itemImage(item: MenuItem): SafeHtml {
  if (!item.imagePath) return html``;
  return html`<img src="${item.imagePath}" alt="${item.name}" width="120">`;
}

function orderLine(line: OrderLineView): SafeHtml {
  if (line.name === null || line.price === null || line.subtotal === null) {
    return html`<li class="line missing">Item #${line.menuItemId} (no longer available) × ${line.quantity}</li>`;
  }
  return html`<li class="line">${line.name} ${formatPrice(line.price)} × ${line.quantity} = ${formatPrice(line.subtotal)}</li>`;
}

function orderCard(order: OrderView, showCustomer: boolean): SafeHtml {
  return html`<article class="order" data-order-id="${order.id}">
    <h2>Order #${order.id}</h2>
    <p>${order.orderDate}${showCustomer ? html` · ${order.username ?? "(deleted user)"}` : ""}</p>
    <ul>${order.lines.map(orderLine)}</ul>
    <p class="total">Total: ${formatPrice(order.totalPrice)}</p>
  </article>`;
}

export function renderLogin(view: LoginView = {}): string {
  return layout(
    "Restaurant Ordering",
    null,
    html`${view.error ? html`<p class="error">${view.error}</p>` : ""}
    <form method="post" action="/login">
      <label>Username <input name="username" required></label>
      <label>Password <input name="password" type="password" required></label>
      <label><input type="checkbox" name="is_student" value="true" checked> Customer login</label>
      <button type="submit">Log in</button>
    </form>`,
  );
}

export function renderDashboard(view: DashboardView): string {
  const body = view.orders.length
    ? html`${view.orders.map((order) => orderCard(order, true))}`
    : html`<p>No orders yet.</p>`;
  return layout("Orders", view.user, body);
}

export function renderUsers(view: UsersView): string {
  const rows = view.users.map(
    (u) => html`<tr>
      <td>${u.id}</td>
      <td>${u.username}</td>
      <td>${u.isRestaurant ? "Restaurant" : "Customer"}</td>
      <td>
        <form method="post" action="/restaurant/users/update/${u.id}">
          <input name="password" type="password" placeholder="New password" required>
          <input name="confirm_password" type="password" placeholder="Confirm" required>
          <button type="submit">Update password</button>
        </form>
        <a href="/restaurant/users/delete/${u.id}">Delete</a>
      </td>
    </tr>`,
  );

  return layout(
    "Users",
    view.user,
    html`<table>
      <thead><tr><th>ID</th><th>Username</th><th>Role</th><th></th></tr></thead>
      <tbody>${rows}</tbody>
    </table>
    <h2>Add user</h2>
    <form method="post" action="/restaurant/users/add">
      <label>Username <input name="username" required></label>
      <label>Password <input name="password" type="password" required></label>
      <label>Role
        <select name="is_restaurant">
          <option value="false">Customer</option>
          <option value="true">Restaurant</option>
        </select>
      </label>
      <button type="submit">Add</button>
    </form>`,
  );
}

export function renderRestaurantMenu(view: MenuView): string {
  const rows = view.items.map(
    (item) => html`<tr>
      <td>${itemImage(item)}</td>
      <td>
        <form method="post" action="/restaurant/menu/update/${item.id}">
          <input name="name" value="${item.name}" required>
          <input name="price" type="number" min="0" step="0.01" value="${item.price}" required>
          <input name="description" value="${item.description ?? ""}">
          <button type="submit">Save</button>
        </form>
      </td>
      <td>
        <form method="post" action="/restaurant/menu/upload-image/${item.id}" enctype="multipart/form-data">
          <input name="item_image" type="file" accept="image/*" required>
          <button type="submit">Upload image</button>
        </form>
      </td>
      <td><a href="/restaurant/menu/delete/${item.id}">Delete</a></td>
    </tr>`,
  );

  return layout(
    "Menu",
    view.user,
    html`${fullMenu(view.fullMenuImage)}
    <form method="post" action="/restaurant/menu/upload-full-menu" enctype="multipart/form-data">
      <input name="full_menu_image" type="file" accept="image/*" required>
      <button type="submit">Upload full menu image</button>
    </form>
    <table><tbody>${rows}</tbody></table>
    <h2>Add item</h2>
    <form method="post" action="/restaurant/menu/add" enctype="multipart/form-data">
      <label>Name <input name="name" required></label>
      <label>Price <input name="price" type="number" min="0" step="0.01" required></label>
      <label>Description <input name="description"></label>
      <label>Image <input name="item_image" type="file" accept="image/*"></label>
      <button type="submit">Add</button>
    </form>`,
  );
}

export function renderCustomerMenu(view: MenuView): string {
  const items = view.items.map(
    (item) => html`<li class="menu-item">
      ${itemImage(item)}
      <strong>${item.name}</strong> ${formatPrice(item.price)}
      ${item.description ? html`<p>${item.description}</p>` : ""}
      <input name="quantity_${item.id}" type="number" min="0" value="0">
    </li>`,
  );

  return layout(
    "Menu",
    view.user,
    html`${fullMenu(view.fullMenuImage)}
    <form method="post" action="/customer/order">
      <ul>${items}</ul>
      <button type="submit">Place order</button>
    </form>`,
  );
}

export function renderOrderHistory(view: OrderHistoryView): string {
  const body = view.orders.length
    ? html`${view.orders.map((order) => orderCard(order, false))}`
    : html`<p>You have not ordered anything yet.</p>`;
  return layout("My orders", view.user, body);
}
