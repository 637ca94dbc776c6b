import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { closeDatabase, initDatabase } from "../src/db/index.js";
import {
  createUser,
  deleteUser,
  findUserById,
  findUserByUsername,
  hasRestaurantAccount,
  listUsers,
  updatePassword,
  type User,
} from "../src/users/service.js";
import { createMenuItem } from "../src/menu/service.js";
import { placeOrder } from "../src/orders/service.js";
import { SqliteSessionStore } from "../src/session/store.js";
import { countRows } from "./helpers.js";

describe("users", () => {
  beforeEach(() => {
    initDatabase();
  });

  afterEach(() => {
    closeDatabase();
  });

  it("creates users with their role and rejects a taken username", () => {
    const chef = createUser("chef", "secret", true);
    expect(chef).toEqual({ id: chef?.id, username: "chef", password: "secret", isRestaurant: true });

    expect(createUser("chef", "other", false)).toBeNull();
    expect(countRows("users")).toBe(1);
    expect(findUserByUsername("chef")?.password).toBe("secret");
  });

  it("knows whether a restaurant account exists", () => {
    createUser("alice", "pw", false);
    expect(hasRestaurantAccount()).toBe(false);
    createUser("chef", "pw", true);
    expect(hasRestaurantAccount()).toBe(true);
  });

  it("lists users of both roles", () => {
    createUser("chef", "pw", true);
    createUser("alice", "pw", false);
    expect(listUsers().map((u) => [u.username, u.isRestaurant])).toEqual([
      ["chef", true],
      ["alice", false],
    ]);
  });

  it("updates a password in place", () => {
    const alice = createUser("alice", "old", false);
    if (!alice) throw new Error("seed user missing");

    expect(updatePassword(alice.id, "new")).toBe(true);
    expect(findUserById(alice.id)?.password).toBe("new");
    expect(updatePassword(999, "new")).toBe(false);
  });

  describe("deleteUser", () => {
    let alice: User;

    beforeEach(() => {
      const created = createUser("alice", "pw", false);
      if (!created) throw new Error("seed user missing");
      alice = created;
      const item = createMenuItem({ name: "Burger", price: 80, description: null });
      placeOrder(alice.id, { lines: [{ menuItemId: item.id, quantity: 1 }] });
      new SqliteSessionStore().create(alice.id);
    });

    it("orphan: removes only the user", () => {
      expect(deleteUser(alice.id, "orphan")).toBe(true);
      expect(findUserById(alice.id)).toBeNull();
      expect(countRows("orders")).toBe(1);
      expect(countRows("order_items")).toBe(1);
    });

    it("restrict: refuses while the user has orders", () => {
      expect(deleteUser(alice.id, "restrict")).toBe(false);
      expect(findUserById(alice.id)).not.toBeNull();
    });

    it("cascade: removes orders, their lines and sessions", () => {
      expect(deleteUser(alice.id, "cascade")).toBe(true);
      expect(countRows("orders")).toBe(0);
      expect(countRows("order_items")).toBe(0);
      expect(countRows("sessions")).toBe(0);
    });

    it("returns false for an unknown id", () => {
      expect(deleteUser(999, "orphan")).toBe(false);
    });
  });
});
