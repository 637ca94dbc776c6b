import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { closeDatabase, initDatabase } from "../src/db/index.js";
import { createSessionStore, MemorySessionStore, SqliteSessionStore } from "../src/session/store.js";

describe.each(["sqlite", "memory"] as const)("%s session store", (backend) => {
  beforeEach(() => {
    initDatabase();
  });

  afterEach(() => {
    closeDatabase();
  });

  it("resolves a created token to its user", () => {
    const store = createSessionStore(backend);
    const token = store.create(7);

    expect(token).toMatch(/^[A-Za-z0-9_-]{32}$/);
    expect(store.resolve(token)).toBe(7);
  });

  it("issues a new token per login", () => {
    const store = createSessionStore(backend);
    const a = store.create(7);
    const b = store.create(7);

    expect(a).not.toBe(b);
    expect(store.resolve(a)).toBe(7);
    expect(store.resolve(b)).toBe(7);
  });

  it("forgets destroyed and unknown tokens", () => {
    const store = createSessionStore(backend);
    const token = store.create(3);
    store.destroy(token);

    expect(store.resolve(token)).toBeNull();
    expect(store.resolve("never-issued")).toBeNull();
    expect(() => store.destroy("never-issued")).not.toThrow();
  });
});

describe("createSessionStore", () => {
  it("picks the backing implementation", () => {
    expect(createSessionStore("memory")).toBeInstanceOf(MemorySessionStore);
    expect(createSessionStore("sqlite")).toBeInstanceOf(SqliteSessionStore);
  });

  it("keeps memory sessions in the process", () => {
    const store = new MemorySessionStore();
    const token = store.create(1);
    store.create(2);
    expect(store.size).toBe(2);
    store.destroy(token);
    expect(store.size).toBe(1);
  });
});
