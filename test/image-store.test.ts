import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, readdirSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { ImageStore, timestampName } from "../src/images/store.js";

describe("timestampName", () => {
  it("formats local time down to the millisecond", () => {
    expect(timestampName(new Date(2024, 2, 9, 14, 5, 6, 7))).toBe("20240309-140506007");
    expect(timestampName(new Date(2024, 11, 31, 23, 59, 59, 999))).toBe("20241231-235959999");
  });
});

describe("ImageStore", () => {
  let dir: string;

  beforeEach(() => {
    dir = join(mkdtempSync(join(tmpdir(), "image-store-")), "images");
  });

  afterEach(() => {
    rmSync(join(dir, ".."), { recursive: true, force: true });
  });

  it("writes the bytes unchanged under a .jpg timestamp name", async () => {
    const store = new ImageStore(dir, "/static/images", () => new Date(2024, 2, 9, 14, 5, 6, 7));
    store.ensureDir();

    const path = await store.save({ filename: "photo.png", data: Buffer.from("not-really-a-png") });

    expect(path).toBe("/static/images/20240309-140506007.jpg");
    expect(readFileSync(join(dir, "20240309-140506007.jpg"), "utf-8")).toBe("not-really-a-png");
  });

  it("gives uploads in different milliseconds distinct names", async () => {
    let ms = 0;
    const store = new ImageStore(dir, "/static/images", () => new Date(2024, 2, 9, 14, 5, 6, ms++));
    store.ensureDir();

    const first = await store.save({ filename: "a.jpg", data: Buffer.from("a") });
    const second = await store.save({ filename: "b.jpg", data: Buffer.from("b") });

    expect(first).toBe("/static/images/20240309-140506000.jpg");
    expect(second).toBe("/static/images/20240309-140506001.jpg");
    expect(readdirSync(dir).sort()).toEqual(["20240309-140506000.jpg", "20240309-140506001.jpg"]);
  });

  it("lets the later of two same-millisecond uploads overwrite the earlier", async () => {
    const store = new ImageStore(dir, "/static/images", () => new Date(2024, 2, 9, 14, 5, 6, 7));
    store.ensureDir();

    const first = await store.save({ filename: "a.jpg", data: Buffer.from("first") });
    const second = await store.save({ filename: "b.jpg", data: Buffer.from("second") });

    expect(second).toBe(first);
    expect(readdirSync(dir)).toEqual(["20240309-140506007.jpg"]);
    expect(readFileSync(join(dir, "20240309-140506007.jpg"), "utf-8")).toBe("second");
  });
});
