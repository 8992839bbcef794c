import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { SQLiteStorage } from "../src/storage/sqlite.js";
import { MemoryStorage, type IndexCache, type KeyValueStore } from "../src/storage/types.js";

const CACHED_AT = new Date("2024-06-01T12:00:00.000Z");

describe("SQLiteStorage", () => {
  let storage: SQLiteStorage;

  beforeEach(() => {
    storage = new SQLiteStorage({
      path: ":memory:",
      vaultName: "test-vault",
    });
  });

  afterEach(() => {
    storage.close();
  });

  it("should store and retrieve values", () => {
    storage.set("salt", "c2FsdA==");
    expect(storage.get("salt")).toBe("c2FsdA==");
  });

  it("should return undefined for missing keys", () => {
    expect(storage.get("nonexistent")).toBeUndefined();
  });

  it("should overwrite existing values", () => {
    storage.set("failed_attempts", "1");
    storage.set("failed_attempts", "2");
    expect(storage.get("failed_attempts")).toBe("2");
  });

  it("should delete values", () => {
    storage.set("key1", "value");
    expect(storage.delete("key1")).toBe(true);
    expect(storage.get("key1")).toBeUndefined();
    expect(storage.delete("key1")).toBe(false);
  });

  it("should list all keys", () => {
    storage.set("c", "3");
    storage.set("a", "1");
    storage.set("b", "2");

    expect(storage.keys()).toEqual(["a", "b", "c"]);
  });

  it("should cache the encrypted index", () => {
    const content = Buffer.from([1, 2, 3, 4]);
    storage.cacheIndex(content, "sha-1", CACHED_AT);

    const cached = storage.getCachedIndex();
    expect(cached?.content.equals(content)).toBe(true);
    expect(cached?.sha).toBe("sha-1");
    expect(cached?.cachedAt).toEqual(CACHED_AT);

    storage.cacheIndex(Buffer.from([9]), "sha-2", CACHED_AT);
    expect(storage.getCachedIndex()?.sha).toBe("sha-2");

    storage.clearIndex();
    expect(storage.getCachedIndex()).toBeUndefined();
  });

  it("should clear state and cache together", () => {
    storage.set("salt", "x");
    storage.cacheIndex(Buffer.from([1]), "sha", CACHED_AT);

    storage.clear();

    expect(storage.keys()).toEqual([]);
    expect(storage.getCachedIndex()).toBeUndefined();
  });

  it("should scope state by vault name within one database", () => {
    const dir = mkdtempSync(join(tmpdir(), "gitvault-"));
    const path = join(dir, "vault.db");
    const first = new SQLiteStorage({ path, vaultName: "first" });
    const second = new SQLiteStorage({ path, vaultName: "second" });

    first.set("salt", "mine");
    second.set("salt", "theirs");
    first.clear();

    expect(first.get("salt")).toBeUndefined();
    expect(second.get("salt")).toBe("theirs");

    first.close();
    second.close();
    rmSync(dir, { recursive: true, force: true });
  });
});

describe("Storage backends", () => {
  const backends: Array<[string, () => KeyValueStore & IndexCache]> = [
    ["memory", () => new MemoryStorage()],
    ["sqlite", () => new SQLiteStorage({ path: ":memory:", vaultName: "parity" })],
  ];

  it.each(backends)("should behave like the other backends (%s)", (_name, create) => {
    const store = create();
    store.set("b", "2");
    store.set("a", "1");
    store.cacheIndex(Buffer.from("idx"), "sha", CACHED_AT);

    expect(store.get("a")).toBe("1");
    expect(store.keys().sort()).toEqual(["a", "b"]);
    expect(store.delete("a")).toBe(true);
    expect(store.getCachedIndex()?.content.toString("utf8")).toBe("idx");

    store.clear();
    expect(store.keys()).toEqual([]);
    expect(store.getCachedIndex()).toBeUndefined();
    store.close();
  });
});
