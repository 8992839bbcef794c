import { describe, it, expect, beforeEach, vi } from "vitest";
import { loadConfig } from "../src/config.js";
import { NodeCryptoService } from "../src/crypto/index.js";
import { DATA_DIR, INDEX_FILE, entryPath } from "../src/remote/vault-repository.js";
import { DeviceSecrets } from "../src/storage/device-secrets.js";
import { MemoryStorage } from "../src/storage/types.js";
import { createEntry } from "../src/vault/vault-entry.js";
import { VaultIndex } from "../src/vault/vault-index.js";
import { VaultSession, sessionErrorMessage } from "../src/vault/vault-session.js";
import { InMemoryVaultRepository } from "./support/in-memory-repository.js";

const PIN = "123456";
const HOUR = 60 * 60 * 1000;

describe("VaultSession", () => {
  const crypto = new NodeCryptoService();
  let store: MemoryStorage;
  let repository: InMemoryVaultRepository;
  let clock: Date;
  let session: VaultSession;

  beforeEach(async () => {
    store = new MemoryStorage();
    repository = new InMemoryVaultRepository();
    clock = new Date("2024-06-01T12:00:00.000Z");
    session = new VaultSession({
      store,
      config: loadConfig({ pbkdf2Iterations: 1000 }),
      openRepository: () => repository,
      now: () => clock,
    });
    await session.initialize();
    (
      await session.setupVault({
        repoUrl: "https://github.com/alice/secrets",
        token: "test-token",
        password: "test-password",
        pin: PIN,
      })
    ).unwrap();
  });

  function masterKey(): Uint8Array {
    const key = session.auth.masterKey;
    if (!key) {
      throw new Error("vault must be unlocked");
    }
    return key.expose();
  }

  function remoteIndex(): VaultIndex {
    const file = repository.files.get(INDEX_FILE);
    if (!file) {
      throw new Error("index was never uploaded");
    }
    return VaultIndex.parse(crypto.decryptString(file.content, masterKey()).unwrap()).unwrap();
  }

  function remoteEntryIds(): string[] {
    return remoteIndex().entries.map((entry) => entry.id);
  }

  /** Publish a new remote index the way another device would */
  function rewriteRemoteIndex(change: (index: VaultIndex) => VaultIndex): void {
    const next = change(remoteIndex());
    repository.seed(INDEX_FILE, crypto.encryptString(next.toJSONString(), masterKey()).unwrap());
  }

  function addedElsewhere(index: VaultIndex): VaultIndex {
    const entry = createEntry({
      id: "from-laptop",
      type: "text",
      label: "laptop",
      sizeBytes: 4,
      retentionPeriod: null,
      now: clock,
    });
    return index.addEntry(entry).unwrap();
  }

  function blobPaths(): string[] {
    return [...repository.files.keys()].filter((path) => path.startsWith(DATA_DIR));
  }

  it("should start with an empty index when none exists remotely", async () => {
    const index = (await session.loadIndex()).unwrap();

    expect(index.isEmpty).toBe(true);
    expect(repository.callsTo("uploadFile").filter((call) => call.endsWith(INDEX_FILE))).toEqual(
      []
    );
  });

  it("should add, read and delete an entry", async () => {
    const entry = (
      await session.addEntry({ type: "text", label: "wifi", content: "hunter2" })
    ).unwrap();

    expect(entry.expiresAt).toEqual(new Date(clock.getTime() + 24 * HOUR));
    expect(entry.sha).toBe(repository.shaOf(entryPath(entry.id)));
    expect(entry.sizeBytes).toBe(repository.files.get(entryPath(entry.id))?.content.length);
    expect(remoteEntryIds()).toEqual([entry.id]);
    expect(new DeviceSecrets(store).getIndexSha()).toBe(repository.shaOf(INDEX_FILE));

    const read = (await session.readEntry(entry.id)).unwrap();
    expect(read.content.toString("utf8")).toBe("hunter2");
    expect(read.entry.label).toBe("wifi");

    (await session.deleteEntry(entry.id)).unwrap();
    expect(repository.files.has(entryPath(entry.id))).toBe(false);
    expect(remoteEntryIds()).toEqual([]);
    expect(session.currentIndex?.isEmpty).toBe(true);
  });

  it("should report unknown entries", async () => {
    const result = await session.readEntry("missing");

    expect(result.errorOrUndefined).toEqual({
      kind: "index",
      error: { kind: "entry-not-found", id: "missing" },
    });
  });

  it("should remove the uploaded blob when the index cannot be published", async () => {
    repository.failOn("uploadFile", INDEX_FILE, { kind: "server", statusCode: 503 });

    const result = await session.addEntry({ type: "text", label: "note", content: "x" });

    expect(result.errorOrUndefined).toEqual({
      kind: "remote",
      error: { kind: "server", statusCode: 503 },
    });
    expect(repository.callsTo("deleteFile")).toHaveLength(1);
    expect(blobPaths()).toEqual([]);
  });

  it("should add concurrent entries one after the other", async () => {
    const upload = repository.uploadEntry.bind(repository);
    vi.spyOn(repository, "uploadEntry").mockImplementationOnce(async (id, content, sha) => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      return upload(id, content, sha);
    });

    const [first, second] = await Promise.all([
      session.addEntry({ type: "text", label: "first", content: "1" }),
      session.addEntry({ type: "text", label: "second", content: "2" }),
    ]);

    const ids = [first.unwrap().id, second.unwrap().id];
    expect(remoteEntryIds()).toEqual(ids);
    expect(session.currentIndex?.entries.map((e) => e.id)).toEqual(ids);
    expect(blobPaths()).toHaveLength(2);
    expect(repository.callsTo("deleteFile")).toEqual([]);
  });

  it("should publish against the index it read and reload after a conflict", async () => {
    const existing = (
      await session.addEntry({ type: "text", label: "note", content: "x" })
    ).unwrap();
    const readAt = repository.shaOf(INDEX_FILE);
    const upload = repository.uploadEntry.bind(repository);
    vi.spyOn(repository, "uploadEntry").mockImplementationOnce(async (id, content, sha) => {
      rewriteRemoteIndex(addedElsewhere);
      return upload(id, content, sha);
    });

    const lost = await session.addEntry({ type: "text", label: "late", content: "y" });

    expect(lost.errorOrUndefined).toEqual({
      kind: "remote",
      error: { kind: "conflict", path: INDEX_FILE, expectedSha: readAt },
    });
    expect(session.currentIndex).toBeNull();
    expect(blobPaths()).toEqual([entryPath(existing.id)]);

    const retried = (
      await session.addEntry({ type: "text", label: "late", content: "y" })
    ).unwrap();
    expect(remoteEntryIds()).toEqual([existing.id, "from-laptop", retried.id]);
  });

  it("should drop the index and refuse work once locked", async () => {
    await session.addEntry({ type: "text", label: "note", content: "x" });
    expect(session.currentIndex?.count).toBe(1);

    session.lock();

    expect(session.currentIndex).toBeNull();
    const result = await session.addEntry({ type: "text", label: "note", content: "y" });
    expect(result.errorOrUndefined).toEqual({ kind: "locked" });
    expect(sessionErrorMessage({ kind: "locked" })).toBe("Vault is locked");
  });

  it("should fall back to the cached index when offline", async () => {
    const entry = (
      await session.addEntry({ type: "text", label: "note", content: "x" })
    ).unwrap();
    session.lock();
    (await session.submitPin(PIN)).unwrap();
    repository.failOn("downloadFile", INDEX_FILE, { kind: "network", details: "offline" });

    const cached = (await session.loadIndex()).unwrap();
    expect(cached.entries.map((e) => e.id)).toEqual([entry.id]);

    store.clearIndex();
    const offline = await session.loadIndex();
    expect(offline.errorOrUndefined).toEqual({
      kind: "remote",
      error: { kind: "network", details: "offline" },
    });
  });

  it("should purge expired entries", async () => {
    const shortLived = (
      await session.addEntry({ type: "text", label: "otp", content: "123", retentionPeriod: "1h" })
    ).unwrap();
    const keeper = (
      await session.addEntry({
        type: "text",
        label: "note",
        content: "keep",
        retentionPeriod: null,
      })
    ).unwrap();
    clock = new Date(clock.getTime() + 2 * HOUR);

    const outcome = (await session.cleanup()).unwrap();

    expect(outcome.result.deletedIds).toEqual([shortLived.id]);
    expect(outcome.indexUpdate.status).toBe("uploaded");
    expect(session.currentIndex?.entries.map((e) => e.id)).toEqual([keeper.id]);
    expect(remoteEntryIds()).toEqual([keeper.id]);
  });

  it("should recover on the next cleanup after another device moved the index", async () => {
    const shortLived = (
      await session.addEntry({ type: "text", label: "otp", content: "123", retentionPeriod: "1h" })
    ).unwrap();
    const keeper = (
      await session.addEntry({
        type: "text",
        label: "note",
        content: "keep",
        retentionPeriod: null,
      })
    ).unwrap();
    const readAt = repository.shaOf(INDEX_FILE);
    rewriteRemoteIndex(addedElsewhere);
    clock = new Date(clock.getTime() + 2 * HOUR);

    const first = (await session.cleanup()).unwrap();

    expect(first.result.deletedIds).toEqual([shortLived.id]);
    expect(first.indexUpdate.status).toBe("failed");
    if (first.indexUpdate.status === "failed") {
      expect(first.indexUpdate.error).toEqual({
        stage: "upload",
        error: { kind: "conflict", path: INDEX_FILE, expectedSha: readAt },
      });
    }
    expect(session.currentIndex).toBeNull();
    expect(remoteEntryIds()).toEqual([shortLived.id, keeper.id, "from-laptop"]);

    const second = (await session.cleanup()).unwrap();

    expect(second.result.deletedIds).toEqual([shortLived.id]);
    expect(second.indexUpdate.status).toBe("uploaded");
    expect(remoteEntryIds()).toEqual([keeper.id, "from-laptop"]);
    expect(session.currentIndex?.entries.map((e) => e.id)).toEqual([keeper.id, "from-laptop"]);

    const third = (await session.cleanup()).unwrap();
    expect(third.result.deleted).toBe(0);
    expect(third.indexUpdate).toEqual({ status: "unchanged" });
  });

  it("should share one cleanup pass between concurrent callers", async () => {
    await session.addEntry({ type: "text", label: "otp", content: "123", retentionPeriod: "1m" });
    clock = new Date(clock.getTime() + HOUR);

    const [first, second] = await Promise.all([session.cleanup(), session.cleanup()]);

    expect(second).toBe(first);
    expect(repository.callsTo("deleteFile")).toHaveLength(1);
  });

  it("should forget everything on reset", async () => {
    await session.addEntry({ type: "text", label: "note", content: "x" });

    (await session.resetVault()).unwrap();

    expect(session.state).toEqual({ status: "not-configured" });
    expect(session.currentIndex).toBeNull();
    expect(store.getCachedIndex()).toBeUndefined();
  });
});
