/**
 * Vault Session - the collaborator surface for an app shell
 *
 * Wires the auth machine, remote repository, local store and cleanup
 * service for one vault. Exposes the auth state as an observable value,
 * PIN submission, entry operations and a single-flight cleanup trigger.
 */

import { v4 as uuidv4 } from "uuid";
import {
  cryptoErrorMessage,
  NodeCryptoService,
  type CryptoError,
  type CryptoService,
} from "../crypto/index.js";
import { failure, success, type Result } from "../result/index.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { loadConfig, type VaultCoreConfig } from "../config.js";
import {
  AuthStateMachine,
  type AuthStateListener,
  type SetupVaultOptions,
} from "../auth/auth-machine.js";
import { ExponentialLockoutPolicy } from "../auth/lockout-policy.js";
import type { MasterKey } from "../auth/master-key.js";
import type { AuthError, AuthState } from "../auth/types.js";
import { CleanupService, type CleanupOutcome } from "../cleanup/cleanup-service.js";
import { GitHubAuth } from "../remote/github-auth.js";
import { GitHubClient } from "../remote/github-client.js";
import {
  entryPath,
  GitHubVaultRepository,
  type VaultRepository,
} from "../remote/vault-repository.js";
import { remoteErrorMessage, type RemoteError } from "../remote/errors.js";
import { DeviceSecrets, type RepoCredentials } from "../storage/device-secrets.js";
import { SQLiteStorage } from "../storage/sqlite.js";
import type { IndexCache, KeyValueStore } from "../storage/types.js";
import {
  indexErrorMessage,
  type EntryType,
  type IndexError,
  type RetentionPeriod,
  type VaultEntry,
} from "./types.js";
import { createEntry, withSha } from "./vault-entry.js";
import { VaultIndex } from "./vault-index.js";

export type SessionError =
  | { kind: "locked" }
  | { kind: "not-configured" }
  | { kind: "remote"; error: RemoteError }
  | { kind: "crypto"; error: CryptoError }
  | { kind: "index"; error: IndexError };

export function sessionErrorMessage(error: SessionError): string {
  switch (error.kind) {
    case "locked":
      return "Vault is locked";
    case "not-configured":
      return "Vault is not configured on this device";
    case "remote":
      return remoteErrorMessage(error.error);
    case "crypto":
      return cryptoErrorMessage(error.error);
    case "index":
      return indexErrorMessage(error.error);
  }
}

export interface NewEntry {
  type: EntryType;
  label: string;
  content: string | Uint8Array;
  mimeType?: string;
  /** `null` for an entry that never expires; defaults to one day */
  retentionPeriod?: RetentionPeriod | null;
}

export interface EntryContent {
  entry: VaultEntry;
  content: Buffer;
}

interface ReadyVault {
  repository: VaultRepository;
  index: VaultIndex;
  /** Remote SHA `index` was read or last written at */
  indexSha: string | undefined;
  key: MasterKey;
}

export interface VaultSessionOptions {
  store: KeyValueStore & IndexCache;
  config?: VaultCoreConfig;
  crypto?: CryptoService;
  /** Defaults to the GitHub repository named by the stored credentials */
  openRepository?: (credentials: RepoCredentials) => VaultRepository;
  logger?: Logger;
  now?: () => Date;
}

export class VaultSession {
  readonly auth: AuthStateMachine;
  private store: KeyValueStore & IndexCache;
  private secrets: DeviceSecrets;
  private config: VaultCoreConfig;
  private crypto: CryptoService;
  private openRepository: (credentials: RepoCredentials) => VaultRepository;
  private logger: Logger;
  private now: () => Date;
  private repository: VaultRepository | null = null;
  private index: VaultIndex | null = null;
  private indexSha: string | undefined;
  private cleanupInFlight: Promise<Result<CleanupOutcome, SessionError>> | null = null;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: VaultSessionOptions) {
    this.store = options.store;
    this.secrets = new DeviceSecrets(options.store);
    this.config = options.config ?? loadConfig();
    this.crypto =
      options.crypto ?? new NodeCryptoService({ iterations: this.config.pbkdf2Iterations });
    this.logger = (options.logger ?? silentLogger).child("Session");
    this.now = options.now ?? (() => new Date());
    this.openRepository =
      options.openRepository ?? ((credentials) => this.createGitHubRepository(credentials));

    this.auth = new AuthStateMachine({
      secrets: this.secrets,
      crypto: this.crypto,
      openRepository: this.openRepository,
      policy: new ExponentialLockoutPolicy(this.config.lockout),
      logger: options.logger,
      now: this.now,
    });

    this.auth.subscribe((state) => {
      if (state.status !== "unlocked") {
        this.index = null;
      }
      if (state.status === "not-configured") {
        this.repository = null;
        this.indexSha = undefined;
      }
    });
  }

  /**
   * Open a session backed by SQLite at `config.storage.path`
   */
  static open(
    vaultName: string,
    config: VaultCoreConfig = loadConfig(),
    logger?: Logger
  ): VaultSession {
    const store = new SQLiteStorage({ path: config.storage.path, vaultName });
    return new VaultSession({ store, config, logger });
  }

  get state(): AuthState {
    return this.auth.state;
  }

  get currentIndex(): VaultIndex | null {
    return this.index;
  }

  subscribe(listener: AuthStateListener): () => void {
    return this.auth.subscribe(listener);
  }

  async initialize(): Promise<AuthState> {
    return this.auth.initialize();
  }

  async submitPin(pin: string): Promise<Result<MasterKey, AuthError>> {
    return this.auth.submitPin(pin);
  }

  async setupVault(options: SetupVaultOptions): Promise<Result<MasterKey, AuthError>> {
    return this.auth.setupVault(options);
  }

  async reauthenticate(password: string, pin: string): Promise<Result<MasterKey, AuthError>> {
    return this.auth.reauthenticate(password, pin);
  }

  lock(): void {
    this.auth.lock();
  }

  async resetVault(): Promise<Result<void, AuthError>> {
    return this.auth.resetVault();
  }

  /**
   * Download and decrypt the index. Falls back to the cached copy when the
   * remote is unreachable.
   */
  async loadIndex(): Promise<Result<VaultIndex, SessionError>> {
    return this.exclusive(() => this.fetchIndex());
  }

  /**
   * Encrypt and upload a new entry, then publish the updated index
   */
  async addEntry(input: NewEntry): Promise<Result<VaultEntry, SessionError>> {
    return this.exclusive(() => this.writeEntry(input));
  }

  /**
   * Download and decrypt an entry's content
   */
  async readEntry(id: string): Promise<Result<EntryContent, SessionError>> {
    return this.exclusive(async () => {
      const ready = await this.ready();
      if (!ready.ok) {
        return failure(ready.error);
      }
      const { repository, index, key } = ready.value;

      const entry = index.getEntry(id);
      if (!entry) {
        return failure({ kind: "index", error: { kind: "entry-not-found", id } });
      }
      const downloaded = await repository.downloadEntry(id);
      if (!downloaded.ok) {
        return failure({ kind: "remote", error: downloaded.error });
      }
      const decrypted = this.crypto.decrypt(downloaded.value.content, key.expose());
      if (!decrypted.ok) {
        return failure({ kind: "crypto", error: decrypted.error });
      }
      return success({ entry, content: decrypted.value });
    });
  }

  /**
   * Delete an entry's blob and remove it from the index. A blob that is
   * already gone still removes the entry.
   */
  async deleteEntry(id: string): Promise<Result<void, SessionError>> {
    return this.exclusive(() => this.removeEntry(id));
  }

  /**
   * Purge expired entries. A call made while a pass is running gets that
   * pass's outcome. A rejected index upload is reported in
   * `indexUpdate`; the next pass starts from the remote index again.
   */
  async cleanup(): Promise<Result<CleanupOutcome, SessionError>> {
    if (this.cleanupInFlight) {
      return this.cleanupInFlight;
    }
    const run = this.exclusive(() => this.runCleanup());
    this.cleanupInFlight = run;
    try {
      return await run;
    } finally {
      this.cleanupInFlight = null;
    }
  }

  close(): void {
    this.auth.lock();
    this.store.close();
  }

  private async fetchIndex(): Promise<Result<VaultIndex, SessionError>> {
    const key = this.auth.masterKey;
    if (!key) {
      return failure({ kind: "locked" });
    }
    const repository = this.getRepository();
    if (!repository.ok) {
      return failure(repository.error);
    }

    const downloaded = await repository.value.downloadIndex();
    if (!downloaded.ok) {
      if (downloaded.error.kind === "not-found") {
        this.logger.info("No remote index yet, starting empty");
        return success(this.setIndex(VaultIndex.empty(this.now()), undefined));
      }
      const cached = this.store.getCachedIndex();
      if (!cached) {
        return failure({ kind: "remote", error: downloaded.error });
      }
      this.logger.warn("Using cached index", {
        error: remoteErrorMessage(downloaded.error),
        cachedAt: cached.cachedAt.toISOString(),
      });
      return this.decryptIndex(cached.content, key).map((index) =>
        this.setIndex(index, cached.sha)
      );
    }

    const decoded = this.decryptIndex(downloaded.value.content, key);
    if (!decoded.ok) {
      return failure(decoded.error);
    }
    this.store.cacheIndex(downloaded.value.content, downloaded.value.sha, this.now());
    this.secrets.setIndexSha(downloaded.value.sha);
    this.secrets.setLastSyncAt(this.now());
    return success(this.setIndex(decoded.value, downloaded.value.sha));
  }

  private async writeEntry(input: NewEntry): Promise<Result<VaultEntry, SessionError>> {
    const ready = await this.ready();
    if (!ready.ok) {
      return failure(ready.error);
    }
    const { repository, index, key } = ready.value;

    const id = uuidv4();
    const plaintext =
      typeof input.content === "string" ? Buffer.from(input.content, "utf8") : input.content;
    const encrypted = this.crypto.encrypt(plaintext, key.expose());
    if (!encrypted.ok) {
      return failure({ kind: "crypto", error: encrypted.error });
    }

    const uploaded = await repository.uploadEntry(id, encrypted.value);
    if (!uploaded.ok) {
      return failure({ kind: "remote", error: uploaded.error });
    }

    const entry = createEntry({
      id,
      type: input.type,
      label: input.label,
      mimeType: input.mimeType,
      retentionPeriod: input.retentionPeriod,
      sizeBytes: encrypted.value.length,
      now: this.now(),
    });
    const withRemoteSha = withSha(entry, uploaded.value, this.now());

    const next = index.addEntry(withRemoteSha);
    if (!next.ok) {
      return failure({ kind: "index", error: next.error });
    }
    const published = await this.publishIndex(ready.value, next.value);
    if (!published.ok) {
      // The blob is unreachable without an index entry
      const removed = await repository.deleteEntry(id, uploaded.value);
      if (!removed.ok) {
        this.logger.warn("Could not remove orphaned entry blob", {
          id,
          error: remoteErrorMessage(removed.error),
        });
      }
      return failure(published.error);
    }
    this.logger.info("Entry added", { id, type: input.type });
    return success(withRemoteSha);
  }

  private async removeEntry(id: string): Promise<Result<void, SessionError>> {
    const ready = await this.ready();
    if (!ready.ok) {
      return failure(ready.error);
    }
    const { repository, index } = ready.value;

    const entry = index.getEntry(id);
    if (!entry) {
      return failure({ kind: "index", error: { kind: "entry-not-found", id } });
    }

    let sha = entry.sha;
    if (sha === undefined) {
      const info = await repository.getFileInfo(entryPath(id));
      if (info.ok) {
        sha = info.value.sha;
      } else if (info.error.kind !== "not-found") {
        return failure({ kind: "remote", error: info.error });
      }
    }
    if (sha !== undefined) {
      const deleted = await repository.deleteEntry(id, sha);
      if (!deleted.ok && deleted.error.kind !== "not-found") {
        return failure({ kind: "remote", error: deleted.error });
      }
    }

    const published = await this.publishIndex(ready.value, index.removeEntry(id));
    if (!published.ok) {
      return failure(published.error);
    }
    this.logger.info("Entry deleted", { id });
    return success(undefined);
  }

  private async runCleanup(): Promise<Result<CleanupOutcome, SessionError>> {
    const ready = await this.ready();
    if (!ready.ok) {
      return failure(ready.error);
    }
    const { repository, index, indexSha, key } = ready.value;

    const service = new CleanupService({
      repository,
      crypto: this.crypto,
      maxBatchSize: this.config.maxBatchSize,
      logger: this.logger,
      now: this.now,
    });
    const outcome = await service.run({ index, indexSha, masterKey: key });
    if (!outcome.ok) {
      return failure({ kind: "locked" });
    }

    const { indexUpdate } = outcome.value;
    if (indexUpdate.status === "uploaded") {
      this.commitIndex(indexUpdate.index, indexUpdate.sha, key);
    } else if (indexUpdate.status === "failed") {
      this.logger.warn("Index not updated after cleanup, reloading on next use", {
        stage: indexUpdate.error.stage,
      });
      this.index = null;
    }
    return success(outcome.value);
  }

  /**
   * Unlocked repository, index and the SHA that index was read at
   */
  private async ready(): Promise<Result<ReadyVault, SessionError>> {
    const key = this.auth.masterKey;
    if (!key) {
      return failure({ kind: "locked" });
    }
    const repository = this.getRepository();
    if (!repository.ok) {
      return failure(repository.error);
    }
    if (this.index) {
      return success({
        repository: repository.value,
        index: this.index,
        indexSha: this.indexSha,
        key,
      });
    }
    const loaded = await this.fetchIndex();
    return loaded.map((index) => ({
      repository: repository.value,
      index,
      indexSha: this.indexSha,
      key,
    }));
  }

  /**
   * Upload `index` guarded by the SHA its base was read at. On any
   * rejection the in-memory index is dropped and reloaded on next use.
   */
  private async publishIndex(
    base: ReadyVault,
    index: VaultIndex
  ): Promise<Result<VaultIndex, SessionError>> {
    const encrypted = this.crypto.encryptString(index.toJSONString(), base.key.expose());
    if (!encrypted.ok) {
      return failure({ kind: "crypto", error: encrypted.error });
    }
    const uploaded = await base.repository.uploadIndex(encrypted.value, base.indexSha);
    if (!uploaded.ok) {
      this.logger.warn("Index upload rejected", { error: remoteErrorMessage(uploaded.error) });
      this.index = null;
      return failure({ kind: "remote", error: uploaded.error });
    }
    this.store.cacheIndex(encrypted.value, uploaded.value, this.now());
    this.secrets.setIndexSha(uploaded.value);
    this.secrets.setLastSyncAt(this.now());
    return success(this.setIndex(index, uploaded.value));
  }

  private commitIndex(index: VaultIndex, sha: string, key: MasterKey): void {
    this.setIndex(index, sha);
    this.secrets.setIndexSha(sha);
    if (key.isValid) {
      const encrypted = this.crypto.encryptString(index.toJSONString(), key.expose());
      if (encrypted.ok) {
        this.store.cacheIndex(encrypted.value, sha, this.now());
      }
    }
  }

  private decryptIndex(content: Buffer, key: MasterKey): Result<VaultIndex, SessionError> {
    const json = this.crypto.decryptString(content, key.expose());
    if (!json.ok) {
      return failure({ kind: "crypto", error: json.error });
    }
    return VaultIndex.parse(json.value).mapError(
      (error): SessionError => ({ kind: "index", error })
    );
  }

  private setIndex(index: VaultIndex, sha: string | undefined): VaultIndex {
    if (this.auth.isUnlocked) {
      this.index = index;
    }
    this.indexSha = sha;
    return index;
  }

  private getRepository(): Result<VaultRepository, SessionError> {
    if (this.repository) {
      return success(this.repository);
    }
    const credentials = this.secrets.getCredentials();
    if (!credentials) {
      return failure({ kind: "not-configured" });
    }
    this.repository = this.openRepository(credentials);
    return success(this.repository);
  }

  private createGitHubRepository(credentials: RepoCredentials): VaultRepository {
    const { github } = this.config;
    const client = new GitHubClient({
      auth: new GitHubAuth({ ...credentials, baseUrl: github.baseUrl }),
      maxRetries: github.maxRetries,
      retryDelayMs: github.retryDelayMs,
      timeoutMs: github.timeoutMs,
      rateLimitWarningThreshold: github.rateLimitWarningThreshold,
      logger: this.logger,
    });
    return new GitHubVaultRepository(client);
  }

  /** Runs session operations one at a time so each publishes from the latest index */
  private async exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
