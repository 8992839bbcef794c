/**
 * Authentication State Machine - PIN unlock with brute-force lockout
 *
 * The machine owns the master key while `unlocked` and destroys it on
 * every transition away. On disk only a copy sealed under a PIN-derived
 * key is kept, alongside the PIN hash and the persisted lockout counters.
 */

import { clearKey, cryptoErrorMessage, type CryptoService } from "../crypto/index.js";
import { failure, success, type Result } from "../result/index.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import type { DeviceSecrets, RepoCredentials } from "../storage/device-secrets.js";
import type { VaultRepository } from "../remote/vault-repository.js";
import { remoteErrorMessage } from "../remote/errors.js";
import { parseRepoUrl } from "../remote/github-auth.js";
import { createVaultConfig } from "../vault/vault-config.js";
import { ExponentialLockoutPolicy, type LockoutPolicy } from "./lockout-policy.js";
import { MasterKey } from "./master-key.js";
import {
  authErrorMessage,
  remainingLockout,
  type AuthError,
  type AuthState,
  type LockedState,
} from "./types.js";

const PIN_PATTERN = /^\d{6}$/;

export type AuthStateListener = (state: AuthState) => void;

export interface AuthStateMachineOptions {
  secrets: DeviceSecrets;
  crypto: CryptoService;
  /** Opens the remote repository during vault setup */
  openRepository: (credentials: RepoCredentials) => VaultRepository;
  policy?: LockoutPolicy;
  logger?: Logger;
  now?: () => Date;
}

export interface SetupVaultOptions {
  /** e.g. https://github.com/owner/repo.git; alternative to owner + name */
  repoUrl?: string;
  repoOwner?: string;
  repoName?: string;
  token: string;
  password: string;
  pin: string;
}

export class AuthStateMachine {
  private secrets: DeviceSecrets;
  private crypto: CryptoService;
  private openRepository: (credentials: RepoCredentials) => VaultRepository;
  private policy: LockoutPolicy;
  private logger: Logger;
  private now: () => Date;
  private current: AuthState = { status: "initializing" };
  private listeners: Set<AuthStateListener> = new Set();
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: AuthStateMachineOptions) {
    this.secrets = options.secrets;
    this.crypto = options.crypto;
    this.openRepository = options.openRepository;
    this.policy = options.policy ?? new ExponentialLockoutPolicy();
    this.logger = (options.logger ?? silentLogger).child("Auth");
    this.now = options.now ?? (() => new Date());
  }

  get state(): AuthState {
    return this.current;
  }

  /**
   * The master key, only while unlocked
   */
  get masterKey(): MasterKey | undefined {
    return this.current.status === "unlocked" ? this.current.masterKey : undefined;
  }

  get isUnlocked(): boolean {
    return this.current.status === "unlocked";
  }

  isLockedOut(): boolean {
    return remainingLockout(this.current, this.now()) !== undefined;
  }

  /**
   * Subscribe to state changes
   */
  subscribe(listener: AuthStateListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /**
   * Read local storage and leave `initializing`
   */
  async initialize(): Promise<AuthState> {
    return this.exclusive(async () => {
      if (this.current.status !== "initializing") {
        return this.current;
      }
      try {
        if (!this.secrets.isVaultConfigured()) {
          this.setState({ status: "not-configured" });
        } else {
          const failedAttempts = this.secrets.getFailedAttempts();
          this.setState(lockedState(failedAttempts, this.secrets.getLockoutUntil()));
        }
      } catch (error) {
        this.fail({ kind: "storage", details: describe(error) });
      }
      return this.current;
    });
  }

  /**
   * Leave `error` and read storage again
   */
  async retry(): Promise<AuthState> {
    if (this.current.status === "error") {
      this.setState({ status: "initializing" });
    }
    return this.initialize();
  }

  /**
   * Submit a PIN attempt while locked
   */
  async submitPin(pin: string): Promise<Result<MasterKey, AuthError>> {
    return this.exclusive(async () => {
      const state = this.current;
      if (state.status === "unlocked") {
        return success(state.masterKey);
      }
      if (state.status !== "locked") {
        return failure({ kind: "setup-validation", details: notReadyMessage(state) });
      }

      const remaining = remainingLockout(state, this.now());
      if (remaining !== undefined) {
        const error: AuthError = { kind: "locked-out", remainingMs: remaining };
        this.setState({ ...state, lastError: error });
        return failure(error);
      }

      try {
        const salt = this.secrets.getSalt();
        const pinHash = this.secrets.getPinHash();
        if (salt === undefined || pinHash === undefined) {
          this.setState({ status: "not-configured" });
          return failure({
            kind: "setup-validation",
            details: "Vault is not configured on this device",
          });
        }

        if (!this.crypto.verifyPinHash(pin, salt, pinHash)) {
          return failure(this.recordFailedAttempt(state));
        }

        const wrapped = this.secrets.getWrappedMasterKey();
        if (wrapped === undefined) {
          const error: AuthError = {
            kind: "storage",
            details: "Master key is not stored on this device; re-authenticate with your password",
          };
          this.setState({ ...state, lastError: error });
          return failure(error);
        }

        const unwrapped = await this.unwrapMasterKey(pin, salt, wrapped);
        if (!unwrapped.ok) {
          this.fail(unwrapped.error);
          return failure(unwrapped.error);
        }

        this.secrets.clearLockout();
        return success(this.unlock(unwrapped.value));
      } catch (error) {
        const cause: AuthError = { kind: "storage", details: describe(error) };
        this.fail(cause);
        return failure(cause);
      }
    });
  }

  /**
   * Create or join a vault: validate input, reuse the remote salt (or
   * publish a new one), derive the master key and store it sealed.
   */
  async setupVault(options: SetupVaultOptions): Promise<Result<MasterKey, AuthError>> {
    return this.exclusive(async () => {
      const validated = validateSetup(options);
      if (!validated.ok) {
        return failure(validated.error);
      }
      const credentials = validated.value;

      let salt: Result<Buffer, AuthError>;
      try {
        salt = await this.resolveRemoteSalt(credentials);
      } catch (error) {
        return failure({ kind: "setup-validation", details: describe(error) });
      }
      if (!salt.ok) {
        return failure(salt.error);
      }

      const derived = await this.crypto.deriveKey(options.password, options.pin, salt.value);
      if (!derived.ok) {
        const cause: AuthError = {
          kind: "key-derivation",
          details: cryptoErrorMessage(derived.error),
        };
        this.fail(cause);
        return failure(cause);
      }

      try {
        const stored = await this.storeMasterKey(options.pin, salt.value, derived.value);
        if (!stored.ok) {
          this.fail(stored.error);
          return failure(stored.error);
        }
        this.secrets.setCredentials(credentials);
        this.secrets.clearLockout();
        this.logger.info("Vault configured", { owner: credentials.owner, repo: credentials.repo });
        return success(this.unlock(derived.value));
      } catch (error) {
        clearKey(derived.value);
        const cause: AuthError = { kind: "storage", details: describe(error) };
        this.fail(cause);
        return failure(cause);
      }
    });
  }

  /**
   * Re-derive the master key from the password, e.g. when the sealed copy
   * is missing on this device. The PIN is still checked and counted.
   */
  async reauthenticate(password: string, pin: string): Promise<Result<MasterKey, AuthError>> {
    return this.exclusive(async () => {
      const state = this.current;
      if (state.status !== "locked" && state.status !== "error") {
        return failure({ kind: "setup-validation", details: notReadyMessage(state) });
      }

      try {
        const base =
          state.status === "locked"
            ? state
            : lockedState(this.secrets.getFailedAttempts(), this.secrets.getLockoutUntil());
        const remaining = remainingLockout(base, this.now());
        if (remaining !== undefined) {
          return failure({ kind: "locked-out", remainingMs: remaining });
        }

        const salt = this.secrets.getSalt();
        const pinHash = this.secrets.getPinHash();
        if (salt === undefined || pinHash === undefined) {
          this.setState({ status: "not-configured" });
          return failure({
            kind: "setup-validation",
            details: "Vault is not configured on this device",
          });
        }
        if (!this.crypto.verifyPinHash(pin, salt, pinHash)) {
          return failure(this.recordFailedAttempt(base));
        }

        const derived = await this.crypto.deriveKey(password, pin, salt);
        if (!derived.ok) {
          const cause: AuthError = {
            kind: "key-derivation",
            details: cryptoErrorMessage(derived.error),
          };
          this.fail(cause);
          return failure(cause);
        }

        const stored = await this.storeMasterKey(pin, salt, derived.value);
        if (!stored.ok) {
          this.fail(stored.error);
          return failure(stored.error);
        }
        this.secrets.clearLockout();
        return success(this.unlock(derived.value));
      } catch (error) {
        const cause: AuthError = { kind: "storage", details: describe(error) };
        this.fail(cause);
        return failure(cause);
      }
    });
  }

  /**
   * Discard the master key. Call on explicit lock, timeout or suspension.
   */
  lock(): void {
    if (this.current.status !== "unlocked") {
      return;
    }
    this.setState({ status: "locked", failedAttempts: 0 });
    this.logger.info("Vault locked");
  }

  /**
   * Forget this device's vault: key material, credentials and cache
   */
  async resetVault(): Promise<Result<void, AuthError>> {
    return this.exclusive(async () => {
      try {
        this.secrets.clearAll();
      } catch (error) {
        const cause: AuthError = { kind: "storage", details: describe(error) };
        this.fail(cause);
        return failure(cause);
      }
      this.setState({ status: "not-configured" });
      this.logger.info("Vault reset");
      return success(undefined);
    });
  }

  private recordFailedAttempt(state: LockedState): AuthError {
    const failedAttempts = state.failedAttempts + 1;
    this.secrets.setFailedAttempts(failedAttempts);

    const duration = this.policy.lockoutDuration(failedAttempts);
    if (duration > 0) {
      const lockoutUntil = new Date(this.now().getTime() + duration);
      this.secrets.setLockoutUntil(lockoutUntil);
      const error: AuthError = { kind: "locked-out", remainingMs: duration };
      this.setState(lockedState(failedAttempts, lockoutUntil, error));
      this.logger.warn("Too many failed PIN attempts, locking out", {
        failedAttempts,
        lockoutMs: duration,
      });
      return error;
    }

    const error: AuthError = {
      kind: "wrong-pin",
      attemptsRemaining: this.policy.attemptsRemaining(failedAttempts),
    };
    this.setState(lockedState(failedAttempts, undefined, error));
    this.logger.warn("Wrong PIN", { failedAttempts });
    return error;
  }

  private async unwrapMasterKey(
    pin: string,
    salt: Buffer,
    wrapped: Buffer
  ): Promise<Result<Buffer, AuthError>> {
    const kek = await this.crypto.deriveKeyFromPin(pin, salt);
    if (!kek.ok) {
      return failure({ kind: "key-derivation", details: cryptoErrorMessage(kek.error) });
    }
    const unwrapped = this.crypto.decrypt(wrapped, kek.value);
    clearKey(kek.value);
    return unwrapped.mapError(
      (error): AuthError => ({ kind: "key-derivation", details: cryptoErrorMessage(error) })
    );
  }

  private async storeMasterKey(
    pin: string,
    salt: Buffer,
    masterKey: Buffer
  ): Promise<Result<void, AuthError>> {
    const kek = await this.crypto.deriveKeyFromPin(pin, salt);
    if (!kek.ok) {
      clearKey(masterKey);
      return failure({ kind: "key-derivation", details: cryptoErrorMessage(kek.error) });
    }
    const wrapped = this.crypto.encrypt(masterKey, kek.value);
    clearKey(kek.value);
    if (!wrapped.ok) {
      clearKey(masterKey);
      return failure({ kind: "key-derivation", details: cryptoErrorMessage(wrapped.error) });
    }

    this.secrets.setSalt(salt);
    this.secrets.setPinHash(this.crypto.hashPin(pin, salt));
    this.secrets.setWrappedMasterKey(wrapped.value);
    return success(undefined);
  }

  private async resolveRemoteSalt(
    credentials: RepoCredentials
  ): Promise<Result<Buffer, AuthError>> {
    const repository = this.openRepository(credentials);
    const existing = await repository.downloadVaultConfig();
    if (existing.ok) {
      this.logger.debug("Joining existing vault");
      return success(existing.value.salt);
    }
    if (existing.error.kind !== "not-found") {
      return failure({ kind: "setup-validation", details: remoteErrorMessage(existing.error) });
    }

    const salt = this.crypto.generateSalt();
    const uploaded = await repository.uploadVaultConfig(createVaultConfig(salt, this.now()));
    if (!uploaded.ok) {
      return failure({ kind: "setup-validation", details: remoteErrorMessage(uploaded.error) });
    }
    this.secrets.setConfigSha(uploaded.value);
    this.logger.debug("Created new vault config");
    return success(salt);
  }

  /** Takes ownership of `raw` and clears it */
  private unlock(raw: Buffer): MasterKey {
    const masterKey = new MasterKey(raw);
    clearKey(raw);
    this.setState({ status: "unlocked", masterKey });
    this.logger.info("Vault unlocked");
    return masterKey;
  }

  private fail(cause: AuthError): void {
    this.logger.error("Authentication error", {
      kind: cause.kind,
      message: authErrorMessage(cause),
    });
    this.setState({ status: "error", error: cause });
  }

  private setState(next: AuthState): void {
    const previous = this.current;
    if (
      previous.status === "unlocked" &&
      (next.status !== "unlocked" || next.masterKey !== previous.masterKey)
    ) {
      previous.masterKey.destroy();
    }
    this.current = next;
    for (const listener of this.listeners) {
      listener(next);
    }
  }

  private async exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    // Errors reach the caller through `run`; the queue only orders work
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

function lockedState(
  failedAttempts: number,
  lockoutUntil?: Date,
  lastError?: AuthError
): LockedState {
  const state: LockedState = { status: "locked", failedAttempts };
  if (lockoutUntil !== undefined) {
    state.lockoutUntil = lockoutUntil;
  }
  if (lastError !== undefined) {
    state.lastError = lastError;
  }
  return state;
}

function validateSetup(options: SetupVaultOptions): Result<RepoCredentials, AuthError> {
  const token = options.token.trim();
  if (token.length === 0) {
    return failure({ kind: "setup-validation", details: "GitHub token is required" });
  }

  let owner: string | undefined;
  let repo: string | undefined;
  if (options.repoUrl !== undefined && options.repoUrl.trim().length > 0) {
    const parsed = parseRepoUrl(options.repoUrl);
    if (parsed === null) {
      return failure({
        kind: "setup-validation",
        details: `Invalid GitHub repository URL: ${options.repoUrl}`,
      });
    }
    owner = parsed.owner;
    repo = parsed.repo;
  } else {
    owner = options.repoOwner?.trim();
    repo = options.repoName?.trim();
  }
  if (!owner || !repo) {
    return failure({ kind: "setup-validation", details: "Repository owner and name are required" });
  }

  if (options.password.length === 0) {
    return failure({ kind: "setup-validation", details: "Password is required" });
  }
  if (!PIN_PATTERN.test(options.pin)) {
    return failure({ kind: "setup-validation", details: "PIN must be exactly 6 digits" });
  }
  return success({ owner, repo, token });
}

function notReadyMessage(state: AuthState): string {
  switch (state.status) {
    case "initializing":
      return "Vault is still initializing";
    case "not-configured":
      return "Vault is not configured on this device";
    case "error":
      return `Vault is in an error state: ${authErrorMessage(state.error)}`;
    case "locked":
      return "Vault is locked";
    case "unlocked":
      return "Vault is already unlocked";
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
