/**
 * Typed accessors for the device state kept in a KeyValueStore
 *
 * The master key itself is never written here; only a copy sealed under a
 * PIN-derived key is persisted, so a correct PIN is needed to recover it.
 */

import type { KeyValueStore } from "./types.js";

export const DeviceStateKeys = {
  salt: "salt",
  pinHash: "pin_hash",
  wrappedMasterKey: "wrapped_master_key",
  githubToken: "github_token",
  repoOwner: "repo_owner",
  repoName: "repo_name",
  failedAttempts: "failed_attempts",
  lockoutUntil: "lockout_until",
  indexSha: "index_sha",
  configSha: "config_sha",
  lastSyncAt: "last_sync_at",
} as const;

export interface RepoCredentials {
  owner: string;
  repo: string;
  token: string;
}

export class DeviceSecrets {
  private store: KeyValueStore;

  constructor(store: KeyValueStore) {
    this.store = store;
  }

  // Key material

  getSalt(): Buffer | undefined {
    return this.getBytes(DeviceStateKeys.salt);
  }

  setSalt(salt: Uint8Array): void {
    this.setBytes(DeviceStateKeys.salt, salt);
  }

  getPinHash(): Buffer | undefined {
    return this.getBytes(DeviceStateKeys.pinHash);
  }

  setPinHash(hash: Uint8Array): void {
    this.setBytes(DeviceStateKeys.pinHash, hash);
  }

  getWrappedMasterKey(): Buffer | undefined {
    return this.getBytes(DeviceStateKeys.wrappedMasterKey);
  }

  setWrappedMasterKey(wrapped: Uint8Array): void {
    this.setBytes(DeviceStateKeys.wrappedMasterKey, wrapped);
  }

  // Repository credentials

  getCredentials(): RepoCredentials | undefined {
    const owner = this.store.get(DeviceStateKeys.repoOwner);
    const repo = this.store.get(DeviceStateKeys.repoName);
    const token = this.store.get(DeviceStateKeys.githubToken);
    if (owner === undefined || repo === undefined || token === undefined) {
      return undefined;
    }
    return { owner, repo, token };
  }

  setCredentials(credentials: RepoCredentials): void {
    this.store.set(DeviceStateKeys.repoOwner, credentials.owner);
    this.store.set(DeviceStateKeys.repoName, credentials.repo);
    this.store.set(DeviceStateKeys.githubToken, credentials.token);
  }

  // Lockout bookkeeping

  getFailedAttempts(): number {
    const value = Number.parseInt(this.store.get(DeviceStateKeys.failedAttempts) ?? "0", 10);
    return Number.isNaN(value) || value < 0 ? 0 : value;
  }

  setFailedAttempts(count: number): void {
    this.store.set(DeviceStateKeys.failedAttempts, String(count));
  }

  getLockoutUntil(): Date | undefined {
    return this.getDate(DeviceStateKeys.lockoutUntil);
  }

  setLockoutUntil(until: Date): void {
    this.store.set(DeviceStateKeys.lockoutUntil, until.toISOString());
  }

  clearLockout(): void {
    this.store.delete(DeviceStateKeys.failedAttempts);
    this.store.delete(DeviceStateKeys.lockoutUntil);
  }

  // Sync state

  getIndexSha(): string | undefined {
    return this.store.get(DeviceStateKeys.indexSha);
  }

  setIndexSha(sha: string): void {
    this.store.set(DeviceStateKeys.indexSha, sha);
  }

  getConfigSha(): string | undefined {
    return this.store.get(DeviceStateKeys.configSha);
  }

  setConfigSha(sha: string): void {
    this.store.set(DeviceStateKeys.configSha, sha);
  }

  getLastSyncAt(): Date | undefined {
    return this.getDate(DeviceStateKeys.lastSyncAt);
  }

  setLastSyncAt(time: Date): void {
    this.store.set(DeviceStateKeys.lastSyncAt, time.toISOString());
  }

  // Vault status

  /**
   * A vault is configured once salt, PIN hash and a token are present
   */
  isVaultConfigured(): boolean {
    return (
      this.getSalt() !== undefined &&
      this.getPinHash() !== undefined &&
      this.store.get(DeviceStateKeys.githubToken) !== undefined
    );
  }

  clearAll(): void {
    this.store.clear();
  }

  private getBytes(key: string): Buffer | undefined {
    const value = this.store.get(key);
    return value === undefined ? undefined : Buffer.from(value, "base64");
  }

  private setBytes(key: string, value: Uint8Array): void {
    this.store.set(key, Buffer.from(value).toString("base64"));
  }

  private getDate(key: string): Date | undefined {
    const value = this.store.get(key);
    if (value === undefined) {
      return undefined;
    }
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? undefined : date;
  }
}
