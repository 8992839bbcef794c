/**
 * GitVault Core
 *
 * Local-first encrypted vault synced to a GitHub repository, with PIN
 * unlock and expiry cleanup
 */

export { VaultSession, sessionErrorMessage } from "./vault/vault-session.js";
export type {
  SessionError,
  NewEntry,
  EntryContent,
  VaultSessionOptions,
} from "./vault/vault-session.js";

// Result
export {
  Success,
  Failure,
  ResultError,
  success,
  failure,
  matchResult,
  tryCatch,
  fromPromise,
} from "./result/index.js";
export type { Result } from "./result/index.js";

// Authentication
export { AuthStateMachine } from "./auth/auth-machine.js";
export type {
  AuthStateListener,
  AuthStateMachineOptions,
  SetupVaultOptions,
} from "./auth/auth-machine.js";
export { ExponentialLockoutPolicy } from "./auth/lockout-policy.js";
export type { LockoutPolicy } from "./auth/lockout-policy.js";
export { MasterKey, MasterKeyRevokedError } from "./auth/master-key.js";
export {
  authErrorMessage,
  isLockedOut,
  isRetryableAuthError,
  remainingLockout,
} from "./auth/types.js";
export type { AuthError, AuthState, AuthStatus, LockedState } from "./auth/types.js";

// Cleanup
export { CleanupService, CleanupResult } from "./cleanup/cleanup-service.js";
export type {
  CleanupError,
  CleanupOutcome,
  CleanupRequest,
  CleanupServiceOptions,
  IndexUpdate,
  IndexUpdateError,
} from "./cleanup/cleanup-service.js";

// Vault model
export { VaultIndex } from "./vault/vault-index.js";
export type { VaultIndexJSON } from "./vault/vault-index.js";
export {
  createEntry,
  withSha,
  isExpired,
  isRetentionPeriod,
  parseRetentionPeriod,
  calculateExpiration,
  timeRemaining,
  formatTimeRemaining,
  formatSize,
} from "./vault/vault-entry.js";
export type { CreateEntryOptions } from "./vault/vault-entry.js";
export { RETENTION_PERIODS, DEFAULT_RETENTION, indexErrorMessage } from "./vault/types.js";
export type { VaultEntry, EntryType, RetentionPeriod, IndexError } from "./vault/types.js";
export {
  VAULT_CONFIG_VERSION,
  createVaultConfig,
  parseVaultConfig,
  serializeVaultConfig,
} from "./vault/vault-config.js";
export type { VaultConfig } from "./vault/vault-config.js";

// Crypto
export {
  NodeCryptoService,
  encrypt,
  decrypt,
  deriveKey,
  extractVersion,
  generateKey,
  generateSalt,
  hashPin,
  verifyPinHash,
  clearKey,
  cryptoErrorMessage,
  KEY_LENGTH,
  SALT_LENGTH,
  FORMAT_VERSION,
} from "./crypto/index.js";
export type { CryptoService, CryptoError, NodeCryptoServiceOptions } from "./crypto/index.js";

// Remote
export { GitHubAuth, parseRepoUrl } from "./remote/github-auth.js";
export type { RepoCoordinates } from "./remote/github-auth.js";
export { GitHubClient } from "./remote/github-client.js";
export type { GitHubClientOptions, GitHubResponse } from "./remote/github-client.js";
export { RateLimitTracker } from "./remote/rate-limit-tracker.js";
export {
  GitHubVaultRepository,
  VAULT_DIR,
  CONFIG_FILE,
  INDEX_FILE,
  DATA_DIR,
  entryPath,
} from "./remote/vault-repository.js";
export type { VaultRepository, RemoteFile, RemoteFileInfo } from "./remote/vault-repository.js";
export { isTransportError, remoteErrorMessage, RemoteRequestError } from "./remote/errors.js";
export type { RemoteError, TransportError } from "./remote/errors.js";

// Storage
export { SQLiteStorage } from "./storage/sqlite.js";
export type { SQLiteStorageOptions } from "./storage/sqlite.js";
export { MemoryStorage } from "./storage/types.js";
export type { KeyValueStore, IndexCache, CachedIndex } from "./storage/types.js";
export { DeviceSecrets, DeviceStateKeys } from "./storage/device-secrets.js";
export type { RepoCredentials } from "./storage/device-secrets.js";

// Config and logging
export { loadConfig, loadConfigFromEnv, ConfigError, DEFAULT_MAX_BATCH_SIZE } from "./config.js";
export type {
  VaultCoreConfig,
  VaultCoreConfigInput,
  LockoutConfig,
  GitHubConfig,
} from "./config.js";
export { ConsoleLogger, createLogger, silentLogger } from "./logging/logger.js";
export type { Logger, LogLevel, LogContext, ConsoleLoggerOptions } from "./logging/logger.js";
