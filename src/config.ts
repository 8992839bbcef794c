/**
 * Runtime configuration for the vault core
 *
 * Defaults cover a single-device setup against api.github.com. A host
 * process can pass overrides directly or read them from GITVAULT_* env vars.
 */

import { z } from "zod";

export const DEFAULT_MAX_BATCH_SIZE = 50;

const lockoutSchema = z.object({
  /** Failed attempts before the first lockout */
  maxFailedAttempts: z.number().int().min(1).default(5),
  /** Lockout applied when the threshold is first reached */
  baseLockoutMs: z.number().int().min(1).default(60_000),
  /** Upper bound for the doubling lockout */
  maxLockoutMs: z.number().int().min(1).default(3_600_000),
});

const githubSchema = z.object({
  baseUrl: z.string().url().default("https://api.github.com"),
  maxRetries: z.number().int().min(1).default(3),
  retryDelayMs: z.number().int().min(0).default(1000),
  rateLimitWarningThreshold: z.number().int().min(0).default(100),
  timeoutMs: z.number().int().min(1).default(30_000),
});

const storageSchema = z.object({
  /** SQLite database file, ":memory:" for an ephemeral store */
  path: z.string().min(1).default(":memory:"),
});

export const configSchema = z
  .object({
    maxBatchSize: z.number().int().min(1).default(DEFAULT_MAX_BATCH_SIZE),
    pbkdf2Iterations: z.number().int().min(1).default(100_000),
    lockout: lockoutSchema.default({}),
    github: githubSchema.default({}),
    storage: storageSchema.default({}),
  })
  .refine((config) => config.lockout.maxLockoutMs >= config.lockout.baseLockoutMs, {
    message: "lockout.maxLockoutMs must be at least lockout.baseLockoutMs",
    path: ["lockout", "maxLockoutMs"],
  });

export type VaultCoreConfig = z.infer<typeof configSchema>;
export type VaultCoreConfigInput = z.input<typeof configSchema>;
export type LockoutConfig = VaultCoreConfig["lockout"];
export type GitHubConfig = VaultCoreConfig["github"];

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Merge overrides onto the defaults and validate the result
 */
export function loadConfig(overrides: VaultCoreConfigInput = {}): VaultCoreConfig {
  const parsed = configSchema.safeParse(overrides);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/**
 * Build configuration from GITVAULT_* environment variables
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): VaultCoreConfig {
  const overrides: VaultCoreConfigInput = {};

  if (env.GITVAULT_MAX_BATCH_SIZE) {
    overrides.maxBatchSize = parseInteger("GITVAULT_MAX_BATCH_SIZE", env.GITVAULT_MAX_BATCH_SIZE);
  }
  if (env.GITVAULT_STORAGE_PATH) {
    overrides.storage = { path: env.GITVAULT_STORAGE_PATH };
  }
  if (env.GITVAULT_GITHUB_API_URL) {
    overrides.github = { baseUrl: env.GITVAULT_GITHUB_API_URL };
  }

  return loadConfig(overrides);
}

function parseInteger(name: string, raw: string): number {
  const value = Number.parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new ConfigError([`${name}: expected an integer, got "${raw}"`]);
  }
  return value;
}
