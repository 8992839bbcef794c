/**
 * Vault configuration stored in plaintext at the vault root.
 *
 * Holds the salt every device needs to derive the same master key. The salt
 * is not secret.
 */

import { z } from "zod";

export const VAULT_CONFIG_VERSION = 1;

const vaultConfigSchema = z.object({
  version: z.number().int(),
  salt: z.string().min(1),
  createdAt: z.string().datetime({ offset: true }),
});

export interface VaultConfig {
  version: number;
  salt: Buffer;
  createdAt: Date;
}

export function createVaultConfig(salt: Buffer, now: Date = new Date()): VaultConfig {
  return { version: VAULT_CONFIG_VERSION, salt, createdAt: now };
}

export function serializeVaultConfig(config: VaultConfig): string {
  return JSON.stringify({
    version: config.version,
    salt: config.salt.toString("base64"),
    createdAt: config.createdAt.toISOString(),
  });
}

/**
 * @throws Error if the JSON is malformed or missing fields
 */
export function parseVaultConfig(json: string): VaultConfig {
  const raw: unknown = JSON.parse(json);
  const parsed = vaultConfigSchema.parse(raw);
  return {
    version: parsed.version,
    salt: Buffer.from(parsed.salt, "base64"),
    createdAt: new Date(parsed.createdAt),
  };
}
