/**
 * Cryptographic utilities for the vault
 *
 * Implements AES-256-GCM encryption with PBKDF2 key derivation.
 *
 * Encrypted envelope:
 *   | version (4 bytes LE) | IV (12 bytes) | ciphertext | auth tag (16 bytes) |
 */

import {
  randomBytes,
  createCipheriv,
  createDecipheriv,
  createHash,
  pbkdf2,
  timingSafeEqual,
} from "node:crypto";
import { promisify } from "node:util";
import { failure, success, type Result } from "../result/index.js";
import type { CryptoError } from "./errors.js";

export type { CryptoError } from "./errors.js";
export { cryptoErrorMessage } from "./errors.js";

const pbkdf2Async = promisify(pbkdf2);

const ALGORITHM = "aes-256-gcm";
export const KEY_LENGTH = 32; // 256 bits
export const IV_LENGTH = 12; // 96 bits for GCM
export const AUTH_TAG_LENGTH = 16; // 128 bits
export const SALT_LENGTH = 32;
export const MIN_SALT_LENGTH = 16;
export const FORMAT_VERSION = 1;
const VERSION_LENGTH = 4;
const MIN_ENCRYPTED_LENGTH = VERSION_LENGTH + IV_LENGTH + AUTH_TAG_LENGTH;
const DEFAULT_PBKDF2_ITERATIONS = 100000;

/**
 * Encryption capability consumed by the auth machine, cleanup and session.
 */
export interface CryptoService {
  encrypt(plaintext: Uint8Array, key: Uint8Array): Result<Buffer, CryptoError>;
  decrypt(encrypted: Uint8Array, key: Uint8Array): Result<Buffer, CryptoError>;
  encryptString(plaintext: string, key: Uint8Array): Result<Buffer, CryptoError>;
  decryptString(encrypted: Uint8Array, key: Uint8Array): Result<string, CryptoError>;
  /** Master key from password + PIN, shared by every device through the remote salt */
  deriveKey(password: string, pin: string, salt: Uint8Array): Promise<Result<Buffer, CryptoError>>;
  /** Local key-wrapping key, used to keep the master key sealed at rest */
  deriveKeyFromPin(pin: string, salt: Uint8Array): Promise<Result<Buffer, CryptoError>>;
  hashPin(pin: string, salt: Uint8Array): Buffer;
  verifyPinHash(pin: string, salt: Uint8Array, storedHash: Uint8Array): boolean;
  generateSalt(): Buffer;
}

/**
 * Generate a random encryption key
 */
export function generateKey(): Buffer {
  return randomBytes(KEY_LENGTH);
}

export function generateSalt(): Buffer {
  return randomBytes(SALT_LENGTH);
}

/**
 * Derive an encryption key from a secret using PBKDF2-SHA256
 */
export async function deriveKey(
  secret: string,
  salt: Uint8Array,
  iterations: number = DEFAULT_PBKDF2_ITERATIONS
): Promise<Result<Buffer, CryptoError>> {
  if (salt.length < MIN_SALT_LENGTH) {
    return failure({
      kind: "invalid-salt-length",
      minLength: MIN_SALT_LENGTH,
      actual: salt.length,
    });
  }

  try {
    const key = await pbkdf2Async(secret, salt, iterations, KEY_LENGTH, "sha256");
    return success(key);
  } catch (error) {
    return failure({
      kind: "key-derivation-failed",
      details: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Encrypt data using AES-256-GCM
 *
 * @returns The versioned envelope (version, IV, ciphertext, auth tag)
 */
export function encrypt(
  plaintext: string | Uint8Array,
  key: Uint8Array
): Result<Buffer, CryptoError> {
  if (key.length !== KEY_LENGTH) {
    return failure({ kind: "invalid-key-length", expected: KEY_LENGTH, actual: key.length });
  }

  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv(ALGORITHM, key, iv, { authTagLength: AUTH_TAG_LENGTH });

  const data = typeof plaintext === "string" ? Buffer.from(plaintext, "utf8") : plaintext;
  const encrypted = Buffer.concat([cipher.update(data), cipher.final()]);
  const authTag = cipher.getAuthTag();

  const version = Buffer.alloc(VERSION_LENGTH);
  version.writeUInt32LE(FORMAT_VERSION, 0);

  return success(Buffer.concat([version, iv, encrypted, authTag]));
}

/**
 * Decrypt an envelope produced by {@link encrypt}
 */
export function decrypt(encrypted: Uint8Array, key: Uint8Array): Result<Buffer, CryptoError> {
  if (key.length !== KEY_LENGTH) {
    return failure({ kind: "invalid-key-length", expected: KEY_LENGTH, actual: key.length });
  }

  const versionResult = extractVersion(encrypted);
  if (!versionResult.ok) {
    return failure(versionResult.error);
  }

  const data = Buffer.from(encrypted);
  const iv = data.subarray(VERSION_LENGTH, VERSION_LENGTH + IV_LENGTH);
  const ciphertext = data.subarray(VERSION_LENGTH + IV_LENGTH, data.length - AUTH_TAG_LENGTH);
  const authTag = data.subarray(data.length - AUTH_TAG_LENGTH);

  const decipher = createDecipheriv(ALGORITHM, key, iv, { authTagLength: AUTH_TAG_LENGTH });
  decipher.setAuthTag(authTag);

  try {
    return success(Buffer.concat([decipher.update(ciphertext), decipher.final()]));
  } catch {
    return failure({ kind: "decryption-failed" });
  }
}

/**
 * Read the format version without decrypting
 */
export function extractVersion(encrypted: Uint8Array): Result<number, CryptoError> {
  if (encrypted.length < MIN_ENCRYPTED_LENGTH) {
    return failure({
      kind: "invalid-data-format",
      details: `Encrypted data too short: ${encrypted.length} bytes ` +
        `(minimum ${MIN_ENCRYPTED_LENGTH})`,
    });
  }

  const version = Buffer.from(encrypted).readUInt32LE(0);
  if (version !== FORMAT_VERSION) {
    return failure({ kind: "unsupported-version", version, supportedVersions: [FORMAT_VERSION] });
  }
  return success(version);
}

/**
 * SHA-256 of salt || PIN, used for quick PIN verification
 */
export function hashPin(pin: string, salt: Uint8Array): Buffer {
  return createHash("sha256").update(salt).update(pin, "utf8").digest();
}

/**
 * Constant-time PIN check against a stored hash
 */
export function verifyPinHash(pin: string, salt: Uint8Array, storedHash: Uint8Array): boolean {
  const computed = hashPin(pin, salt);
  if (computed.length !== storedHash.length) {
    return false;
  }
  return timingSafeEqual(computed, storedHash);
}

/**
 * Securely clear a buffer from memory
 */
export function clearKey(key: Uint8Array): void {
  key.fill(0);
}

export interface NodeCryptoServiceOptions {
  /** PBKDF2 iterations (default: 100000) */
  iterations?: number;
}

/**
 * CryptoService backed by node:crypto
 */
export class NodeCryptoService implements CryptoService {
  private iterations: number;

  constructor(options: NodeCryptoServiceOptions = {}) {
    this.iterations = options.iterations ?? DEFAULT_PBKDF2_ITERATIONS;
  }

  encrypt(plaintext: Uint8Array, key: Uint8Array): Result<Buffer, CryptoError> {
    return encrypt(plaintext, key);
  }

  decrypt(encrypted: Uint8Array, key: Uint8Array): Result<Buffer, CryptoError> {
    return decrypt(encrypted, key);
  }

  encryptString(plaintext: string, key: Uint8Array): Result<Buffer, CryptoError> {
    return encrypt(plaintext, key);
  }

  decryptString(encrypted: Uint8Array, key: Uint8Array): Result<string, CryptoError> {
    return decrypt(encrypted, key).map((bytes) => bytes.toString("utf8"));
  }

  async deriveKey(
    password: string,
    pin: string,
    salt: Uint8Array
  ): Promise<Result<Buffer, CryptoError>> {
    // Password and PIN are concatenated before derivation
    return deriveKey(`${password}${pin}`, salt, this.iterations);
  }

  async deriveKeyFromPin(pin: string, salt: Uint8Array): Promise<Result<Buffer, CryptoError>> {
    return deriveKey(`pin:${pin}`, salt, this.iterations);
  }

  hashPin(pin: string, salt: Uint8Array): Buffer {
    return hashPin(pin, salt);
  }

  verifyPinHash(pin: string, salt: Uint8Array, storedHash: Uint8Array): boolean {
    return verifyPinHash(pin, salt, storedHash);
  }

  generateSalt(): Buffer {
    return generateSalt();
  }
}
