import { describe, it, expect } from "vitest";
import {
  clearKey,
  cryptoErrorMessage,
  decrypt,
  deriveKey,
  encrypt,
  extractVersion,
  generateKey,
  generateSalt,
  hashPin,
  NodeCryptoService,
  verifyPinHash,
} from "../src/crypto/index.js";

// Low iteration count keeps derivation fast in tests
const crypto = new NodeCryptoService({ iterations: 1000 });

describe("Crypto", () => {
  describe("key generation", () => {
    it("should generate a 32-byte key", () => {
      const key = generateKey();
      expect(key.length).toBe(32);
    });

    it("should generate unique keys", () => {
      const key1 = generateKey();
      const key2 = generateKey();
      expect(key1.equals(key2)).toBe(false);
    });

    it("should generate a 32-byte salt", () => {
      expect(generateSalt().length).toBe(32);
    });
  });

  describe("key derivation", () => {
    it("should derive a consistent key from password and PIN", async () => {
      const salt = generateSalt();
      const key1 = (await crypto.deriveKey("test-password", "123456", salt)).unwrap();
      const key2 = (await crypto.deriveKey("test-password", "123456", salt)).unwrap();
      expect(key1.length).toBe(32);
      expect(key1.equals(key2)).toBe(true);
    });

    it("should derive different keys for different PINs", async () => {
      const salt = generateSalt();
      const key1 = (await crypto.deriveKey("test-password", "123456", salt)).unwrap();
      const key2 = (await crypto.deriveKey("test-password", "654321", salt)).unwrap();
      expect(key1.equals(key2)).toBe(false);
    });

    it("should derive different keys with different salts", async () => {
      const key1 = (await crypto.deriveKey("test-password", "123456", generateSalt())).unwrap();
      const key2 = (await crypto.deriveKey("test-password", "123456", generateSalt())).unwrap();
      expect(key1.equals(key2)).toBe(false);
    });

    it("should keep the PIN wrapping key separate from the master key", async () => {
      const salt = generateSalt();
      const master = (await crypto.deriveKey("", "123456", salt)).unwrap();
      const wrapping = (await crypto.deriveKeyFromPin("123456", salt)).unwrap();
      expect(master.equals(wrapping)).toBe(false);
    });

    it("should reject a short salt", async () => {
      const result = await deriveKey("secret", Buffer.alloc(8), 1000);
      expect(result.errorOrUndefined).toEqual({
        kind: "invalid-salt-length",
        minLength: 16,
        actual: 8,
      });
    });
  });

  describe("encrypt/decrypt", () => {
    it("should encrypt and decrypt a string", () => {
      const key = generateKey();
      const encrypted = crypto.encryptString("Hello, World!", key).unwrap();
      expect(crypto.decryptString(encrypted, key).unwrap()).toBe("Hello, World!");
    });

    it("should encrypt and decrypt binary data", () => {
      const key = generateKey();
      const data = Buffer.from([0, 1, 2, 255, 254]);
      const encrypted = encrypt(data, key).unwrap();
      expect(decrypt(encrypted, key).unwrap().equals(data)).toBe(true);
    });

    it("should lay out version, IV, ciphertext and tag", () => {
      const key = generateKey();
      const encrypted = encrypt("abc", key).unwrap();
      // 4 version + 12 IV + 3 ciphertext + 16 tag
      expect(encrypted.length).toBe(35);
      expect(encrypted.readUInt32LE(0)).toBe(1);
      expect(extractVersion(encrypted).unwrap()).toBe(1);
    });

    it("should produce different ciphertext for same plaintext", () => {
      const key = generateKey();
      const encrypted1 = encrypt("Same message", key).unwrap();
      const encrypted2 = encrypt("Same message", key).unwrap();
      expect(encrypted1.equals(encrypted2)).toBe(false);
    });

    it("should fail decryption with wrong key", () => {
      const encrypted = encrypt("Secret message", generateKey()).unwrap();
      const result = decrypt(encrypted, generateKey());
      expect(result.errorOrUndefined).toEqual({ kind: "decryption-failed" });
      if (!result.ok) {
        expect(cryptoErrorMessage(result.error)).toBe(
          "Decryption failed: invalid key or tampered data"
        );
      }
    });

    it("should fail decryption with tampered ciphertext", () => {
      const key = generateKey();
      const encrypted = encrypt("Secret message", key).unwrap();
      encrypted[20] ^= 0xff;
      expect(decrypt(encrypted, key).errorOrUndefined).toEqual({ kind: "decryption-failed" });
    });

    it("should fail decryption with tampered auth tag", () => {
      const key = generateKey();
      const encrypted = encrypt("Secret message", key).unwrap();
      encrypted[encrypted.length - 1] ^= 0xff;
      expect(decrypt(encrypted, key).errorOrUndefined).toEqual({ kind: "decryption-failed" });
    });

    it("should reject data that is too short", () => {
      const result = decrypt(Buffer.alloc(10), generateKey());
      expect(result.errorOrUndefined).toEqual({
        kind: "invalid-data-format",
        details: "Encrypted data too short: 10 bytes (minimum 32)",
      });
    });

    it("should reject an unknown format version", () => {
      const key = generateKey();
      const encrypted = encrypt("data", key).unwrap();
      encrypted.writeUInt32LE(7, 0);
      expect(decrypt(encrypted, key).errorOrUndefined).toEqual({
        kind: "unsupported-version",
        version: 7,
        supportedVersions: [1],
      });
    });

    it("should reject invalid key length", () => {
      const result = encrypt("Test", Buffer.alloc(16));
      expect(result.errorOrUndefined).toEqual({
        kind: "invalid-key-length",
        expected: 32,
        actual: 16,
      });
      if (!result.ok) {
        expect(cryptoErrorMessage(result.error)).toBe("Invalid key length: expected 32, got 16");
      }
    });
  });

  describe("PIN hash", () => {
    it("should verify the matching PIN only", () => {
      const salt = generateSalt();
      const hash = hashPin("123456", salt);
      expect(hash.length).toBe(32);
      expect(verifyPinHash("123456", salt, hash)).toBe(true);
      expect(verifyPinHash("123457", salt, hash)).toBe(false);
    });

    it("should reject a stored hash of the wrong length", () => {
      const salt = generateSalt();
      expect(verifyPinHash("123456", salt, Buffer.alloc(4))).toBe(false);
    });
  });

  describe("clearKey", () => {
    it("should zero out the key buffer", () => {
      const key = generateKey();
      // Verify key has non-zero bytes
      expect(key.some((b) => b !== 0)).toBe(true);

      clearKey(key);

      // All bytes should now be zero
      expect(key.every((b) => b === 0)).toBe(true);
    });
  });
});
