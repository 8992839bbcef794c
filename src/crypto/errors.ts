/**
 * Crypto error kinds. Every crypto failure is classified into one of these,
 * never surfaced as an unrelated exception.
 */

export type CryptoError =
  | { kind: "decryption-failed"; details?: string }
  | { kind: "invalid-key-length"; expected: number; actual: number }
  | { kind: "unsupported-version"; version: number; supportedVersions: number[] }
  | { kind: "invalid-data-format"; details?: string }
  | { kind: "key-derivation-failed"; details?: string }
  | { kind: "invalid-salt-length"; minLength: number; actual: number };

export function cryptoErrorMessage(error: CryptoError): string {
  switch (error.kind) {
    case "decryption-failed":
      return error.details ?? "Decryption failed: invalid key or tampered data";
    case "invalid-key-length":
      return `Invalid key length: expected ${error.expected}, got ${error.actual}`;
    case "unsupported-version": {
      const supported = error.supportedVersions.join(", ");
      return `Unsupported version: ${error.version} (supported: ${supported})`;
    }
    case "invalid-data-format":
      return error.details ?? "Invalid encrypted data format";
    case "key-derivation-failed":
      return error.details ?? "Key derivation failed";
    case "invalid-salt-length":
      return `Invalid salt length: minimum ${error.minLength}, got ${error.actual}`;
  }
}
