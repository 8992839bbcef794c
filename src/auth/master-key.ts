/**
 * Capability wrapping the master key for the lifetime of the unlocked state.
 *
 * The auth machine destroys it on every transition out of `unlocked`; the
 * backing buffer is zeroed and any later use fails.
 */

import { clearKey } from "../crypto/index.js";

export class MasterKeyRevokedError extends Error {
  constructor() {
    super("Master key has been revoked; unlock the vault again");
    this.name = "MasterKeyRevokedError";
  }
}

export class MasterKey {
  private bytes: Buffer | null;

  /** Copies `bytes`; the caller should clear its own copy */
  constructor(bytes: Uint8Array) {
    this.bytes = Buffer.from(bytes);
  }

  get isValid(): boolean {
    return this.bytes !== null;
  }

  get length(): number {
    return this.bytes?.length ?? 0;
  }

  /**
   * Borrow the key bytes. Do not keep the returned buffer.
   *
   * @throws MasterKeyRevokedError after {@link destroy}
   */
  expose(): Buffer {
    if (this.bytes === null) {
      throw new MasterKeyRevokedError();
    }
    return this.bytes;
  }

  destroy(): void {
    if (this.bytes !== null) {
      clearKey(this.bytes);
      this.bytes = null;
    }
  }

  toString(): string {
    return this.bytes === null ? "MasterKey(revoked)" : `MasterKey(${this.bytes.length} bytes)`;
  }

  toJSON(): string {
    return this.toString();
  }
}
