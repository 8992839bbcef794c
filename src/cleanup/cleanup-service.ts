/**
 * Expiry cleanup - purges expired entries from the remote store and index
 *
 * Deletes run one at a time, capped per run. There is no transaction across
 * objects: a missing remote object counts as deleted, so a run interrupted
 * after its deletes (or whose index upload was rejected) is repaired by the
 * next run.
 */

import type { CryptoError, CryptoService } from "../crypto/index.js";
import { failure, success, type Result } from "../result/index.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { DEFAULT_MAX_BATCH_SIZE } from "../config.js";
import { entryPath, type VaultRepository } from "../remote/vault-repository.js";
import { remoteErrorMessage, type RemoteError } from "../remote/errors.js";
import type { MasterKey } from "../auth/master-key.js";
import type { VaultEntry } from "../vault/types.js";
import type { VaultIndex } from "../vault/vault-index.js";

export type CleanupError = { kind: "vault-locked" };

export type IndexUpdateError =
  | { stage: "locked" }
  | { stage: "encrypt"; error: CryptoError }
  | { stage: "upload"; error: RemoteError };

export type IndexUpdate =
  | { status: "unchanged" }
  | { status: "uploaded"; index: VaultIndex; sha: string }
  /** Remote deletes stand; `index` is what should have been uploaded */
  | { status: "failed"; index: VaultIndex; error: IndexUpdateError };

export interface CleanupOutcome {
  result: CleanupResult;
  indexUpdate: IndexUpdate;
}

export interface CleanupRequest {
  index: VaultIndex;
  /** Last known remote SHA of the index; guards the upload */
  indexSha?: string;
  masterKey: MasterKey;
}

export interface CleanupServiceOptions {
  repository: VaultRepository;
  crypto: CryptoService;
  maxBatchSize?: number;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Counts from one cleanup run
 */
export class CleanupResult {
  readonly deleted: number;
  readonly failed: number;
  /** Expired entries left for a later run by the batch cap */
  readonly remaining: number;
  readonly deletedIds: readonly string[];

  constructor(deletedIds: readonly string[], failed: number, remaining: number) {
    this.deletedIds = Object.freeze([...deletedIds]);
    this.deleted = deletedIds.length;
    this.failed = failed;
    this.remaining = remaining;
    Object.freeze(this);
  }

  static empty(): CleanupResult {
    return new CleanupResult([], 0, 0);
  }

  get hasDeleted(): boolean {
    return this.deleted > 0;
  }

  get hasFailed(): boolean {
    return this.failed > 0;
  }

  get hasRemaining(): boolean {
    return this.remaining > 0;
  }

  toString(): string {
    const { deleted, failed, remaining } = this;
    return `CleanupResult(deleted: ${deleted}, failed: ${failed}, remaining: ${remaining})`;
  }
}

type EntryOutcome = "deleted" | "failed";

export class CleanupService {
  private repository: VaultRepository;
  private crypto: CryptoService;
  private maxBatchSize: number;
  private logger: Logger;
  private now: () => Date;

  constructor(options: CleanupServiceOptions) {
    this.repository = options.repository;
    this.crypto = options.crypto;
    this.maxBatchSize = Math.max(1, options.maxBatchSize ?? DEFAULT_MAX_BATCH_SIZE);
    this.logger = (options.logger ?? silentLogger).child("Cleanup");
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Run one cleanup pass. Callers must not run two passes on the same
   * vault at once.
   */
  async run(request: CleanupRequest): Promise<Result<CleanupOutcome, CleanupError>> {
    const { index, indexSha, masterKey } = request;
    if (!masterKey.isValid) {
      return failure({ kind: "vault-locked" });
    }

    const expired = index.expiredEntries(this.now());
    if (expired.length === 0) {
      this.logger.debug("No expired entries");
      return success({ result: CleanupResult.empty(), indexUpdate: { status: "unchanged" } });
    }

    const batch = expired.slice(0, this.maxBatchSize);
    const remaining = expired.length - batch.length;
    this.logger.info("Cleaning up expired entries", { batch: batch.length, remaining });

    const deletedIds: string[] = [];
    let failed = 0;
    for (const entry of batch) {
      const outcome = await this.deleteEntry(entry);
      if (outcome === "deleted") {
        deletedIds.push(entry.id);
      } else {
        failed++;
      }
    }

    const result = new CleanupResult(deletedIds, failed, remaining);
    if (deletedIds.length === 0) {
      this.logger.warn("Cleanup deleted nothing", { failed });
      return success({ result, indexUpdate: { status: "unchanged" } });
    }

    const next = index.removeEntries(deletedIds);
    const indexUpdate = await this.uploadIndex(next, indexSha, masterKey);
    this.logger.info("Cleanup finished", { deleted: result.deleted, failed, remaining });
    return success({ result, indexUpdate });
  }

  private async deleteEntry(entry: VaultEntry): Promise<EntryOutcome> {
    try {
      let sha = entry.sha;
      if (sha === undefined) {
        const info = await this.repository.getFileInfo(entryPath(entry.id));
        if (!info.ok) {
          if (info.error.kind === "not-found") {
            this.logger.debug("Entry already absent", { id: entry.id });
            return "deleted";
          }
          this.logger.warn("Could not resolve entry SHA", {
            id: entry.id,
            error: remoteErrorMessage(info.error),
          });
          return "failed";
        }
        sha = info.value.sha;
      }

      const deleted = await this.repository.deleteEntry(entry.id, sha);
      if (deleted.ok) {
        return "deleted";
      }
      // Gone since the index was written, e.g. by a pass whose index upload failed
      if (deleted.error.kind === "not-found") {
        this.logger.debug("Entry already absent", { id: entry.id });
        return "deleted";
      }
      this.logger.warn("Failed to delete entry", {
        id: entry.id,
        error: remoteErrorMessage(deleted.error),
      });
      return "failed";
    } catch (error) {
      this.logger.error("Unexpected error deleting entry", {
        id: entry.id,
        error: error instanceof Error ? error.message : String(error),
      });
      return "failed";
    }
  }

  private async uploadIndex(
    index: VaultIndex,
    indexSha: string | undefined,
    masterKey: MasterKey
  ): Promise<IndexUpdate> {
    if (!masterKey.isValid) {
      this.logger.warn("Vault locked before index update; deletions stand");
      return { status: "failed", index, error: { stage: "locked" } };
    }

    const encrypted = this.crypto.encryptString(index.toJSONString(), masterKey.expose());
    if (!encrypted.ok) {
      this.logger.error("Failed to encrypt index", { kind: encrypted.error.kind });
      return { status: "failed", index, error: { stage: "encrypt", error: encrypted.error } };
    }

    let uploaded: Result<string, RemoteError>;
    try {
      uploaded = await this.repository.uploadIndex(encrypted.value, indexSha);
    } catch (error) {
      const details = error instanceof Error ? error.message : String(error);
      uploaded = failure({ kind: "unknown", details });
    }
    if (!uploaded.ok) {
      this.logger.error("Failed to update index after cleanup", {
        error: remoteErrorMessage(uploaded.error),
      });
      return { status: "failed", index, error: { stage: "upload", error: uploaded.error } };
    }
    return { status: "uploaded", index, sha: uploaded.value };
  }
}
