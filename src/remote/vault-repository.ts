/**
 * Vault Repository - encrypted vault files in a GitHub repository
 *
 * Layout:
 *   .gitvault/
 *     config.json     - salt for key derivation (plaintext)
 *     index.enc       - encrypted index of all entries
 *     data/{id}.enc   - encrypted entry payloads
 *
 * Every write or delete carries the SHA last read for that path. GitHub
 * rejects a stale SHA, which surfaces as a `conflict` error.
 */

import { z } from "zod";
import { failure, success, type Result } from "../result/index.js";
import { GitHubClient, responseMessage, type GitHubResponse } from "./github-client.js";
import { RemoteRequestError, type RemoteError } from "./errors.js";
import type { RateLimitTracker } from "./rate-limit-tracker.js";
import { parseVaultConfig, serializeVaultConfig, type VaultConfig } from "../vault/vault-config.js";

export const VAULT_DIR = ".gitvault";
export const CONFIG_FILE = `${VAULT_DIR}/config.json`;
export const INDEX_FILE = `${VAULT_DIR}/index.enc`;
export const DATA_DIR = `${VAULT_DIR}/data`;
export const ENTRY_SUFFIX = ".enc";

export function entryPath(entryId: string): string {
  return `${DATA_DIR}/${entryId}${ENTRY_SUFFIX}`;
}

export interface RemoteFileInfo {
  name: string;
  path: string;
  sha: string;
  size: number;
  type: "file" | "dir" | "symlink" | "submodule";
}

export interface RemoteFile extends RemoteFileInfo {
  content: Buffer;
}

/**
 * Remote object store capability consumed by the vault core.
 */
export interface VaultRepository {
  getFileInfo(path: string): Promise<Result<RemoteFileInfo, RemoteError>>;
  downloadFile(path: string): Promise<Result<RemoteFile, RemoteError>>;
  downloadIndex(): Promise<Result<RemoteFile, RemoteError>>;
  /** @returns the index's new SHA */
  uploadIndex(content: Uint8Array, expectedSha?: string): Promise<Result<string, RemoteError>>;
  downloadEntry(entryId: string): Promise<Result<RemoteFile, RemoteError>>;
  /** @returns the entry's new SHA */
  uploadEntry(
    entryId: string,
    content: Uint8Array,
    expectedSha?: string
  ): Promise<Result<string, RemoteError>>;
  deleteEntry(entryId: string, expectedSha: string): Promise<Result<void, RemoteError>>;
  downloadVaultConfig(): Promise<Result<VaultConfig, RemoteError>>;
  uploadVaultConfig(
    config: VaultConfig,
    expectedSha?: string
  ): Promise<Result<string, RemoteError>>;
}

const githubFileSchema = z.object({
  name: z.string(),
  path: z.string(),
  sha: z.string(),
  size: z.number().int().nonnegative(),
  type: z.enum(["file", "dir", "symlink", "submodule"]),
  content: z.string().optional(),
  encoding: z.string().optional(),
});

const githubWriteSchema = z.object({
  content: githubFileSchema,
});

type GitHubFile = z.infer<typeof githubFileSchema>;

export class GitHubVaultRepository implements VaultRepository {
  private client: GitHubClient;

  constructor(client: GitHubClient) {
    this.client = client;
  }

  get rateLimits(): RateLimitTracker {
    return this.client.rateLimits;
  }

  /**
   * Check repository access and whether a vault has been initialized
   *
   * @returns true if the vault config exists, false if the repo is empty
   */
  async verifyAccess(): Promise<Result<boolean, RemoteError>> {
    return this.request<boolean>(this.client.auth.repoPath, async () => {
      const repo = await this.client.get(this.client.auth.repoPath);
      if (repo.status !== 200) {
        return failure(mapStatusToError(repo, this.client.auth.repoPath));
      }
      const config = await this.client.get(this.client.auth.contentsPath(CONFIG_FILE));
      return success(config.status === 200);
    });
  }

  async getFileInfo(path: string): Promise<Result<RemoteFileInfo, RemoteError>> {
    return this.request<RemoteFileInfo>(path, async () => {
      const response = await this.client.get(this.client.auth.contentsPath(path));
      if (response.status !== 200) {
        return failure(mapStatusToError(response, path));
      }
      return parseFile(response.data, path).map(toInfo);
    });
  }

  async downloadFile(path: string): Promise<Result<RemoteFile, RemoteError>> {
    return this.request<RemoteFile>(path, async () => {
      const response = await this.client.get(this.client.auth.contentsPath(path));
      if (response.status !== 200) {
        return failure(mapStatusToError(response, path));
      }
      return parseFile(response.data, path).flatMap((file): Result<RemoteFile, RemoteError> => {
        if (file.content === undefined) {
          return failure({ kind: "unknown", details: `File has no content: ${path}` });
        }
        // GitHub wraps base64 content with newlines
        const content = Buffer.from(file.content.replace(/\n/g, ""), "base64");
        return success({ ...toInfo(file), content });
      });
    });
  }

  async downloadIndex(): Promise<Result<RemoteFile, RemoteError>> {
    return this.downloadFile(INDEX_FILE);
  }

  async getIndexSha(): Promise<Result<string, RemoteError>> {
    const info = await this.getFileInfo(INDEX_FILE);
    return info.map((file) => file.sha);
  }

  async uploadIndex(
    content: Uint8Array,
    expectedSha?: string
  ): Promise<Result<string, RemoteError>> {
    return this.uploadFile(
      INDEX_FILE,
      content,
      expectedSha ? "Update vault index" : "Initialize vault index",
      expectedSha
    );
  }

  async downloadEntry(entryId: string): Promise<Result<RemoteFile, RemoteError>> {
    return this.downloadFile(entryPath(entryId));
  }

  async uploadEntry(
    entryId: string,
    content: Uint8Array,
    expectedSha?: string
  ): Promise<Result<string, RemoteError>> {
    return this.uploadFile(
      entryPath(entryId),
      content,
      expectedSha ? `Update entry ${entryId}` : `Add entry ${entryId}`,
      expectedSha
    );
  }

  async deleteEntry(entryId: string, expectedSha: string): Promise<Result<void, RemoteError>> {
    return this.deleteFile(entryPath(entryId), expectedSha, `Delete entry ${entryId}`);
  }

  async downloadVaultConfig(): Promise<Result<VaultConfig, RemoteError>> {
    const file = await this.downloadFile(CONFIG_FILE);
    return file.flatMap((downloaded): Result<VaultConfig, RemoteError> => {
      try {
        return success(parseVaultConfig(downloaded.content.toString("utf8")));
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        return failure({ kind: "unknown", details: `Invalid vault config: ${reason}` });
      }
    });
  }

  async uploadVaultConfig(
    config: VaultConfig,
    expectedSha?: string
  ): Promise<Result<string, RemoteError>> {
    return this.uploadFile(
      CONFIG_FILE,
      Buffer.from(serializeVaultConfig(config), "utf8"),
      expectedSha ? "Update vault config" : "Initialize vault",
      expectedSha
    );
  }

  /**
   * List encrypted entry files; a missing data directory is an empty list
   */
  async listEntries(): Promise<Result<RemoteFileInfo[], RemoteError>> {
    return this.request<RemoteFileInfo[]>(DATA_DIR, async () => {
      const response = await this.client.get(this.client.auth.contentsPath(DATA_DIR));
      if (response.status === 404) {
        return success([]);
      }
      if (response.status !== 200) {
        return failure(mapStatusToError(response, DATA_DIR));
      }
      const parsed = z.array(githubFileSchema).safeParse(response.data);
      if (!parsed.success) {
        return failure({
          kind: "unknown",
          details: `Unexpected directory listing for ${DATA_DIR}`,
        });
      }
      return success(parsed.data.filter((file) => file.type === "file").map(toInfo));
    });
  }

  private async uploadFile(
    path: string,
    content: Uint8Array,
    message: string,
    expectedSha?: string
  ): Promise<Result<string, RemoteError>> {
    return this.request<string>(path, async () => {
      const body: Record<string, unknown> = {
        message,
        content: Buffer.from(content).toString("base64"),
      };
      if (expectedSha) {
        body.sha = expectedSha;
      }

      const response = await this.client.put(this.client.auth.contentsPath(path), body);
      if (response.status !== 200 && response.status !== 201) {
        return failure(mapStatusToError(response, path, expectedSha));
      }

      const parsed = githubWriteSchema.safeParse(response.data);
      if (!parsed.success) {
        return failure({ kind: "unknown", details: `Unexpected write response for ${path}` });
      }
      return success(parsed.data.content.sha);
    });
  }

  private async deleteFile(
    path: string,
    sha: string,
    message: string
  ): Promise<Result<void, RemoteError>> {
    return this.request<void>(path, async () => {
      const response = await this.client.delete(this.client.auth.contentsPath(path), {
        message,
        sha,
      });
      if (response.status !== 200) {
        return failure(mapStatusToError(response, path, sha));
      }
      return success(undefined);
    });
  }

  /**
   * Convert errors thrown by the client into Failures
   */
  private async request<T>(
    path: string,
    run: () => Promise<Result<T, RemoteError>>
  ): Promise<Result<T, RemoteError>> {
    try {
      return await run();
    } catch (error) {
      if (error instanceof RemoteRequestError) {
        return failure(error.remote);
      }
      return failure({
        kind: "unknown",
        details: `${path}: ${error instanceof Error ? error.message : String(error)}`,
      });
    }
  }
}

function parseFile(data: unknown, path: string): Result<GitHubFile, RemoteError> {
  const parsed = githubFileSchema.safeParse(data);
  if (!parsed.success) {
    return failure({ kind: "unknown", details: `Unexpected contents response for ${path}` });
  }
  return success(parsed.data);
}

function toInfo(file: GitHubFile): RemoteFileInfo {
  return { name: file.name, path: file.path, sha: file.sha, size: file.size, type: file.type };
}

function mapStatusToError(
  response: GitHubResponse,
  path: string,
  expectedSha?: string
): RemoteError {
  const message = responseMessage(response.data);

  switch (response.status) {
    case 401:
      return { kind: "authentication-failed" };
    case 403:
      return { kind: "access-forbidden" };
    case 404:
      return { kind: "not-found", path };
    case 409:
      return { kind: "conflict", path, expectedSha };
    case 422:
      // "sha" mismatches on the contents API come back as 422
      if (message.toLowerCase().includes("sha")) {
        return { kind: "conflict", path, expectedSha };
      }
      return { kind: "unknown", details: message || "Unprocessable entity", statusCode: 422 };
    default:
      return {
        kind: "unknown",
        details: message || `HTTP ${response.status}`,
        statusCode: response.status,
      };
  }
}
