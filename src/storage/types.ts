/**
 * Local storage backends for device secrets and the offline index copy
 */

/**
 * String key/value store for device metadata
 */
export interface KeyValueStore {
  get(key: string): string | undefined;
  set(key: string, value: string): void;
  delete(key: string): boolean;
  keys(): string[];
  clear(): void;
  close(): void;
}

export interface CachedIndex {
  /** Encrypted index bytes, exactly as downloaded */
  content: Buffer;
  sha: string;
  cachedAt: Date;
}

/**
 * Offline copy of the encrypted index
 */
export interface IndexCache {
  cacheIndex(content: Uint8Array, sha: string, now?: Date): void;
  getCachedIndex(): CachedIndex | undefined;
  clearIndex(): void;
}

/**
 * In-memory storage backend
 */
export class MemoryStorage implements KeyValueStore, IndexCache {
  private data: Map<string, string> = new Map();
  private index: CachedIndex | undefined;

  get(key: string): string | undefined {
    return this.data.get(key);
  }

  set(key: string, value: string): void {
    this.data.set(key, value);
  }

  delete(key: string): boolean {
    return this.data.delete(key);
  }

  keys(): string[] {
    return Array.from(this.data.keys());
  }

  clear(): void {
    this.data.clear();
    this.index = undefined;
  }

  cacheIndex(content: Uint8Array, sha: string, now: Date = new Date()): void {
    this.index = { content: Buffer.from(content), sha, cachedAt: now };
  }

  getCachedIndex(): CachedIndex | undefined {
    if (!this.index) {
      return undefined;
    }
    return { ...this.index, content: Buffer.from(this.index.content) };
  }

  clearIndex(): void {
    this.index = undefined;
  }

  close(): void {
    this.clear();
  }
}
