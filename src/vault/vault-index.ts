/**
 * Vault Index - manifest of all entry metadata
 *
 * Stored encrypted as index.enc in the remote vault. The index is an
 * immutable value: every change returns a new VaultIndex and leaves the
 * original usable by anyone still reading it. Entry order is insertion
 * order and decides which expired entries a cleanup batch picks first.
 */

import { z } from "zod";
import { failure, success, type Result } from "../result/index.js";
import type { EntryType, IndexError, VaultEntry } from "./types.js";
import { calculateExpiration, isExpired, parseRetentionPeriod } from "./vault-entry.js";

const isoDate = z.string().datetime({ offset: true });

const entrySchema = z.object({
  id: z.string().min(1),
  filename: z.string().min(1),
  type: z.string().transform((value): EntryType => (value === "image" ? "image" : "text")),
  label: z.string(),
  mime_type: z.string().optional(),
  created_at: isoDate,
  updated_at: isoDate,
  size_bytes: z.number().int().nonnegative(),
  sha: z.string().optional(),
  retention_period: z.string().optional(),
  expires_at: isoDate.optional(),
});

const indexSchema = z.object({
  version: z.number().int().optional(),
  entries: z.array(entrySchema).optional(),
  updated_at: isoDate.optional(),
});

type EntryJSON = z.input<typeof entrySchema>;

export interface VaultIndexJSON {
  version: number;
  entries: EntryJSON[];
  updated_at: string;
}

export class VaultIndex {
  /** Version 2 adds retention to entries; version 1 entries never expire */
  static readonly CURRENT_VERSION = 2;

  readonly version: number;
  readonly entries: readonly VaultEntry[];
  readonly updatedAt: Date;

  private constructor(entries: readonly VaultEntry[], version: number, updatedAt: Date) {
    this.version = version;
    this.entries = Object.freeze([...entries]);
    this.updatedAt = updatedAt;
    Object.freeze(this);
  }

  static empty(now: Date = new Date()): VaultIndex {
    return new VaultIndex([], VaultIndex.CURRENT_VERSION, now);
  }

  /**
   * Build an index from entries, rejecting duplicate identifiers
   */
  static create(
    entries: readonly VaultEntry[],
    options: { version?: number; updatedAt?: Date } = {}
  ): Result<VaultIndex, IndexError> {
    const seen = new Set<string>();
    for (const entry of entries) {
      if (seen.has(entry.id)) {
        return failure({ kind: "duplicate-entry", id: entry.id });
      }
      seen.add(entry.id);
    }
    return success(
      new VaultIndex(
        entries,
        options.version ?? VaultIndex.CURRENT_VERSION,
        options.updatedAt ?? new Date()
      )
    );
  }

  static fromJSON(json: unknown): Result<VaultIndex, IndexError> {
    const parsed = indexSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return failure({
        kind: "invalid-index",
        details: issue ? `${issue.path.join(".")}: ${issue.message}` : "malformed index",
      });
    }

    const entries = (parsed.data.entries ?? []).map(entryFromJSON);
    return VaultIndex.create(entries, {
      version: parsed.data.version ?? 1,
      updatedAt: parsed.data.updated_at ? new Date(parsed.data.updated_at) : undefined,
    });
  }

  static parse(jsonString: string): Result<VaultIndex, IndexError> {
    let raw: unknown;
    try {
      raw = JSON.parse(jsonString);
    } catch (error) {
      return failure({
        kind: "invalid-index",
        details: error instanceof Error ? error.message : String(error),
      });
    }
    return VaultIndex.fromJSON(raw);
  }

  toJSON(): VaultIndexJSON {
    return {
      version: this.version,
      entries: this.entries.map(entryToJSON),
      updated_at: this.updatedAt.toISOString(),
    };
  }

  toJSONString(): string {
    return JSON.stringify(this.toJSON());
  }

  get count(): number {
    return this.entries.length;
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  get totalSize(): number {
    return this.entries.reduce((sum, entry) => sum + entry.sizeBytes, 0);
  }

  getEntry(id: string): VaultEntry | undefined {
    return this.entries.find((entry) => entry.id === id);
  }

  hasEntry(id: string): boolean {
    return this.entries.some((entry) => entry.id === id);
  }

  addEntry(entry: VaultEntry): Result<VaultIndex, IndexError> {
    if (this.hasEntry(entry.id)) {
      return failure({ kind: "duplicate-entry", id: entry.id });
    }
    return success(this.withEntries([...this.entries, entry]));
  }

  updateEntry(entry: VaultEntry): Result<VaultIndex, IndexError> {
    const position = this.entries.findIndex((existing) => existing.id === entry.id);
    if (position === -1) {
      return failure({ kind: "entry-not-found", id: entry.id });
    }
    const entries = [...this.entries];
    entries[position] = entry;
    return success(this.withEntries(entries));
  }

  upsertEntry(entry: VaultEntry): VaultIndex {
    const updated = this.hasEntry(entry.id) ? this.updateEntry(entry) : this.addEntry(entry);
    return updated.unwrap();
  }

  removeEntry(id: string): VaultIndex {
    return this.removeEntries([id]);
  }

  /**
   * New index without the given identifiers; unknown ids are ignored
   */
  removeEntries(ids: Iterable<string>): VaultIndex {
    const idSet = new Set(ids);
    return this.withEntries(this.entries.filter((entry) => !idSet.has(entry.id)));
  }

  /**
   * Entries whose expiration is at or before `now`, in index order
   */
  expiredEntries(now: Date = new Date()): VaultEntry[] {
    return this.entries.filter((entry) => isExpired(entry, now));
  }

  entriesExpiringWithin(durationMs: number, now: Date = new Date()): VaultEntry[] {
    const threshold = now.getTime() + durationMs;
    return this.entries.filter(
      (entry) => entry.expiresAt !== undefined && entry.expiresAt.getTime() < threshold
    );
  }

  /** Newest first */
  get entriesByDate(): VaultEntry[] {
    return [...this.entries].sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  entriesOfType(type: EntryType): VaultEntry[] {
    return this.entries.filter((entry) => entry.type === type);
  }

  toString(): string {
    return `VaultIndex(v${this.version}, ${this.entries.length} entries)`;
  }

  private withEntries(entries: readonly VaultEntry[]): VaultIndex {
    return new VaultIndex(entries, this.version, new Date());
  }
}

function entryFromJSON(json: z.output<typeof entrySchema>): VaultEntry {
  const createdAt = new Date(json.created_at);
  const retentionPeriod =
    json.retention_period !== undefined ? parseRetentionPeriod(json.retention_period) : undefined;

  let expiresAt: Date | undefined;
  if (json.expires_at !== undefined) {
    expiresAt = new Date(json.expires_at);
  } else if (retentionPeriod !== undefined) {
    expiresAt = calculateExpiration(retentionPeriod, createdAt);
  }

  return Object.freeze({
    id: json.id,
    filename: json.filename,
    type: json.type,
    label: json.label,
    mimeType: json.mime_type,
    createdAt,
    updatedAt: new Date(json.updated_at),
    sizeBytes: json.size_bytes,
    sha: json.sha,
    retentionPeriod,
    expiresAt,
  });
}

function entryToJSON(entry: VaultEntry): EntryJSON {
  const json: EntryJSON = {
    id: entry.id,
    filename: entry.filename,
    type: entry.type,
    label: entry.label,
    created_at: entry.createdAt.toISOString(),
    updated_at: entry.updatedAt.toISOString(),
    size_bytes: entry.sizeBytes,
  };
  if (entry.mimeType !== undefined) {
    json.mime_type = entry.mimeType;
  }
  if (entry.sha !== undefined) {
    json.sha = entry.sha;
  }
  if (entry.retentionPeriod !== undefined) {
    json.retention_period = entry.retentionPeriod;
  }
  if (entry.expiresAt !== undefined) {
    json.expires_at = entry.expiresAt.toISOString();
  }
  return json;
}
