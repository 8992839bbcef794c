/**
 * Vault entry construction, expiry and formatting helpers
 */

import { v4 as uuidv4 } from "uuid";
import {
  DEFAULT_RETENTION,
  RETENTION_PERIODS,
  type EntryType,
  type RetentionPeriod,
  type VaultEntry,
} from "./types.js";

export interface CreateEntryOptions {
  type: EntryType;
  label: string;
  sizeBytes: number;
  mimeType?: string;
  /** `null` creates an entry that never expires */
  retentionPeriod?: RetentionPeriod | null;
  id?: string;
  now?: Date;
}

export function isRetentionPeriod(code: string): code is RetentionPeriod {
  return Object.prototype.hasOwnProperty.call(RETENTION_PERIODS, code);
}

/**
 * Parse a retention code; unknown codes fall back to the default period
 */
export function parseRetentionPeriod(code: string): RetentionPeriod {
  return isRetentionPeriod(code) ? code : DEFAULT_RETENTION;
}

export function calculateExpiration(period: RetentionPeriod, from: Date): Date {
  return new Date(from.getTime() + RETENTION_PERIODS[period].durationMs);
}

export function createEntry(options: CreateEntryOptions): VaultEntry {
  const id = options.id ?? uuidv4();
  const now = options.now ?? new Date();
  const retentionPeriod =
    options.retentionPeriod === null ? undefined : options.retentionPeriod ?? DEFAULT_RETENTION;

  return Object.freeze({
    id,
    filename: `${id}.enc`,
    type: options.type,
    label: options.label,
    mimeType: options.mimeType,
    createdAt: now,
    updatedAt: now,
    sizeBytes: options.sizeBytes,
    retentionPeriod,
    expiresAt: retentionPeriod ? calculateExpiration(retentionPeriod, now) : undefined,
  });
}

/**
 * Copy of the entry with a new remote hash
 */
export function withSha(entry: VaultEntry, sha: string, now: Date = new Date()): VaultEntry {
  return Object.freeze({ ...entry, sha, updatedAt: now });
}

/**
 * True when the expiration timestamp is at or before `now`
 */
export function isExpired(entry: VaultEntry, now: Date = new Date()): boolean {
  return entry.expiresAt !== undefined && entry.expiresAt.getTime() <= now.getTime();
}

/**
 * Milliseconds until expiry (0 once expired), or undefined if it never expires
 */
export function timeRemaining(entry: VaultEntry, now: Date = new Date()): number | undefined {
  if (entry.expiresAt === undefined) {
    return undefined;
  }
  return Math.max(0, entry.expiresAt.getTime() - now.getTime());
}

export function formatTimeRemaining(entry: VaultEntry, now: Date = new Date()): string | undefined {
  const remaining = timeRemaining(entry, now);
  if (remaining === undefined) {
    return undefined;
  }
  if (remaining === 0) {
    return "Expired";
  }

  const minutes = Math.floor(remaining / 60_000);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 365) {
    return plural(Math.floor(days / 365), "year", "years");
  }
  if (days > 30) {
    return plural(Math.floor(days / 30), "month", "months");
  }
  if (days > 0) {
    return plural(days, "day", "days");
  }
  if (hours > 0) {
    return plural(hours, "hour", "hours");
  }
  if (minutes > 0) {
    return plural(minutes, "min", "mins");
  }
  return "< 1 min";
}

export function formatSize(sizeBytes: number): string {
  if (sizeBytes < 1024) {
    return `${sizeBytes} B`;
  }
  if (sizeBytes < 1024 * 1024) {
    return `${(sizeBytes / 1024).toFixed(1)} KB`;
  }
  return `${(sizeBytes / (1024 * 1024)).toFixed(1)} MB`;
}

function plural(count: number, one: string, many: string): string {
  return `${count} ${count === 1 ? one : many}`;
}
