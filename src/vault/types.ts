/**
 * Type definitions for vault entries
 */

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

/**
 * Retention periods for auto-deletion, keyed by their serialized code
 */
export const RETENTION_PERIODS = {
  "1m": { durationMs: MINUTE_MS, label: "1 minute" },
  "1h": { durationMs: HOUR_MS, label: "1 hour" },
  "1d": { durationMs: DAY_MS, label: "1 day" },
  "1w": { durationMs: 7 * DAY_MS, label: "1 week" },
  "1M": { durationMs: 30 * DAY_MS, label: "1 month" },
  "1y": { durationMs: 365 * DAY_MS, label: "1 year" },
  "10y": { durationMs: 3650 * DAY_MS, label: "10 years" },
  "100y": { durationMs: 36500 * DAY_MS, label: "Forever" },
} as const satisfies Record<string, { durationMs: number; label: string }>;

export type RetentionPeriod = keyof typeof RETENTION_PERIODS;

export const DEFAULT_RETENTION: RetentionPeriod = "1d";

export type EntryType = "text" | "image";

export interface VaultEntry {
  /** Unique identifier (UUID v4) */
  readonly id: string;
  /** Filename in the remote data directory, `{id}.enc` */
  readonly filename: string;
  readonly type: EntryType;
  /** User-provided label */
  readonly label: string;
  readonly mimeType?: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  /** Size of the encrypted payload in bytes */
  readonly sizeBytes: number;
  /** Remote content hash of the encrypted payload, if known */
  readonly sha?: string;
  readonly retentionPeriod?: RetentionPeriod;
  /** Absent means the entry never expires */
  readonly expiresAt?: Date;
}

export type IndexError =
  | { kind: "duplicate-entry"; id: string }
  | { kind: "entry-not-found"; id: string }
  | { kind: "invalid-index"; details: string };

export function indexErrorMessage(error: IndexError): string {
  switch (error.kind) {
    case "duplicate-entry":
      return `Entry with ID ${error.id} already exists`;
    case "entry-not-found":
      return `Entry with ID ${error.id} not found`;
    case "invalid-index":
      return `Invalid vault index: ${error.details}`;
  }
}
