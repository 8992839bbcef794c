/**
 * Tracks GitHub API rate limit status from `x-ratelimit-*` response headers.
 *
 * Authenticated users get 5000 requests per hour.
 */

export type HeaderBag = Record<string, unknown>;

export class RateLimitTracker {
  limit?: number;
  remaining?: number;
  resetAt?: Date;
  readonly warningThreshold: number;
  private now: () => Date;

  constructor(options: { warningThreshold?: number; now?: () => Date } = {}) {
    this.warningThreshold = options.warningThreshold ?? 100;
    this.now = options.now ?? (() => new Date());
  }

  updateFromHeaders(headers: HeaderBag): void {
    const limit = parseHeaderInt(headers["x-ratelimit-limit"]);
    const remaining = parseHeaderInt(headers["x-ratelimit-remaining"]);
    const reset = parseHeaderInt(headers["x-ratelimit-reset"]);

    if (limit !== undefined) {
      this.limit = limit;
    }
    if (remaining !== undefined) {
      this.remaining = remaining;
    }
    if (reset !== undefined) {
      this.resetAt = new Date(reset * 1000);
    }
  }

  get isNearLimit(): boolean {
    return this.remaining !== undefined && this.remaining < this.warningThreshold;
  }

  get isExhausted(): boolean {
    return this.remaining !== undefined && this.remaining <= 0;
  }

  /** Milliseconds until reset, or undefined if unknown */
  get timeUntilReset(): number | undefined {
    if (!this.resetAt) {
      return undefined;
    }
    return Math.max(0, this.resetAt.getTime() - this.now().getTime());
  }

  get status(): string {
    if (this.remaining === undefined || this.limit === undefined) {
      return "Rate limit: unknown";
    }
    const reset = this.resetAt ? ` (resets at ${this.resetAt.toISOString()})` : "";
    return `Rate limit: ${this.remaining}/${this.limit} remaining${reset}`;
  }

  toString(): string {
    return this.status;
  }
}

function parseHeaderInt(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value !== "string") {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}
