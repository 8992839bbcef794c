/**
 * Brute-force lockout policy
 *
 * The lockout length is a pure function of the cumulative failed-attempt
 * count and never decreases as that count grows.
 */

import type { LockoutConfig } from "../config.js";

export interface LockoutPolicy {
  readonly maxFailedAttempts: number;
  /** Lockout length in ms after `failedAttempts` failures, 0 for none */
  lockoutDuration(failedAttempts: number): number;
  /** Attempts left before the next lockout */
  attemptsRemaining(failedAttempts: number): number;
}

/**
 * No lockout below the threshold. At the threshold the base duration
 * applies, and every further failure doubles it up to the cap.
 *
 * With defaults (5, 1 min, 1 h): 5 → 1 min, 6 → 2 min, 7 → 4 min, ... 11+ → 1 h.
 */
export class ExponentialLockoutPolicy implements LockoutPolicy {
  readonly maxFailedAttempts: number;
  readonly baseLockoutMs: number;
  readonly maxLockoutMs: number;

  constructor(config: Partial<LockoutConfig> = {}) {
    this.maxFailedAttempts = config.maxFailedAttempts ?? 5;
    this.baseLockoutMs = config.baseLockoutMs ?? 60_000;
    this.maxLockoutMs = Math.max(config.maxLockoutMs ?? 3_600_000, this.baseLockoutMs);
  }

  lockoutDuration(failedAttempts: number): number {
    if (failedAttempts < this.maxFailedAttempts) {
      return 0;
    }
    const doublings = failedAttempts - this.maxFailedAttempts;
    // 2 ** 31 already exceeds any sane cap, avoid float overflow
    const factor = 2 ** Math.min(doublings, 31);
    return Math.min(this.baseLockoutMs * factor, this.maxLockoutMs);
  }

  attemptsRemaining(failedAttempts: number): number {
    return Math.max(0, this.maxFailedAttempts - failedAttempts);
  }
}
