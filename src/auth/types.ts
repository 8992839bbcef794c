/**
 * Authentication states and errors
 */

import type { MasterKey } from "./master-key.js";

export type AuthError =
  | { kind: "wrong-pin"; attemptsRemaining: number }
  | { kind: "locked-out"; remainingMs: number }
  | { kind: "storage"; details: string }
  | { kind: "key-derivation"; details: string }
  | { kind: "setup-validation"; details: string };

export type AuthState =
  | { status: "initializing" }
  | { status: "not-configured" }
  | {
      status: "locked";
      failedAttempts: number;
      /** Set once the failure threshold is reached */
      lockoutUntil?: Date;
      /** Outcome of the most recent PIN attempt, for display */
      lastError?: AuthError;
    }
  | { status: "unlocked"; masterKey: MasterKey }
  | { status: "error"; error: AuthError };

export type AuthStatus = AuthState["status"];
export type LockedState = Extract<AuthState, { status: "locked" }>;

/**
 * Lockout is derived from the clock on every check, so time passing is
 * enough to clear it.
 */
export function isLockedOut(state: AuthState, now: Date = new Date()): boolean {
  return remainingLockout(state, now) !== undefined;
}

/**
 * Milliseconds left in the current lockout, or undefined if none applies
 */
export function remainingLockout(state: AuthState, now: Date = new Date()): number | undefined {
  if (state.status !== "locked" || state.lockoutUntil === undefined) {
    return undefined;
  }
  const remaining = state.lockoutUntil.getTime() - now.getTime();
  return remaining > 0 ? remaining : undefined;
}

export function authErrorMessage(error: AuthError): string {
  switch (error.kind) {
    case "wrong-pin":
      return `Wrong PIN. ${plural(error.attemptsRemaining, "attempt", "attempts")} remaining.`;
    case "locked-out": {
      const minutes = Math.floor(error.remainingMs / 60_000);
      if (minutes > 0) {
        return `Too many failed attempts. Try again in ${plural(minutes, "minute", "minutes")}.`;
      }
      const seconds = Math.max(1, Math.ceil(error.remainingMs / 1000));
      return `Too many failed attempts. Try again in ${plural(seconds, "second", "seconds")}.`;
    }
    case "storage":
      return `Storage error: ${error.details}`;
    case "key-derivation":
      return `Failed to derive key: ${error.details}`;
    case "setup-validation":
      return error.details;
  }
}

/**
 * Whether the same action can succeed later without a reset
 */
export function isRetryableAuthError(error: AuthError): boolean {
  switch (error.kind) {
    case "wrong-pin":
    case "locked-out":
    case "storage":
    case "setup-validation":
      return true;
    case "key-derivation":
      return false;
  }
}

function plural(count: number, one: string, many: string): string {
  return `${count} ${count === 1 ? one : many}`;
}
