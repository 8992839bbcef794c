/**
 * Remote store error kinds
 *
 * `not-found` and `conflict` are distinguishable outcomes of the
 * hash-guarded contract; everything else is a transport failure.
 */

export type RemoteError =
  | { kind: "not-found"; path: string }
  | { kind: "conflict"; path: string; expectedSha?: string }
  | { kind: "authentication-failed" }
  | { kind: "access-forbidden" }
  | { kind: "rate-limit-exceeded"; resetAt?: Date; remaining?: number }
  | { kind: "network"; details: string }
  | { kind: "server"; statusCode: number; details?: string }
  | { kind: "unknown"; details: string; statusCode?: number };

export type TransportError = Exclude<RemoteError, { kind: "not-found" } | { kind: "conflict" }>;

export function isTransportError(error: RemoteError): error is TransportError {
  return error.kind !== "not-found" && error.kind !== "conflict";
}

export function remoteErrorMessage(error: RemoteError): string {
  switch (error.kind) {
    case "not-found":
      return `Resource not found: ${error.path}`;
    case "conflict":
      return `Conflict: ${error.path} was modified (expected SHA: ${error.expectedSha ?? "none"})`;
    case "authentication-failed":
      return "Authentication failed - check your token";
    case "access-forbidden":
      return "Access forbidden - check repository permissions";
    case "rate-limit-exceeded":
      return error.resetAt
        ? `Rate limit exceeded - resets at ${error.resetAt.toISOString()}`
        : "Rate limit exceeded";
    case "network":
      return `Network error: ${error.details}`;
    case "server":
      return `GitHub server error (${error.statusCode}): ${error.details ?? "Unknown error"}`;
    case "unknown":
      return `GitHub error: ${error.details}`;
  }
}

/**
 * Carrier for a RemoteError thrown inside the HTTP client and caught at the
 * repository boundary, where it becomes a Failure.
 */
export class RemoteRequestError extends Error {
  readonly remote: RemoteError;

  constructor(remote: RemoteError) {
    super(remoteErrorMessage(remote));
    this.name = "RemoteRequestError";
    this.remote = remote;
  }
}
