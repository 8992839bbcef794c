/**
 * Result - two-variant outcome for fallible operations
 *
 * Every expected failure in the vault (crypto, remote store, auth) travels
 * as a Failure value instead of an exception. Callers narrow on `ok`.
 *
 * @example
 * const result = decryptString(data, key);
 * if (result.ok) {
 *   console.log(result.value);
 * } else {
 *   console.error(result.error.kind);
 * }
 */

export type Result<T, E> = Success<T, E> | Failure<T, E>;

/**
 * Thrown by `unwrap()` when a caller opts into exceptions.
 */
export class ResultError<E> extends Error {
  readonly error: E;

  constructor(error: E) {
    super(describeError(error));
    this.name = "ResultError";
    this.error = error;
  }
}

export class Success<T, E = never> {
  readonly ok = true as const;

  constructor(readonly value: T) {}

  get isSuccess(): true {
    return true;
  }

  get isFailure(): false {
    return false;
  }

  get valueOrUndefined(): T {
    return this.value;
  }

  get errorOrUndefined(): undefined {
    return undefined;
  }

  map<U>(transform: (value: T) => U): Result<U, E> {
    return new Success<U, E>(transform(this.value));
  }

  mapError<F>(_transform: (error: E) => F): Result<T, F> {
    return new Success<T, F>(this.value);
  }

  flatMap<U, F = E>(transform: (value: T) => Result<U, F>): Result<U, E | F> {
    return transform(this.value);
  }

  unwrap(): T {
    return this.value;
  }

  unwrapOr(_fallback: T): T {
    return this.value;
  }

  toString(): string {
    return `Success(${String(this.value)})`;
  }
}

export class Failure<T, E> {
  readonly ok = false as const;

  constructor(readonly error: E) {}

  get isSuccess(): false {
    return false;
  }

  get isFailure(): true {
    return true;
  }

  get valueOrUndefined(): undefined {
    return undefined;
  }

  get errorOrUndefined(): E {
    return this.error;
  }

  map<U>(_transform: (value: T) => U): Result<U, E> {
    return new Failure<U, E>(this.error);
  }

  mapError<F>(transform: (error: E) => F): Result<T, F> {
    return new Failure<T, F>(transform(this.error));
  }

  flatMap<U, F = E>(_transform: (value: T) => Result<U, F>): Result<U, E | F> {
    return new Failure<U, E | F>(this.error);
  }

  unwrap(): never {
    throw new ResultError(this.error);
  }

  unwrapOr(fallback: T): T {
    return fallback;
  }

  toString(): string {
    return `Failure(${describeError(this.error)})`;
  }
}

export function success<T, E = never>(value: T): Result<T, E> {
  return new Success<T, E>(value);
}

export function failure<E, T = never>(error: E): Result<T, E> {
  return new Failure<T, E>(error);
}

/**
 * Fold a result into a single value, handling both variants
 */
export function matchResult<T, E, R>(
  result: Result<T, E>,
  handlers: { success: (value: T) => R; failure: (error: E) => R }
): R {
  return result.ok ? handlers.success(result.value) : handlers.failure(result.error);
}

/**
 * Run a throwing function and capture any exception as a Failure
 */
export function tryCatch<T, E>(fn: () => T, onError: (cause: unknown) => E): Result<T, E> {
  try {
    return success(fn());
  } catch (cause) {
    return failure(onError(cause));
  }
}

/**
 * Await a promise and capture a rejection as a Failure
 */
export async function fromPromise<T, E>(
  promise: Promise<T>,
  onError: (cause: unknown) => E
): Promise<Result<T, E>> {
  try {
    return success(await promise);
  } catch (cause) {
    return failure(onError(cause));
  }
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "object" && error !== null) {
    if ("message" in error && typeof error.message === "string") {
      return error.message;
    }
    if ("kind" in error) {
      return String(error.kind);
    }
  }
  return String(error);
}
