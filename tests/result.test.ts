import { describe, it, expect, vi } from "vitest";
import {
  failure,
  fromPromise,
  matchResult,
  ResultError,
  success,
  tryCatch,
  type Result,
} from "../src/result/index.js";

type TestError = { kind: "bad-input"; message: string } | { kind: "too-large" };

function parsePositive(input: string): Result<number, TestError> {
  const value = Number(input);
  if (Number.isNaN(value)) {
    return failure({ kind: "bad-input", message: `not a number: ${input}` });
  }
  return success(value);
}

describe("Result", () => {
  describe("variants", () => {
    it("should expose the value of a success", () => {
      const result = success<number, TestError>(42);
      expect(result.ok).toBe(true);
      expect(result.isSuccess).toBe(true);
      expect(result.isFailure).toBe(false);
      expect(result.valueOrUndefined).toBe(42);
      expect(result.errorOrUndefined).toBeUndefined();
    });

    it("should expose the error of a failure", () => {
      const result = failure<TestError, number>({ kind: "too-large" });
      expect(result.ok).toBe(false);
      expect(result.isFailure).toBe(true);
      expect(result.valueOrUndefined).toBeUndefined();
      expect(result.errorOrUndefined).toEqual({ kind: "too-large" });
    });

    it("should narrow on ok", () => {
      const result = parsePositive("7");
      if (!result.ok) {
        throw new Error("expected success");
      }
      expect(result.value + 1).toBe(8);
    });
  });

  describe("map and mapError", () => {
    it("should transform only the success value", () => {
      const mapError = vi.fn((error: TestError) => error.kind);
      const result = success<number, TestError>(2)
        .map((value) => value * 10)
        .mapError(mapError);

      expect(result.valueOrUndefined).toBe(20);
      expect(mapError).not.toHaveBeenCalled();
    });

    it("should transform only the failure error", () => {
      const map = vi.fn((value: number) => value * 10);
      const result = failure<TestError, number>({ kind: "too-large" })
        .map(map)
        .mapError((error) => `failed: ${error.kind}`);

      expect(result.errorOrUndefined).toBe("failed: too-large");
      expect(map).not.toHaveBeenCalled();
    });
  });

  describe("flatMap", () => {
    it("should chain successes", () => {
      const result = parsePositive("5").flatMap(
        (value): Result<number, TestError> =>
          value > 3 ? failure({ kind: "too-large" }) : success(value)
      );
      expect(result.errorOrUndefined).toEqual({ kind: "too-large" });
    });

    it("should short-circuit on the first failure", () => {
      const second = vi.fn((value: number) => success<number, TestError>(value + 1));
      const third = vi.fn((value: number) => success<number, TestError>(value + 1));

      const result = parsePositive("abc").flatMap(second).flatMap(third);

      expect(result.errorOrUndefined).toEqual({ kind: "bad-input", message: "not a number: abc" });
      expect(second).not.toHaveBeenCalled();
      expect(third).not.toHaveBeenCalled();
    });

    it("should widen the error type", () => {
      const result: Result<string, TestError | string> = parsePositive("1").flatMap(
        (value): Result<string, string> =>
          value === 1 ? failure("one is not allowed") : success(String(value))
      );
      expect(result.errorOrUndefined).toBe("one is not allowed");
    });
  });

  describe("unwrap", () => {
    it("should return the value of a success", () => {
      expect(success(3).unwrap()).toBe(3);
      expect(success(3).unwrapOr(0)).toBe(3);
    });

    it("should throw a ResultError carrying the typed error", () => {
      const result = failure<TestError, number>({ kind: "bad-input", message: "nope" });
      expect(result.unwrapOr(0)).toBe(0);

      let thrown: unknown;
      try {
        result.unwrap();
      } catch (error) {
        thrown = error;
      }
      expect(thrown).toBeInstanceOf(ResultError);
      expect(thrown instanceof ResultError ? thrown.error : undefined).toEqual({
        kind: "bad-input",
        message: "nope",
      });
      expect(thrown instanceof Error ? thrown.message : undefined).toBe("nope");
    });

    it("should describe kind-tagged errors without a message", () => {
      expect(() => failure({ kind: "too-large" }).unwrap()).toThrow("too-large");
      expect(failure({ kind: "too-large" }).toString()).toBe("Failure(too-large)");
      expect(success(1).toString()).toBe("Success(1)");
    });
  });

  describe("helpers", () => {
    it("should fold both variants with matchResult", () => {
      const handlers = {
        success: (value: number) => `value ${value}`,
        failure: (error: TestError) => `error ${error.kind}`,
      };
      expect(matchResult(parsePositive("9"), handlers)).toBe("value 9");
      expect(matchResult(parsePositive("x"), handlers)).toBe("error bad-input");
    });

    it("should capture exceptions with tryCatch", () => {
      const parsed = tryCatch(
        (): unknown => JSON.parse("{broken"),
        () => "invalid json"
      );
      expect(parsed.errorOrUndefined).toBe("invalid json");
      expect(tryCatch(() => 1 + 1, () => "unreachable").valueOrUndefined).toBe(2);
    });

    it("should capture rejections with fromPromise", async () => {
      const rejected = await fromPromise(Promise.reject(new Error("offline")), (cause) =>
        cause instanceof Error ? cause.message : "unknown"
      );
      expect(rejected.errorOrUndefined).toBe("offline");

      const resolved = await fromPromise(Promise.resolve("ok"), () => "unreachable");
      expect(resolved.valueOrUndefined).toBe("ok");
    });
  });
});
