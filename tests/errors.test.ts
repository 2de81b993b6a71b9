import { describe, expect, it } from "vitest";
import {
  BackendFailureError,
  FinRagError,
  InvalidProfileError,
  TimeoutError,
  ValidationError,
  isRetryableError,
  wrapError,
} from "../src/core/errors.js";

describe("isRetryableError", () => {
  it("reads the flag on FinRag errors", () => {
    expect(isRetryableError(new BackendFailureError("down", "claude"))).toBe(true);
    expect(isRetryableError(new TimeoutError("index search", 50))).toBe(true);
    expect(isRetryableError(new ValidationError("bad payload"))).toBe(false);
    expect(isRetryableError(new BackendFailureError("bad key", "claude", { retryable: false }))).toBe(false);
  });

  it("recognises transient failures in plain errors", () => {
    expect(isRetryableError(new Error("socket ECONNRESET"))).toBe(true);
    expect(isRetryableError(new Error("Rate limit reached"))).toBe(true);
    expect(isRetryableError(new Error("bad input"))).toBe(false);
    expect(isRetryableError("overloaded")).toBe(false);
  });
});

describe("wrapError", () => {
  it("passes FinRag errors through", () => {
    const error = new InvalidProfileError("Invalid profile: age", "age", -1);
    expect(wrapError(error)).toBe(error);
  });

  it("wraps plain errors and thrown values", () => {
    const cause = new Error("disk full");
    const wrapped = wrapError(cause);
    expect(wrapped).toBeInstanceOf(FinRagError);
    expect(wrapped.code).toBe("UNKNOWN_ERROR");
    expect(wrapped.message).toBe("disk full");
    expect(wrapped.cause).toBe(cause);

    expect(wrapError("plain string").message).toBe("plain string");
    expect(wrapError(undefined, "ask failed").message).toBe("ask failed");
  });
});

describe("FinRagError.toJSON", () => {
  it("serialises code and context", () => {
    expect(new InvalidProfileError("Invalid profile: age", "age", -1).toJSON()).toEqual({
      name: "InvalidProfileError",
      code: "INVALID_PROFILE",
      message: "Invalid profile: age",
      context: { field: "age", received: -1 },
      retryable: false,
    });
  });
});
