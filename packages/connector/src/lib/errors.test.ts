import { describe, it, expect } from "vitest";
import {
  AuthError,
  ConfigurationError,
  describeError,
  getRetryAfterSeconds,
  isAuthError,
  isRateLimitedError,
  isRetryableError,
  MigrationError,
  PermanentUploadError,
  RateLimitedError,
  TransientFetchError,
  TransientUploadError,
} from "./errors.js";

describe("error classes", () => {
  it("should name errors after their class", () => {
    const error = new PermanentUploadError("HTTP 400");

    expect(error).toBeInstanceOf(MigrationError);
    expect(error.name).toBe("PermanentUploadError");
  });

  it("should prefix auth errors with the service", () => {
    const error = new AuthError("garmin", "Token refresh rejected");

    expect(error.message).toBe("[garmin] Token refresh rejected");
    expect(error.service).toBe("garmin");
  });

  it("should list every configuration issue", () => {
    const error = new ConfigurationError(["TZ: Unknown time zone", "STATUS_PORT: Expected number"]);

    expect(error.message).toBe("Invalid configuration:\n  - TZ: Unknown time zone\n  - STATUS_PORT: Expected number");
  });
});

describe("type guards", () => {
  it("should recognise retryable errors", () => {
    expect(isRetryableError(new TransientFetchError("x"))).toBe(true);
    expect(isRetryableError(new TransientUploadError("x"))).toBe(true);
    expect(isRetryableError(new RateLimitedError(10))).toBe(true);
    expect(isRetryableError(new PermanentUploadError("x"))).toBe(false);
    expect(isRetryableError(new Error("x"))).toBe(false);
  });

  it("should recognise auth and rate limit errors", () => {
    expect(isAuthError(new AuthError("omron", "x"))).toBe(true);
    expect(isAuthError(new Error("x"))).toBe(false);
    expect(isRateLimitedError(new RateLimitedError(5))).toBe(true);
  });

  it("should read the retry wait", () => {
    expect(getRetryAfterSeconds(new RateLimitedError(42))).toBe(42);
    expect(getRetryAfterSeconds(new TransientFetchError("x"))).toBeNull();
  });
});

describe("describeError", () => {
  it("should prefix the class name", () => {
    expect(describeError(new RateLimitedError(60))).toBe(
      "RateLimitedError: Rate limit exceeded. Retry after 60 seconds."
    );
  });

  it("should leave plain errors and other values as they are", () => {
    expect(describeError(new Error("boom"))).toBe("boom");
    expect(describeError("boom")).toBe("boom");
  });
});
