import { describe, it, expect, vi } from "vitest";
import {
  AuthError,
  DuplicateRejected,
  PermanentFetchError,
  PermanentUploadError,
  RateLimitedError,
  RunCancelledError,
  TransientFetchError,
  TransientUploadError,
} from "./errors.js";
import { parseRetryAfter, readJson, sendRequest, type RequestContext } from "./http.js";
import { unlimited } from "../testing/fakes.js";

function context(kind: "fetch" | "upload", response: Response | Error): RequestContext {
  return {
    service: "fitbit",
    limiter: unlimited(),
    kind,
    fetchImpl: vi.fn(async () => {
      if (response instanceof Error) {
        throw response;
      }
      return response;
    }),
  };
}

describe("parseRetryAfter", () => {
  it("should read seconds", () => {
    expect(parseRetryAfter(new Headers({ "Retry-After": "120" }))).toBe(120);
  });

  it("should read an HTTP date", () => {
    const now = Date.parse("2024-01-01T00:00:00Z");

    expect(parseRetryAfter(new Headers({ "Retry-After": "Mon, 01 Jan 2024 00:01:30 GMT" }), now)).toBe(90);
  });

  it("should fall back to the Fitbit reset header", () => {
    expect(parseRetryAfter(new Headers({ "Fitbit-Rate-Limit-Reset": "1800" }))).toBe(1800);
  });

  it("should be undefined without a usable header", () => {
    expect(parseRetryAfter(new Headers())).toBeUndefined();
  });
});

describe("sendRequest", () => {
  it("should return a successful response", async () => {
    const ctx = context("fetch", new Response("{}", { status: 200 }));

    const response = await sendRequest("https://api.example.com/a?b=1", {}, ctx);

    expect(response.status).toBe(200);
    expect(ctx.fetchImpl).toHaveBeenCalledWith("https://api.example.com/a?b=1", {});
  });

  it("should classify network errors as transient", async () => {
    await expect(sendRequest("https://api.example.com", {}, context("fetch", new TypeError("fetch failed")))).rejects.toBeInstanceOf(
      TransientFetchError
    );
    await expect(sendRequest("https://api.example.com", {}, context("upload", new TypeError("fetch failed")))).rejects.toBeInstanceOf(
      TransientUploadError
    );
  });

  it("should classify server errors as transient", async () => {
    await expect(
      sendRequest("https://api.example.com", {}, context("fetch", new Response("oops", { status: 503 })))
    ).rejects.toThrow("[fitbit] HTTP 503: oops");
  });

  it("should classify client errors as permanent", async () => {
    await expect(
      sendRequest("https://api.example.com", {}, context("fetch", new Response("bad", { status: 400 })))
    ).rejects.toBeInstanceOf(PermanentFetchError);
    await expect(
      sendRequest("https://api.example.com", {}, context("upload", new Response("bad", { status: 400 })))
    ).rejects.toBeInstanceOf(PermanentUploadError);
  });

  it("should map 401 and 403 to AuthError", async () => {
    await expect(
      sendRequest("https://api.example.com", {}, context("fetch", new Response("", { status: 401 })))
    ).rejects.toBeInstanceOf(AuthError);
    await expect(
      sendRequest("https://api.example.com", {}, context("upload", new Response("", { status: 403 })))
    ).rejects.toThrow("[fitbit] HTTP 403: ");
  });

  it("should map 409 to a duplicate for uploads only", async () => {
    await expect(
      sendRequest("https://api.example.com", {}, context("upload", new Response("", { status: 409 })))
    ).rejects.toBeInstanceOf(DuplicateRejected);
    await expect(
      sendRequest("https://api.example.com", {}, context("fetch", new Response("", { status: 409 })))
    ).rejects.toBeInstanceOf(PermanentFetchError);
  });

  it("should not send once the signal has aborted", async () => {
    const ctx = context("fetch", new Response("{}", { status: 200 }));

    await expect(
      sendRequest("https://api.example.com", { signal: AbortSignal.abort() }, ctx)
    ).rejects.toBeInstanceOf(RunCancelledError);
    expect(ctx.fetchImpl).not.toHaveBeenCalled();
  });

  it("should report an aborted request as cancelled, not transient", async () => {
    const controller = new AbortController();
    const ctx: RequestContext = {
      service: "fitbit",
      limiter: unlimited(),
      kind: "fetch",
      fetchImpl: vi.fn(async () => {
        controller.abort();
        throw new Error("This operation was aborted");
      }),
    };

    await expect(
      sendRequest("https://api.example.com", { signal: controller.signal }, ctx)
    ).rejects.toBeInstanceOf(RunCancelledError);
  });

  it("should report 429 to the limiter and carry the wait", async () => {
    const ctx = context("fetch", new Response("", { status: 429, headers: { "Retry-After": "30" } }));

    const error = await sendRequest("https://api.example.com", {}, ctx).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error instanceof RateLimitedError && error.retryAfterSeconds).toBe(30);
    expect(ctx.limiter.backoffRemainingMs()).toBeGreaterThan(0);
  });
});

describe("readJson", () => {
  it("should parse a JSON body", async () => {
    const data = await readJson<{ a: number }>(new Response('{"a":1}'), { service: "omron", kind: "fetch" });

    expect(data).toEqual({ a: 1 });
  });

  it("should reject a malformed body as permanent", async () => {
    await expect(readJson(new Response("<html>"), { service: "omron", kind: "fetch" })).rejects.toBeInstanceOf(
      PermanentFetchError
    );
  });
});
