/**
 * Rate-limited HTTP requests with provider response classification.
 *
 * No retries here: the orchestrator owns retry policy. This module only
 * maps a response (or a network failure) onto the error taxonomy.
 */

import {
  AuthError,
  DuplicateRejected,
  PermanentFetchError,
  PermanentUploadError,
  RateLimitedError,
  RunCancelledError,
  TransientFetchError,
  TransientUploadError,
  type ServiceName,
} from "./errors.js";
import { setupLogger } from "./logger.js";
import type { RateLimiter } from "./rate-limiter.js";

const logger = setupLogger("http");

/** Whether the call reads from a source or writes to the sink */
export type CallKind = "fetch" | "upload";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface RequestContext {
  service: ServiceName;
  limiter: RateLimiter;
  kind: CallKind;
  fetchImpl?: FetchLike;
}

/**
 * Seconds to wait from Retry-After (seconds or HTTP date) or
 * Fitbit-Rate-Limit-Reset. Undefined when neither header is usable.
 */
export function parseRetryAfter(headers: Headers, now: number = Date.now()): number | undefined {
  const retryAfter = headers.get("Retry-After");
  if (retryAfter) {
    if (/^\d+$/.test(retryAfter.trim())) {
      return parseInt(retryAfter, 10);
    }
    const until = Date.parse(retryAfter);
    if (!isNaN(until) && until > now) {
      return Math.ceil((until - now) / 1000);
    }
  }

  const resetSeconds = headers.get("Fitbit-Rate-Limit-Reset");
  if (resetSeconds) {
    const seconds = parseInt(resetSeconds, 10);
    if (!isNaN(seconds) && seconds > 0) {
      return seconds;
    }
  }

  return undefined;
}

function transient(kind: CallKind, message: string, cause?: unknown): Error {
  return kind === "fetch"
    ? new TransientFetchError(message, { cause })
    : new TransientUploadError(message, { cause });
}

function permanent(kind: CallKind, message: string): Error {
  return kind === "fetch" ? new PermanentFetchError(message) : new PermanentUploadError(message);
}

/**
 * Perform one HTTP request after taking a rate-limit slot.
 *
 * @returns the response when its status is 2xx
 * @throws AuthError on 401/403, RateLimitedError on 429, DuplicateRejected on
 *   409 for uploads, Transient* on network errors and 5xx, Permanent* on other
 *   statuses, RunCancelledError when init.signal aborts
 */
export async function sendRequest(
  url: string,
  init: RequestInit,
  ctx: RequestContext
): Promise<Response> {
  const signal = init.signal ?? undefined;
  await ctx.limiter.acquire(signal);

  const method = init.method ?? "GET";
  logger.debug(`${method} ${url.split("?")[0]}`);

  let response: Response;
  try {
    response = await (ctx.fetchImpl ?? fetch)(url, init);
  } catch (error) {
    if (signal?.aborted) {
      throw new RunCancelledError();
    }
    throw transient(ctx.kind, `[${ctx.service}] ${method} failed: ${String(error)}`, error);
  }

  if (response.ok) {
    ctx.limiter.reportSuccess();
    return response;
  }

  const text = await response.text().catch(() => "");
  const detail = `[${ctx.service}] HTTP ${response.status}: ${text.slice(0, 200)}`;

  if (response.status === 429) {
    const seconds = ctx.limiter.reportLimitExceeded(parseRetryAfter(response.headers));
    throw new RateLimitedError(seconds, `${detail} (retry after ${seconds}s)`);
  }

  if (response.status === 401 || response.status === 403) {
    throw new AuthError(ctx.service, `HTTP ${response.status}: ${text.slice(0, 200)}`);
  }

  if (response.status === 409 && ctx.kind === "upload") {
    throw new DuplicateRejected(detail);
  }

  if (response.status >= 500) {
    throw transient(ctx.kind, detail);
  }

  throw permanent(ctx.kind, detail);
}

/**
 * Parse a JSON response body, classifying malformed bodies as permanent.
 */
export async function readJson<T>(response: Response, ctx: Pick<RequestContext, "service" | "kind">): Promise<T> {
  try {
    return (await response.json()) as T;
  } catch (error) {
    throw permanent(ctx.kind, `[${ctx.service}] Invalid JSON response: ${String(error)}`);
  }
}
