/**
 * Per-service rate limiter
 *
 * Token bucket consulted before every outbound call to a provider.
 * - acquire(): waits (timer based, FIFO) until a token is free
 * - reportLimitExceeded(): provider said 429; reject everything until the
 *   cool-down ends, so a run fails fast instead of queueing for hours
 *
 * Cool-down is the provider's Retry-After when given, otherwise exponential
 * (60s, 120s, 240s, ... capped at 1h) over consecutive hits.
 */

import { RateLimitedError, RunCancelledError } from "./errors.js";
import { setupLogger } from "./logger.js";
import { abortableSleep } from "./time.js";

const logger = setupLogger("rate-limiter");

const DEFAULT_BACKOFF_SEC = 60;
const MAX_BACKOFF_SEC = 3600;
const BACKOFF_MULTIPLIER = 2;

export interface RateLimitPolicy {
  /** Bucket size: calls allowed back to back */
  capacity: number;
  /** Tokens added per second */
  refillPerSecond: number;
}

export interface RateLimiterOptions extends RateLimitPolicy {
  name: string;
  baseBackoffSeconds?: number;
  maxBackoffSeconds?: number;
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export class RateLimiter {
  readonly name: string;
  private readonly capacity: number;
  private readonly refillPerSecond: number;
  private readonly baseBackoffSeconds: number;
  private readonly maxBackoffSeconds: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  private tokens: number;
  private lastRefillAt: number;
  private backoffUntil = 0;
  private consecutiveHits = 0;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: RateLimiterOptions) {
    if (options.capacity < 1 || options.refillPerSecond <= 0) {
      throw new RangeError(
        `Invalid rate limit for ${options.name}: capacity must be >= 1 and refill > 0`
      );
    }

    this.name = options.name;
    this.capacity = options.capacity;
    this.refillPerSecond = options.refillPerSecond;
    this.baseBackoffSeconds = options.baseBackoffSeconds ?? DEFAULT_BACKOFF_SEC;
    this.maxBackoffSeconds = options.maxBackoffSeconds ?? MAX_BACKOFF_SEC;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? abortableSleep;
    this.tokens = options.capacity;
    this.lastRefillAt = this.now();
  }

  /**
   * Take a token without waiting.
   *
   * @returns false when the bucket is empty
   * @throws RateLimitedError while cooling down
   */
  tryAcquire(): boolean {
    this.assertNotBackingOff();
    this.refill();
    if (this.tokens >= 1) {
      this.tokens -= 1;
      return true;
    }
    return false;
  }

  /**
   * Wait for a token. Waiters are served in call order.
   *
   * @throws RateLimitedError while cooling down (also when the cool-down
   *   starts while this call is waiting)
   * @throws RunCancelledError once the signal aborts
   */
  acquire(signal?: AbortSignal): Promise<void> {
    const turn = this.queue.then(() => this.waitForToken(signal));
    // The caller observes the rejection through `turn`; the queue only
    // needs to know this waiter is finished.
    this.queue = turn.then(
      () => undefined,
      () => undefined
    );
    return turn;
  }

  /**
   * Provider reported its hard limit (HTTP 429).
   */
  reportLimitExceeded(retryAfterSeconds?: number): number {
    this.consecutiveHits++;

    const seconds =
      retryAfterSeconds !== undefined && retryAfterSeconds > 0
        ? retryAfterSeconds
        : Math.min(
            this.baseBackoffSeconds * Math.pow(BACKOFF_MULTIPLIER, this.consecutiveHits - 1),
            this.maxBackoffSeconds
          );

    this.backoffUntil = Math.max(this.backoffUntil, this.now() + seconds * 1000);
    this.tokens = 0;

    logger.warn(
      `${this.name}: rate limited, cooling down ${seconds}s [hit ${this.consecutiveHits}]`
    );
    return seconds;
  }

  reportSuccess(): void {
    this.consecutiveHits = 0;
  }

  backoffRemainingMs(): number {
    return Math.max(0, this.backoffUntil - this.now());
  }

  private async waitForToken(signal?: AbortSignal): Promise<void> {
    for (;;) {
      if (signal?.aborted) {
        throw new RunCancelledError();
      }
      this.assertNotBackingOff();
      this.refill();

      if (this.tokens >= 1) {
        this.tokens -= 1;
        return;
      }

      const waitMs = Math.ceil(((1 - this.tokens) / this.refillPerSecond) * 1000);
      logger.debug(`${this.name}: bucket empty, waiting ${waitMs}ms`);
      await this.sleep(waitMs, signal);
    }
  }

  private refill(): void {
    const now = this.now();
    const elapsedSec = (now - this.lastRefillAt) / 1000;
    if (elapsedSec > 0) {
      this.tokens = Math.min(this.capacity, this.tokens + elapsedSec * this.refillPerSecond);
      this.lastRefillAt = now;
    }
  }

  private assertNotBackingOff(): void {
    const remainingMs = this.backoffRemainingMs();
    if (remainingMs > 0) {
      const seconds = Math.ceil(remainingMs / 1000);
      throw new RateLimitedError(
        seconds,
        `${this.name} rate limit cooling down. Retry after ${seconds} seconds.`
      );
    }
  }
}
