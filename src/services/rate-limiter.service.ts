// src/services/rate-limiter.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { RateLimiterOptions } from '../interfaces/config.interface';
import {
  AcquireOptions,
  ITokenBucket,
  RateLimiterState,
} from '../interfaces/rate-limiter.interface';
import { ConfigurationError } from '../errors/configuration.error';
import { sleep } from '../utils/sleep';

const DEFAULT_BURST_CAPACITY = 1;
const DEFAULT_COOLDOWN_SECONDS = 5;
const MIN_WAIT_MS = 10;

function isPositiveSeconds(value: number | undefined): value is number {
  return value !== undefined && Number.isFinite(value) && value > 0;
}

/**
 * Token-bucket limiter shared by every outbound call to the agent API.
 *
 * Two independent gates must both be open for `acquire()` to return: a token
 * must be available, and no cooldown set by `reportOverload()` may be active.
 *
 * Time is read from a monotonic clock, so wall-clock changes neither
 * stretch nor cut short a cooldown.
 *
 * Bucket state is only read and written inside the synchronous part of
 * `tryConsume()` and `reportOverload()`, so concurrent callers never interleave
 * a refill with a consume.
 */
@Injectable()
export class RateLimiterService {
  private readonly logger = new Logger(RateLimiterService.name);
  private readonly refillRate: number | null;
  private readonly capacity: number;
  private readonly defaultCooldownSeconds: number;
  private readonly now: () => number;
  private bucket: ITokenBucket | null = null;

  constructor(options: RateLimiterOptions = {}) {
    const {
      steadyRate,
      burstCapacity = DEFAULT_BURST_CAPACITY,
      defaultCooldownSeconds = DEFAULT_COOLDOWN_SECONDS,
      clock = () => performance.now(),
    } = options;

    if (
      steadyRate !== undefined &&
      (!Number.isFinite(steadyRate) || steadyRate <= 0)
    ) {
      throw new ConfigurationError(
        `Rate limiter steadyRate must be a positive number, got ${steadyRate}`,
      );
    }
    if (!Number.isInteger(burstCapacity) || burstCapacity < 1) {
      throw new ConfigurationError(
        `Rate limiter burstCapacity must be an integer >= 1, got ${burstCapacity}`,
      );
    }
    if (!Number.isFinite(defaultCooldownSeconds) || defaultCooldownSeconds < 0) {
      throw new ConfigurationError(
        `Rate limiter defaultCooldownSeconds must be >= 0, got ${defaultCooldownSeconds}`,
      );
    }

    this.refillRate = steadyRate ?? null;
    this.capacity = burstCapacity;
    this.defaultCooldownSeconds = defaultCooldownSeconds;
    this.now = clock;
  }

  /**
   * Wait until a token is available and no cooldown is active, then take one token.
   *
   * Never fails because of rate limiting; rejects only when `signal` aborts
   * while waiting.
   */
  async acquire(options: AcquireOptions = {}): Promise<void> {
    const { signal } = options;
    for (;;) {
      signal?.throwIfAborted();
      const waitMs = this.tryConsume();
      if (waitMs === 0) {
        return;
      }
      await sleep(Math.max(waitMs, MIN_WAIT_MS), signal);
    }
  }

  /**
   * Extend the cooldown after an overload (HTTP 429) response.
   *
   * @param retryAfterSeconds Server hint. Missing, zero, negative or
   * non-finite values fall back to the configured default cooldown.
   */
  reportOverload(retryAfterSeconds?: number): void {
    const seconds = isPositiveSeconds(retryAfterSeconds)
      ? retryAfterSeconds
      : this.defaultCooldownSeconds;

    if (seconds <= 0) {
      this.logger.debug('Overload reported without hint and no default cooldown');
      return;
    }

    const bucket = this.getBucket();
    const target = this.now() + seconds * 1000;
    if (target > bucket.cooldownUntil) {
      bucket.cooldownUntil = target;
      this.logger.warn(
        `Agent API overloaded, pausing outbound calls for ${seconds}s`,
      );
    }
  }

  /**
   * Milliseconds an immediate acquire() would currently wait
   */
  getWaitTimeMs(): number {
    const bucket = this.getBucket();
    const now = this.now();
    this.refillBucket(bucket, now);
    return Math.max(
      bucket.cooldownUntil - now,
      this.tokenDeficitMs(bucket),
      0,
    );
  }

  /**
   * Snapshot of the bucket after applying a refill
   */
  getState(): RateLimiterState {
    const bucket = this.getBucket();
    this.refillBucket(bucket, this.now());
    return {
      ...bucket,
      capacity: this.capacity,
      refillRate: this.refillRate,
    };
  }

  /**
   * Refill, then take a token if both gates are open.
   * @returns 0 when a token was taken, otherwise how long to wait in ms
   */
  private tryConsume(): number {
    const bucket = this.getBucket();
    const now = this.now();
    this.refillBucket(bucket, now);

    if (bucket.cooldownUntil > now) {
      return bucket.cooldownUntil - now;
    }
    if (this.refillRate === null) {
      return 0;
    }
    if (bucket.tokens >= 1) {
      bucket.tokens -= 1;
      this.logger.debug(`Consumed 1 token, ${bucket.tokens} remaining`);
      return 0;
    }
    return this.tokenDeficitMs(bucket);
  }

  private tokenDeficitMs(bucket: ITokenBucket): number {
    if (this.refillRate === null || bucket.tokens >= 1) {
      return 0;
    }
    return Math.ceil(((1 - bucket.tokens) / this.refillRate) * 1000);
  }

  /**
   * Refill a token bucket based on elapsed time.
   * A clock that moved backwards adds nothing.
   */
  private refillBucket(bucket: ITokenBucket, now: number): void {
    const elapsedMs = Math.max(0, now - bucket.lastRefill);
    if (this.refillRate !== null && elapsedMs > 0) {
      bucket.tokens = Math.min(
        this.capacity,
        bucket.tokens + (elapsedMs / 1000) * this.refillRate,
      );
    }
    bucket.lastRefill = now;
  }

  private getBucket(): ITokenBucket {
    if (!this.bucket) {
      this.bucket = {
        tokens: this.capacity,
        lastRefill: this.now(),
        cooldownUntil: 0,
      };
      this.logger.debug(
        `Created token bucket: capacity ${this.capacity}, rate ${this.refillRate ?? 'unbounded'}/s`,
      );
    }
    return this.bucket;
  }
}
