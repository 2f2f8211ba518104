/**
 * Mutable state of the process-wide token bucket
 */
export interface ITokenBucket {
  tokens: number;
  lastRefill: number; // Limiter clock time in milliseconds
  /**
   * Acquisitions wait until this limiter clock time. 0 means no active cooldown.
   */
  cooldownUntil: number;
}

export interface AcquireOptions {
  /**
   * Aborting rejects a pending acquire() with the signal's reason.
   * A cancelled waiter never holds a token.
   */
  signal?: AbortSignal;
}

export interface RateLimiterState extends ITokenBucket {
  capacity: number;
  /**
   * Tokens per second, or null when the token gate is disabled
   */
  refillRate: number | null;
}
