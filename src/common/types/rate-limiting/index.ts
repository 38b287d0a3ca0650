/**
 * Token bucket configuration for one source
 */
export interface RateLimitConfig {
  /**
   * Tokens added per second
   */
  ratePerSecond: number;

  /**
   * Bucket capacity, also the maximum number of attempts in flight
   */
  burst: number;
}

export interface RateLimiterStats {
  sourceId: string;
  availableTokens: number;
  inFlight: number;
  waiting: number;
  granted: number;
  config: RateLimitConfig;
}

/**
 * Handle for one acquired slot. `release` is idempotent.
 */
export interface RateLimitPermit {
  readonly sourceId: string;
  readonly acquiredAt: number;
  release(): void;
}
