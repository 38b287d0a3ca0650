import { Injectable } from "@nestjs/common";
import { StandardService } from "../base/composed.service";
import { WithConfiguration } from "../base/mixins/configurable.mixin";
import type { RateLimitConfig, RateLimiterStats, RateLimitPermit } from "../types/rate-limiting";
import { ENV } from "@/config/environment.constants";
import { ConfigurationError } from "@/error-handling/pipeline.errors";
import { TokenBucket } from "./token-bucket";

export interface RateLimiterServiceConfig {
  /** Applied to sources without an explicit limit */
  defaultLimit: RateLimitConfig;
}

export function validateRateLimit(limit: RateLimitConfig, label: string): string[] {
  const problems: string[] = [];
  if (!(limit.ratePerSecond > 0)) {
    problems.push(`${label}: ratePerSecond must be > 0 (got ${limit.ratePerSecond})`);
  }
  if (!Number.isInteger(limit.burst) || limit.burst < 1) {
    problems.push(`${label}: burst must be a positive integer (got ${limit.burst})`);
  }
  return problems;
}

const ConfigurableService = WithConfiguration<RateLimiterServiceConfig>({
  defaultLimit: {
    ratePerSecond: ENV.RATE_LIMITING.SOURCE_RATE_PER_SECOND,
    burst: ENV.RATE_LIMITING.SOURCE_BURST,
  },
})(StandardService);

/**
 * Owns one token bucket per source. Every collector attempt against a source takes a permit
 * from the same bucket, whichever request it belongs to.
 */
@Injectable()
export class RateLimiterService extends ConfigurableService {
  private readonly buckets = new Map<string, TokenBucket>();
  private readonly overrides = new Map<string, RateLimitConfig>();

  constructor(config?: Partial<RateLimiterServiceConfig>) {
    super();
    if (config) this.updateConfig(config);
  }

  override validateConfig(config: RateLimiterServiceConfig): void {
    const problems = validateRateLimit(config.defaultLimit, "defaultLimit");
    if (problems.length > 0) {
      throw new ConfigurationError(`Invalid rate limiter configuration: ${problems.join("; ")}`, problems);
    }
  }

  /**
   * Set a source-specific limit. A busy bucket keeps its old limit until it is next idle, so
   * permits already handed out are never orphaned.
   */
  configureSource(sourceId: string, limit: RateLimitConfig): void {
    const problems = validateRateLimit(limit, sourceId);
    if (problems.length > 0) {
      throw new ConfigurationError(`Invalid rate limit for ${sourceId}: ${problems.join("; ")}`, problems);
    }

    const key = this.keyOf(sourceId);
    this.overrides.set(key, { ...limit });
    this.retireIfStale(key);
    this.logger.debug(`Rate limit for ${sourceId}: ${limit.ratePerSecond}/s, burst ${limit.burst}`);
  }

  /**
   * Wait for a permit for one fetch attempt. Rejects with AbortedError if `signal` fires first.
   */
  async acquire(sourceId: string, signal?: AbortSignal): Promise<RateLimitPermit> {
    const permit = await this.bucketFor(sourceId).acquire(signal);
    this.incrementCounter(`permits_${this.keyOf(sourceId)}`);
    return permit;
  }

  getLimit(sourceId: string): RateLimitConfig {
    return { ...(this.overrides.get(this.keyOf(sourceId)) ?? this.config.defaultLimit) };
  }

  getStats(): RateLimiterStats[] {
    return [...this.buckets.values()].map(bucket => bucket.getStats());
  }

  override async cleanup(): Promise<void> {
    for (const bucket of this.buckets.values()) {
      bucket.dispose();
    }
    this.buckets.clear();
  }

  private bucketFor(sourceId: string): TokenBucket {
    const key = this.keyOf(sourceId);
    this.retireIfStale(key);
    let bucket = this.buckets.get(key);
    if (!bucket) {
      bucket = new TokenBucket(key, this.getLimit(key));
      this.buckets.set(key, bucket);
    }
    return bucket;
  }

  /**
   * Drop an idle bucket whose limit no longer matches the configured one
   */
  private retireIfStale(key: string): void {
    const bucket = this.buckets.get(key);
    if (!bucket) return;

    const limit = this.getLimit(key);
    const stale = bucket.config.ratePerSecond !== limit.ratePerSecond || bucket.config.burst !== limit.burst;
    const { inFlight, waiting } = bucket.getStats();
    if (stale && inFlight === 0 && waiting === 0) {
      bucket.dispose();
      this.buckets.delete(key);
    }
  }

  private keyOf(sourceId: string): string {
    return sourceId.toLowerCase();
  }
}
