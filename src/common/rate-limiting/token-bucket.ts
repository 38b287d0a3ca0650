import type { RateLimitConfig, RateLimiterStats, RateLimitPermit } from "../types/rate-limiting";
import { AbortedError } from "../utils/async.utils";

interface Waiter {
  resolve: (permit: RateLimitPermit) => void;
  reject: (error: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

/**
 * Token bucket with a concurrency ceiling.
 *
 * A permit needs one token (refilled at `ratePerSecond`, capped at `burst`) and a free slot
 * (at most `burst` permits outstanding). Waiters are served FIFO. All bookkeeping happens
 * synchronously inside `drain`, so grants and releases never interleave.
 */
export class TokenBucket {
  private tokens: number;
  private lastRefill: number;
  private inFlight = 0;
  private granted = 0;
  private readonly waiters: Waiter[] = [];
  private refillTimer?: NodeJS.Timeout;
  private disposed = false;

  constructor(
    readonly sourceId: string,
    readonly config: Readonly<RateLimitConfig>,
    private readonly now: () => number = Date.now
  ) {
    this.tokens = config.burst;
    this.lastRefill = now();
  }

  acquire(signal?: AbortSignal): Promise<RateLimitPermit> {
    if (this.disposed) {
      return Promise.reject(new AbortedError(`Rate limiter for ${this.sourceId} is shut down`));
    }
    if (signal?.aborted) {
      return Promise.reject(new AbortedError(`Rate limit wait for ${this.sourceId} aborted`));
    }

    return new Promise<RateLimitPermit>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal };
      if (signal) {
        waiter.onAbort = () => {
          this.removeWaiter(waiter);
          reject(new AbortedError(`Rate limit wait for ${this.sourceId} aborted`));
        };
        signal.addEventListener("abort", waiter.onAbort, { once: true });
      }
      this.waiters.push(waiter);
      this.drain();
    });
  }

  getStats(): RateLimiterStats {
    this.refill();
    return {
      sourceId: this.sourceId,
      availableTokens: Math.floor(this.tokens),
      inFlight: this.inFlight,
      waiting: this.waiters.length,
      granted: this.granted,
      config: { ...this.config },
    };
  }

  /**
   * Reject every waiter and stop refilling
   */
  dispose(): void {
    this.disposed = true;
    if (this.refillTimer) {
      clearTimeout(this.refillTimer);
      this.refillTimer = undefined;
    }
    for (const waiter of this.waiters.splice(0)) {
      this.detach(waiter);
      waiter.reject(new AbortedError(`Rate limiter for ${this.sourceId} is shut down`));
    }
  }

  private drain(): void {
    this.refill();

    while (this.inFlight < this.config.burst && this.tokens >= 1) {
      const waiter = this.waiters.shift();
      if (!waiter) break;

      this.tokens -= 1;
      this.inFlight += 1;
      this.granted += 1;
      this.detach(waiter);
      waiter.resolve(this.createPermit());
    }

    this.scheduleRefill();
  }

  private scheduleRefill(): void {
    // Slot-bound waiters are woken by release(); only token-bound ones need a timer
    if (this.disposed || this.refillTimer || this.waiters.length === 0) return;
    if (this.inFlight >= this.config.burst || this.tokens >= 1) return;

    const waitMs = Math.max(1, Math.ceil(((1 - this.tokens) / this.config.ratePerSecond) * 1000));
    this.refillTimer = setTimeout(() => {
      this.refillTimer = undefined;
      this.drain();
    }, waitMs);
  }

  private refill(): void {
    const now = this.now();
    const elapsedMs = Math.max(0, now - this.lastRefill);
    this.tokens = Math.min(this.config.burst, this.tokens + (elapsedMs / 1000) * this.config.ratePerSecond);
    this.lastRefill = now;
  }

  private createPermit(): RateLimitPermit {
    let released = false;
    return {
      sourceId: this.sourceId,
      acquiredAt: this.now(),
      release: () => {
        if (released) return;
        released = true;
        this.inFlight -= 1;
        if (!this.disposed) this.drain();
      },
    };
  }

  private removeWaiter(waiter: Waiter): void {
    const index = this.waiters.indexOf(waiter);
    if (index >= 0) {
      this.waiters.splice(index, 1);
    }
  }

  private detach(waiter: Waiter): void {
    if (waiter.signal && waiter.onAbort) {
      waiter.signal.removeEventListener("abort", waiter.onAbort);
    }
  }
}
