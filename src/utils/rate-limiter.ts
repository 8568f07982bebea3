/**
 * Rate Limiter - token bucket shared by every request a collector makes
 *
 * Waiters are served strictly in arrival order: each acquire() chains onto the
 * previous one, so concurrent workers cannot overdraw the bucket.
 */

export interface RateLimiterOptions {
  // Tokens added per second
  refillRate: number
  // Maximum tokens (burst capacity)
  capacity?: number
  now?: () => number
  sleep?: (ms: number) => Promise<void>
}

export class RateLimiter {
  private tokens: number
  private readonly capacity: number
  private readonly refillRate: number
  private lastRefill: number
  private tail: Promise<void> = Promise.resolve()
  private readonly now: () => number
  private readonly sleep: (ms: number) => Promise<void>

  constructor(options: RateLimiterOptions) {
    if (!(options.refillRate > 0)) {
      throw new RangeError('refillRate must be positive')
    }
    this.refillRate = options.refillRate
    this.capacity = Math.max(1, options.capacity ?? 1)
    this.tokens = this.capacity
    this.now = options.now ?? Date.now
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)))
    this.lastRefill = this.now()
  }

  /**
   * Acquire a token, waiting for the bucket to refill if necessary
   */
  acquire(): Promise<void> {
    const turn = this.tail.then(() => this.take())
    this.tail = turn.catch(() => undefined)
    return turn
  }

  /**
   * Tokens currently available (after refill), for diagnostics
   */
  available(): number {
    this.refill()
    return this.tokens
  }

  private async take(): Promise<void> {
    this.refill()

    while (this.tokens < 1) {
      const waitMs = Math.max(1, Math.ceil(((1 - this.tokens) / this.refillRate) * 1000))
      await this.sleep(waitMs)
      this.refill()
    }

    this.tokens -= 1
  }

  private refill(): void {
    const now = this.now()
    const elapsedSeconds = (now - this.lastRefill) / 1000
    this.tokens = Math.min(this.capacity, this.tokens + elapsedSeconds * this.refillRate)
    this.lastRefill = now
  }
}
