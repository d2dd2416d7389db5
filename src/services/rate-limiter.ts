/**
 * Fixed minimum delay between consecutive calls to one provider. Sources that
 * talk to the same provider share an instance.
 */
export class RateLimiter {
  private lastRequestTime: number = 0;

  constructor(
    private readonly minRequestDelay: number = 1000,
    private readonly sleep: (ms: number) => Promise<void> = (ms) =>
      new Promise((resolve) => setTimeout(resolve, ms)),
    private readonly now: () => number = Date.now
  ) {}

  async wait(): Promise<void> {
    const timeSinceLastRequest = this.now() - this.lastRequestTime;
    if (this.lastRequestTime > 0 && timeSinceLastRequest < this.minRequestDelay) {
      await this.sleep(this.minRequestDelay - timeSinceLastRequest);
    }
    this.lastRequestTime = this.now();
  }
}

/**
 * One RateLimiter per provider name, so price, description and metadata calls
 * to the same provider are spaced together while different providers never
 * wait on each other.
 */
export class RateLimiters {
  private limiters = new Map<string, RateLimiter>();

  constructor(
    private readonly minRequestDelay: number = 1000,
    private readonly sleep?: (ms: number) => Promise<void>,
    private readonly now?: () => number
  ) {}

  for(provider: string): RateLimiter {
    let limiter = this.limiters.get(provider);
    if (!limiter) {
      limiter = new RateLimiter(this.minRequestDelay, this.sleep, this.now);
      this.limiters.set(provider, limiter);
    }
    return limiter;
  }
}
