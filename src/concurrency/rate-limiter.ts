/**
 * Rate Limiter
 *
 * Fixed-window rate limiter for per-sender request throttling.
 *
 * @module bastion/concurrency/rate-limiter
 */

interface WindowState {
  count: number;
  windowStart: number;
}

/**
 * Fixed-window rate limiter
 *
 * - One `{ count, windowStart }` pair per sender, created lazily
 * - O(1) memory per sender; bursts up to 2N are possible across a
 *   window boundary
 * - State for a sender lives until `clear()` (wired to disconnect)
 *
 * @example
 * ```typescript
 * const limiter = new RateLimiter({ maxRequests: 30, windowMs: 1000 });
 *
 * if (!limiter.allow("session-123")) {
 *   // reject
 * }
 * ```
 */
export class RateLimiter {
  private windows = new Map<string, WindowState>();
  private readonly windowMs: number;
  private readonly maxRequests: number;

  constructor(options: { maxRequests: number; windowMs: number }) {
    if (!(options.maxRequests > 0) || !(options.windowMs > 0)) {
      throw new Error(
        "[RateLimiter] maxRequests and windowMs must be positive numbers",
      );
    }
    this.maxRequests = options.maxRequests;
    this.windowMs = options.windowMs;
  }

  /**
   * Count a request for the sender and decide whether it may proceed.
   *
   * @param key - Sender identity
   * @returns true if allowed, false if rate limited
   */
  allow(key: string): boolean {
    const now = Date.now();
    const state = this.windows.get(key);

    if (!state || now - state.windowStart >= this.windowMs) {
      this.windows.set(key, { count: 1, windowStart: now });
      return true;
    }

    state.count++;
    return state.count <= this.maxRequests;
  }

  /**
   * Requests counted in the sender's current window (0 once it elapsed)
   */
  getCurrentCount(key: string): number {
    const state = this.windows.get(key);
    if (!state || Date.now() - state.windowStart >= this.windowMs) return 0;
    return state.count;
  }

  /**
   * Get remaining requests for a sender in the current window
   */
  getRemainingRequests(key: string): number {
    return Math.max(0, this.maxRequests - this.getCurrentCount(key));
  }

  /**
   * Time until the sender's window resets (in ms).
   * Returns 0 if a request would be allowed now.
   */
  getTimeUntilReset(key: string): number {
    const state = this.windows.get(key);
    if (!state || state.count < this.maxRequests) return 0;
    return Math.max(0, state.windowStart + this.windowMs - Date.now());
  }

  /**
   * Drop the state for a sender (session teardown)
   */
  clear(key: string): void {
    this.windows.delete(key);
  }

  /**
   * Drop all state
   */
  clearAll(): void {
    this.windows.clear();
  }

  /**
   * Get metrics for monitoring
   */
  getMetrics(): { keys: number; totalRequests: number } {
    let totalRequests = 0;
    for (const key of this.windows.keys()) {
      totalRequests += this.getCurrentCount(key);
    }
    return { keys: this.windows.size, totalRequests };
  }
}
