/**
 * Rate limiting middleware.
 *
 * @module bastion/middleware/rate-limit
 */

import type { RateLimiter } from "../concurrency/rate-limiter.ts";
import { RateLimitError } from "../errors.ts";
import type { ServerMiddleware } from "../types.ts";

/**
 * Create a per-sender rate limiting middleware.
 *
 * Counts every request that reaches it against the sender's window and
 * rejects with "Rate limit exceeded" once the window is full. The
 * handler is not invoked for a rejected request.
 *
 * @param limiter - RateLimiter instance (shared with the router so
 *   `disconnect()` can clear it)
 */
export function createRateLimitMiddleware(
  limiter: RateLimiter,
): ServerMiddleware {
  return (ctx, next) => {
    if (!limiter.allow(ctx.senderId)) {
      throw new RateLimitError(limiter.getTimeUntilReset(ctx.senderId));
    }
    return next();
  };
}
