/**
 * Client retry middleware.
 *
 * @module bastion/client/retry
 */

import { TimeoutError } from "../errors.ts";
import type { ClientContext, ClientMiddleware, RetryOptions } from "../types.ts";
import { delay } from "./delay.ts";

/**
 * Whether the current attempt ended in a failure worth re-issuing:
 * a timeout or a failure Response.
 */
export function isRetryable(ctx: ClientContext): boolean {
  if (ctx.failure) return ctx.failure instanceof TimeoutError;
  return ctx.response !== undefined && !ctx.response.success;
}

/**
 * Backoff before attempt `attempt + 1`: min(base * 2^(attempt-1), max)
 */
export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
): number {
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

/**
 * Create a retry middleware.
 *
 * Re-runs the rest of the chain (fresh request id and timestamp each
 * time) until an attempt succeeds or `maxAttempts` attempts were made.
 * Only the last attempt's outcome reaches the caller.
 *
 * @example
 * ```typescript
 * client.use(createRetryMiddleware({ maxAttempts: 3, baseDelayMs: 50 }));
 * ```
 */
export function createRetryMiddleware(options: RetryOptions): ClientMiddleware {
  const { maxAttempts } = options;
  const baseDelayMs = options.baseDelayMs ?? 100;
  const maxDelayMs = options.maxDelayMs ?? 2000;
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new Error("[Retry] maxAttempts must be a positive integer");
  }

  return async (ctx, next) => {
    await next();

    while (isRetryable(ctx) && ctx.attempt < maxAttempts && !ctx.cancelled) {
      await delay(backoffDelay(ctx.attempt, baseDelayMs, maxDelayMs), ctx.signal);
      if (ctx.cancelled) return;

      ctx.response = undefined;
      ctx.failure = undefined;
      ctx.request = undefined;
      ctx.attempt++;
      await next();
    }
  };
}
