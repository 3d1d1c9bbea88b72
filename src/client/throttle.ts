/**
 * Client throttle middleware.
 *
 * @module bastion/client/throttle
 */

import { ThrottledError } from "../errors.ts";
import type { ClientMiddleware, ThrottleOptions } from "../types.ts";
import { delay } from "./delay.ts";

/**
 * Create a per-action throttle.
 *
 * Behavior depends on `options.mode`:
 * - `'reject'`: fails with ThrottledError when the previous request for
 *   the same action left less than `intervalMs` ago
 * - `'wait'` (default): delays the request until the interval elapsed;
 *   queued requests are spaced `intervalMs` apart; a request cancelled
 *   while waiting releases its slot
 *
 * Throttle state belongs to the middleware instance, so each client
 * engine (or each `createThrottleMiddleware()` call) spaces independently.
 */
export function createThrottleMiddleware(
  options: ThrottleOptions,
): ClientMiddleware {
  const { intervalMs } = options;
  const mode = options.mode ?? "wait";
  if (!Number.isFinite(intervalMs) || intervalMs < 0) {
    throw new Error("[Throttle] intervalMs must be a non-negative number");
  }

  // action -> time the last request was (or will be) let through
  const lastSent = new Map<string, number>();

  return async (ctx, next) => {
    const now = Date.now();
    const last = lastSent.get(ctx.action);
    const wait = last === undefined ? 0 : last + intervalMs - now;

    if (wait <= 0) {
      lastSent.set(ctx.action, now);
      await next();
      return;
    }

    if (mode === "reject") {
      throw new ThrottledError(ctx.action, wait);
    }

    const slot = now + wait;
    lastSent.set(ctx.action, slot);
    await delay(wait, ctx.signal);

    if (ctx.signal.aborted) {
      // Give the slot back unless a later request already queued behind it
      if (lastSent.get(ctx.action) === slot) {
        if (last === undefined) lastSent.delete(ctx.action);
        else lastSent.set(ctx.action, last);
      }
      return;
    }
    await next();
  };
}
