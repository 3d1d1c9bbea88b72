/**
 * Request logging middleware (observer only).
 *
 * @module bastion/middleware/logging
 */

import type { ClientMiddleware, ServerMiddleware } from "../types.ts";
import type { Response } from "../protocol/envelope.ts";

function describeOutcome(
  response: Response | undefined,
  cancelled: boolean,
): string {
  if (response) {
    return response.success ? "ok" : `failed: ${response.error}`;
  }
  return cancelled ? "cancelled" : "error";
}

/**
 * Create a server logging middleware.
 *
 * Logs one line when a request enters and one when it leaves, e.g.
 * `→ move from session-1 [req-1]` / `← move ok (3ms)`.
 * Never changes the outcome.
 */
export function createLoggingMiddleware(
  log: (message: string) => void,
): ServerMiddleware {
  return async (ctx, next) => {
    const { action, requestId } = ctx.request;
    const start = performance.now();
    log(`→ ${action} from ${ctx.senderId} [${requestId}]`);
    try {
      await next();
    } finally {
      const ms = Math.round(performance.now() - start);
      log(`← ${action} ${describeOutcome(ctx.response, ctx.cancelled)} (${ms}ms)`);
    }
  };
}

/**
 * Create a client logging middleware.
 *
 * Logs every attempt, e.g. `→ move #1` / `← move ok (12ms)`; local
 * failures such as a timeout are logged by their message.
 */
export function createClientLoggingMiddleware(
  log: (message: string) => void,
): ClientMiddleware {
  return async (ctx, next) => {
    const start = performance.now();
    log(`→ ${ctx.action} #${ctx.attempt}`);
    try {
      await next();
    } finally {
      const ms = Math.round(performance.now() - start);
      const outcome = ctx.failure
        ? `failed: ${ctx.failure.message}`
        : describeOutcome(ctx.response, ctx.cancelled);
      log(`← ${ctx.action} ${outcome} (${ms}ms)`);
    }
  };
}
