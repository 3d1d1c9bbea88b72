/**
 * Replay and sender-binding middleware.
 *
 * @module bastion/middleware/security
 */

import { ReplayError, SenderMismatchError } from "../errors.ts";
import type { ServerMiddleware } from "../types.ts";

export interface SecurityOptions {
  /** Requests older than this are rejected, in ms */
  maxRequestAgeMs: number;

  /** Tolerated lead of the sender's clock, in ms */
  maxClockSkewMs: number;
}

/**
 * Create the security middleware.
 *
 * - `now - timestamp > maxRequestAgeMs` → "Request expired"
 * - `timestamp - now > maxClockSkewMs` → "Request expired"
 * - `request.senderId` present and not the channel sender → "Sender mismatch"
 *
 * A request exactly `maxRequestAgeMs` old is still accepted.
 */
export function createSecurityMiddleware(
  options: SecurityOptions,
): ServerMiddleware {
  const { maxRequestAgeMs, maxClockSkewMs } = options;

  return (ctx, next) => {
    const { request, senderId } = ctx;
    const age = Date.now() - request.timestamp;

    if (age > maxRequestAgeMs || -age > maxClockSkewMs) {
      throw new ReplayError(age);
    }
    if (request.senderId !== undefined && request.senderId !== senderId) {
      throw new SenderMismatchError();
    }
    return next();
  };
}
