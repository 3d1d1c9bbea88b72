/**
 * Admin gate middleware.
 *
 * @module bastion/middleware/admin
 */

import { AuthorizationError } from "../errors.ts";
import type { AdminPredicate, ServerMiddleware } from "../types.ts";

/**
 * Create a middleware that only lets admin senders through.
 *
 * Attached per action by `router.handle(action, handler, { admin: true })`,
 * or by hand with `router.useForAction(action, createAdminMiddleware(isAdmin))`.
 * A predicate that throws counts as a denial.
 *
 * @param isAdmin - Host-supplied predicate (may be async)
 */
export function createAdminMiddleware(
  isAdmin: AdminPredicate,
): ServerMiddleware {
  return async (ctx, next) => {
    let allowed = false;
    try {
      allowed = await isAdmin(ctx.senderId);
    } catch (error) {
      throw new AuthorizationError(ctx.request.action, { cause: error });
    }
    if (!allowed) {
      throw new AuthorizationError(ctx.request.action);
    }
    await next();
  };
}
