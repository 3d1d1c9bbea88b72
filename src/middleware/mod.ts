/**
 * Middleware engine.
 *
 * @module bastion/middleware
 */

export type {
  Middleware,
  MiddlewareRunner,
  NextFunction,
  PipelineContext,
  TerminalAction,
} from "./types.ts";

export { createMiddlewareRunner, PipelineError } from "./runner.ts";

// Built-in server steps
export { createSecurityMiddleware, type SecurityOptions } from "./security.ts";
export { createRateLimitMiddleware } from "./rate-limit.ts";
export { createAdminMiddleware } from "./admin.ts";
export { createValidationMiddleware } from "./validation.ts";
export {
  createClientLoggingMiddleware,
  createLoggingMiddleware,
} from "./logging.ts";
