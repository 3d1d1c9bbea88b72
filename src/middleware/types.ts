/**
 * Middleware pipeline types.
 *
 * Onion-model middleware (similar to Koa/Hono) shared by the server
 * router and the client engine, generic over the context type. Each
 * middleware wraps the next and may short-circuit by not calling it.
 *
 * @module bastion/middleware/types
 */

import type { Response } from "../protocol/envelope.ts";

/**
 * Minimal context contract the runner relies on.
 * Once `cancelled` or `response` is set, downstream steps and the
 * terminal action do not run.
 */
export interface PipelineContext {
  cancelled: boolean;
  response?: Response;
}

/**
 * Function to invoke the rest of the chain (then the terminal action).
 */
export type NextFunction = () => Promise<void>;

/**
 * A middleware step.
 *
 * @example
 * ```typescript
 * const timing: Middleware<ServerContext> = async (ctx, next) => {
 *   const start = performance.now();
 *   await next();
 *   ctx.locals.durationMs = performance.now() - start;
 * };
 * ```
 */
export type Middleware<C extends PipelineContext> = (
  ctx: C,
  next: NextFunction,
) => Promise<void> | void;

/**
 * Final action run after every middleware called `next()`.
 */
export type TerminalAction<C extends PipelineContext> = (
  ctx: C,
) => Promise<void>;

/**
 * Composed pipeline: runs the chain and resolves with the same context.
 */
export type MiddlewareRunner<C extends PipelineContext> = (
  ctx: C,
) => Promise<C>;
