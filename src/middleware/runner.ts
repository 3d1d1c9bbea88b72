/**
 * Middleware pipeline runner.
 *
 * Composes an array of middlewares into a single callable function
 * using the onion model: each middleware wraps the next.
 *
 * @module bastion/middleware/runner
 */

import type {
  Middleware,
  MiddlewareRunner,
  PipelineContext,
  TerminalAction,
} from "./types.ts";

/**
 * Raised when a pipeline run produced no outcome: no step set a
 * response or cancelled, and the terminal action was never reached.
 */
export class PipelineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PipelineError";
  }
}

function isSettled(ctx: PipelineContext): boolean {
  return ctx.cancelled || ctx.response !== undefined;
}

/**
 * Create a middleware runner that composes middlewares + a terminal action.
 *
 * Execution order (onion model):
 * ```
 * m1-before → m2-before → terminal → m2-after → m1-after
 * ```
 *
 * `next()` does nothing once the context carries a response or is
 * cancelled, so at most one outcome is produced per run. A step may call
 * `next()` again after clearing the outcome; the remainder of the chain
 * then runs again (client retry relies on this).
 *
 * @param middlewares - Middleware functions, executed in order
 * @param terminal - Final action (handler invocation or network send)
 *
 * @example
 * ```typescript
 * const run = createMiddlewareRunner(
 *   [securityMiddleware, rateLimitMiddleware],
 *   async (ctx) => { ctx.response = await invoke(ctx); },
 * );
 * const ctx = await run(context);
 * ```
 */
export function createMiddlewareRunner<C extends PipelineContext>(
  middlewares: readonly Middleware<C>[],
  terminal: TerminalAction<C>,
): MiddlewareRunner<C> {
  const chain = [...middlewares];

  return async (ctx: C): Promise<C> => {
    let terminalReached = false;

    const dispatch = async (index: number): Promise<void> => {
      if (isSettled(ctx)) return;
      if (index < chain.length) {
        await chain[index](ctx, () => dispatch(index + 1));
        return;
      }
      terminalReached = true;
      await terminal(ctx);
    };

    await dispatch(0);

    if (!terminalReached && !isSettled(ctx)) {
      throw new PipelineError(
        "[MiddlewareRunner] Pipeline ended without an outcome. " +
          "A middleware returned without calling next(), setting a response or cancelling.",
      );
    }
    return ctx;
  };
}
