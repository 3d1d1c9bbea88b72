/**
 * Schema validation middleware.
 *
 * Validates action payloads against JSON Schema before execution.
 *
 * @module bastion/middleware/validation
 */

import { ShapeError } from "../errors.ts";
import type { ServerMiddleware } from "../types.ts";
import type { SchemaValidator } from "../validation/schema-validator.ts";

/**
 * Create a schema validation middleware.
 *
 * Validates `ctx.request.payload` against the schema registered for
 * `ctx.request.action`. Actions without a schema pass through. A
 * mismatch is answered with "Invalid data format"; the ajv details are
 * kept on the error's `reason` for diagnostics only.
 *
 * @param validator - SchemaValidator holding the per-action schemas
 *   (the router passes the one `handle()` registers into)
 */
export function createValidationMiddleware(
  validator: SchemaValidator,
): ServerMiddleware {
  return (ctx, next) => {
    const { action, payload } = ctx.request;
    const result = validator.validate(action, payload);
    if (!result.valid) {
      const details = result.errors.map((e) => e.message).join("; ");
      throw new ShapeError(`schema: ${details}`);
    }
    return next();
  };
}
