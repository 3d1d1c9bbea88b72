/**
 * Unit tests for the built-in server middlewares
 */

import { afterEach, beforeEach, expect, test, vi } from "vitest";
import { RateLimiter } from "../concurrency/rate-limiter.ts";
import {
  AuthorizationError,
  RateLimitError,
  ReplayError,
  SenderMismatchError,
  ShapeError,
} from "../errors.ts";
import type { Request } from "../protocol/envelope.ts";
import type { ServerContext } from "../types.ts";
import { SchemaValidator } from "../validation/schema-validator.ts";
import { createAdminMiddleware } from "./admin.ts";
import { createLoggingMiddleware } from "./logging.ts";
import { createRateLimitMiddleware } from "./rate-limit.ts";
import { createSecurityMiddleware } from "./security.ts";
import { createValidationMiddleware } from "./validation.ts";

const NOW = 1_700_000_000_000;

beforeEach(() => {
  vi.useFakeTimers();
  vi.setSystemTime(NOW);
});

afterEach(() => {
  vi.useRealTimers();
});

function context(overrides: Partial<Request> = {}): ServerContext {
  return {
    senderId: "session-1",
    request: {
      requestId: "req-00000001",
      action: "move",
      timestamp: NOW,
      ...overrides,
    },
    cancelled: false,
    locals: {},
  };
}

const next = () => Promise.resolve();

// ── security ──────────────────────────────────────────────────

const security = createSecurityMiddleware({
  maxRequestAgeMs: 30_000,
  maxClockSkewMs: 5_000,
});

test("security - accepts a fresh request", async () => {
  const proceed = vi.fn(next);
  await security(context(), proceed);
  expect(proceed).toHaveBeenCalledTimes(1);
});

test("security - a request exactly maxRequestAge old is accepted", async () => {
  const proceed = vi.fn(next);
  await security(context({ timestamp: NOW - 30_000 }), proceed);
  expect(proceed).toHaveBeenCalledTimes(1);
});

test("security - one ms past maxRequestAge is expired", () => {
  const proceed = vi.fn(next);
  expect(() => security(context({ timestamp: NOW - 30_001 }), proceed)).toThrow(
    ReplayError,
  );
  expect(proceed).not.toHaveBeenCalled();
});

test("security - timestamps too far in the future are expired", () => {
  expect(() => security(context({ timestamp: NOW + 5_001 }), next)).toThrow(
    "Request expired",
  );
});

test("security - claimed sender must match the channel sender", () => {
  expect(() => security(context({ senderId: "session-2" }), next)).toThrow(
    SenderMismatchError,
  );
});

test("security - matching claimed sender passes", async () => {
  const proceed = vi.fn(next);
  await security(context({ senderId: "session-1" }), proceed);
  expect(proceed).toHaveBeenCalledTimes(1);
});

// ── rate limit ────────────────────────────────────────────────

test("rate limit - rejects once the sender's window is full", async () => {
  const limiter = new RateLimiter({ maxRequests: 2, windowMs: 1000 });
  const rateLimit = createRateLimitMiddleware(limiter);
  const proceed = vi.fn(next);

  await rateLimit(context(), proceed);
  await rateLimit(context(), proceed);

  let caught: unknown;
  try {
    await rateLimit(context(), proceed);
  } catch (error) {
    caught = error;
  }

  expect(caught).toBeInstanceOf(RateLimitError);
  expect(caught).toMatchObject({ retryAfterMs: 1000 });
  expect(proceed).toHaveBeenCalledTimes(2);
});

// ── admin ─────────────────────────────────────────────────────

test("admin - lets admins through", async () => {
  const admin = createAdminMiddleware((id) => id === "session-1");
  const proceed = vi.fn(next);

  await admin(context(), proceed);
  expect(proceed).toHaveBeenCalledTimes(1);
});

test("admin - rejects everyone else", async () => {
  const admin = createAdminMiddleware(async () => false);
  const proceed = vi.fn(next);

  await expect(admin(context(), proceed)).rejects.toBeInstanceOf(
    AuthorizationError,
  );
  expect(proceed).not.toHaveBeenCalled();
});

test("admin - a throwing predicate denies", async () => {
  const admin = createAdminMiddleware(() => {
    throw new Error("directory offline");
  });

  await expect(admin(context(), next)).rejects.toThrow("Unauthorized");
});

// ── validation ────────────────────────────────────────────────

test("validation - rejects payloads that break the action schema", () => {
  const validator = new SchemaValidator();
  validator.addSchema("move", {
    type: "object",
    properties: { x: { type: "integer" } },
    required: ["x"],
  });
  const validation = createValidationMiddleware(validator);

  let caught: unknown;
  try {
    validation(context({ payload: { x: "left" } }), next);
  } catch (error) {
    caught = error;
  }

  expect(caught).toBeInstanceOf(ShapeError);
  expect(caught).toMatchObject({
    message: "Invalid data format",
    reason: "schema: Property /x must be integer",
  });
});

test("validation - passes actions without a schema", async () => {
  const validation = createValidationMiddleware(new SchemaValidator());
  const proceed = vi.fn(next);

  await validation(context({ payload: "anything" }), proceed);
  expect(proceed).toHaveBeenCalledTimes(1);
});

// ── logging ───────────────────────────────────────────────────

test("logging - logs entry and outcome without changing it", async () => {
  const lines: string[] = [];
  const logging = createLoggingMiddleware((msg) => lines.push(msg));
  const ctx = context();

  await logging(ctx, async () => {
    ctx.response = { requestId: "req-00000001", success: false, error: "Blocked" };
  });

  expect(lines).toHaveLength(2);
  expect(lines[0]).toBe("→ move from session-1 [req-00000001]");
  expect(lines[1]).toMatch(/^← move failed: Blocked \(\d+ms\)$/);
  expect(ctx.response).toEqual({
    requestId: "req-00000001",
    success: false,
    error: "Blocked",
  });
});
