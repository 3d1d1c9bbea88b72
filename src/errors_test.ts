/**
 * Tests for the error taxonomy
 */

import { expect, test } from "vitest";
import {
  AuthorizationError,
  BackpressureError,
  describeError,
  HandlerError,
  RateLimitError,
  RemoteError,
  ReplayError,
  RpcError,
  SenderMismatchError,
  ShapeError,
  SignatureError,
  TimeoutError,
  UnknownActionError,
} from "./errors.ts";

test("server rejections carry their client-safe message and code", () => {
  const cases: Array<[RpcError, string, string]> = [
    [new ShapeError("invalid_action"), "invalid_shape", "Invalid data format"],
    [new ReplayError(40_000), "replay", "Request expired"],
    [new SenderMismatchError(), "sender_mismatch", "Sender mismatch"],
    [new SignatureError("HMAC signature mismatch"), "invalid_signature", "Invalid signature"],
    [new RateLimitError(300), "rate_limited", "Rate limit exceeded"],
    [new BackpressureError(), "busy", "Server busy"],
    [new AuthorizationError("kick"), "unauthorized", "Unauthorized"],
    [new UnknownActionError("fly"), "unknown_action", "Unknown action"],
    [new HandlerError(new Error("db down")), "handler_failed", "Operation failed"],
  ];

  for (const [error, code, message] of cases) {
    expect(error).toBeInstanceOf(RpcError);
    expect(error.code).toBe(code);
    expect(error.message).toBe(message);
  }
});

test("HandlerError - keeps the cause out of the message", () => {
  const cause = new Error("secret table name");
  const error = new HandlerError(cause);

  expect(error.message).toBe("Operation failed");
  expect(error.cause).toBe(cause);
});

test("TimeoutError - names the request and deadline", () => {
  const error = new TimeoutError("req-00000001", 250);
  expect(error.message).toBe("Request req-00000001 timed out after 250ms");
  expect(error.code).toBe("timeout");
});

test("RemoteError - message is exactly the response error", () => {
  const response = { requestId: "req-1", success: false, error: "Blocked" };
  const error = new RemoteError(response);

  expect(error.message).toBe("Blocked");
  expect(error.response).toBe(response);
});

test("describeError - formats non-errors", () => {
  expect(describeError("plain")).toBe("plain");
  expect(describeError(42)).toBe("42");
});
