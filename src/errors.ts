/**
 * Error taxonomy.
 *
 * Every server-side rejection is an `RpcError` whose `message` is the
 * client-safe text placed in the response. Anything that is not an
 * `RpcError` is reported to diagnostics and answered with
 * "Operation failed".
 *
 * @module bastion/errors
 */

import type { Response } from "./protocol/envelope.ts";

export type RpcErrorCode =
  | "invalid_shape"
  | "replay"
  | "sender_mismatch"
  | "invalid_signature"
  | "rate_limited"
  | "busy"
  | "unauthorized"
  | "unknown_action"
  | "handler_failed"
  | "rejected"
  | "timeout"
  | "remote"
  | "throttled"
  | "closed";

/**
 * Base class for all errors raised by the messaging layer.
 */
export class RpcError extends Error {
  constructor(
    public readonly code: RpcErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RpcError";
  }
}

// ---------------------------------------------------------------------------
// Server-side rejections
// ---------------------------------------------------------------------------

export class ShapeError extends RpcError {
  constructor(public readonly reason: string) {
    super("invalid_shape", "Invalid data format");
    this.name = "ShapeError";
  }
}

export class ReplayError extends RpcError {
  constructor(public readonly ageMs: number) {
    super("replay", "Request expired");
    this.name = "ReplayError";
  }
}

export class SenderMismatchError extends RpcError {
  constructor() {
    super("sender_mismatch", "Sender mismatch");
    this.name = "SenderMismatchError";
  }
}

export class SignatureError extends RpcError {
  constructor(public readonly reason: string) {
    super("invalid_signature", "Invalid signature");
    this.name = "SignatureError";
  }
}

export class RateLimitError extends RpcError {
  constructor(public readonly retryAfterMs: number) {
    super("rate_limited", "Rate limit exceeded");
    this.name = "RateLimitError";
  }
}

export class BackpressureError extends RpcError {
  constructor() {
    super("busy", "Server busy");
    this.name = "BackpressureError";
  }
}

export class AuthorizationError extends RpcError {
  constructor(
    public readonly action: string,
    options?: { cause?: unknown },
  ) {
    super("unauthorized", "Unauthorized", options);
    this.name = "AuthorizationError";
  }
}

export class UnknownActionError extends RpcError {
  constructor(public readonly action: string) {
    super("unknown_action", "Unknown action");
    this.name = "UnknownActionError";
  }
}

export class HandlerError extends RpcError {
  constructor(cause?: unknown) {
    super("handler_failed", "Operation failed", { cause });
    this.name = "HandlerError";
  }
}

// ---------------------------------------------------------------------------
// Client-side failures
// ---------------------------------------------------------------------------

/**
 * No response arrived before the request deadline.
 * Distinct from `RemoteError`: the server never answered.
 */
export class TimeoutError extends RpcError {
  constructor(
    public readonly requestId: string,
    public readonly timeoutMs: number,
  ) {
    super("timeout", `Request ${requestId} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * The server answered with `success: false`. `message` is exactly the
 * response's `error`.
 */
export class RemoteError extends RpcError {
  constructor(public readonly response: Response) {
    super("remote", response.error ?? "Operation failed");
    this.name = "RemoteError";
  }
}

export class ThrottledError extends RpcError {
  constructor(
    public readonly action: string,
    public readonly retryAfterMs: number,
  ) {
    super("throttled", `Request throttled: ${action}`);
    this.name = "ThrottledError";
  }
}

export class ChannelClosedError extends RpcError {
  constructor() {
    super("closed", "Channel closed");
    this.name = "ChannelClosedError";
  }
}

/**
 * Format an unknown thrown value for diagnostics.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  return String(error);
}
