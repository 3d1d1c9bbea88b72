/**
 * Type definitions for the router and the client engine
 *
 * @module bastion/types
 */

import type { SchemaObject } from "ajv";
import type { HandlerOutcome, Request, Response } from "./protocol/envelope.ts";
import type { Middleware } from "./middleware/types.ts";
import type { ClientChannel, ServerChannel } from "./transport/channel.ts";

/**
 * Diagnostic categories emitted by the core
 */
export type DiagnosticCategory =
  | "lifecycle"
  | "registry"
  | "security"
  | "rate-limit"
  | "dispatch"
  | "handler"
  | "request"
  | "event"
  | "transport";

/**
 * Diagnostics sink: receives named category/message pairs.
 * Handler failure causes are only ever reported here.
 */
export type DiagnosticsSink = (
  category: DiagnosticCategory,
  message: string,
) => void;

/**
 * Admin authorization predicate supplied by the host
 */
export type AdminPredicate = (
  senderId: string,
) => boolean | Promise<boolean>;

/**
 * Action handler.
 *
 * Receives the authenticated sender and the request payload and returns
 * an outcome. A thrown error becomes "Operation failed" on the wire.
 *
 * **Security**: the payload is untrusted client input. Only its
 * structure has been checked (plus the action schema, if one is set),
 * so narrow it before use.
 *
 * @example
 * ```typescript
 * const move: Handler<{ x: number; y: number }> = (senderId, payload) => {
 *   if (!isPosition(payload)) return fail("Bad position");
 *   return world.move(senderId, payload) ? ok(payload) : fail("Blocked");
 * };
 * ```
 */
export type Handler<D = unknown> = (
  senderId: string,
  payload: unknown,
) => HandlerOutcome<D> | Promise<HandlerOutcome<D>>;

/**
 * Options accepted by `ServerRouter.handle()`
 */
export interface HandleOptions {
  /** JSON Schema for the payload, checked by the validation middleware */
  schema?: SchemaObject;

  /** Gate the action behind the admin predicate */
  admin?: boolean;
}

/**
 * Handler registration owned by the router
 */
export interface HandlerRegistration {
  action: string;
  handler: Handler;
  schema?: SchemaObject;
  admin: boolean;
}

/**
 * Configuration options for ServerRouter
 */
export interface RouterOptions {
  /** Channel to the sessions */
  channel: ServerChannel;

  /** Name used in log lines (default: "bastion") */
  name?: string;

  /** Requests allowed per sender per window (default: 30) */
  maxRequestRate?: number;

  /** Rate limit window in ms (default: 1000) */
  rateLimitWindowMs?: number;

  /** Requests older than this are rejected as replays, in ms (default: 30000) */
  maxRequestAgeMs?: number;

  /** Tolerated sender clock lead, in ms (default: 5000) */
  maxClockSkewMs?: number;

  /** Gate the built-in rate-limit middleware (default: true) */
  enableRateLimiting?: boolean;

  /** Gate the built-in logging middleware (default: false) */
  enableRequestLogging?: boolean;

  /** Per-sender backlog before "Server busy" (default: 64) */
  maxQueuedPerSender?: number;

  /** Admin predicate used by `handle(..., { admin: true })` */
  isAdmin?: AdminPredicate;

  /**
   * Envelope signing. When `secretFor` returns a secret for a sender,
   * every request from that sender must carry a valid `_hmac`/`_seq`.
   */
  signing?: { secretFor: (senderId: string) => string | undefined };

  /** Diagnostics sink (default: console.error) */
  logger?: DiagnosticsSink;
}

/**
 * Retry configuration for the client engine
 */
export interface RetryOptions {
  /** Total attempts including the first (default: 3) */
  maxAttempts: number;

  /** Delay before the second attempt, doubled each time (default: 100) */
  baseDelayMs?: number;

  /** Backoff cap (default: 2000) */
  maxDelayMs?: number;
}

/**
 * Throttle configuration for the client engine
 */
export interface ThrottleOptions {
  /** Minimum spacing between requests for the same action, in ms */
  intervalMs: number;

  /**
   * Behavior when a request comes too early
   * - 'reject': fail with ThrottledError
   * - 'wait': delay until the interval elapsed (default)
   */
  mode?: "reject" | "wait";
}

/**
 * Configuration options for ClientEngine
 */
export interface ClientOptions {
  /** Channel to the server */
  channel: ClientChannel;

  /** This session's identity, stamped on every request */
  sessionId: string;

  /** Name used in log lines (default: "bastion-client") */
  name?: string;

  /** Deadline per attempt, in ms (default: 10000) */
  requestTimeoutMs?: number;

  /** Built-in throttle middleware (off when omitted) */
  throttle?: ThrottleOptions;

  /** Built-in retry middleware (off when omitted) */
  retry?: RetryOptions;

  /** Gate the built-in logging middleware (default: false) */
  enableRequestLogging?: boolean;

  /** Hex secret for envelope signing (must match the server's) */
  signingSecret?: string;

  /** Diagnostics sink (default: console.error) */
  logger?: DiagnosticsSink;
}

/**
 * Callback for server-initiated events. The payload comes from the
 * server but is still narrowed by the subscriber.
 */
export type EventCallback = (payload: unknown) => void | Promise<void>;

/**
 * Per-request context flowing through the server pipeline
 */
export interface ServerContext {
  /** Channel-authenticated session id */
  senderId: string;

  /** Shape-checked request (signing fields removed) */
  request: Request;

  /** Registration for the action, when one exists */
  registration?: HandlerRegistration;

  cancelled: boolean;
  response?: Response;

  /** Scratch space for middleware */
  locals: Record<string, unknown>;
}

/**
 * Per-call context flowing through the client pipeline
 */
export interface ClientContext {
  sessionId: string;
  action: string;
  payload: unknown;

  /** Request of the current attempt (rebuilt on every attempt) */
  request?: Request;

  /** 1-based attempt counter */
  attempt: number;

  cancelled: boolean;
  response?: Response;

  /** Local failure (timeout, closed channel, send error) */
  failure?: Error;

  /** Aborted when the caller cancels; waits in middleware should honor it */
  signal: AbortSignal;

  locals: Record<string, unknown>;
}

/** Middleware step on the server pipeline */
export type ServerMiddleware = Middleware<ServerContext>;

/** Middleware step on the client pipeline */
export type ClientMiddleware = Middleware<ClientContext>;
