/**
 * Wire envelopes shared by the server router and the client engine.
 *
 * Three message kinds travel over a channel:
 * - `Request`  client → server, correlated by `requestId`
 * - `Response` server → client, echoes the request's `requestId`
 * - `ServerEvent` server → client, never correlated
 *
 * @module bastion/protocol/envelope
 */

import { randomUUID } from "node:crypto";

/**
 * JSON-compatible payload value.
 */
export type Payload =
  | null
  | boolean
  | number
  | string
  | Payload[]
  | { [key: string]: Payload };

/**
 * A client request.
 *
 * `timestamp` is the sender's clock in ms since epoch and is only used
 * for staleness checks.
 */
export interface Request<P = unknown> {
  requestId: string;
  action: string;
  payload?: P;
  timestamp: number;
  senderId?: string;

  /** Monotonic signing sequence (present only on signed channels) */
  _seq?: number;

  /** HMAC-SHA256 hex signature (present only on signed channels) */
  _hmac?: string;
}

/**
 * A server response. `data` is meaningful only when `success` is true,
 * `error` only when it is false.
 */
export interface Response<D = unknown> {
  requestId: string;
  success: boolean;
  data?: D;
  error?: string;
}

/**
 * A server-initiated push message.
 */
export interface ServerEvent<P = unknown> {
  eventName: string;
  payload: P;
}

export type WireMessage = Request | Response | ServerEvent;

/**
 * What a handler returns.
 */
export type HandlerOutcome<D = unknown> =
  | { success: true; data?: D }
  | { success: false; error?: string };

/**
 * Generate a fresh request id.
 */
export function generateRequestId(): string {
  return randomUUID();
}

/**
 * Build a request stamped with a fresh id and the current time.
 */
export function buildRequest<P>(
  action: string,
  payload: P | undefined,
  senderId: string,
): Request<P> {
  const request: Request<P> = {
    requestId: generateRequestId(),
    action,
    timestamp: Date.now(),
    senderId,
  };
  if (payload !== undefined) request.payload = payload;
  return request;
}

/**
 * Build a response. Only the field matching `success` is carried.
 */
export function buildResponse<D>(
  success: boolean,
  data: D | undefined,
  error: string | undefined,
  requestId: string,
): Response<D> {
  if (success) {
    return data === undefined
      ? { requestId, success: true }
      : { requestId, success: true, data };
  }
  return { requestId, success: false, error: error ?? "Operation failed" };
}

export function buildEvent<P>(eventName: string, payload: P): ServerEvent<P> {
  return { eventName, payload };
}

/** Successful handler outcome. */
export function ok<D>(data?: D): HandlerOutcome<D> {
  return data === undefined ? { success: true } : { success: true, data };
}

/** Failed handler outcome with a client-safe message. */
export function fail(error: string): HandlerOutcome<never> {
  return { success: false, error };
}
