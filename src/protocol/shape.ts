/**
 * Structural validation of inbound envelopes.
 *
 * Pure functions: no state, never throw. Failures return a reason code
 * that is safe to log but is never sent to the client verbatim.
 *
 * @module bastion/protocol/shape
 */

import type { Request, Response, ServerEvent } from "./envelope.ts";

export type ShapeFailureReason =
  | "not_an_object"
  | "missing_request_id"
  | "invalid_request_id"
  | "invalid_action"
  | "invalid_timestamp"
  | "invalid_sender"
  | "invalid_signature_fields"
  | "invalid_payload";

export type ShapeResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: ShapeFailureReason };

const REQUEST_ID_PATTERN = /^[A-Za-z0-9_-]{8,128}$/;
const MAX_ACTION_LENGTH = 128;
const MAX_PAYLOAD_DEPTH = 32;
const FORBIDDEN_KEYS = new Set(["__proto__", "constructor", "prototype"]);

/**
 * Plain object check: rejects arrays, class instances and exotic objects.
 */
export function isPlainObject(
  value: unknown,
): value is Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Check that a payload is JSON-compatible and bounded in depth.
 */
export function isAllowedPayload(value: unknown, depth = 0): boolean {
  if (depth > MAX_PAYLOAD_DEPTH) return false;
  if (value === null) return true;

  switch (typeof value) {
    case "boolean":
    case "string":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      break;
    default:
      return false;
  }

  if (Array.isArray(value)) {
    return value.every((item) => isAllowedPayload(item, depth + 1));
  }
  if (!isPlainObject(value)) return false;

  for (const key of Object.keys(value)) {
    if (FORBIDDEN_KEYS.has(key)) return false;
    if (!isAllowedPayload(value[key], depth + 1)) return false;
  }
  return true;
}

/**
 * Validate the shape of an inbound request.
 *
 * Accepts iff `requestId`, `action` (non-empty string) and `timestamp`
 * (finite number) are present and well-formed. `payload` is optional.
 */
export function validateRequestShape(msg: unknown): ShapeResult<Request> {
  if (!isPlainObject(msg)) return { ok: false, reason: "not_an_object" };

  const { requestId, action, timestamp, senderId, payload, _seq, _hmac } = msg;

  if (requestId === undefined || requestId === null) {
    return { ok: false, reason: "missing_request_id" };
  }
  if (typeof requestId !== "string" || !REQUEST_ID_PATTERN.test(requestId)) {
    return { ok: false, reason: "invalid_request_id" };
  }
  if (
    typeof action !== "string" || action.length === 0 ||
    action.length > MAX_ACTION_LENGTH
  ) {
    return { ok: false, reason: "invalid_action" };
  }
  if (typeof timestamp !== "number" || !Number.isFinite(timestamp)) {
    return { ok: false, reason: "invalid_timestamp" };
  }
  if (senderId !== undefined && typeof senderId !== "string") {
    return { ok: false, reason: "invalid_sender" };
  }
  if (
    (_seq !== undefined && (!Number.isSafeInteger(_seq) || Number(_seq) < 0)) ||
    (_hmac !== undefined && typeof _hmac !== "string")
  ) {
    return { ok: false, reason: "invalid_signature_fields" };
  }
  if (payload !== undefined && !isAllowedPayload(payload)) {
    return { ok: false, reason: "invalid_payload" };
  }

  const request: Request = { requestId, action, timestamp };
  if (payload !== undefined) request.payload = payload;
  if (senderId !== undefined) request.senderId = senderId;
  if (typeof _seq === "number") request._seq = _seq;
  if (typeof _hmac === "string") request._hmac = _hmac;
  return { ok: true, value: request };
}

/**
 * Best-effort extraction of a request id from a message that failed
 * validation, so the rejection can still be correlated by the client.
 */
export function extractRequestId(msg: unknown): string {
  if (!isPlainObject(msg)) return "";
  const { requestId } = msg;
  return typeof requestId === "string" && REQUEST_ID_PATTERN.test(requestId)
    ? requestId
    : "";
}

/**
 * Validate the shape of an inbound response (client side).
 */
export function validateResponseShape(msg: unknown): ShapeResult<Response> {
  if (!isPlainObject(msg)) return { ok: false, reason: "not_an_object" };

  const { requestId, success, data, error } = msg;
  if (typeof requestId !== "string") {
    return { ok: false, reason: "invalid_request_id" };
  }
  if (typeof success !== "boolean") {
    return { ok: false, reason: "invalid_payload" };
  }
  if (error !== undefined && typeof error !== "string") {
    return { ok: false, reason: "invalid_payload" };
  }

  const response: Response = { requestId, success };
  if (success && data !== undefined) response.data = data;
  if (!success) response.error = error ?? "Operation failed";
  return { ok: true, value: response };
}

/**
 * A server event carries an `eventName` and no `requestId`.
 */
export function isServerEvent(msg: unknown): msg is ServerEvent {
  if (!isPlainObject(msg) || "requestId" in msg) return false;
  const { eventName } = msg;
  return typeof eventName === "string" && eventName.length > 0;
}
