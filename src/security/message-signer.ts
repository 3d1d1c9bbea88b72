/**
 * HMAC-SHA256 Envelope Signer
 *
 * Signs and verifies request envelopes exchanged over a channel.
 * Each signed request gains `_hmac` (signature) and `_seq` (monotonic
 * counter) fields for authentication and anti-replay protection.
 *
 * HMAC payload: `"${_seq}:${requestId}:${action}:${timestamp}:${JSON.stringify(payload ?? null)}"`
 *
 * @module bastion/security/message-signer
 */

import { createHmac, randomBytes, timingSafeEqual } from "node:crypto";
import type { Request } from "../protocol/envelope.ts";

const SECRET_PATTERN = /^[0-9a-f]{64}$/;

/** Result of verifying a signed request. */
export type VerifyResult =
  | { valid: true; request: Request }
  | { valid: false; request: Request; error: string };

/**
 * Build the canonical HMAC payload string.
 */
export function buildHmacPayload(request: Request, seq: number): string {
  const body = JSON.stringify(request.payload ?? null);
  return `${seq}:${request.requestId}:${request.action}:${request.timestamp}:${body}`;
}

/**
 * Remove the signing fields from a request.
 */
export function stripSignature(request: Request): Request {
  const { _hmac: _ignoredHmac, _seq: _ignoredSeq, ...clean } = request;
  return clean;
}

/**
 * HMAC-SHA256 signer/verifier for one sender's channel.
 *
 * Keeps separate sequence counters for the send and receive directions.
 *
 * @example
 * ```ts
 * const signer = new MessageSigner(secretHex);
 * const signed = signer.sign(buildRequest("ping", undefined, "session-1"));
 * const result = otherSide.verify(signed);
 * ```
 */
export class MessageSigner {
  private readonly key: Buffer;
  private sendSeq = 0;
  private lastRecvSeq = -1;

  /**
   * Generate a 32-byte random hex secret for channel authentication.
   *
   * @returns 64-character lowercase hex string
   */
  static generateSecret(): string {
    return randomBytes(32).toString("hex");
  }

  constructor(secretHex: string) {
    if (!SECRET_PATTERN.test(secretHex)) {
      throw new Error(
        "[MessageSigner] Invalid secret: expected 64-char lowercase hex string. " +
          "Use MessageSigner.generateSecret() to create one.",
      );
    }
    this.key = Buffer.from(secretHex, "hex");
  }

  /** Sign a request by adding `_hmac` and `_seq` fields. */
  sign(request: Request): Request {
    const clean = stripSignature(request);
    const seq = this.sendSeq++;
    return { ...clean, _seq: seq, _hmac: this.digest(clean, seq) };
  }

  /**
   * Verify a signed request and strip `_hmac`/`_seq`.
   *
   * Rejects if: missing fields, replay (seq <= last seen), HMAC mismatch.
   */
  verify(request: Request): VerifyResult {
    const { _hmac, _seq } = request;
    const clean = stripSignature(request);

    if (_hmac === undefined || _seq === undefined) {
      return {
        valid: false,
        request: clean,
        error: "Missing _hmac or _seq field",
      };
    }
    if (_seq <= this.lastRecvSeq) {
      return {
        valid: false,
        request: clean,
        error: `Replay detected: _seq=${_seq} <= lastRecvSeq=${this.lastRecvSeq}`,
      };
    }

    const expected = Buffer.from(this.digest(clean, _seq), "hex");
    const actual = /^[0-9a-fA-F]+$/.test(_hmac)
      ? Buffer.from(_hmac, "hex")
      : Buffer.alloc(0);
    if (
      actual.length !== expected.length || !timingSafeEqual(actual, expected)
    ) {
      return { valid: false, request: clean, error: "HMAC signature mismatch" };
    }

    this.lastRecvSeq = _seq;
    return { valid: true, request: clean };
  }

  /** Reset sequence counters (for testing). */
  reset(): void {
    this.sendSeq = 0;
    this.lastRecvSeq = -1;
  }

  private digest(request: Request, seq: number): string {
    return createHmac("sha256", this.key)
      .update(buildHmacPayload(request, seq))
      .digest("hex");
  }
}
