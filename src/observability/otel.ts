/**
 * OpenTelemetry integration
 *
 * Provides tracing for dispatches and security rejections.
 *
 * Enable with: OTEL_ENABLED=true node ...
 * (spans go nowhere unless the host registers an OTel SDK)
 *
 * @module bastion/observability/otel
 */

import {
  type Span,
  SpanStatusCode,
  trace,
  type Tracer,
} from "@opentelemetry/api";
import { env } from "../runtime/runtime.ts";

let routerTracer: Tracer | null = null;

/**
 * Get or create the router tracer
 */
export function getRouterTracer(): Tracer {
  if (!routerTracer) {
    routerTracer = trace.getTracer("bastion.router", "0.1.0");
  }
  return routerTracer;
}

/**
 * Span attributes for a dispatch
 */
export interface DispatchSpanAttributes {
  "rpc.action": string;
  "rpc.router.name"?: string;
  "rpc.sender.id"?: string;
  "rpc.request.id"?: string;
  [key: string]: string | number | boolean | undefined;
}

/**
 * Start a span for a dispatch.
 * Caller MUST call endDispatchSpan() when done.
 */
export function startDispatchSpan(
  action: string,
  attributes: DispatchSpanAttributes,
): Span {
  const tracer = getRouterTracer();
  return tracer.startSpan(`rpc.dispatch ${action}`, { attributes });
}

/**
 * Record a dispatch result on a span and end it.
 */
export function endDispatchSpan(
  span: Span,
  success: boolean,
  durationMs: number,
  error?: string,
): void {
  span.setAttribute("rpc.duration_ms", durationMs);
  span.setAttribute("rpc.success", success);

  if (error) {
    span.setAttribute("rpc.error", error);
  }

  span.setStatus({
    code: success ? SpanStatusCode.OK : SpanStatusCode.ERROR,
    message: error,
  });
  span.end();
}

/**
 * Record a security rejection as a fire-and-forget span.
 */
export function recordSecurityEvent(
  event: "replay" | "sender_mismatch" | "invalid_signature" | "unauthorized",
  attributes: Record<string, string | number | boolean | undefined>,
): void {
  const tracer = getRouterTracer();
  tracer.startActiveSpan(`rpc.security.${event}`, { attributes }, (span) => {
    span.setStatus({ code: SpanStatusCode.ERROR });
    span.end();
  });
}

/**
 * Check if OTEL is enabled (OTEL_ENABLED=true).
 */
export function isOtelEnabled(): boolean {
  return env("OTEL_ENABLED") === "true";
}
