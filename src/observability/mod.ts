/**
 * Observability module
 *
 * - OTel tracing (spans on dispatches, security events)
 * - Metrics collection (counters, histograms, gauges)
 * - Prometheus text format export
 *
 * @module bastion/observability
 */

export {
  type DispatchSpanAttributes,
  endDispatchSpan,
  getRouterTracer,
  isOtelEnabled,
  recordSecurityEvent,
  startDispatchSpan,
} from "./otel.ts";

export {
  type Histogram,
  type RejectionReason,
  ServerMetrics,
  type ServerMetricsSnapshot,
} from "./metrics.ts";
